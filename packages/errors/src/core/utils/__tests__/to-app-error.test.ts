import { BaseError } from "../../base-error"
import { toAppError } from "../to-app-error"

describe("toAppError", () => {
  it("passes AppErrors through", () => {
    const err = new BaseError("missing", { code: "not_found" })

    expect(toAppError(err)).toBe(err)
  })

  it("wraps plain errors as non-operational", () => {
    const cause = new TypeError("undefined is not a function")
    const result = toAppError(cause)

    expect(result).toBeInstanceOf(BaseError)
    expect(result.code).toBe("unknown")
    expect(result.message).toBe("undefined is not a function")
    expect(result.cause).toBe(cause)
    expect(result.isOperational).toBe(false)
  })

  it("uses the fallback code", () => {
    expect(toAppError(new Error("x"), "upstream_failure").code).toBe("upstream_failure")
  })

  it("keeps thrown strings as the message", () => {
    const result = toAppError("disk full")

    expect(result.message).toBe("disk full")
    expect(result.context).toEqual({})
  })

  it("keeps other thrown values in context", () => {
    const result = toAppError(404)

    expect(result.message).toBe("Unknown error")
    expect(result.context).toEqual({ value: 404 })
  })
})
