import { BaseError } from "../base-error"

class LookupError extends BaseError<"record_missing"> {}

describe("BaseError", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date("2025-03-02T08:00:00.000Z"))
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("carries code, message and operational defaults", () => {
    const err = new BaseError("article missing", { code: "not_found" })

    expect(err.message).toBe("article missing")
    expect(err.code).toBe("not_found")
    expect(err.context).toEqual({})
    expect(err.isRetryable).toBe(false)
    expect(err.isOperational).toBe(true)
    expect(err.timestamp).toEqual(new Date("2025-03-02T08:00:00.000Z"))
  })

  it("uses the subclass name", () => {
    const err = new LookupError("gone", { code: "record_missing" })

    expect(err.name).toBe("LookupError")
    expect(err).toBeInstanceOf(BaseError)
    expect(err).toBeInstanceOf(Error)
  })

  it("keeps the cause", () => {
    const cause = new Error("connection reset")
    const err = new BaseError("store read failed", { code: "store_unavailable", cause })

    expect(err.cause).toBe(cause)
  })

  it("freezes a copy of the context", () => {
    const context = { key: "article_7" }
    const err = new BaseError("stale", { code: "stale_entry", context })
    context.key = "article_8"

    expect(err.context).toEqual({ key: "article_7" })
    expect(Object.isFrozen(err.context)).toBe(true)
  })

  it("honours explicit flags", () => {
    const err = new BaseError("bad config", {
      code: "invalid_configuration",
      isRetryable: true,
      isOperational: false,
    })

    expect(err.isRetryable).toBe(true)
    expect(err.isOperational).toBe(false)
  })

  it("serializes through toJSON", () => {
    const err = new BaseError("article missing", {
      code: "not_found",
      context: { id: 3 },
      cause: new Error("no row"),
    })

    expect(JSON.parse(JSON.stringify(err))).toEqual({
      name: "BaseError",
      code: "not_found",
      message: "article missing",
      context: { id: 3 },
      isOperational: true,
      timestamp: "2025-03-02T08:00:00.000Z",
      cause: {
        name: "Error",
        code: "unknown",
        message: "no row",
        context: {},
        isOperational: false,
        timestamp: "2025-03-02T08:00:00.000Z",
      },
    })
  })
})
