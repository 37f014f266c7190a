import superjson from "superjson"
import type { Codec } from "../../ports/codec"

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * UTF-8 JSON codec that keeps `Date`, `bigint`, `Map`, `Set` and
 * `undefined` intact.
 *
 * `decode` does not validate. Parse the result before trusting its shape.
 */
export function createSuperjsonCodec<T>(): Codec<T> {
  return {
    encode: (value: T) => encoder.encode(superjson.stringify(value)),
    decode: (bytes: Uint8Array) => superjson.parse<T>(decoder.decode(bytes)),
  }
}
