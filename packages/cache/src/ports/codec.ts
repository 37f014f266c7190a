/**
 * Bidirectional transform between a typed value and bytes.
 *
 * Codecs sit between {@link DataCache} and byte-oriented adapters, which
 * treat codec output as opaque. Keep them pure and deterministic.
 *
 * @remarks
 * Plain JSON loses `Date`, `Map`, `Set` and `bigint`. Use
 * `createSuperjsonCodec` when those must survive.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array
  decode(bytes: Uint8Array): T
}
