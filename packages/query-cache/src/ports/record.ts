export type RecordId = string | number

/**
 * Describes a record type to the cache. `name` seeds the default namespace
 * (lowercased); `identifier` is the field holding the record's stable id.
 */
export type RecordModel<T extends object> = {
  readonly name: string
  readonly identifier: keyof T & string
}
