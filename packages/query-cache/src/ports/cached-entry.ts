import { z } from "zod"

const recordIdSchema = z.union([z.string(), z.number()])

/**
 * A cached list: the identifiers that satisfied the query when it was
 * written, in result order. Records themselves are never stored.
 */
export const cachedCollectionEntrySchema = z.object({
  kind: z.literal("collection"),
  ids: z.array(recordIdSchema),
  suffix: z.string().nullable(),
  criteria: z.unknown(),
  storedAt: z.number(),
})

/** A cached detail lookup. The record is re-read by id on every hit. */
export const cachedDetailEntrySchema = z.object({
  kind: z.literal("detail"),
  id: recordIdSchema,
  storedAt: z.number(),
})

export const cachedEntrySchema = z.discriminatedUnion("kind", [
  cachedCollectionEntrySchema,
  cachedDetailEntrySchema,
])

export type CachedCollectionEntry = z.infer<typeof cachedCollectionEntrySchema>
export type CachedDetailEntry = z.infer<typeof cachedDetailEntrySchema>
export type CachedEntry = z.infer<typeof cachedEntrySchema>
