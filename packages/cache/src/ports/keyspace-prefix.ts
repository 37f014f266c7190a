/**
 * Prefix that scopes an adapter instance to its partition of a shared
 * keyspace, e.g. `catalog:prod:query-cache:`. Adapters prepend it verbatim.
 */
export type KeyspacePrefix = string
