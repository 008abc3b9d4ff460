/**
 * A prefix that scopes a remote store to a partition of a shared keyspace
 * (e.g. one Redis database used by several caches).
 *
 * @remarks
 * The adapter prepends it to every key it sends: `app:prod:cache:` turns the
 * cache key `users:1` into `app:prod:cache:users:1`. `FLUSHALL` is not
 * scoped by the prefix.
 */
export type KeyspacePrefix = string
