export { RedisStorageAdapter } from "./RedisStorageAdapter";
export type { RedisConfig } from "./RedisConfig";
export { DEFAULT_KEY_PREFIX } from "./RedisConfig";
export { HOT_FIELDS, buildKeys, jobKey, readyKey, toRedisHash, fromRedisHash, hashToArgs } from "./serialization";
export type { RedisKeys, RedisJobHash, HotField } from "./serialization";
