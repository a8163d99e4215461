export { default as redisPlugin, createRedisClient } from './redis-plugin.js';
export type { RedisPluginOptions } from './redis-plugin.js';
export { publishEventChange, changePayload, CHANGE_CHANNEL } from './change-notifier.js';
export type { EventChangeReason, EventChangePayload } from './change-notifier.js';
