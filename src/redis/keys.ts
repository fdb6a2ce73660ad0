/**
 * Centralized Redis key patterns for the gateway.
 * All keys and TTLs defined here for consistency.
 */
export const RedisKeys = {
  // Channel rows cached from the database
  channel: (channelType: string, channelUuid: string) =>
    `ch:${channelType}:${channelUuid}`,

  // External ids already persisted, value is the message UUID
  externalIdSeen: (channelUuid: string, externalId: string) =>
    `seen:${channelUuid}:${externalId}`,
};

/**
 * TTL constants in seconds
 */
export const RedisTTL = {
  CHANNEL_DEFAULT: 60, // overridable with CHANNEL_CACHE_TTL
  EXTERNAL_ID_SEEN: 24 * 3600, // 24 hours
};
