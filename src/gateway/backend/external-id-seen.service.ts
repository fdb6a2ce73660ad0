import { Injectable, Logger } from '@nestjs/common';
import { RedisService } from '../../redis/redis.service';
import { RedisKeys, RedisTTL } from '../../redis/keys';
import { IncomingMsg } from '../contracts';
import { errorMessage } from '../errors';
import { debugLog } from '../../common/utils/debug-logger';

/**
 * Remembers which provider external ids were persisted on a channel, and under
 * which message UUID, so a redelivered webhook maps onto the first message.
 *
 * `check` claims the external id atomically (SET NX), so of two concurrent
 * deliveries only one is treated as new. A claim whose write failed must be
 * given back with `release`.
 */
@Injectable()
export class ExternalIdSeenService {
  private readonly log = new Logger(ExternalIdSeenService.name);
  private readonly dlog = debugLog.backend.child('seen');

  constructor(private readonly redis: RedisService) {}

  async check(msg: IncomingMsg): Promise<IncomingMsg> {
    if (!msg.externalId) return msg;

    const key = RedisKeys.externalIdSeen(msg.channelUuid, msg.externalId);
    const claimed = await this.redis.setIfAbsent(key, msg.uuid, RedisTTL.EXTERNAL_ID_SEEN);
    if (claimed) return msg;

    const seenUuid = await this.redis.get(key);
    // expired between the two calls
    if (!seenUuid || seenUuid === msg.uuid) return msg;

    this.dlog.state('External id already seen', { externalId: msg.externalId, msgUuid: seenUuid }, msg.channelUuid);
    return { ...msg, uuid: seenUuid, alreadyWritten: true };
  }

  /** Refreshes the TTL once the message is written. */
  async record(msg: IncomingMsg): Promise<void> {
    if (!msg.externalId) return;

    await this.redis.set(
      RedisKeys.externalIdSeen(msg.channelUuid, msg.externalId),
      msg.uuid,
      RedisTTL.EXTERNAL_ID_SEEN,
    );
  }

  /**
   * Gives back the claim taken by `check` so a redelivery is written.
   * Errors are logged, the caller is already failing.
   */
  async release(msg: IncomingMsg): Promise<void> {
    if (!msg.externalId || msg.alreadyWritten) return;

    try {
      await this.redis.del(RedisKeys.externalIdSeen(msg.channelUuid, msg.externalId));
    } catch (err) {
      this.log.error(`[release] Claim on ${msg.externalId} kept: ${errorMessage(err)}`);
    }
  }
}
