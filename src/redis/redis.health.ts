import { Injectable } from '@nestjs/common';
import { RedisService } from './redis.service';

export interface RedisHealth {
  status: 'up' | 'down';
  mode: 'redis' | 'fallback';
}

/**
 * Reports whether the channel cache is on Redis or the in-memory fallback.
 */
@Injectable()
export class RedisHealthIndicator {
  constructor(private readonly redis: RedisService) {}

  async check(): Promise<{ redis: RedisHealth }> {
    const healthy = await this.redis.isHealthy();
    const { mode } = this.redis.getStatus();
    return { redis: { status: healthy ? 'up' : 'down', mode } };
  }
}
