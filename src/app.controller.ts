import { Controller, Get, Inject } from '@nestjs/common';
import { RedisHealthIndicator } from './redis/redis.health';
import {
  HANDLER_REGISTRY,
  HandlerRegistry,
} from './gateway/handlers/handler-registry';

@Controller()
export class AppController {
  constructor(
    private readonly redisHealth: RedisHealthIndicator,
    @Inject(HANDLER_REGISTRY) private readonly registry: HandlerRegistry,
  ) {}

  @Get('health')
  async health() {
    const { redis } = await this.redisHealth.check();
    return {
      status: 'ok',
      redis,
      handlers: this.registry.list(),
    };
  }
}
