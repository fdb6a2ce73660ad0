import { ConfigService } from '@nestjs/config';
import { AppController } from './app.controller';
import { RedisHealthIndicator } from './redis/redis.health';
import { RedisService } from './redis/redis.service';
import { HandlerRegistry } from './gateway/handlers/handler-registry';
import { WebSocketHandler } from './gateway/handlers/websocket/websocket.handler';
import { InMemoryBackend } from './gateway/testing/in-memory-backend';

describe('AppController', () => {
  it('reports redis mode and registered handlers', async () => {
    const cfg = new ConfigService({});
    const registry = new HandlerRegistry([new WebSocketHandler(new InMemoryBackend(), cfg)]);
    const controller = new AppController(new RedisHealthIndicator(new RedisService(cfg)), registry);

    expect(await controller.health()).toEqual({
      status: 'ok',
      redis: { status: 'up', mode: 'fallback' },
      handlers: [{ channelType: 'WS', name: 'WebSocket', actions: ['register', 'receive'] }],
    });
  });
});
