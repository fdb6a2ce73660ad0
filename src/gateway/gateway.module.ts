import { Module } from '@nestjs/common';
import { GatewayController } from './gateway.controller';
import { GatewayService } from './gateway.service';
import { SenderService } from './sender.service';
import { CHANNEL_BACKEND } from './backend/channel-backend.interface';
import { SupabaseBackend } from './backend/supabase.backend';
import { ExternalIdSeenService } from './backend/external-id-seen.service';
import { HANDLER_REGISTRY, HandlerRegistry } from './handlers/handler-registry';
import { WebSocketHandler } from './handlers/websocket/websocket.handler';
import { InternalTokenGuard } from './guards/internal-token.guard';

@Module({
  controllers: [GatewayController],
  providers: [
    GatewayService,
    SenderService,
    ExternalIdSeenService,
    InternalTokenGuard,
    { provide: CHANNEL_BACKEND, useClass: SupabaseBackend },
    WebSocketHandler,
    {
      // new channel types are added here
      provide: HANDLER_REGISTRY,
      useFactory: (ws: WebSocketHandler) => new HandlerRegistry([ws]),
      inject: [WebSocketHandler],
    },
  ],
  exports: [GatewayService, SenderService, HANDLER_REGISTRY],
})
export class GatewayModule {}
