import { Logger } from '@nestjs/common';
import { ChannelType } from '../contracts';
import { ChannelHandler, HandlerRoute } from './channel-handler.interface';

export const HANDLER_REGISTRY = 'HANDLER_REGISTRY';

/**
 * HandlerRegistry - lookup of channel handlers by channel type.
 *
 * Handlers never register themselves: the module that composes the
 * application builds the registry from the handlers it provides.
 */
export class HandlerRegistry {
  private readonly log = new Logger(HandlerRegistry.name);
  private readonly handlers = new Map<string, ChannelHandler>();

  constructor(handlers: ChannelHandler[] = []) {
    this.registerAll(handlers);
  }

  /**
   * Registers a handler. A second handler for the same type is skipped.
   */
  register(handler: ChannelHandler): void {
    if (this.handlers.has(handler.channelType)) {
      this.log.warn(
        `Handler for "${handler.channelType}" already registered, skipping`,
      );
      return;
    }

    this.handlers.set(handler.channelType, handler);
    this.log.log(`Registered handler: ${handler.channelType} (${handler.channelName})`);
  }

  registerAll(handlers: ChannelHandler[]): void {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  /** Channel types are matched case-insensitively (`ws` finds `WS`). */
  get(channelType: string): ChannelHandler | undefined {
    return this.handlers.get(channelType.toUpperCase());
  }

  has(channelType: string): boolean {
    return this.handlers.has(channelType.toUpperCase());
  }

  findRoute(channelType: string, method: string, action: string): HandlerRoute | undefined {
    return this.get(channelType)
      ?.routes()
      .find((r) => r.method === method.toUpperCase() && r.action === action);
  }

  list(): Array<{ channelType: ChannelType; name: string; actions: string[] }> {
    return Array.from(this.handlers.values()).map((h) => ({
      channelType: h.channelType,
      name: h.channelName,
      actions: h.routes().map((r) => r.action),
    }));
  }
}
