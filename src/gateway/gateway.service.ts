import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { debugLog } from '../common/utils/debug-logger';
import { CHANNEL_BACKEND, ChannelBackend } from './backend/channel-backend.interface';
import { Channel, ChannelLog } from './contracts';
import { ChannelNotFoundError, errorMessage } from './errors';
import { HANDLER_REGISTRY, HandlerRegistry } from './handlers/handler-registry';
import {
  ERROR,
  WebhookResult,
  dataResponse,
  describeResult,
  errorData,
} from './responses';

export interface IncomingWebhook {
  channelType: string;
  channelUuid: string;
  action: string;
  method: string;
  url: string;
  body: string;
  headers: Record<string, string>;
}

/**
 * Routes an incoming webhook to its handler and records it as a channel log.
 */
@Injectable()
export class GatewayService {
  private readonly log = new Logger(GatewayService.name);
  private readonly dlog = debugLog.gateway;

  constructor(
    @Inject(HANDLER_REGISTRY) private readonly registry: HandlerRegistry,
    @Inject(CHANNEL_BACKEND) private readonly backend: ChannelBackend,
  ) {}

  /**
   * @throws NotFoundException when no handler serves the type and action
   */
  async handleWebhook(req: IncomingWebhook): Promise<WebhookResult> {
    const handler = this.registry.get(req.channelType);
    const route = this.registry.findRoute(req.channelType, req.method, req.action);
    if (!handler || !route) {
      throw new NotFoundException(`no handler for ${req.method} ${req.channelType}/${req.action}`);
    }

    let channel: Channel;
    try {
      channel = await this.backend.getChannel(handler.channelType, req.channelUuid);
    } catch (err) {
      if (err instanceof ChannelNotFoundError) {
        this.dlog.warn('Unknown channel', { type: req.channelType, uuid: req.channelUuid });
        return {
          statusCode: 400,
          response: dataResponse(ERROR, [errorData(err.message)]),
          events: [],
        };
      }
      throw err;
    }

    this.dlog.recv(`${handler.channelType} ${req.action}`, { bytes: req.body.length }, channel.uuid);
    const started = Date.now();
    const result = await route.handle({ channel, body: req.body, headers: req.headers });
    await this.recordIncoming(channel, req, result, Date.now() - started);

    return result;
  }

  private async recordIncoming(
    channel: Channel,
    req: IncomingWebhook,
    result: WebhookResult,
    elapsedMs: number,
  ): Promise<void> {
    const log: ChannelLog = {
      uuid: randomUUID(),
      channelUuid: channel.uuid,
      description: describeResult(result),
      method: req.method,
      url: req.url,
      statusCode: result.statusCode,
      request: req.body,
      response: JSON.stringify(result.response),
      elapsedMs,
      createdOn: new Date(),
      ...(result.statusCode >= 400
        ? { error: result.response.data.flatMap((d) => (d.type === 'error' ? [d.error] : [])).join('; ') }
        : {}),
    };

    try {
      await this.backend.writeChannelLogs([log]);
    } catch (err) {
      // logged only, the webhook itself was handled
      this.log.error(`[recordIncoming] Unable to write channel log for ${channel.uuid}: ${errorMessage(err)}`);
    }
  }
}
