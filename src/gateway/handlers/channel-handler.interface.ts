import { Logger } from '@nestjs/common';
import { plainToInstance, ClassConstructor } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import { Channel, ChannelType, GatewayEvent, MsgStatusUpdate, OutgoingMsg } from '../contracts';
import { RequestError, errorMessage } from '../errors';
import {
  DataResponse,
  ERROR,
  IGNORED,
  WebhookResult,
  dataResponse,
  errorData,
  infoData,
} from '../responses';

export interface WebhookRequest {
  channel: Channel;
  /** Raw request body; handlers decode it themselves. */
  body: string;
  headers: Record<string, string>;
}

export interface HandlerRoute {
  method: 'GET' | 'POST';
  action: string;
  handle(req: WebhookRequest): Promise<WebhookResult>;
}

/**
 * A channel handler bridges one provider protocol to the gateway model.
 *
 * Each handler declares:
 * - channelType: key used in webhook URLs (`/c/:type/...`) and in the registry
 * - routes: the webhook actions it accepts
 * - sendMsg: delivery of an outgoing message, reported as a status update
 */
export interface ChannelHandler {
  readonly channelType: ChannelType;
  readonly channelName: string;

  routes(): HandlerRoute[];

  /**
   * Sends the message. Transport failures are reported in the returned
   * status and its logs, not thrown.
   */
  sendMsg(msg: OutgoingMsg): Promise<MsgStatusUpdate>;
}

/**
 * Base class with the response helpers every handler uses.
 */
export abstract class BaseHandler implements ChannelHandler {
  abstract readonly channelType: ChannelType;
  abstract readonly channelName: string;

  protected readonly logger = new Logger(this.constructor.name);

  abstract routes(): HandlerRoute[];
  abstract sendMsg(msg: OutgoingMsg): Promise<MsgStatusUpdate>;

  protected respond(
    message: string,
    data: DataResponse['data'],
    events: GatewayEvent[],
    statusCode = 200,
  ): WebhookResult {
    return { statusCode, response: dataResponse(message, data), events };
  }

  protected requestError(channel: Channel, err: unknown): WebhookResult {
    const message = errorMessage(err);
    this.logger.warn(`[${channel.uuid}] Request error: ${message}`);
    return this.respond(ERROR, [errorData(message)], [], 400);
  }

  protected requestIgnored(channel: Channel, details: string): WebhookResult {
    this.logger.debug(`[${channel.uuid}] ${details}`);
    return this.respond(IGNORED, [infoData(details)], []);
  }

  /**
   * A failure part-way through a request. Items already handled were
   * committed, so they are reported ahead of the error.
   */
  protected failed(
    channel: Channel,
    err: unknown,
    data: DataResponse['data'],
    events: GatewayEvent[],
    statusCode = 500,
  ): WebhookResult {
    const message = errorMessage(err);
    this.logger.error(`[${channel.uuid}] Request failed after ${data.length} item(s): ${message}`);
    return this.respond(ERROR, [...data, errorData(message)], events, statusCode);
  }
}

function flattenValidationErrors(errors: ValidationError[], prefix = ''): string[] {
  const messages: string[] = [];
  for (const err of errors) {
    const path = prefix ? `${prefix}.${err.property}` : err.property;
    for (const constraint of Object.values(err.constraints ?? {})) {
      messages.push(`${path}: ${constraint}`);
    }
    if (err.children?.length) {
      messages.push(...flattenValidationErrors(err.children, path));
    }
  }
  return messages;
}

/**
 * Parses a JSON body into the payload class and validates it.
 *
 * @throws RequestError when the body is not a JSON object or fails validation
 */
export async function decodeAndValidateJson<T extends object>(
  body: string,
  payloadClass: ClassConstructor<T>,
): Promise<T> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new RequestError(`unable to parse request JSON: ${errorMessage(err)}`);
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new RequestError('request JSON must be an object');
  }

  const payload = plainToInstance(payloadClass, parsed);
  const errors = await validate(payload);
  if (errors.length > 0) {
    throw new RequestError(`request JSON doesn't match required schema: ${flattenValidationErrors(errors).join('; ')}`);
  }
  return payload;
}

/**
 * Display name from whatever name parts the provider sends,
 * falling back to the username.
 */
export function nameFromFirstLastUsername(first: string, last: string, username: string): string {
  const full = [first.trim(), last.trim()].filter(Boolean).join(' ');
  return full || username.trim();
}
