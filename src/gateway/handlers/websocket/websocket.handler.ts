import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { URN, URNError } from '../../../common/utils/urns';
import { parseLanguageBase } from '../../../common/i18n/language';
import { makeHttpRequest } from '../../../common/utils/http';
import { debugLog } from '../../../common/utils/debug-logger';
import { CHANNEL_BACKEND, ChannelBackend } from '../../backend/channel-backend.interface';
import { channelLogForError, channelLogFromTrace } from '../../channel-log';
import {
  Channel,
  ChannelLog,
  GatewayEvent,
  IncomingMsg,
  MsgStatusUpdate,
  MsgStatusValue,
  OutgoingMsg,
  newIncomingMsg,
} from '../../contracts';
import { MsgNotFoundError, errorMessage } from '../../errors';
import {
  EVENTS_HANDLED,
  ResponseData,
  WebhookResult,
  contactRegisteredData,
  infoData,
  msgReceiveData,
  statusData,
} from '../../responses';
import {
  BaseHandler,
  HandlerRoute,
  WebhookRequest,
  decodeAndValidateJson,
  nameFromFirstLastUsername,
} from '../channel-handler.interface';
import {
  ReceivePayload,
  ReceivedMessage,
  RegisterPayload,
  SendPayload,
} from './websocket.payloads';

const AUTHOR_SUFFIX = '@c.us';
const DEFAULT_SEND_TIMEOUT_MS = 30_000;

function stripPlus(value: string): string {
  return value.replace('+', '');
}

export function ackStatus(status: string | undefined): MsgStatusValue {
  if (status === 'sent') return 'sent';
  if (status === 'delivered') return 'delivered';
  return 'queued';
}

export function buildSendPayload(msg: OutgoingMsg): SendPayload {
  const address = msg.channel.address;
  const to = msg.urn.path;

  return {
    ID: String(msg.id),
    Text: msg.text,
    To: to,
    ToNoPlus: stripPlus(to),
    From: address,
    FromNoPlus: stripPlus(address),
    Channel: stripPlus(address),
    ...(msg.quickReplies.length > 0
      ? { Metadata: { quick_replies: [...msg.quickReplies] } }
      : {}),
    ...(msg.attachments.length > 0 ? { Attachments: [...msg.attachments] } : {}),
  };
}

/**
 * Parts to POST for a message, in order. Attachments travel in the same
 * payload as the text, so this yields one part for any message with content.
 */
export function* buildSendParts(msg: OutgoingMsg): Generator<SendPayload> {
  if (msg.text !== '' || msg.attachments.length > 0) {
    yield buildSendPayload(msg);
  }
}

/**
 * Handler for WS channels: a bridge service that relays a chat account over
 * HTTP/JSON. It posts registrations, received messages and delivery acks to
 * us, and receives our outgoing messages at the channel address.
 */
@Injectable()
export class WebSocketHandler extends BaseHandler {
  readonly channelType = 'WS' as const;
  readonly channelName = 'WebSocket';

  private readonly dlog = debugLog.handlers.child('ws');
  private readonly sendTimeoutMs: number;

  constructor(
    @Inject(CHANNEL_BACKEND) private readonly backend: ChannelBackend,
    cfg: ConfigService,
  ) {
    super();
    this.sendTimeoutMs = Number(cfg.get<string>('SEND_TIMEOUT_MS') ?? DEFAULT_SEND_TIMEOUT_MS);
  }

  routes(): HandlerRoute[] {
    return [
      { method: 'POST', action: 'register', handle: (req) => this.registerUser(req) },
      { method: 'POST', action: 'receive', handle: (req) => this.receiveMessage(req) },
    ];
  }

  /**
   * POST /c/ws/:uuid/register
   * Creates (or finds) the contact for a URN and sets its language.
   */
  async registerUser({ channel, body }: WebhookRequest): Promise<WebhookResult> {
    let payload: RegisterPayload;
    try {
      payload = await decodeAndValidateJson(body, RegisterPayload);
    } catch (err) {
      return this.requestError(channel, err);
    }

    if (!payload.urn) {
      return this.requestIgnored(channel, 'Ignoring request, no identifier');
    }

    let urn: URN;
    let iso3: string;
    try {
      urn = URN.fromParts(channel.schemes[0] ?? 'ext', payload.urn);
      iso3 = parseLanguageBase(payload.language ?? '').iso3;
    } catch (err) {
      return this.requestError(channel, err);
    }

    try {
      const contact = await this.backend.getContact(channel, urn);
      const registered = await this.backend.addLanguageToContact(channel, iso3, contact);

      this.dlog.recv('Contact registered', { urn: urn.identity, contact: registered.uuid, language: iso3 }, channel.uuid);
      return this.respond(
        EVENTS_HANDLED,
        [contactRegisteredData(registered.uuid)],
        [{ kind: 'contact', contact: registered }],
      );
    } catch (err) {
      return this.failed(channel, err, [], []);
    }
  }

  /**
   * POST /c/ws/:uuid/receive
   * A batch of received messages and delivery acknowledgements.
   */
  async receiveMessage({ channel, body }: WebhookRequest): Promise<WebhookResult> {
    let payload: ReceivePayload;
    try {
      payload = await decodeAndValidateJson(body, ReceivePayload);
    } catch (err) {
      return this.requestError(channel, err);
    }

    if (!payload.instanceId) {
      return this.requestIgnored(channel, 'Ignoring request, no message');
    }

    const events: GatewayEvent[] = [];
    const data: ResponseData[] = [];

    try {
      for (const message of payload.messages ?? []) {
        if (message.fromMe === true) {
          this.dlog.ignore('Skipping own message', { id: message.id }, channel.uuid);
          continue;
        }
        if (!message.id) {
          data.push(infoData('message has no id, ignored'));
          continue;
        }

        const msg = await this.receiveOne(channel, message, message.id);
        events.push({ kind: 'msg', msg });
        data.push(msgReceiveData(msg));
      }

      for (const ack of payload.ack ?? []) {
        // an empty id can never match a sent message
        if (!ack.id) {
          data.push(infoData('message not found, ignored'));
          continue;
        }
        const status = MsgStatusUpdate.forExternalId(channel, ack.id, ackStatus(ack.status));

        try {
          await this.backend.writeMsgStatus(status);
        } catch (err) {
          if (err instanceof MsgNotFoundError) {
            this.dlog.ignore('Ack for unknown message', { externalId: ack.id }, channel.uuid);
            data.push(infoData('message not found, ignored'));
            continue;
          }
          throw err;
        }

        this.dlog.status('Status updated', { externalId: ack.id, status: status.status }, channel.uuid);
        events.push({ kind: 'status', status });
        data.push(statusData(status));
      }
    } catch (err) {
      const statusCode = err instanceof URNError ? 400 : 500;
      return this.failed(channel, err, data, events, statusCode);
    }

    return this.respond(EVENTS_HANDLED, data, events);
  }

  private async receiveOne(channel: Channel, message: ReceivedMessage, externalId: string): Promise<IncomingMsg> {
    const receivedOn = message.time !== undefined ? new Date(message.time * 1000) : new Date();
    const urn = URN.whatsApp((message.author ?? '').replace(AUTHOR_SUFFIX, ''));
    const name = nameFromFirstLastUsername(message.senderName ?? '', '', '');

    // images carry their caption as text and the media reference in body
    let text = message.body ?? '';
    let attachment: string | undefined;
    if (message.type === 'image') {
      text = message.caption ?? '';
      attachment = message.body;
    }

    const built = newIncomingMsg(channel, urn, text);
    built.externalId = externalId;
    built.receivedOn = receivedOn;
    if (name) built.contactName = name;
    if (attachment) built.attachments.push(attachment);

    const msg = await this.backend.checkExternalIdSeen(built);
    await this.backend.writeMsg(msg);
    await this.backend.writeExternalIdSeen(msg);

    this.dlog.recv(
      msg.alreadyWritten ? 'Message redelivered' : 'Message received',
      { externalId, urn: urn.identity, text },
      channel.uuid,
    );
    return msg;
  }

  async sendMsg(msg: OutgoingMsg): Promise<MsgStatusUpdate> {
    const status = MsgStatusUpdate.forId(msg.channel, msg.id, 'errored');
    const done = this.dlog.timer(`Send ${msg.id}`, msg.channel.uuid);

    let sent = 0;
    let failed = false;
    for (const part of buildSendParts(msg)) {
      const { log, error } = await this.sendMsgPart(msg, msg.channel.address, part);
      status.addLog(log);
      if (error) {
        failed = true;
        break;
      }
      sent++;
    }

    if (sent > 0 && !failed) {
      status.setStatus('wired');
    }
    done();
    return status;
  }

  private async sendMsgPart(
    msg: OutgoingMsg,
    url: string,
    payload: SendPayload,
  ): Promise<{ log: ChannelLog; error?: string }> {
    let body: string;
    try {
      body = JSON.stringify(payload);
    } catch (err) {
      const error = errorMessage(err);
      this.logger.error(`[${msg.channel.uuid}] Unable to build JSON body for msg ${msg.id}: ${error}`);
      return { log: channelLogForError('unable to build JSON body', msg.channel, msg.id, error), error };
    }

    this.dlog.link('POST', { url, msg: msg.id }, msg.channel.uuid);
    const trace = await makeHttpRequest({
      method: 'POST',
      url,
      headers: {
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
      body,
      timeoutMs: this.sendTimeoutMs,
    });

    const log = channelLogFromTrace('Message Sent', msg.channel, msg.id, trace);
    if (trace.error) {
      this.logger.warn(`[${msg.channel.uuid}] Message Send Error for msg ${msg.id}: ${trace.error}`);
      return { log, error: trace.error };
    }

    this.dlog.send('Message sent', { msg: msg.id, to: msg.urn.identity, status: trace.statusCode }, msg.channel.uuid);
    return { log };
  }
}
