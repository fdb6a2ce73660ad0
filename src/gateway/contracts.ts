import { randomUUID } from 'crypto';
import { URN } from '../common/utils/urns';

export type ChannelType = 'WS';

export interface Channel {
  uuid: string;
  channelType: ChannelType;
  name: string;
  address: string; // provider endpoint for WS channels
  schemes: string[];
  config: Record<string, unknown>;
}

export interface Contact {
  uuid: string;
  urn: URN;
  name?: string;
  language?: string; // ISO 639-3
}

export type MsgStatusValue =
  | 'pending'
  | 'queued'
  | 'wired'
  | 'sent'
  | 'delivered'
  | 'errored'
  | 'failed';

export interface IncomingMsg {
  uuid: string;
  channelUuid: string;
  urn: URN;
  text: string;
  attachments: string[];
  externalId?: string;
  receivedOn?: Date;
  contactName?: string;
  /** Set by the seen check when this external id was already persisted. */
  alreadyWritten: boolean;
}

export interface OutgoingMsg {
  id: number;
  uuid: string;
  channel: Channel;
  urn: URN;
  text: string;
  attachments: string[];
  quickReplies: string[];
}

/**
 * Record of one HTTP exchange with a provider (or of a webhook we received),
 * stored alongside the message it concerns.
 */
export interface ChannelLog {
  uuid: string;
  channelUuid: string;
  msgId?: number;
  description: string;
  method: string;
  url: string;
  statusCode: number;
  request: string;
  response: string;
  elapsedMs: number;
  createdOn: Date;
  error?: string;
}

export function newIncomingMsg(channel: Channel, urn: URN, text: string): IncomingMsg {
  return {
    uuid: randomUUID(),
    channelUuid: channel.uuid,
    urn,
    text,
    attachments: [],
    alreadyWritten: false,
  };
}

/**
 * A status change for a message, addressed either by our id (outgoing sends)
 * or by the provider's external id (acknowledgements).
 */
export class MsgStatusUpdate {
  readonly logs: ChannelLog[] = [];

  private constructor(
    readonly channelUuid: string,
    public status: MsgStatusValue,
    readonly msgId?: number,
    readonly externalId?: string,
  ) {}

  static forId(channel: Channel, msgId: number, status: MsgStatusValue): MsgStatusUpdate {
    return new MsgStatusUpdate(channel.uuid, status, msgId);
  }

  static forExternalId(channel: Channel, externalId: string, status: MsgStatusValue): MsgStatusUpdate {
    return new MsgStatusUpdate(channel.uuid, status, undefined, externalId);
  }

  setStatus(status: MsgStatusValue): void {
    this.status = status;
  }

  addLog(log: ChannelLog): void {
    this.logs.push(log);
  }
}

export type GatewayEvent =
  | { kind: 'msg'; msg: IncomingMsg }
  | { kind: 'status'; status: MsgStatusUpdate }
  | { kind: 'contact'; contact: Contact };
