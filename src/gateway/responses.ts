import { GatewayEvent, IncomingMsg, MsgStatusUpdate, MsgStatusValue } from './contracts';

export interface MsgReceiveData {
  type: 'msg';
  channel_uuid: string;
  msg_uuid: string;
  text: string;
  urn: string;
  attachments?: string[];
  external_id?: string;
  received_on?: string;
}

export interface StatusData {
  type: 'status';
  channel_uuid: string;
  status: MsgStatusValue;
  msg_id?: number;
  external_id?: string;
}

export interface ContactRegisteredData {
  type: 'contact';
  contact_uuid: string;
}

export interface InfoData {
  type: 'info';
  info: string;
}

export interface ErrorData {
  type: 'error';
  error: string;
}

export type ResponseData =
  | MsgReceiveData
  | StatusData
  | ContactRegisteredData
  | InfoData
  | ErrorData;

/** Body of every webhook response: a summary label plus one item per result. */
export interface DataResponse {
  message: string;
  data: ResponseData[];
}

export interface WebhookResult {
  statusCode: number;
  response: DataResponse;
  events: GatewayEvent[];
}

export const EVENTS_HANDLED = 'Events Handled';
export const IGNORED = 'Ignored';
export const ERROR = 'Error';

export function msgReceiveData(msg: IncomingMsg): MsgReceiveData {
  return {
    type: 'msg',
    channel_uuid: msg.channelUuid,
    msg_uuid: msg.uuid,
    text: msg.text,
    urn: msg.urn.identity,
    ...(msg.attachments.length > 0 ? { attachments: [...msg.attachments] } : {}),
    ...(msg.externalId ? { external_id: msg.externalId } : {}),
    ...(msg.receivedOn ? { received_on: msg.receivedOn.toISOString() } : {}),
  };
}

export function statusData(status: MsgStatusUpdate): StatusData {
  return {
    type: 'status',
    channel_uuid: status.channelUuid,
    status: status.status,
    ...(status.msgId !== undefined ? { msg_id: status.msgId } : {}),
    ...(status.externalId ? { external_id: status.externalId } : {}),
  };
}

export function contactRegisteredData(contactUuid: string): ContactRegisteredData {
  return { type: 'contact', contact_uuid: contactUuid };
}

export function infoData(info: string): InfoData {
  return { type: 'info', info };
}

export function errorData(error: string): ErrorData {
  return { type: 'error', error };
}

export function dataResponse(message: string, data: ResponseData[]): DataResponse {
  return { message, data };
}

/** Summary line for the channel log written for an incoming webhook. */
export function describeResult(result: WebhookResult): string {
  if (result.statusCode >= 400) return 'Request Error';
  if (result.response.message === IGNORED) return 'Ignored';

  const kinds = new Set(result.events.map((e) => e.kind));
  if (kinds.has('contact')) return 'Contact Registered';
  if (kinds.has('msg')) return 'Message Received';
  if (kinds.has('status')) return 'Status Updated';
  return 'Events Handled';
}
