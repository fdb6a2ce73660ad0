import { randomUUID } from 'crypto';
import { RequestResponse } from '../common/utils/http';
import { Channel, ChannelLog } from './contracts';

export function channelLogFromTrace(
  description: string,
  channel: Channel,
  msgId: number | undefined,
  trace: RequestResponse,
): ChannelLog {
  return {
    uuid: randomUUID(),
    channelUuid: channel.uuid,
    msgId,
    description,
    method: trace.method,
    url: trace.url,
    statusCode: trace.statusCode,
    request: trace.request,
    response: trace.response,
    elapsedMs: trace.elapsedMs,
    createdOn: new Date(),
    ...(trace.error !== undefined ? { error: trace.error } : {}),
  };
}

/** Log for a failure that happened before any HTTP exchange. */
export function channelLogForError(
  description: string,
  channel: Channel,
  msgId: number | undefined,
  err: string,
): ChannelLog {
  return {
    uuid: randomUUID(),
    channelUuid: channel.uuid,
    msgId,
    description,
    method: '',
    url: '',
    statusCode: 0,
    request: '',
    response: '',
    elapsedMs: 0,
    createdOn: new Date(),
    error: err,
  };
}
