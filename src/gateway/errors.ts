/** The webhook body could not be decoded or holds an invalid value. */
export class RequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RequestError';
  }
}

export class ChannelNotFoundError extends Error {
  constructor(readonly channelUuid: string) {
    super('channel not found');
    this.name = 'ChannelNotFoundError';
  }
}

/** A status update named a message the backend does not know. */
export class MsgNotFoundError extends Error {
  constructor(readonly ref: string) {
    super('message not found');
    this.name = 'MsgNotFoundError';
  }
}

/** Persistence or lookup failure in the backend. */
export class BackendError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'BackendError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
