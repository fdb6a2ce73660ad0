import { URN } from '../../common/utils/urns';
import {
  Channel,
  ChannelLog,
  ChannelType,
  Contact,
  IncomingMsg,
  MsgStatusUpdate,
} from '../contracts';

export const CHANNEL_BACKEND = 'CHANNEL_BACKEND';

/**
 * Everything a channel handler needs from the host's storage.
 *
 * Each call is a single blocking operation; implementations own their
 * consistency. Lookups of unknown channels reject with ChannelNotFoundError,
 * status writes for unknown messages with MsgNotFoundError, and any other
 * storage failure with BackendError.
 */
export interface ChannelBackend {
  getChannel(channelType: ChannelType, uuid: string): Promise<Channel>;

  /** Looks up the contact owning the URN, creating both if needed. */
  getContact(channel: Channel, urn: URN, name?: string): Promise<Contact>;

  addLanguageToContact(channel: Channel, language: string, contact: Contact): Promise<Contact>;

  /**
   * Claims the message's external id on this channel. If another message
   * holds it, returns the message marked `alreadyWritten` with that UUID.
   */
  checkExternalIdSeen(msg: IncomingMsg): Promise<IncomingMsg>;

  /**
   * Persists an incoming message. A no-op for `alreadyWritten` messages.
   * On failure the external id claim is released.
   */
  writeMsg(msg: IncomingMsg): Promise<void>;

  writeExternalIdSeen(msg: IncomingMsg): Promise<void>;

  writeMsgStatus(status: MsgStatusUpdate): Promise<void>;

  writeChannelLogs(logs: ChannelLog[]): Promise<void>;
}
