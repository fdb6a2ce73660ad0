import {
  BadRequestException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { URN, URNError } from '../common/utils/urns';
import { debugLog } from '../common/utils/debug-logger';
import { CHANNEL_BACKEND, ChannelBackend } from './backend/channel-backend.interface';
import { Channel, MsgStatusUpdate, OutgoingMsg } from './contracts';
import { ChannelNotFoundError, MsgNotFoundError, errorMessage } from './errors';
import { HANDLER_REGISTRY, HandlerRegistry } from './handlers/handler-registry';
import { SendMsgDto } from './dto/send-msg.dto';

/**
 * Host side of an outgoing send: hands the message to its channel's handler,
 * then stores the resulting status and channel logs.
 */
@Injectable()
export class SenderService {
  private readonly log = new Logger(SenderService.name);
  private readonly dlog = debugLog.sender;

  constructor(
    @Inject(HANDLER_REGISTRY) private readonly registry: HandlerRegistry,
    @Inject(CHANNEL_BACKEND) private readonly backend: ChannelBackend,
  ) {}

  /**
   * Resolves the channel and URN of a send request into an OutgoingMsg.
   *
   * @throws NotFoundException for an unknown channel type or channel
   * @throws BadRequestException for a malformed URN
   */
  async toOutgoing(dto: SendMsgDto): Promise<OutgoingMsg> {
    const handler = this.registry.get(dto.channelType);
    if (!handler) {
      throw new NotFoundException(`no handler for channel type ${dto.channelType}`);
    }

    let urn: URN;
    try {
      urn = URN.parse(dto.urn);
    } catch (err) {
      if (err instanceof URNError) throw new BadRequestException(err.message);
      throw err;
    }

    let channel: Channel;
    try {
      channel = await this.backend.getChannel(handler.channelType, dto.channelUuid);
    } catch (err) {
      if (err instanceof ChannelNotFoundError) throw new NotFoundException(err.message);
      throw err;
    }

    return {
      id: dto.id,
      uuid: dto.uuid,
      channel,
      urn,
      text: dto.text,
      attachments: dto.attachments ?? [],
      quickReplies: dto.quickReplies ?? [],
    };
  }

  async send(msg: OutgoingMsg): Promise<MsgStatusUpdate> {
    const handler = this.registry.get(msg.channel.channelType);
    if (!handler) {
      throw new NotFoundException(`no handler for channel type ${msg.channel.channelType}`);
    }

    const status = await handler.sendMsg(msg);

    // the logs record a POST that happened, whatever the status write does
    try {
      await this.backend.writeMsgStatus(status);
    } catch (err) {
      if (err instanceof MsgNotFoundError) {
        throw new NotFoundException(`message ${msg.id} not found`);
      }
      throw err;
    } finally {
      await this.writeLogs(msg, status);
    }

    if (status.status === 'errored') {
      this.log.warn(`[send] Msg ${msg.id} on ${msg.channel.uuid} errored`);
    } else {
      this.dlog.send(`Msg ${msg.id} ${status.status}`, { urn: msg.urn.identity }, msg.channel.uuid);
    }
    return status;
  }

  private async writeLogs(msg: OutgoingMsg, status: MsgStatusUpdate): Promise<void> {
    try {
      await this.backend.writeChannelLogs(status.logs);
    } catch (err) {
      this.log.error(`[send] Unable to write ${status.logs.length} log(s) for msg ${msg.id}: ${errorMessage(err)}`);
    }
  }
}
