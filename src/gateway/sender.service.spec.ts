import { BadRequestException, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosHeaders } from 'axios';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { SendMsgDto } from './dto/send-msg.dto';
import { HandlerRegistry } from './handlers/handler-registry';
import { WebSocketHandler } from './handlers/websocket/websocket.handler';
import { SenderService } from './sender.service';
import { InMemoryBackend, testChannel } from './testing/in-memory-backend';

const channel = testChannel();

function sendDto(overrides: Partial<SendMsgDto> = {}): SendMsgDto {
  return plainToInstance(SendMsgDto, {
    channelType: 'ws',
    channelUuid: channel.uuid,
    id: 7,
    uuid: '6f1d6c52-3b8e-4d4f-9a51-0c2e7d8b9a10',
    urn: 'whatsapp:5511999999999',
    text: 'Your order shipped',
    quickReplies: ['Track'],
    ...overrides,
  });
}

describe('SenderService', () => {
  let backend: InMemoryBackend;
  let sender: SenderService;

  beforeEach(() => {
    backend = new InMemoryBackend();
    backend.addChannel(channel);
    backend.knownMsgIds.add(7);
    const registry = new HandlerRegistry([new WebSocketHandler(backend, new ConfigService({}))]);
    sender = new SenderService(registry, backend);
  });

  afterEach(() => jest.restoreAllMocks());

  it('validates send requests', async () => {
    expect(await validate(sendDto())).toEqual([]);

    const errors = await validate(sendDto({ id: 0, quickReplies: Array.from({ length: 11 }, (_, i) => `r${i}`) }));
    expect(errors.map((e) => e.property).sort()).toEqual(['id', 'quickReplies']);
  });

  it('resolves channel and URN for a send request', async () => {
    const msg = await sender.toOutgoing(sendDto());

    expect(msg.channel).toBe(channel);
    expect(msg.urn.identity).toBe('whatsapp:5511999999999');
    expect(msg.attachments).toEqual([]);
    expect(msg.quickReplies).toEqual(['Track']);
  });

  it('rejects unknown channels and malformed URNs', async () => {
    await expect(sender.toOutgoing(sendDto({ channelType: 'tg' }))).rejects.toBeInstanceOf(NotFoundException);
    await expect(sender.toOutgoing(sendDto({ urn: 'whatsapp:+55' }))).rejects.toBeInstanceOf(BadRequestException);
    await expect(
      sender.toOutgoing(sendDto({ channelUuid: 'c1d2e3f4-a5b6-4c7d-8e9f-0a1b2c3d4e5f' })),
    ).rejects.toThrow('channel not found');
  });

  it('stores the status and logs of a send', async () => {
    jest.spyOn(axios, 'request').mockResolvedValue({
      status: 200,
      statusText: 'OK',
      data: '',
      headers: {},
      config: { headers: new AxiosHeaders() },
    });

    const status = await sender.send(await sender.toOutgoing(sendDto()));

    expect(status.status).toBe('wired');
    expect(backend.statuses).toEqual([{ msgId: 7, status: 'wired' }]);
    expect(backend.logs).toHaveLength(1);
    expect(backend.logs[0].msgId).toBe(7);
  });

  it('keeps the send logs when the message is unknown', async () => {
    jest.spyOn(axios, 'request').mockResolvedValue({
      status: 200,
      statusText: 'OK',
      data: '',
      headers: {},
      config: { headers: new AxiosHeaders() },
    });
    backend.knownMsgIds.clear();

    await expect(sender.send(await sender.toOutgoing(sendDto()))).rejects.toBeInstanceOf(NotFoundException);

    expect(backend.statuses).toEqual([]);
    expect(backend.logs).toHaveLength(1);
    expect(backend.logs[0]).toMatchObject({ msgId: 7, description: 'Message Sent', statusCode: 200 });
  });

  it('returns the status when the logs cannot be written', async () => {
    jest.spyOn(axios, 'request').mockRejectedValue(new Error('socket hang up'));
    backend.failOn('writeChannelLogs');

    const status = await sender.send(await sender.toOutgoing(sendDto()));

    expect(status.status).toBe('errored');
    expect(backend.statuses).toEqual([{ msgId: 7, status: 'errored' }]);
  });

  it('stores errored sends too', async () => {
    jest.spyOn(axios, 'request').mockRejectedValue(new Error('timeout of 30000ms exceeded'));

    const status = await sender.send(await sender.toOutgoing(sendDto()));

    expect(status.status).toBe('errored');
    expect(backend.statuses).toEqual([{ msgId: 7, status: 'errored' }]);
    expect(backend.logs[0].error).toBe('timeout of 30000ms exceeded');
  });
});
