import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { ConfigService } from '@nestjs/config';
import { URN } from '../../../common/utils/urns';
import { OutgoingMsg } from '../../contracts';
import { BackendError } from '../../errors';
import { InMemoryBackend, testChannel } from '../../testing/in-memory-backend';
import { WebhookRequest } from '../channel-handler.interface';
import {
  WebSocketHandler,
  ackStatus,
  buildSendParts,
  buildSendPayload,
} from './websocket.handler';

const channel = testChannel();

function request(body: unknown): WebhookRequest {
  return {
    channel,
    body: typeof body === 'string' ? body : JSON.stringify(body),
    headers: { 'content-type': 'application/json' },
  };
}

function okResponse(status = 200): AxiosResponse<string> {
  return {
    status,
    statusText: status === 200 ? 'OK' : 'Bad Gateway',
    data: '{"ok":true}',
    headers: {},
    config: { headers: new AxiosHeaders() },
  };
}

function outgoing(overrides: Partial<OutgoingMsg> = {}): OutgoingMsg {
  return {
    id: 42,
    uuid: '0f3c2b7e-5d0b-4a3a-9d8e-3c1a7b9f2e11',
    channel,
    urn: URN.fromParts('tel', '+15551234567'),
    text: 'Hello there',
    attachments: [],
    quickReplies: [],
    ...overrides,
  };
}

describe('WebSocketHandler', () => {
  let backend: InMemoryBackend;
  let handler: WebSocketHandler;

  beforeEach(() => {
    backend = new InMemoryBackend();
    backend.addChannel(channel);
    handler = new WebSocketHandler(backend, new ConfigService({ SEND_TIMEOUT_MS: '5000' }));
  });

  afterEach(() => jest.restoreAllMocks());

  it('serves register and receive', () => {
    expect(handler.routes().map((r) => `${r.method} ${r.action}`)).toEqual(['POST register', 'POST receive']);
  });

  describe('registerUser', () => {
    it('ignores requests without an identifier and never touches the backend', async () => {
      const result = await handler.registerUser(request({ urn: '', language: 'en' }));

      expect(result.statusCode).toBe(200);
      expect(result.response).toEqual({
        message: 'Ignored',
        data: [{ type: 'info', info: 'Ignoring request, no identifier' }],
      });
      expect(result.events).toEqual([]);
      expect(backend.totalCalls()).toBe(0);
    });

    it('creates the contact and stores the ISO 639-3 language', async () => {
      const result = await handler.registerUser(request({ urn: '5511999999999', language: 'pt-BR' }));

      const contact = backend.contacts.get('whatsapp:5511999999999');
      expect(contact?.language).toBe('por');
      expect(result.statusCode).toBe(200);
      expect(result.response).toEqual({
        message: 'Events Handled',
        data: [{ type: 'contact', contact_uuid: contact?.uuid }],
      });
      expect(result.events).toHaveLength(1);
    });

    it('returns the same contact when registered twice', async () => {
      await handler.registerUser(request({ urn: '5511999999999', language: 'en' }));
      await handler.registerUser(request({ urn: '5511999999999', language: 'es' }));

      expect(backend.contacts.size).toBe(1);
      expect(backend.contacts.get('whatsapp:5511999999999')?.language).toBe('spa');
    });

    it('rejects unknown languages before looking up the contact', async () => {
      const result = await handler.registerUser(request({ urn: '5511999999999', language: 'qq-ZZ' }));

      expect(result.statusCode).toBe(400);
      expect(result.response).toEqual({
        message: 'Error',
        data: [{ type: 'error', error: 'language subtag "qq" is well-formed but unknown' }],
      });
      expect(backend.calls.getContact).toBe(0);
    });

    it('rejects identifiers the channel scheme does not allow', async () => {
      const result = await handler.registerUser(request({ urn: 'not-a-number', language: 'en' }));

      expect(result.statusCode).toBe(400);
      expect(result.response.data).toEqual([
        { type: 'error', error: 'invalid path for whatsapp URN: not-a-number' },
      ]);
    });

    it('rejects bodies that are not JSON', async () => {
      const result = await handler.registerUser(request('urn=123'));

      expect(result.statusCode).toBe(400);
      expect(result.response.data[0]).toMatchObject({ type: 'error' });
      expect(JSON.stringify(result.response.data[0])).toContain('unable to parse request JSON');
    });

    it('rejects payloads of the wrong shape', async () => {
      const result = await handler.registerUser(request({ urn: 5511999999999 }));

      expect(result.statusCode).toBe(400);
      expect(result.response.data).toEqual([
        { type: 'error', error: "request JSON doesn't match required schema: urn: urn must be a string" },
      ]);
    });

    it('reports backend failures as server errors', async () => {
      backend.failOn('getContact');

      const result = await handler.registerUser(request({ urn: '5511999999999', language: 'en' }));

      expect(result.statusCode).toBe(500);
      expect(result.response.data).toEqual([{ type: 'error', error: 'getContact failed' }]);
    });
  });

  describe('receiveMessage', () => {
    it('ignores requests without an instance id', async () => {
      const result = await handler.receiveMessage(request({ messages: [{ id: 'm1', body: 'hi' }] }));

      expect(result.response).toEqual({
        message: 'Ignored',
        data: [{ type: 'info', info: 'Ignoring request, no message' }],
      });
      expect(backend.totalCalls()).toBe(0);
    });

    it('records received messages', async () => {
      const result = await handler.receiveMessage(
        request({
          instanceId: 'instance-1',
          messages: [
            {
              id: 'm1',
              time: 1700000000,
              author: '5511999999999@c.us',
              senderName: 'Ana',
              body: 'hello',
              type: 'chat',
            },
          ],
        }),
      );

      expect(backend.msgs).toHaveLength(1);
      const [msg] = backend.msgs;
      expect(msg.urn.identity).toBe('whatsapp:5511999999999');
      expect(msg.contactName).toBe('Ana');
      expect(msg.receivedOn?.toISOString()).toBe('2023-11-14T22:13:20.000Z');

      expect(result.statusCode).toBe(200);
      expect(result.response).toEqual({
        message: 'Events Handled',
        data: [
          {
            type: 'msg',
            channel_uuid: channel.uuid,
            msg_uuid: msg.uuid,
            text: 'hello',
            urn: 'whatsapp:5511999999999',
            external_id: 'm1',
            received_on: '2023-11-14T22:13:20.000Z',
          },
        ],
      });
    });

    it('produces no event for our own messages', async () => {
      const result = await handler.receiveMessage(
        request({
          instanceId: 'instance-1',
          messages: [{ id: 'm0', fromMe: true, author: '5511999999999@c.us', body: 'sent by us' }],
        }),
      );

      expect(result.events).toEqual([]);
      expect(result.response.data).toEqual([]);
      expect(backend.calls.writeMsg).toBe(0);
    });

    it('takes image text from the caption and the attachment from the body', async () => {
      const result = await handler.receiveMessage(
        request({
          instanceId: 'instance-1',
          messages: [{ id: 'm2', author: '5511999999999@c.us', type: 'image', caption: 'C', body: 'B' }],
        }),
      );

      expect(result.events).toHaveLength(1);
      const [msg] = backend.msgs;
      expect(msg.text).toBe('C');
      expect(msg.attachments).toEqual(['B']);
    });

    it('reports messages without an id and carries on', async () => {
      const result = await handler.receiveMessage(
        request({
          instanceId: 'instance-1',
          messages: [
            { author: '5511999999999@c.us', body: 'no id' },
            { id: 'm3', author: '5511999999999@c.us', body: 'with id' },
          ],
        }),
      );

      expect(result.response.data[0]).toEqual({ type: 'info', info: 'message has no id, ignored' });
      expect(result.response.data[1]).toMatchObject({ type: 'msg', external_id: 'm3' });
      expect(backend.msgs).toHaveLength(1);
    });

    it('persists a redelivered message once', async () => {
      const body = {
        instanceId: 'instance-1',
        messages: [{ id: 'dup-1', author: '5511999999999@c.us', body: 'again' }],
      };

      const first = await handler.receiveMessage(request(body));
      const second = await handler.receiveMessage(request(body));

      expect(backend.msgs).toHaveLength(1);
      expect(second.response.data[0]).toMatchObject({
        type: 'msg',
        msg_uuid: backend.msgs[0].uuid,
      });
      expect(first.response.data[0]).toMatchObject({ msg_uuid: backend.msgs[0].uuid });
    });

    it('persists one message when the same delivery arrives twice at once', async () => {
      const body = {
        instanceId: 'instance-1',
        messages: [{ id: 'dup-2', author: '5511999999999@c.us', body: 'racing' }],
      };

      const [a, b] = await Promise.all([
        handler.receiveMessage(request(body)),
        handler.receiveMessage(request(body)),
      ]);

      expect(backend.msgs).toHaveLength(1);
      expect(a.response.data[0]).toMatchObject({ msg_uuid: backend.msgs[0].uuid });
      expect(b.response.data[0]).toMatchObject({ msg_uuid: backend.msgs[0].uuid });
    });

    it('rejects message times a date cannot hold, before any write', async () => {
      const result = await handler.receiveMessage(
        request({
          instanceId: 'instance-1',
          messages: [{ id: 'm8', time: 1e16, author: '5511999999999@c.us', body: 'late' }],
        }),
      );

      expect(result.statusCode).toBe(400);
      expect(result.response.data).toEqual([
        {
          type: 'error',
          error: "request JSON doesn't match required schema: messages.0.time: time must not be greater than 8640000000000",
        },
      ]);
      expect(backend.totalCalls()).toBe(0);
    });

    it('answers acks with an empty id as not found', async () => {
      backend.knownExternalIds.add('ext-1');

      const result = await handler.receiveMessage(
        request({ instanceId: 'instance-1', ack: [{ id: '' }, { id: 'ext-1', status: 'sent' }] }),
      );

      expect(result.statusCode).toBe(200);
      expect(result.response.data).toEqual([
        { type: 'info', info: 'message not found, ignored' },
        { type: 'status', channel_uuid: channel.uuid, status: 'sent', external_id: 'ext-1' },
      ]);
      expect(backend.calls.writeMsgStatus).toBe(1);
    });

    it('stops the batch when a status write fails', async () => {
      backend.knownExternalIds.add('ext-1');
      backend.knownExternalIds.add('ext-2');
      backend.failOn('writeMsgStatus', new BackendError('status write failed'));

      const result = await handler.receiveMessage(
        request({
          instanceId: 'instance-1',
          messages: [{ id: 'm7', author: '5511999999999@c.us', body: 'before acks' }],
          ack: [
            { id: 'ext-1', status: 'sent' },
            { id: 'ext-2', status: 'delivered' },
          ],
        }),
      );

      expect(result.statusCode).toBe(500);
      expect(result.response.data).toHaveLength(2);
      expect(result.response.data[0]).toMatchObject({ type: 'msg', external_id: 'm7' });
      expect(result.response.data[1]).toEqual({ type: 'error', error: 'status write failed' });
      expect(backend.calls.writeMsgStatus).toBe(1);
      expect(backend.statuses).toEqual([]);
    });

    it('treats acks for unknown messages as info and keeps going', async () => {
      backend.knownExternalIds.add('ext-1');

      const result = await handler.receiveMessage(
        request({
          instanceId: 'instance-1',
          ack: [
            { id: 'missing', status: 'sent' },
            { id: 'ext-1', status: 'delivered' },
          ],
        }),
      );

      expect(result.statusCode).toBe(200);
      expect(result.response.data).toEqual([
        { type: 'info', info: 'message not found, ignored' },
        { type: 'status', channel_uuid: channel.uuid, status: 'delivered', external_id: 'ext-1' },
      ]);
      expect(backend.statuses).toEqual([{ externalId: 'ext-1', status: 'delivered' }]);
    });

    it('rejects authors that are not WhatsApp numbers', async () => {
      const result = await handler.receiveMessage(
        request({ instanceId: 'instance-1', messages: [{ id: 'm4', author: 'someone@c.us', body: 'x' }] }),
      );

      expect(result.statusCode).toBe(400);
      expect(result.response.data).toEqual([
        { type: 'error', error: 'invalid path for whatsapp URN: someone' },
      ]);
    });

    it('reports the items handled before a backend failure', async () => {
      backend.failOn('writeMsg', undefined, 1);

      const result = await handler.receiveMessage(
        request({
          instanceId: 'instance-1',
          messages: [
            { id: 'm5', author: '5511999999999@c.us', body: 'first' },
            { id: 'm6', author: '5511999999999@c.us', body: 'second' },
          ],
        }),
      );

      expect(result.statusCode).toBe(500);
      expect(result.events).toHaveLength(1);
      expect(result.response.message).toBe('Error');
      expect(result.response.data).toHaveLength(2);
      expect(result.response.data[0]).toMatchObject({ type: 'msg', external_id: 'm5' });
      expect(result.response.data[1]).toEqual({ type: 'error', error: 'writeMsg failed' });
    });
  });

  describe('sendMsg', () => {
    it('posts one part and marks the message wired', async () => {
      const spy = jest.spyOn(axios, 'request').mockResolvedValue(okResponse());

      const status = await handler.sendMsg(outgoing());

      expect(spy).toHaveBeenCalledTimes(1);
      const config = spy.mock.calls[0][0];
      expect(config.method).toBe('POST');
      expect(config.url).toBe(channel.address);
      expect(config.timeout).toBe(5000);
      expect(JSON.parse(String(config.data))).toEqual({
        ID: '42',
        Text: 'Hello there',
        To: '+15551234567',
        ToNoPlus: '15551234567',
        From: channel.address,
        FromNoPlus: channel.address,
        Channel: channel.address,
      });

      expect(status.status).toBe('wired');
      expect(status.msgId).toBe(42);
      expect(status.logs).toHaveLength(1);
      expect(status.logs[0]).toMatchObject({ description: 'Message Sent', statusCode: 200, msgId: 42 });
      expect(status.logs[0].error).toBeUndefined();
    });

    it('stays errored when the post fails in transport', async () => {
      jest.spyOn(axios, 'request').mockRejectedValue(new Error('connect ECONNREFUSED'));

      const status = await handler.sendMsg(outgoing());

      expect(status.status).toBe('errored');
      expect(status.logs).toHaveLength(1);
      expect(status.logs[0].error).toBe('connect ECONNREFUSED');
    });

    it('stays errored when the provider answers with an error status', async () => {
      jest.spyOn(axios, 'request').mockResolvedValue(okResponse(502));

      const status = await handler.sendMsg(outgoing());

      expect(status.status).toBe('errored');
      expect(status.logs[0].error).toBe('received non 200 status: 502');
    });

    it('sends nothing for an empty message', async () => {
      const spy = jest.spyOn(axios, 'request');

      const status = await handler.sendMsg(outgoing({ text: '' }));

      expect(spy).not.toHaveBeenCalled();
      expect(status.status).toBe('errored');
      expect(status.logs).toEqual([]);
    });

    it('sends attachment-only messages in one part', async () => {
      const spy = jest.spyOn(axios, 'request').mockResolvedValue(okResponse());

      const status = await handler.sendMsg(outgoing({ text: '', attachments: ['image/jpeg:http://files.test/a.jpg'] }));

      expect(spy).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(spy.mock.calls[0][0].data)).Attachments).toEqual(['image/jpeg:http://files.test/a.jpg']);
      expect(status.status).toBe('wired');
    });
  });
});

describe('buildSendPayload', () => {
  it('strips the leading plus from addresses', () => {
    const payload = buildSendPayload(
      outgoing({ channel: testChannel({ address: '+15550001111' }), quickReplies: ['Yes', 'No'] }),
    );

    expect(payload.ToNoPlus).toBe('15551234567');
    expect(payload.FromNoPlus).toBe('15550001111');
    expect(payload.Channel).toBe('15550001111');
    expect(payload.From).toBe('+15550001111');
    expect(payload.Metadata).toEqual({ quick_replies: ['Yes', 'No'] });
    expect(payload.Attachments).toBeUndefined();
  });

  it('yields one part for a message with text', () => {
    expect(Array.from(buildSendParts(outgoing()))).toHaveLength(1);
    expect(Array.from(buildSendParts(outgoing({ text: '' })))).toHaveLength(0);
  });
});

describe('ackStatus', () => {
  it('maps provider ack states', () => {
    expect(ackStatus('sent')).toBe('sent');
    expect(ackStatus('delivered')).toBe('delivered');
    expect(ackStatus('read')).toBe('queued');
    expect(ackStatus(undefined)).toBe('queued');
  });
});
