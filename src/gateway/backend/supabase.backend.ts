import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SupabaseClient } from '@supabase/supabase-js';
import { URN } from '../../common/utils/urns';
import { debugLog } from '../../common/utils/debug-logger';
import { SUPABASE } from '../../supabase/supabase.module';
import { RedisService } from '../../redis/redis.service';
import { RedisKeys, RedisTTL } from '../../redis/keys';
import {
  Channel,
  ChannelLog,
  ChannelType,
  Contact,
  IncomingMsg,
  MsgStatusUpdate,
} from '../contracts';
import { BackendError, ChannelNotFoundError, MsgNotFoundError } from '../errors';
import { ChannelBackend } from './channel-backend.interface';
import { ExternalIdSeenService } from './external-id-seen.service';

export interface ChannelRow {
  uuid: string;
  name: string | null;
  address: string | null;
  schemes: string[] | null;
  config: Record<string, unknown> | null;
}

interface ContactRow {
  uuid: string;
  name: string | null;
  language: string | null;
}

const UNIQUE_VIOLATION = '23505';

function isStringOrNull(value: unknown): value is string | null {
  return value === null || typeof value === 'string';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArrayOrNull(value: unknown): value is string[] | null {
  return value === null || (Array.isArray(value) && value.every((s) => typeof s === 'string'));
}

function isRecordOrNull(value: unknown): value is Record<string, unknown> | null {
  return value === null || isRecord(value);
}

/**
 * Reads a channel row back from the cache. Anything that is not a row of
 * the expected shape gives null, so the caller goes to the database.
 */
export function parseCachedChannel(raw: string): ChannelRow | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }

  if (!isRecord(value)) return null;
  const { uuid, name, address, schemes, config } = value;
  if (
    typeof uuid !== 'string' ||
    !isStringOrNull(name) ||
    !isStringOrNull(address) ||
    !isStringArrayOrNull(schemes) ||
    !isRecordOrNull(config)
  ) {
    return null;
  }

  return { uuid, name, address, schemes, config };
}

/**
 * ChannelBackend on Supabase tables (see supabase/migrations), with the
 * channel cache and the seen set in Redis.
 */
@Injectable()
export class SupabaseBackend implements ChannelBackend {
  private readonly log = new Logger(SupabaseBackend.name);
  private readonly dlog = debugLog.backend;
  private readonly channelTtl: number;

  constructor(
    @Inject(SUPABASE) private readonly supabase: SupabaseClient,
    private readonly redis: RedisService,
    private readonly seen: ExternalIdSeenService,
    cfg: ConfigService,
  ) {
    this.channelTtl = Number(cfg.get<string>('CHANNEL_CACHE_TTL') ?? RedisTTL.CHANNEL_DEFAULT);
  }

  async getChannel(channelType: ChannelType, uuid: string): Promise<Channel> {
    const cacheKey = RedisKeys.channel(channelType, uuid);
    const cached = await this.redis.get(cacheKey);
    if (cached) {
      const row = parseCachedChannel(cached);
      if (row && row.uuid === uuid) {
        return this.toChannel(channelType, row);
      }
      this.dlog.warn('Ignoring unreadable channel cache entry', { key: cacheKey });
    }

    const { data, error } = await this.supabase
      .from('channels')
      .select('uuid, name, address, schemes, config')
      .eq('uuid', uuid)
      .eq('channel_type', channelType)
      .eq('is_active', true)
      .maybeSingle<ChannelRow>();

    if (error) {
      this.log.error(`[getChannel] Lookup failed: ${error.message}`);
      throw new BackendError(`channel lookup failed: ${error.message}`, error);
    }
    if (!data) {
      throw new ChannelNotFoundError(uuid);
    }

    await this.redis.set(cacheKey, JSON.stringify(data), this.channelTtl);
    return this.toChannel(channelType, data);
  }

  async getContact(channel: Channel, urn: URN, name?: string): Promise<Contact> {
    return this.resolveContact(channel.uuid, urn, name);
  }

  async addLanguageToContact(
    _channel: Channel,
    language: string,
    contact: Contact,
  ): Promise<Contact> {
    const { data, error } = await this.supabase
      .from('contacts')
      .update({ language, modified_on: new Date().toISOString() })
      .eq('uuid', contact.uuid)
      .select('uuid, name, language')
      .single<ContactRow>();

    if (error || !data) {
      const reason = error?.message ?? 'contact not found';
      this.log.error(`[addLanguageToContact] Update failed: ${reason}`);
      throw new BackendError(`unable to set contact language: ${reason}`, error);
    }

    this.dlog.state('Contact language set', { contact: contact.uuid, language });
    return this.toContact(data, contact.urn);
  }

  async checkExternalIdSeen(msg: IncomingMsg): Promise<IncomingMsg> {
    return this.seen.check(msg);
  }

  async writeMsg(msg: IncomingMsg): Promise<void> {
    if (msg.alreadyWritten) {
      this.dlog.state('Message already written, skipping', { uuid: msg.uuid }, msg.channelUuid);
      return;
    }

    try {
      await this.insertMsg(msg);
    } catch (err) {
      await this.seen.release(msg);
      throw err;
    }
  }

  private async insertMsg(msg: IncomingMsg): Promise<void> {
    const contact = await this.resolveContact(msg.channelUuid, msg.urn, msg.contactName);
    const now = new Date().toISOString();

    const { error } = await this.supabase.from('msgs').insert({
      uuid: msg.uuid,
      channel_uuid: msg.channelUuid,
      contact_uuid: contact.uuid,
      contact_urn: msg.urn.identity,
      direction: 'I',
      status: 'pending',
      text: msg.text,
      attachments: msg.attachments,
      external_id: msg.externalId ?? null,
      sent_on: (msg.receivedOn ?? new Date()).toISOString(),
      created_on: now,
      modified_on: now,
    });

    // msgs_incoming_external_id: another delivery of this id got there first
    if (error?.code === UNIQUE_VIOLATION && msg.externalId) {
      this.dlog.state('Message written by a concurrent delivery', { externalId: msg.externalId }, msg.channelUuid);
      return;
    }
    if (error) {
      this.log.error(`[writeMsg] Insert failed: ${error.message}`);
      throw new BackendError(`unable to write message: ${error.message}`, error);
    }

    this.dlog.state('Message written', { uuid: msg.uuid, externalId: msg.externalId }, msg.channelUuid);
  }

  async writeExternalIdSeen(msg: IncomingMsg): Promise<void> {
    await this.seen.record(msg);
  }

  async writeMsgStatus(status: MsgStatusUpdate): Promise<void> {
    const now = new Date().toISOString();
    const patch: Record<string, unknown> = {
      status: status.status,
      modified_on: now,
      ...(status.status === 'wired' ? { sent_on: now } : {}),
    };

    let column: 'id' | 'external_id';
    let value: number | string;
    if (status.msgId !== undefined) {
      column = 'id';
      value = status.msgId;
      if (status.externalId) patch.external_id = status.externalId;
    } else if (status.externalId) {
      column = 'external_id';
      value = status.externalId;
    } else {
      throw new BackendError('status update has neither message id nor external id');
    }
    const ref = `${column} ${value}`;

    const { data, error } = await this.supabase
      .from('msgs')
      .update(patch)
      .eq('channel_uuid', status.channelUuid)
      .eq('direction', 'O')
      .eq(column, value)
      .select('id');

    if (error) {
      this.log.error(`[writeMsgStatus] Update failed for ${ref}: ${error.message}`);
      throw new BackendError(`unable to write status: ${error.message}`, error);
    }
    if (!data || data.length === 0) {
      throw new MsgNotFoundError(ref);
    }

    this.dlog.state('Status written', { ref, status: status.status }, status.channelUuid);
  }

  async writeChannelLogs(logs: ChannelLog[]): Promise<void> {
    if (logs.length === 0) return;

    const { error } = await this.supabase.from('channel_logs').insert(
      logs.map((l) => ({
        uuid: l.uuid,
        channel_uuid: l.channelUuid,
        msg_id: l.msgId ?? null,
        description: l.description,
        method: l.method,
        url: l.url,
        status_code: l.statusCode,
        request: l.request,
        response: l.response,
        elapsed_ms: l.elapsedMs,
        is_error: l.error !== undefined,
        error: l.error ?? null,
        created_on: l.createdOn.toISOString(),
      })),
    );

    if (error) {
      this.log.error(`[writeChannelLogs] Insert failed: ${error.message}`);
      throw new BackendError(`unable to write channel logs: ${error.message}`, error);
    }
  }

  private async resolveContact(channelUuid: string, urn: URN, name?: string): Promise<Contact> {
    const existing = await this.findContactByUrn(urn);
    if (existing) return existing;

    const { data: created, error: createError } = await this.supabase
      .from('contacts')
      .insert({ name: name || null })
      .select('uuid, name, language')
      .single<ContactRow>();

    if (createError || !created) {
      const reason = createError?.message ?? 'no row returned';
      this.log.error(`[resolveContact] Contact insert failed: ${reason}`);
      throw new BackendError(`unable to create contact: ${reason}`, createError);
    }

    const { error: urnError } = await this.supabase.from('contact_urns').insert({
      identity: urn.identity,
      scheme: urn.scheme,
      path: urn.path,
      contact_uuid: created.uuid,
      channel_uuid: channelUuid,
    });

    if (urnError) {
      // Lost a race with another request creating the same URN
      if (urnError.code === UNIQUE_VIOLATION) {
        const { error: cleanupError } = await this.supabase
          .from('contacts')
          .delete()
          .eq('uuid', created.uuid);
        if (cleanupError) {
          this.log.warn(`[resolveContact] Orphan contact ${created.uuid} not removed: ${cleanupError.message}`);
        }
        const winner = await this.findContactByUrn(urn);
        if (winner) return winner;
      }
      this.log.error(`[resolveContact] URN insert failed: ${urnError.message}`);
      throw new BackendError(`unable to create contact URN: ${urnError.message}`, urnError);
    }

    this.dlog.state('Contact created', { contact: created.uuid, urn: urn.identity }, channelUuid);
    return this.toContact(created, urn);
  }

  private async findContactByUrn(urn: URN): Promise<Contact | null> {
    const { data: link, error: linkError } = await this.supabase
      .from('contact_urns')
      .select('contact_uuid')
      .eq('identity', urn.identity)
      .maybeSingle<{ contact_uuid: string }>();

    if (linkError) {
      this.log.error(`[findContactByUrn] Lookup failed: ${linkError.message}`);
      throw new BackendError(`contact lookup failed: ${linkError.message}`, linkError);
    }
    if (!link) return null;

    const { data, error } = await this.supabase
      .from('contacts')
      .select('uuid, name, language')
      .eq('uuid', link.contact_uuid)
      .single<ContactRow>();

    if (error || !data) {
      const reason = error?.message ?? 'contact missing for URN';
      this.log.error(`[findContactByUrn] Contact fetch failed: ${reason}`);
      throw new BackendError(`contact lookup failed: ${reason}`, error);
    }
    return this.toContact(data, urn);
  }

  private toChannel(channelType: ChannelType, row: ChannelRow): Channel {
    return {
      uuid: row.uuid,
      channelType,
      name: row.name ?? '',
      address: row.address ?? '',
      schemes: row.schemes?.length ? row.schemes : ['ext'],
      config: row.config ?? {},
    };
  }

  private toContact(row: ContactRow, urn: URN): Contact {
    return {
      uuid: row.uuid,
      urn,
      ...(row.name ? { name: row.name } : {}),
      ...(row.language ? { language: row.language } : {}),
    };
  }
}
