import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

const FALLBACK_SWEEP_MS = 60_000;

/**
 * Redis service with in-memory fallback for single-instance deployments.
 * GUARD: If MULTI_INSTANCE=true and Redis unavailable, operations fail hard.
 */
@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly logger = new Logger(RedisService.name);
  private client: Redis | null = null;
  private readonly fallbackCache = new Map<
    string,
    { value: string; expiresAt: number }
  >();
  private readonly multiInstance: boolean;
  private connected = false;
  private lastSweep = Date.now();

  constructor(private readonly config: ConfigService) {
    this.multiInstance = config.get('MULTI_INSTANCE') === 'true';
    this.initializeClient();
  }

  private initializeClient() {
    const redisUrl = this.config.get<string>('REDIS_URL');

    if (!redisUrl) {
      this.logger.warn('REDIS_URL not configured, using in-memory fallback');
      return;
    }

    try {
      this.client = new Redis(redisUrl, {
        maxRetriesPerRequest: 3,
        retryStrategy: (times) => {
          if (times > 3) return null;
          return Math.min(times * 100, 2000);
        },
        lazyConnect: true,
      });

      this.client.on('connect', () => {
        this.connected = true;
        this.logger.log('Redis connected');
      });

      this.client.on('error', (err: Error) => {
        this.connected = false;
        this.logger.error('Redis error', err.message);
      });

      this.client.on('close', () => {
        this.connected = false;
        this.logger.warn('Redis connection closed');
      });

      this.client.connect().catch((err: Error) => {
        this.logger.error('Failed to connect to Redis', err.message);
      });
    } catch (err) {
      this.logger.error('Failed to initialize Redis client', err);
    }
  }

  async onModuleDestroy() {
    if (this.client) {
      await this.client.quit();
    }
  }

  /**
   * Returns the live client, or null to use the fallback.
   * Throws if multi-instance and Redis is down.
   */
  private availableClient(): Redis | null {
    if (this.connected && this.client) {
      return this.client;
    }
    if (this.multiInstance) {
      throw new Error('Redis unavailable in multi-instance mode');
    }
    return null;
  }

  async get(key: string): Promise<string | null> {
    const client = this.availableClient();
    if (client) {
      return client.get(key);
    }

    const entry = this.fallbackCache.get(key);
    if (entry && entry.expiresAt > Date.now()) {
      return entry.value;
    }
    this.fallbackCache.delete(key);
    return null;
  }

  /**
   * Set value with TTL (seconds)
   */
  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    const client = this.availableClient();
    if (client) {
      await client.setex(key, ttlSeconds, value);
      return;
    }

    this.sweepFallback();
    this.fallbackCache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  /**
   * Sets the key only if it does not exist (SET NX EX).
   * Returns true when this call created it.
   */
  async setIfAbsent(key: string, value: string, ttlSeconds: number): Promise<boolean> {
    const client = this.availableClient();
    if (client) {
      const result = await client.set(key, value, 'EX', ttlSeconds, 'NX');
      return result === 'OK';
    }

    this.sweepFallback();
    const existing = this.fallbackCache.get(key);
    if (existing && existing.expiresAt > Date.now()) {
      return false;
    }
    this.fallbackCache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
    return true;
  }

  async del(key: string): Promise<void> {
    const client = this.availableClient();
    if (client) {
      await client.del(key);
      return;
    }

    this.fallbackCache.delete(key);
  }

  // Expired fallback keys are otherwise only dropped when read again.
  private sweepFallback() {
    const now = Date.now();
    if (now - this.lastSweep < FALLBACK_SWEEP_MS) return;

    this.lastSweep = now;
    for (const [key, entry] of this.fallbackCache) {
      if (entry.expiresAt <= now) {
        this.fallbackCache.delete(key);
      }
    }
  }

  async isHealthy(): Promise<boolean> {
    if (!this.client || !this.connected) {
      return !this.multiInstance; // Healthy in single-instance fallback mode
    }

    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch {
      return !this.multiInstance;
    }
  }

  getStatus(): { connected: boolean; mode: 'redis' | 'fallback'; fallbackKeys: number } {
    return {
      connected: this.connected,
      mode: this.connected && this.client ? 'redis' : 'fallback',
      fallbackKeys: this.fallbackCache.size,
    };
  }
}
