import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { createClient } from 'redis';
import { StoreUnavailableException } from '../../common/exceptions/ledger.exceptions';

type RedisClient = ReturnType<typeof createClient>;

export interface LockRetryOptions {
  maxRetries?: number;
  retryDelayMs?: number;
}

const RELEASE_SCRIPT = `
  if redis.call("get", KEYS[1]) == ARGV[1] then
    return redis.call("del", KEYS[1])
  else
    return 0
  end
`;

/**
 * RedisLockService
 *
 * Optional distributed locks for running several instances against one
 * ledger store. Lock pattern: SET lock:{key} {token} NX EX {ttl}, released
 * with a compare-and-delete script so an expired lock taken over by another
 * instance is never released by the old owner.
 *
 * Keys used by LedgerService:
 * - user:postpaid:{username}
 * - user:prepaid:{username}
 *
 * Disabled unless REDIS_LOCKS_ENABLED=true; when disabled or disconnected
 * every withLock call runs the work directly and store transactions alone
 * keep the ledger consistent.
 */
@Injectable()
export class RedisLockService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RedisLockService.name);
  private readonly LOCK_PREFIX = 'lock:';
  private readonly defaultTtlSeconds: number;
  private redisClient: RedisClient | null = null;
  private isEnabled = false;

  constructor(private readonly configService: ConfigService) {
    this.defaultTtlSeconds = this.configService.get<number>('redis.lockTtlSeconds', 10);
  }

  async onModuleInit() {
    if (!this.configService.get<boolean>('redis.lockEnabled', false)) {
      this.logger.log('Redis locks disabled, relying on store transactions');
      return;
    }

    const redisHost = this.configService.get<string>('redis.host', 'localhost');
    const redisPort = this.configService.get<number>('redis.port', 6379);

    try {
      this.redisClient = createClient({
        socket: {
          host: redisHost,
          port: redisPort,
        },
      });

      this.redisClient.on('error', (err: Error) => {
        this.logger.error(`Redis client error: ${err.message}`);
        this.isEnabled = false;
      });

      this.redisClient.on('ready', () => {
        this.logger.log(`Redis lock client connected: ${redisHost}:${redisPort}`);
        this.isEnabled = true;
      });

      await this.redisClient.connect();
    } catch (error) {
      this.logger.warn(
        `Redis lock service not available, falling back to store transactions only: ${error instanceof Error ? error.message : String(error)}`,
      );
      this.isEnabled = false;
    }
  }

  async onModuleDestroy() {
    if (this.redisClient?.isOpen) {
      await this.redisClient.quit();
      this.logger.log('Redis lock client disconnected');
    }
  }

  /**
   * Try to take a lock, retrying with linear backoff.
   * @returns the lock token, or null if not acquired
   */
  async acquireLock(
    key: string,
    ttlSeconds: number = this.defaultTtlSeconds,
    retryOptions?: LockRetryOptions,
  ): Promise<string | null> {
    if (!this.isEnabled || !this.redisClient) {
      return null;
    }

    const lockKey = `${this.LOCK_PREFIX}${key}`;
    const lockToken = randomUUID();
    const maxRetries = retryOptions?.maxRetries ?? 20;
    const retryDelayMs = retryOptions?.retryDelayMs ?? 25;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      const result = await this.redisClient.set(lockKey, lockToken, {
        NX: true,
        EX: ttlSeconds,
      });

      if (result === 'OK') {
        this.logger.debug(`Acquired lock: ${lockKey}`);
        return lockToken;
      }

      if (attempt < maxRetries) {
        await this.sleep(retryDelayMs * (attempt + 1));
      }
    }

    return null;
  }

  async releaseLock(key: string, lockToken: string): Promise<boolean> {
    if (!this.redisClient) {
      return false;
    }

    const lockKey = `${this.LOCK_PREFIX}${key}`;

    try {
      const result = await this.redisClient.eval(RELEASE_SCRIPT, {
        keys: [lockKey],
        arguments: [lockToken],
      });

      const released = result === 1;
      if (!released) {
        this.logger.warn(`Failed to release lock ${lockKey} - token mismatch or lock expired`);
      }
      return released;
    } catch (error) {
      // the lock expires on its own after ttl
      this.logger.error(`Error releasing lock ${lockKey}:`, error);
      return false;
    }
  }

  /**
   * Run `fn` while holding the lock for `key`.
   * @throws StoreUnavailableException if Redis is enabled but the lock cannot be taken
   */
  async withLock<T>(
    key: string,
    fn: () => Promise<T>,
    ttlSeconds: number = this.defaultTtlSeconds,
    retryOptions?: LockRetryOptions,
  ): Promise<T> {
    if (!this.isLockServiceAvailable()) {
      return fn();
    }

    let lockToken: string | null;
    try {
      lockToken = await this.acquireLock(key, ttlSeconds, retryOptions);
    } catch (error) {
      throw new StoreUnavailableException(`Failed to acquire lock: ${key}`, error);
    }
    if (!lockToken) {
      throw new StoreUnavailableException(`Failed to acquire lock: ${key}`);
    }

    try {
      return await fn();
    } finally {
      await this.releaseLock(key, lockToken);
    }
  }

  /**
   * Run `fn` while holding every lock in `keys`.
   * Keys are taken in sorted order, so two callers locking the same pair
   * never wait on each other in a cycle.
   */
  async withLocks<T>(
    keys: string[],
    fn: () => Promise<T>,
    ttlSeconds: number = this.defaultTtlSeconds,
  ): Promise<T> {
    const ordered = Array.from(new Set(keys)).sort();
    const run = ordered.reduceRight<() => Promise<T>>(
      (inner, key) => () => this.withLock(key, inner, ttlSeconds),
      fn,
    );
    return run();
  }

  isLockServiceAvailable(): boolean {
    return this.isEnabled && this.redisClient !== null;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
