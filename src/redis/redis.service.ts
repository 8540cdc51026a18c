import { Injectable, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';

/** Value-moving operations that accept a client idempotency key. */
export type IdempotentOperation = 'buy' | 'bid' | 'claim';

@Injectable()
export class RedisService implements OnModuleDestroy {
  private readonly client: Redis;
  private readonly logger = new Logger(RedisService.name);

  constructor(config: ConfigService) {
    const url = config.get<string>('redis.url') ?? 'redis://localhost:6379';
    this.client = new Redis(url);
    this.client.on('error', (err) =>
      this.logger.error('Redis connection error', err.stack),
    );
    this.client.on('connect', () => this.logger.log('Connected to Redis'));
  }

  /**
   * `resource` names what the request acts on (`sale:3`, `auction:7`,
   * `currency:NATIVE`), so one client key reused elsewhere is a new request.
   */
  private idempotencyKey(
    operation: IdempotentOperation,
    resource: string,
    caller: string,
    key: string,
    suffix: 'pending' | 'result',
  ): string {
    return `marketplace:${operation}:${resource}:caller:${caller}:idem:${key}:${suffix}`;
  }

  /**
   * Marks a request as in flight. Returns false when another request with
   * the same key got there first.
   */
  async claimIdempotency(
    operation: IdempotentOperation,
    resource: string,
    caller: string,
    key: string,
    ttlSec = 30,
  ): Promise<boolean> {
    const result = await this.client.set(
      this.idempotencyKey(operation, resource, caller, key, 'pending'),
      '1',
      'EX',
      ttlSec,
      'NX',
    );
    return result === 'OK';
  }

  /** Drops the in-flight mark of a request that produced no result. */
  async releaseIdempotency(
    operation: IdempotentOperation,
    resource: string,
    caller: string,
    key: string,
  ): Promise<void> {
    await this.client.del(
      this.idempotencyKey(operation, resource, caller, key, 'pending'),
    );
  }

  /** Stored JSON of a finished request, or null. */
  async getIdempotencyResult(
    operation: IdempotentOperation,
    resource: string,
    caller: string,
    key: string,
  ): Promise<string | null> {
    return this.client.get(
      this.idempotencyKey(operation, resource, caller, key, 'result'),
    );
  }

  async storeIdempotencyResult(
    operation: IdempotentOperation,
    resource: string,
    caller: string,
    key: string,
    resultJson: string,
    ttlSec = 600,
  ): Promise<void> {
    const pipeline = this.client.pipeline();
    pipeline.set(
      this.idempotencyKey(operation, resource, caller, key, 'result'),
      resultJson,
      'EX',
      ttlSec,
    );
    pipeline.del(this.idempotencyKey(operation, resource, caller, key, 'pending'));
    await pipeline.exec();
  }

  async onModuleDestroy() {
    await this.client.quit();
  }
}
