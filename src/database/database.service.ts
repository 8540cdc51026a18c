import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Pool, type PoolClient, type QueryResultRow } from 'pg';

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private readonly pool: Pool;
  private readonly logger = new Logger(DatabaseService.name);

  constructor(config: ConfigService) {
    const url =
      config.get<string>('database.url') ??
      'postgresql://localhost:5432/marketplace';
    this.pool = new Pool({
      connectionString: url,
      max: 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: 5_000,
    });
    // Errors on idle clients; the pool stays usable.
    this.pool.on('error', (err) =>
      this.logger.error('Postgres pool error', err.stack),
    );
  }

  /** Applies schema.sql; every statement in it is idempotent. */
  async onModuleInit() {
    const schema = await readFile(join(__dirname, 'schema.sql'), 'utf8');
    await this.pool.query(schema);
    this.logger.log('Database schema ready');
  }

  async query<R extends QueryResultRow>(
    text: string,
    params: unknown[] = [],
  ): Promise<R[]> {
    const result = await this.pool.query<R>(text, params);
    return result.rows;
  }

  /** Runs `fn` inside BEGIN/COMMIT on one pooled client. */
  async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await fn(client);
      await client.query('COMMIT');
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: Error) =>
        this.logger.error('Rollback failed', rollbackErr.stack),
      );
      throw err;
    } finally {
      client.release();
    }
  }

  async onModuleDestroy() {
    await this.pool.end();
  }
}
