import { Pool } from 'pg';
import { isOtpError, storageUnavailable } from '@phonekey/domain';

export interface Queryable {
  query<T = unknown>(sql: string, params?: unknown[]): Promise<T[]>;
}

/** The slice of pg's `PoolClient` the transaction helper drives. */
export interface PgClient {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
  release(err?: Error | boolean): void;
}

/** The slice of pg's `Pool` used here; `Pool` satisfies it. */
export interface PgPool {
  query(sql: string, params?: unknown[]): Promise<{ rows: unknown[] }>;
  connect(): Promise<PgClient>;
}

export interface Database extends Queryable {
  transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
}

export function createPool(connectionString: string, timeoutMs: number): Pool {
  return new Pool({
    connectionString,
    connectionTimeoutMillis: timeoutMs,
    query_timeout: timeoutMs,
    statement_timeout: timeoutMs
  });
}

function toStorageError(error: unknown): Error {
  return isOtpError(error) ? error : storageUnavailable(error);
}

async function runQuery<T>(client: PgPool | PgClient, sql: string, params: unknown[]): Promise<T[]> {
  try {
    const res = await client.query(sql, params);
    return res.rows as T[];
  } catch (error) {
    throw toStorageError(error);
  }
}

/**
 * pg pool behind the narrow query/transaction surface the services use. Driver
 * failures, including timeouts, come out as `storage_unavailable`.
 */
export class PgDatabase implements Database {
  constructor(private readonly pool: PgPool) {}

  async query<T = unknown>(sql: string, params: unknown[] = []): Promise<T[]> {
    return runQuery<T>(this.pool, sql, params);
  }

  async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect().catch((error: unknown) => {
      throw toStorageError(error);
    });

    const tx: Queryable = {
      query: <R = unknown>(sql: string, params: unknown[] = []) => runQuery<R>(client, sql, params)
    };

    // A connection whose ROLLBACK failed is destroyed instead of pooled.
    let discard: Error | undefined;
    try {
      await tx.query('BEGIN');
      const result = await work(tx);
      await tx.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        discard = new AggregateError([error, rollbackError], 'rollback_failed');
        throw storageUnavailable(discard);
      }
      throw toStorageError(error);
    } finally {
      client.release(discard);
    }
  }

  async ping(): Promise<void> {
    await this.query('SELECT 1');
  }
}
