import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { logger as rootLogger, Logger } from '../logging/logger';
import { StorageError, toError } from '../../shared/errors';

const SLOW_QUERY_MS = 1000;

/**
 * Anything SQL can be run against: the pool itself, or a client checked out
 * for a transaction. Repositories are written against this.
 */
export interface SqlExecutor {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
  queryOne<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T | null>;
  queryMany<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]>;
}

export interface DatabaseHealth {
  healthy: boolean;
  latencyMs: number;
  connections: {
    total: number;
    idle: number;
    waiting: number;
  };
}

async function runQuery<T extends QueryResultRow>(
  target: Pool | PoolClient,
  log: Logger,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();

  try {
    const result = await target.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration > SLOW_QUERY_MS) {
      log.warn({ query: text.substring(0, 100), duration }, 'Slow query detected');
    }

    return result;
  } catch (error) {
    const err = toError(error);
    log.error({ query: text.substring(0, 100), error: err.message }, 'Query failed');
    throw new StorageError(err.message, err);
  }
}

// ============================================================================
// Transaction Client
// ============================================================================

class TransactionClient implements SqlExecutor {
  constructor(
    private client: PoolClient,
    private log: Logger
  ) {}

  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    return runQuery<T>(this.client, this.log, text, params);
  }

  async queryOne<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T | null> {
    const result = await this.query<T>(text, params);
    return result.rows[0] ?? null;
  }

  async queryMany<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
    const result = await this.query<T>(text, params);
    return result.rows;
  }
}

// ============================================================================
// Database Handle
// ============================================================================

/**
 * Owns the connection pool. Created once at start-up, handed to every
 * repository, and closed on shutdown.
 */
export class Database implements SqlExecutor {
  private pool: Pool;
  private log: Logger;

  constructor(connectionString: string, log: Logger = rootLogger) {
    this.log = log.child({ component: 'db' });
    this.pool = new Pool({
      connectionString,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
      maxUses: 10000,
      allowExitOnIdle: false,
    });

    this.pool.on('connect', () => {
      this.log.debug('New database connection established');
    });

    this.pool.on('error', (err) => {
      this.log.error({ error: err.message }, 'Unexpected database pool error');
    });
  }

  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>> {
    return runQuery<T>(this.pool, this.log, text, params);
  }

  async queryOne<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T | null> {
    const result = await this.query<T>(text, params);
    return result.rows[0] ?? null;
  }

  async queryMany<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
    const result = await this.query<T>(text, params);
    return result.rows;
  }

  // ==========================================================================
  // Transaction Support
  // ==========================================================================

  async withTransaction<T>(callback: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      const err = toError(error);
      throw new StorageError(`Could not acquire connection: ${err.message}`, err);
    }

    try {
      await client.query('BEGIN');
      const result = await callback(new TransactionClient(client, this.log));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        this.log.error({ error: toError(rollbackError).message }, 'Rollback failed');
      }
      throw error;
    } finally {
      client.release();
    }
  }

  // ==========================================================================
  // Health & Lifecycle
  // ==========================================================================

  async checkHealth(): Promise<DatabaseHealth> {
    const start = Date.now();
    let healthy = true;

    try {
      await this.pool.query('SELECT 1');
    } catch (error) {
      this.log.warn({ error: toError(error).message }, 'Database health check failed');
      healthy = false;
    }

    return {
      healthy,
      latencyMs: Date.now() - start,
      connections: {
        total: this.pool.totalCount,
        idle: this.pool.idleCount,
        waiting: this.pool.waitingCount,
      },
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.log.info('Database pool closed');
  }
}
