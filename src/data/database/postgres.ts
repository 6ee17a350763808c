// src/data/database/postgres.ts
import pg from 'pg';
import { logger } from '../../utils/logger.js';
import { StartupError } from '../../utils/errors.js';
import type { DatabaseConfig, DatabaseHealth } from '../../types/index.js';

export interface QueryOutcome {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/** What the repository sees of a borrowed connection. */
export interface DatabaseConnection {
  query(text: string, values?: unknown[]): Promise<QueryOutcome>;
}

export interface DatabaseClient extends DatabaseConnection {
  release(): void;
}

export interface DatabasePool {
  connect(): Promise<DatabaseClient>;
  end(): Promise<void>;
  readonly totalCount?: number;
  readonly idleCount?: number;
  readonly waitingCount?: number;
}

export type PoolFactory = (options: DatabaseConfig) => DatabasePool;

// DATE columns come back as 'YYYY-MM-DD' instead of a local-midnight Date
const DATE_OID = 1082;
pg.types.setTypeParser(DATE_OID, (value: string) => value);

export const createPgPool: PoolFactory = (options) => {
  // No transactions are issued: every statement autocommits.
  const pool = new pg.Pool({
    host: options.host,
    port: options.port,
    user: options.user,
    password: options.password,
    database: options.database,
    min: options.pool.min,
    max: options.pool.max,
    statement_timeout: options.statementTimeoutMs,
    connectionTimeoutMillis: options.connectionTimeoutMs,
    idleTimeoutMillis: options.idleTimeoutMs
  });

  pool.on('error', (error: Error) => {
    logger.error('PostgreSQL idle client error:', error);
  });

  return {
    async connect() {
      const client = await pool.connect();
      return {
        async query(text, values) {
          const result = await client.query(text, values);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release: () => client.release()
      };
    },
    end: () => pool.end(),
    get totalCount() { return pool.totalCount; },
    get idleCount() { return pool.idleCount; },
    get waitingCount() { return pool.waitingCount; }
  };
};

/**
 * Owns the process's connection pool. One instance is created by the
 * server entrypoint and handed to everything that needs a connection.
 */
export class DatabaseManager {
  private pool: DatabasePool | null = null;
  private opening: Promise<DatabasePool> | null = null;

  constructor(
    private readonly options: DatabaseConfig,
    private readonly createPool: PoolFactory = createPgPool
  ) {}

  get isConnected(): boolean {
    return this.pool !== null;
  }

  /** Opens the pool on first call; later and concurrent calls share the same pool. */
  async connect(): Promise<DatabasePool> {
    if (this.pool) return this.pool;
    if (!this.opening) {
      this.opening = this.open().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async open(): Promise<DatabasePool> {
    logger.info(`Creating database connection pool for ${this.options.database} on ${this.options.host}`);
    const pool = this.createPool(this.options);

    try {
      const client = await pool.connect();
      try {
        await client.query('SELECT 1');
      } finally {
        client.release();
      }
    } catch (error) {
      logger.error('❌ Failed to create database connection pool:', error);
      await pool.end().catch((endError: unknown) => {
        logger.warn('Error closing half-open pool:', endError);
      });
      throw new StartupError('Could not connect to the database', error);
    }

    this.pool = pool;
    logger.info(`🐘 PostgreSQL pool ready (min ${this.options.pool.min}, max ${this.options.pool.max})`);
    return pool;
  }

  /** Closes every pooled connection. A later connect() starts over. */
  async disconnect(): Promise<void> {
    if (this.opening) {
      // a failed open already reported itself to its caller and left no pool behind
      await this.opening.catch(() => undefined);
    }
    const pool = this.pool;
    if (!pool) return;

    this.pool = null;
    await pool.end();
    logger.info('🐘 PostgreSQL pool closed');
  }

  /** Borrows one connection for `work`; it goes back to the pool however `work` ends. */
  async withConnection<T>(work: (connection: DatabaseConnection) => Promise<T>): Promise<T> {
    const pool = await this.connect();
    const client = await pool.connect();
    try {
      return await work(client);
    } finally {
      client.release();
    }
  }

  async healthCheck(): Promise<DatabaseHealth> {
    const base = {
      database: this.options.database,
      host: this.options.host,
      port: this.options.port
    };

    const pool = this.pool;
    if (!pool) {
      return { status: 'disconnected', ...base };
    }

    try {
      await this.withConnection(connection => connection.query('SELECT 1'));
      return {
        status: 'connected',
        ...base,
        totalCount: pool.totalCount,
        idleCount: pool.idleCount,
        waitingCount: pool.waitingCount
      };
    } catch (error) {
      logger.error('Database health check failed:', error);
      return { status: 'error', ...base };
    }
  }
}
