import { readFileSync } from 'fs';
import { Pool, PoolConfig } from 'pg';
import { config } from '../config';
import { Config } from '../config/types';
import { logger } from '../utils/logger';

export interface PoolStatus {
  totalCount: number;
  idleCount: number;
  waitingCount: number;
}

/**
 * Build pg pool options from configuration.
 * TLS is enabled by DATABASE_SSL_ENABLED; DATABASE_SSL_CA_PATH adds a CA bundle.
 */
export function buildPoolConfig(settings: Config): PoolConfig {
  const poolConfig: PoolConfig = {
    host: settings.DATABASE_HOST,
    port: settings.DATABASE_PORT,
    database: settings.DATABASE_NAME,
    user: settings.DATABASE_USER,
    password: settings.DATABASE_PASSWORD,
    max: settings.DATABASE_POOL_MAX,
    min: settings.DATABASE_POOL_MIN,
    idleTimeoutMillis: settings.DATABASE_IDLE_TIMEOUT_MS,
    connectionTimeoutMillis: settings.DATABASE_CONNECTION_TIMEOUT_MS,
    statement_timeout: settings.DATABASE_STATEMENT_TIMEOUT_MS,
    query_timeout: settings.DATABASE_QUERY_TIMEOUT_MS,
    application_name: settings.SERVICE_NAME,
  };

  if (settings.DATABASE_SSL_ENABLED) {
    poolConfig.ssl = settings.DATABASE_SSL_CA_PATH
      ? { ca: readFileSync(settings.DATABASE_SSL_CA_PATH, 'utf8'), rejectUnauthorized: true }
      : { rejectUnauthorized: true };
  }

  return poolConfig;
}

/**
 * Database connection pool service
 * Handles only connection pooling and lifecycle management
 */
export class DatabaseService {
  private readonly pool: Pool;

  constructor(pool?: Pool) {
    this.pool = pool ?? new Pool(buildPoolConfig(config));

    // Handle pool errors
    this.pool.on('error', err => {
      logger.error('DatabaseService', 'Unexpected error on idle client', err);
    });

    // Log pool events in development
    if (config.NODE_ENV === 'development') {
      this.pool.on('connect', () => {
        logger.debug('DatabaseService', 'New client connected to database');
      });

      this.pool.on('remove', () => {
        logger.debug('DatabaseService', 'Client removed from pool');
      });
    }
  }

  /**
   * Get the connection pool for session use
   */
  getPool(): Pool {
    return this.pool;
  }

  /**
   * Get pool status for monitoring
   */
  getPoolStatus(): PoolStatus {
    return {
      totalCount: this.pool.totalCount,
      idleCount: this.pool.idleCount,
      waitingCount: this.pool.waitingCount,
    };
  }

  /**
   * Check database connectivity
   */
  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.pool.query<{ health: number }>('SELECT 1 AS health');
      return result.rows.length === 1 && result.rows[0]?.health === 1;
    } catch (error) {
      logger.error('DatabaseService', 'Database health check failed', error);
      return false;
    }
  }

  /**
   * Close all connections (for graceful shutdown)
   */
  async close(): Promise<void> {
    logger.info('DatabaseService', 'Closing database pool');
    await this.pool.end();
  }
}
