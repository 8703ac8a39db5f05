import { randomUUID } from 'crypto';
import { PoolClient, QueryResult, QueryResultRow } from 'pg';
import { Session } from '../types/session.types';
import { DATABASE } from '../constants';
import {
  ConnectionError,
  SessionStateError,
  ValidationError,
  translateDatabaseError,
} from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * The slice of a pooled client a session needs
 */
export type SessionClient = Pick<PoolClient, 'query' | 'release'>;

type BoundaryStatement = 'BEGIN' | 'COMMIT' | 'ROLLBACK';

function truncateQuery(text: string): string {
  return text.length > DATABASE.LOG_QUERY_MAX_LENGTH
    ? text.substring(0, DATABASE.LOG_QUERY_MAX_LENGTH) + '...'
    : text;
}

/**
 * DatabaseSession - one pooled connection and its transaction boundary.
 * Every repository bound to the same session runs on the same client, so
 * they observe each other's uncommitted writes.
 */
export class DatabaseSession implements Session {
  readonly id: string = randomUUID();

  private transactionOpen = false;
  private released = false;
  // Set when the connection can no longer be trusted; the pool discards it on release
  private failure: Error | undefined;

  constructor(private readonly client: SessionClient) {}

  get inTransaction(): boolean {
    return this.transactionOpen;
  }

  get closed(): boolean {
    return this.released;
  }

  async begin(): Promise<void> {
    this.assertOpen('begin');
    if (this.transactionOpen) {
      throw new SessionStateError(`Session ${this.id} already has an open transaction`);
    }
    await this.runBoundary('BEGIN');
    this.transactionOpen = true;
  }

  async commit(): Promise<void> {
    this.assertOpen('commit');
    if (!this.transactionOpen) {
      throw new SessionStateError(`Session ${this.id} has no open transaction to commit`);
    }
    try {
      await this.runBoundary('COMMIT');
    } finally {
      // A failed COMMIT ends the transaction on the server as well
      this.transactionOpen = false;
    }
  }

  async rollback(): Promise<void> {
    if (this.released || !this.transactionOpen) {
      return;
    }
    try {
      await this.runBoundary('ROLLBACK');
    } finally {
      this.transactionOpen = false;
    }
  }

  async close(): Promise<void> {
    if (this.released) {
      return;
    }
    try {
      if (this.transactionOpen) {
        await this.rollback();
      }
    } catch (error) {
      logger.error('DatabaseSession', 'Rollback on close failed, discarding connection', error, {
        sessionId: this.id,
      });
    } finally {
      this.released = true;
      this.client.release(this.failure);
      logger.debug('DatabaseSession', 'Session closed', { sessionId: this.id });
    }
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: readonly unknown[]
  ): Promise<QueryResult<R>> {
    this.assertOpen('query');
    const start = Date.now();
    try {
      const result = await this.client.query<R>(text, params ? [...params] : undefined);

      if (logger.isDebugEnabled()) {
        logger.debug('DatabaseSession', 'Query executed', {
          sessionId: this.id,
          query: truncateQuery(text),
          duration: `${Date.now() - start}ms`,
          rows: result.rowCount ?? 0,
        });
      }

      return result;
    } catch (error) {
      const translated = translateDatabaseError(error);
      if (translated instanceof ConnectionError) {
        this.markFailed(error);
      }
      logger.error('DatabaseSession', 'Query failed', error, {
        sessionId: this.id,
        query: truncateQuery(text),
        duration: `${Date.now() - start}ms`,
        params: params ? '[REDACTED]' : undefined,
      });
      throw translated;
    }
  }

  private assertOpen(operation: string): void {
    if (this.released) {
      throw new SessionStateError(`Cannot ${operation}: session ${this.id} is closed`);
    }
  }

  private async runBoundary(statement: BoundaryStatement): Promise<void> {
    try {
      await this.client.query(statement);
      logger.debug('DatabaseSession', statement, { sessionId: this.id });
    } catch (error) {
      logger.error('DatabaseSession', `${statement} failed`, error, { sessionId: this.id });
      const translated = translateDatabaseError(error);
      // Deferred constraints are checked at COMMIT
      if (translated instanceof ValidationError) {
        throw translated;
      }
      this.markFailed(error);
      if (translated instanceof ConnectionError) {
        throw translated;
      }
      throw new ConnectionError(`${statement} failed: ${describe(error)}`, error);
    }
  }

  private markFailed(error: unknown): void {
    this.failure = error instanceof Error ? error : new Error(String(error));
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
