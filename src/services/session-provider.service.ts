import { Pool, PoolClient } from 'pg';
import { DatabaseSession } from './session.service';
import { Session, SessionWork } from '../types/session.types';
import { ConnectionError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * The slice of a pool the provider needs
 */
export type ConnectionSource = Pick<Pool, 'connect'>;

/**
 * SessionProvider - hands out sessions on pooled connections.
 * Repositories never open, commit or roll back; whoever holds the session does.
 */
export class SessionProvider {
  constructor(private readonly pool: ConnectionSource) {}

  /**
   * Acquire a connection and wrap it in a session.
   * The caller owns the session and must close() it.
   */
  async openSession(): Promise<Session> {
    let client: PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      logger.error('SessionProvider', 'Failed to acquire database connection', error);
      throw new ConnectionError('Failed to acquire database connection', error);
    }

    const session = new DatabaseSession(client);
    logger.debug('SessionProvider', 'Session opened', { sessionId: session.id });
    return session;
  }

  /**
   * Execute work within one session and one transaction.
   * Commits on success; rolls back and rethrows on failure; always releases.
   */
  async withSession<T>(work: SessionWork<T>): Promise<T> {
    const session = await this.openSession();
    try {
      await session.begin();
      const result = await work(session);
      await session.commit();
      return result;
    } catch (error) {
      try {
        await session.rollback();
      } catch (rollbackError) {
        logger.error('SessionProvider', 'Rollback failed', rollbackError, {
          sessionId: session.id,
        });
      }
      throw error;
    } finally {
      await session.close();
    }
  }
}
