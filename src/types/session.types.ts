import { QueryResult, QueryResultRow } from 'pg';

/**
 * Session types and interfaces
 * A session is one pooled connection plus its transaction boundary
 */

/**
 * Unit of work handed to repositories.
 * Owned by exactly one logical request/operation for its whole lifetime.
 */
export interface Session {
  /** Random identifier used to correlate log lines */
  readonly id: string;

  /** True between begin() and commit()/rollback() */
  readonly inTransaction: boolean;

  /** True once close() has released the connection */
  readonly closed: boolean;

  /** Open a transaction boundary (BEGIN) */
  begin(): Promise<void>;

  /** Persist every write made through this session (COMMIT) */
  commit(): Promise<void>;

  /** Discard every write made through this session (ROLLBACK); no-op outside a transaction */
  rollback(): Promise<void>;

  /** Release the connection; rolls back an open transaction first. Safe to call twice. */
  close(): Promise<void>;

  /** Run a parameterized statement on the session's connection */
  query<R extends QueryResultRow = QueryResultRow>(
    text: string,
    params?: readonly unknown[]
  ): Promise<QueryResult<R>>;
}

/**
 * Work executed inside SessionProvider.withSession
 */
export type SessionWork<T> = (session: Session) => Promise<T>;
