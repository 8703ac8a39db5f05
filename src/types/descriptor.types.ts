import { QueryResultRow } from 'pg';

/**
 * Keys of T whose values are numbers (candidate primary keys)
 */
export type NumericKeyOf<T> = {
  [P in keyof T]-?: T[P] extends number ? P : never;
}[keyof T] &
  string;

/**
 * Persisted, writable attribute names of T (everything but the key)
 */
export type AttributeName<T, K extends keyof T> = Exclude<keyof T, K> & string;

/**
 * Static mapping metadata binding the generic repository to one table
 */
export interface EntityDescriptor<T extends QueryResultRow, K extends NumericKeyOf<T>> {
  /** Entity name used in error messages and logs */
  readonly name: string;

  /** Table the rows live in */
  readonly table: string;

  /** Generated integer key column */
  readonly primaryKey: K;

  /** Columns written by create/update, in insert order */
  readonly attributes: readonly AttributeName<T, K>[];
}

export type SortDirection = 'ASC' | 'DESC';

/**
 * Options for listing rows
 */
export interface ListOptions<T> {
  /** Equality filter on persisted columns; null matches IS NULL */
  where?: Partial<T>;
  orderBy?: {
    column: keyof T & string;
    direction?: SortDirection;
  };
  limit?: number;
  offset?: number;
}
