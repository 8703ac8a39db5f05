import { ListOptions } from '../../types/descriptor.types';

/**
 * Base repository interface with common CRUD operations
 */
export interface BaseRepository<T, C> {
  /**
   * Get a row by its key
   * @returns The entity, or null when no row matches
   */
  getById(id: number): Promise<T | null>;

  /**
   * List rows matching an optional filter, ordered by key unless told otherwise
   */
  list(options?: ListOptions<T>): Promise<T[]>;

  /**
   * Insert a row and return it with its generated key
   * @throws ValidationError on unknown attributes or a violated constraint
   */
  create(attributes: C): Promise<T>;

  /**
   * Apply a partial update and return the updated row
   * @throws NotFoundError when no row has this key
   */
  update(id: number, attributes: Partial<C>): Promise<T>;

  /**
   * Delete a row; dependent rows follow the table's ON DELETE rules
   * @returns true if a row was removed
   */
  delete(id: number): Promise<boolean>;

  /**
   * Check existence without materializing the row
   */
  exists(id: number): Promise<boolean>;

  /**
   * Count rows matching an optional equality filter
   */
  count(where?: Partial<T>): Promise<number>;
}
