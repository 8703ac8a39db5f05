/**
 * Repository interface for schema bootstrap
 */
export interface SchemaRepository {
  /**
   * Create the teaching tables, constraints and indexes if they do not exist
   */
  ensureSchema(): Promise<void>;
}
