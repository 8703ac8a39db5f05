import { SchemaRepository } from '../interfaces/schema.repository';
import { Session } from '../../types/session.types';
import { logger } from '../../utils/logger';

/**
 * Tables in dependency order. Cascades are declared here, at the storage
 * engine; repositories never delete dependent rows themselves.
 */
const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS "venue" (
    venue_id SERIAL PRIMARY KEY,
    institution_id INTEGER,
    name VARCHAR(100) NOT NULL,
    capacity INTEGER
  )`,
  `CREATE TABLE IF NOT EXISTS "course" (
    course_id SERIAL PRIMARY KEY,
    institution_id INTEGER,
    code VARCHAR(20) NOT NULL UNIQUE,
    name VARCHAR(150) NOT NULL,
    description TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS "class" (
    class_id SERIAL PRIMARY KEY,
    course_id INTEGER NOT NULL REFERENCES "course" (course_id) ON DELETE CASCADE,
    venue_id INTEGER REFERENCES "venue" (venue_id),
    semester_id INTEGER,
    lecturer_id INTEGER,
    status VARCHAR(20) NOT NULL DEFAULT 'scheduled',
    start_time TIMESTAMPTZ,
    end_time TIMESTAMPTZ
  )`,
  `CREATE TABLE IF NOT EXISTS "course_user" (
    course_user_id SERIAL PRIMARY KEY,
    user_id INTEGER NOT NULL,
    course_id INTEGER NOT NULL REFERENCES "course" (course_id) ON DELETE CASCADE,
    semester_id INTEGER NOT NULL,
    UNIQUE (user_id, course_id, semester_id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_class_course_id ON "class" (course_id)`,
  `CREATE INDEX IF NOT EXISTS idx_class_venue_id ON "class" (venue_id)`,
  `CREATE INDEX IF NOT EXISTS idx_course_user_course_id ON "course_user" (course_id)`,
];

/**
 * Schema repository implementation
 * Runs the idempotent DDL through the caller's session
 */
export class SchemaRepositoryImpl implements SchemaRepository {
  constructor(private readonly session: Session) {}

  async ensureSchema(): Promise<void> {
    try {
      for (const statement of SCHEMA_STATEMENTS) {
        await this.session.query(statement);
      }
      logger.info('SchemaRepository', 'Teaching schema ensured', {
        statements: SCHEMA_STATEMENTS.length,
      });
    } catch (error) {
      logger.error('SchemaRepository', 'Failed to ensure teaching schema', error);
      throw error;
    }
  }
}
