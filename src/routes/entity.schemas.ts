import { DATABASE, HTTP } from '../constants';

/**
 * JSON schemas validated by Fastify before a handler runs
 */

const nullableInteger = { type: 'integer', nullable: true } as const;

export const idParamsSchema = {
  type: 'object',
  properties: {
    id: { type: 'integer', minimum: 1, maximum: DATABASE.MAX_SERIAL_KEY },
  },
  required: ['id'],
} as const;

export const listQuerySchema = {
  type: 'object',
  properties: {
    limit: { type: 'integer', minimum: 0, maximum: HTTP.MAX_PAGE_SIZE },
    offset: { type: 'integer', minimum: 0 },
  },
} as const;

const venueProperties = {
  institution_id: nullableInteger,
  name: { type: 'string', minLength: 1, maxLength: 100 },
  capacity: { type: 'integer', minimum: 0, nullable: true },
} as const;

const courseProperties = {
  institution_id: nullableInteger,
  code: { type: 'string', minLength: 1, maxLength: 20 },
  name: { type: 'string', minLength: 1, maxLength: 150 },
  description: { type: 'string', nullable: true },
} as const;

const classProperties = {
  course_id: { type: 'integer', minimum: 1, maximum: DATABASE.MAX_SERIAL_KEY },
  venue_id: nullableInteger,
  semester_id: nullableInteger,
  lecturer_id: nullableInteger,
  status: { type: 'string', enum: ['scheduled', 'in_progress', 'completed', 'cancelled'] },
  start_time: { type: 'string', format: 'date-time', nullable: true },
  end_time: { type: 'string', format: 'date-time', nullable: true },
} as const;

const courseUserProperties = {
  user_id: { type: 'integer', minimum: 1, maximum: DATABASE.MAX_SERIAL_KEY },
  course_id: { type: 'integer', minimum: 1, maximum: DATABASE.MAX_SERIAL_KEY },
  semester_id: { type: 'integer', minimum: 1, maximum: DATABASE.MAX_SERIAL_KEY },
} as const;

export interface EntityBodySchemas {
  create: Record<string, unknown>;
  update: Record<string, unknown>;
}

function bodySchemas(
  properties: Record<string, unknown>,
  required: readonly string[]
): EntityBodySchemas {
  return {
    create: {
      type: 'object',
      properties,
      required: [...required],
      additionalProperties: false,
    },
    update: {
      type: 'object',
      properties,
      additionalProperties: false,
    },
  };
}

export const venueSchemas = bodySchemas(venueProperties, ['name']);
export const courseSchemas = bodySchemas(courseProperties, ['code', 'name']);
export const classSchemas = bodySchemas(classProperties, ['course_id']);
export const courseUserSchemas = bodySchemas(courseUserProperties, [
  'user_id',
  'course_id',
  'semester_id',
]);
