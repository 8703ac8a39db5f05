import { FastifyReply, FastifyRequest } from 'fastify';
import { SessionProvider } from '../services/session-provider.service';
import { ListOptions } from '../types/descriptor.types';
import { Session } from '../types/session.types';
import { HTTP } from '../constants';
import { ConnectionError, NotFoundError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface IdParams {
  id: number;
}

export interface ListQuery {
  limit?: number;
  offset?: number;
}

export type CreateRequest<C> = FastifyRequest<{ Body: C }>;
export type UpdateRequest<U> = FastifyRequest<{ Params: IdParams; Body: U }>;

/**
 * Repository operations the handlers call. Write inputs are the request
 * bodies as Fastify types them; with a concrete entity they resolve to its
 * create and update shapes.
 */
export interface EntityStore<T, C, U> {
  list(options?: ListOptions<T>): Promise<T[]>;
  getById(id: number): Promise<T | null>;
  create(attributes: CreateRequest<C>['body']): Promise<T>;
  update(id: number, attributes: UpdateRequest<U>['body']): Promise<T>;
  delete(id: number): Promise<boolean>;
}

export interface EntityControllerOptions<T, C, U> {
  /** Entity name used in messages */
  name: string;
  sessionProvider: SessionProvider;
  repositoryFor: (session: Session) => EntityStore<T, C, U>;
}

const UNIQUE_VIOLATION = '23505';

/**
 * Map data-access errors to HTTP responses
 */
export function sendDataAccessError(
  reply: FastifyReply,
  context: string,
  error: unknown
): void {
  if (error instanceof NotFoundError) {
    reply.code(404).send({
      error: 'Not Found',
      message: error.message,
    });
    return;
  }

  if (error instanceof ValidationError) {
    logger.warn(context, 'Write rejected', {
      error: error.message,
      constraint: error.constraint,
    });
    const conflict = error.code === UNIQUE_VIOLATION;
    reply.code(conflict ? 409 : 422).send({
      error: conflict ? 'Conflict' : 'Unprocessable Entity',
      message: error.message,
      ...(error.constraint && { constraint: error.constraint }),
    });
    return;
  }

  if (error instanceof ConnectionError) {
    logger.error(context, 'Database unavailable', error);
    reply.code(503).send({
      error: 'Service Unavailable',
      message: 'Database temporarily unavailable',
    });
    return;
  }

  logger.error(context, 'Request failed', error);
  reply.code(500).send({
    error: 'Internal Server Error',
    message: 'Request failed',
  });
}

/**
 * CRUD handlers for one entity. Each request runs in its own session and
 * transaction.
 */
export function createEntityController<T, C, U>(options: EntityControllerOptions<T, C, U>) {
  const { name, sessionProvider, repositoryFor } = options;
  const context = `${name}Controller`;

  function notFound(reply: FastifyReply, id: number): void {
    reply.code(404).send({
      error: 'Not Found',
      message: `${name} ${id} not found`,
    });
  }

  return {
    async list(
      request: FastifyRequest<{ Querystring: ListQuery }>,
      reply: FastifyReply
    ): Promise<void> {
      try {
        const { limit = HTTP.DEFAULT_PAGE_SIZE, offset = 0 } = request.query;
        const items = await sessionProvider.withSession(session =>
          repositoryFor(session).list({ limit, offset })
        );
        reply.code(200).send({ items, limit, offset });
      } catch (error) {
        sendDataAccessError(reply, context, error);
      }
    },

    async get(
      request: FastifyRequest<{ Params: IdParams }>,
      reply: FastifyReply
    ): Promise<void> {
      try {
        const { id } = request.params;
        const entity = await sessionProvider.withSession(session =>
          repositoryFor(session).getById(id)
        );
        if (entity === null) {
          notFound(reply, id);
          return;
        }
        reply.code(200).send(entity);
      } catch (error) {
        sendDataAccessError(reply, context, error);
      }
    },

    async create(
      request: CreateRequest<C>,
      reply: FastifyReply
    ): Promise<void> {
      try {
        const entity = await sessionProvider.withSession(session =>
          repositoryFor(session).create(request.body)
        );
        reply.code(201).send(entity);
      } catch (error) {
        sendDataAccessError(reply, context, error);
      }
    },

    async update(
      request: UpdateRequest<U>,
      reply: FastifyReply
    ): Promise<void> {
      try {
        const { id } = request.params;
        const entity = await sessionProvider.withSession(session =>
          repositoryFor(session).update(id, request.body)
        );
        reply.code(200).send(entity);
      } catch (error) {
        sendDataAccessError(reply, context, error);
      }
    },

    async remove(
      request: FastifyRequest<{ Params: IdParams }>,
      reply: FastifyReply
    ): Promise<void> {
      try {
        const { id } = request.params;
        const deleted = await sessionProvider.withSession(session =>
          repositoryFor(session).delete(id)
        );
        if (!deleted) {
          notFound(reply, id);
          return;
        }
        reply.code(204).send();
      } catch (error) {
        sendDataAccessError(reply, context, error);
      }
    },
  };
}
