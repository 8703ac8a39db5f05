import { FastifyInstance } from 'fastify';
import { createReadinessCheck, healthCheck } from '../controllers/health.controller';
import {
  createEntityController,
  EntityStore,
  IdParams,
  ListQuery,
} from '../controllers/entity.controller';
import {
  ClassRepositoryImpl,
  CourseRepositoryImpl,
  CourseUserRepositoryImpl,
  VenueRepositoryImpl,
} from '../repositories';
import { DatabaseService } from '../services/database.service';
import { SessionProvider } from '../services/session-provider.service';
import { Session } from '../types/session.types';
import {
  Class,
  Course,
  CourseUser,
  NewClass,
  NewCourse,
  NewCourseUser,
  NewVenue,
  Venue,
} from '../types/entity.types';
import { HTTP } from '../constants';
import {
  classSchemas,
  courseSchemas,
  courseUserSchemas,
  EntityBodySchemas,
  idParamsSchema,
  listQuerySchema,
  venueSchemas,
} from './entity.schemas';

export interface RouteDependencies {
  databaseService: DatabaseService;
  sessionProvider: SessionProvider;
}

interface EntityRoute<T, C, U> {
  path: string;
  name: string;
  schemas: EntityBodySchemas;
  repositoryFor: (session: Session) => EntityStore<T, C, U>;
}

/**
 * CRUD routes for one entity. T is the row, C the create body, U the
 * update body.
 */
function registerEntityRoutes<T, C, U>(
  api: FastifyInstance,
  sessionProvider: SessionProvider,
  route: EntityRoute<T, C, U>
): void {
  const controller = createEntityController<T, C, U>({
    name: route.name,
    sessionProvider,
    repositoryFor: route.repositoryFor,
  });
  const itemPath = `${route.path}/:id`;

  api.get<{ Querystring: ListQuery }>(
    route.path,
    { schema: { querystring: listQuerySchema } },
    controller.list
  );
  api.get<{ Params: IdParams }>(itemPath, { schema: { params: idParamsSchema } }, controller.get);
  api.post<{ Body: C }>(route.path, { schema: { body: route.schemas.create } }, controller.create);
  api.patch<{ Params: IdParams; Body: U }>(
    itemPath,
    { schema: { params: idParamsSchema, body: route.schemas.update } },
    controller.update
  );
  api.delete<{ Params: IdParams }>(
    itemPath,
    { schema: { params: idParamsSchema } },
    controller.remove
  );
}

/**
 * Register all application routes
 */
export async function registerRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies
): Promise<void> {
  const { databaseService, sessionProvider } = deps;

  // Health endpoints (no version prefix)
  fastify.get('/health', healthCheck);
  fastify.get('/ready', createReadinessCheck(databaseService));

  // Versioned API routes
  await fastify.register(
    async api => {
      registerEntityRoutes<Course, NewCourse, Partial<NewCourse>>(api, sessionProvider, {
        path: '/courses',
        name: 'Course',
        schemas: courseSchemas,
        repositoryFor: session => new CourseRepositoryImpl(session),
      });
      registerEntityRoutes<Class, NewClass, Partial<NewClass>>(api, sessionProvider, {
        path: '/classes',
        name: 'Class',
        schemas: classSchemas,
        repositoryFor: session => new ClassRepositoryImpl(session),
      });
      registerEntityRoutes<Venue, NewVenue, Partial<NewVenue>>(api, sessionProvider, {
        path: '/venues',
        name: 'Venue',
        schemas: venueSchemas,
        repositoryFor: session => new VenueRepositoryImpl(session),
      });
      registerEntityRoutes<CourseUser, NewCourseUser, Partial<NewCourseUser>>(api, sessionProvider, {
        path: '/course-users',
        name: 'CourseUser',
        schemas: courseUserSchemas,
        repositoryFor: session => new CourseUserRepositoryImpl(session),
      });
    },
    { prefix: HTTP.API_VERSION }
  );
}
