// Library entry point: sessions, repositories and errors for calling code
export * from './repositories';
export * from './services/database.service';
export * from './services/session.service';
export * from './services/session-provider.service';
export * from './types/descriptor.types';
export * from './types/entity.types';
export * from './types/session.types';
export * from './utils/errors';
export { buildServer } from './app';
