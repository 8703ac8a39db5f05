export * from './base.repository.impl';
export * from './class.repository.impl';
export * from './course.repository.impl';
export * from './course-user.repository.impl';
export * from './venue.repository.impl';
export * from './schema.repository.impl';
