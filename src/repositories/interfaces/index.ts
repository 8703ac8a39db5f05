export * from './base.repository';
export * from './class.repository';
export * from './course.repository';
export * from './course-user.repository';
export * from './venue.repository';
export * from './schema.repository';
