// Repository interfaces
export * from './interfaces';

// Repository implementations
export * from './implementations';

// Entity descriptors
export * from './descriptors';

import { Session } from '../types/session.types';
import { ClassRepositoryImpl } from './implementations/class.repository.impl';
import { CourseRepositoryImpl } from './implementations/course.repository.impl';
import { CourseUserRepositoryImpl } from './implementations/course-user.repository.impl';
import { VenueRepositoryImpl } from './implementations/venue.repository.impl';
import { ClassRepository } from './interfaces/class.repository';
import { CourseRepository } from './interfaces/course.repository';
import { CourseUserRepository } from './interfaces/course-user.repository';
import { VenueRepository } from './interfaces/venue.repository';

export interface TeachingRepositories {
  classes: ClassRepository;
  courses: CourseRepository;
  courseUsers: CourseUserRepository;
  venues: VenueRepository;
}

/**
 * All entity repositories bound to one session, so their writes share one
 * transaction
 */
export function createRepositories(session: Session): TeachingRepositories {
  return {
    classes: new ClassRepositoryImpl(session),
    courses: new CourseRepositoryImpl(session),
    courseUsers: new CourseUserRepositoryImpl(session),
    venues: new VenueRepositoryImpl(session),
  };
}
