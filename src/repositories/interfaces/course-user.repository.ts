import { BaseRepository } from './base.repository';
import { CourseUser, NewCourseUser } from '../../types/entity.types';

/**
 * Repository interface for CourseUser (enrollment) operations
 */
export interface CourseUserRepository extends BaseRepository<CourseUser, NewCourseUser> {
  listByCourse(courseId: number): Promise<CourseUser[]>;
}
