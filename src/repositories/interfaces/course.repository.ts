import { BaseRepository } from './base.repository';
import { Course, NewCourse } from '../../types/entity.types';

/**
 * Repository interface for Course entity operations
 */
export interface CourseRepository extends BaseRepository<Course, NewCourse> {
  /**
   * Get a course by its unique code
   * @returns The course, or null if no course has this code
   */
  findByCode(code: string): Promise<Course | null>;
}
