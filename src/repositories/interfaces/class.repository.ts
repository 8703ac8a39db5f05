import { BaseRepository } from './base.repository';
import { Class, NewClass } from '../../types/entity.types';

/**
 * Repository interface for Class entity operations
 */
export interface ClassRepository extends BaseRepository<Class, NewClass> {
  /**
   * All classes of one course, in key order
   */
  listByCourse(courseId: number): Promise<Class[]>;
}
