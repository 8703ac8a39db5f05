import { BaseRepositoryImpl } from './base.repository.impl';
import { CourseRepository } from '../interfaces/course.repository';
import { COURSE_DESCRIPTOR } from '../descriptors';
import { Course, NewCourse } from '../../types/entity.types';
import { Session } from '../../types/session.types';

/**
 * Course repository implementation
 */
export class CourseRepositoryImpl
  extends BaseRepositoryImpl<Course, 'course_id', NewCourse>
  implements CourseRepository
{
  constructor(session: Session) {
    super(session, COURSE_DESCRIPTOR);
  }

  async findByCode(code: string): Promise<Course | null> {
    return this.findOne({ code });
  }
}
