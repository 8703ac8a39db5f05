import { BaseRepositoryImpl } from './base.repository.impl';
import { CourseUserRepository } from '../interfaces/course-user.repository';
import { COURSE_USER_DESCRIPTOR } from '../descriptors';
import { CourseUser, NewCourseUser } from '../../types/entity.types';
import { Session } from '../../types/session.types';

export class CourseUserRepositoryImpl
  extends BaseRepositoryImpl<CourseUser, 'course_user_id', NewCourseUser>
  implements CourseUserRepository
{
  constructor(session: Session) {
    super(session, COURSE_USER_DESCRIPTOR);
  }

  async listByCourse(courseId: number): Promise<CourseUser[]> {
    return this.list({ where: { course_id: courseId } });
  }
}
