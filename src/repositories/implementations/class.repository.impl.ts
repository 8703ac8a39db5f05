import { BaseRepositoryImpl } from './base.repository.impl';
import { ClassRepository } from '../interfaces/class.repository';
import { CLASS_DESCRIPTOR } from '../descriptors';
import { Class, NewClass } from '../../types/entity.types';
import { Session } from '../../types/session.types';

/**
 * Class repository implementation
 */
export class ClassRepositoryImpl
  extends BaseRepositoryImpl<Class, 'class_id', NewClass>
  implements ClassRepository
{
  constructor(session: Session) {
    super(session, CLASS_DESCRIPTOR);
  }

  async listByCourse(courseId: number): Promise<Class[]> {
    return this.list({ where: { course_id: courseId } });
  }
}
