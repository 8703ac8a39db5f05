import { QueryResultRow } from 'pg';
import { EntityDescriptor, NumericKeyOf } from '../types/descriptor.types';
import { Class, Course, CourseUser, Venue } from '../types/entity.types';
import { TABLES } from '../constants';

function defineDescriptor<T extends QueryResultRow, K extends NumericKeyOf<T>>(
  descriptor: EntityDescriptor<T, K>
): EntityDescriptor<T, K> {
  return Object.freeze({
    ...descriptor,
    attributes: Object.freeze([...descriptor.attributes]),
  });
}

export const VENUE_DESCRIPTOR = defineDescriptor<Venue, 'venue_id'>({
  name: 'Venue',
  table: TABLES.VENUE,
  primaryKey: 'venue_id',
  attributes: ['institution_id', 'name', 'capacity'],
});

export const COURSE_DESCRIPTOR = defineDescriptor<Course, 'course_id'>({
  name: 'Course',
  table: TABLES.COURSE,
  primaryKey: 'course_id',
  attributes: ['institution_id', 'code', 'name', 'description'],
});

export const CLASS_DESCRIPTOR = defineDescriptor<Class, 'class_id'>({
  name: 'Class',
  table: TABLES.CLASS,
  primaryKey: 'class_id',
  attributes: [
    'course_id',
    'venue_id',
    'semester_id',
    'lecturer_id',
    'status',
    'start_time',
    'end_time',
  ],
});

export const COURSE_USER_DESCRIPTOR = defineDescriptor<CourseUser, 'course_user_id'>({
  name: 'CourseUser',
  table: TABLES.COURSE_USER,
  primaryKey: 'course_user_id',
  attributes: ['user_id', 'course_id', 'semester_id'],
});
