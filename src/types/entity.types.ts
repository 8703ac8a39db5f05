/**
 * Teaching entities, one per table.
 * Property names are the column names; keys are generated integers.
 */

export type Venue = {
  venue_id: number;
  institution_id: number | null;
  name: string;
  capacity: number | null;
};

export type NewVenue = {
  name: string;
  institution_id?: number | null;
  capacity?: number | null;
};

export type Course = {
  course_id: number;
  institution_id: number | null;
  code: string;
  name: string;
  description: string | null;
};

export type NewCourse = {
  code: string;
  name: string;
  institution_id?: number | null;
  description?: string | null;
};

export type ClassStatus = 'scheduled' | 'in_progress' | 'completed' | 'cancelled';

/**
 * A scheduled teaching session of a course
 */
export type Class = {
  class_id: number;
  course_id: number;
  venue_id: number | null;
  semester_id: number | null;
  lecturer_id: number | null;
  status: ClassStatus;
  start_time: Date | null;
  end_time: Date | null;
};

export type NewClass = {
  course_id: number;
  venue_id?: number | null;
  semester_id?: number | null;
  lecturer_id?: number | null;
  status?: ClassStatus;
  start_time?: Date | string | null;
  end_time?: Date | string | null;
};

/**
 * Enrollment of a user in a course for one semester
 */
export type CourseUser = {
  course_user_id: number;
  user_id: number;
  course_id: number;
  semester_id: number;
};

export type NewCourseUser = {
  user_id: number;
  course_id: number;
  semester_id: number;
};
