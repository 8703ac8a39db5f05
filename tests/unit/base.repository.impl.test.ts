import {
  ClassRepositoryImpl,
  CourseRepositoryImpl,
  CourseUserRepositoryImpl,
} from '../../src/repositories';
import { Course } from '../../src/types/entity.types';
import { Session } from '../../src/types/session.types';
import { NotFoundError, ValidationError } from '../../src/utils/errors';

const COURSE_COLUMNS = '"course_id", "institution_id", "code", "name", "description"';

const intro: Course = {
  course_id: 1,
  institution_id: null,
  code: 'CS101',
  name: 'Intro',
  description: null,
};

function createSession() {
  const query = jest.fn().mockResolvedValue({ rows: [], rowCount: 0 });
  const session: Session = {
    id: 'test-session',
    inTransaction: true,
    closed: false,
    begin: jest.fn(),
    commit: jest.fn(),
    rollback: jest.fn(),
    close: jest.fn(),
    query,
  };
  return { session, query };
}

describe('BaseRepositoryImpl', () => {
  describe('getById', () => {
    it('selects by key and returns null when no row matches', async () => {
      const { session, query } = createSession();
      const courses = new CourseRepositoryImpl(session);

      await expect(courses.getById(7)).resolves.toBeNull();

      expect(query).toHaveBeenCalledWith(
        `SELECT ${COURSE_COLUMNS} FROM "course" WHERE "course_id" = $1`,
        [7]
      );
    });

    it('returns the matching row', async () => {
      const { session, query } = createSession();
      query.mockResolvedValueOnce({ rows: [intro], rowCount: 1 });

      await expect(new CourseRepositoryImpl(session).getById(1)).resolves.toEqual(intro);
    });
  });

  describe('list', () => {
    it('orders by key when no options are given', async () => {
      const { session, query } = createSession();

      await new CourseRepositoryImpl(session).list();

      expect(query).toHaveBeenCalledWith(
        `SELECT ${COURSE_COLUMNS} FROM "course" ORDER BY "course_id" ASC`,
        []
      );
    });

    it('renders filters, ordering with a key tiebreaker, limit and offset', async () => {
      const { session, query } = createSession();

      await new CourseRepositoryImpl(session).list({
        where: { institution_id: null, name: 'Intro' },
        orderBy: { column: 'code', direction: 'DESC' },
        limit: 10,
        offset: 20,
      });

      expect(query).toHaveBeenCalledWith(
        `SELECT ${COURSE_COLUMNS} FROM "course" WHERE "institution_id" IS NULL AND "name" = $1 ORDER BY "code" DESC, "course_id" ASC LIMIT $2 OFFSET $3`,
        ['Intro', 10, 20]
      );
    });

    it('rejects a negative limit before querying', async () => {
      const { session, query } = createSession();

      await expect(new CourseRepositoryImpl(session).list({ limit: -1 })).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(query).not.toHaveBeenCalled();
    });
  });

  describe('create', () => {
    it('inserts the supplied attributes and returns the generated row', async () => {
      const { session, query } = createSession();
      query.mockResolvedValueOnce({ rows: [intro], rowCount: 1 });

      const created = await new CourseRepositoryImpl(session).create({
        code: 'CS101',
        name: 'Intro',
        description: undefined,
      });

      expect(created).toEqual(intro);
      expect(query).toHaveBeenCalledWith(
        `INSERT INTO "course" ("code", "name") VALUES ($1, $2) RETURNING ${COURSE_COLUMNS}`,
        ['CS101', 'Intro']
      );
    });

    it('rejects attributes the descriptor does not declare', async () => {
      const { session, query } = createSession();
      const input = { code: 'CS101', name: 'Intro', title: 'Introduction' };

      await expect(new CourseRepositoryImpl(session).create(input)).rejects.toThrow(
        'Unknown attribute "title" for Course'
      );
      expect(query).not.toHaveBeenCalled();
    });

    it('rejects a supplied key', async () => {
      const { session, query } = createSession();
      const input = { code: 'CS101', name: 'Intro', course_id: 5 };

      await expect(new CourseRepositoryImpl(session).create(input)).rejects.toThrow(
        'Course.course_id is generated and cannot be written'
      );
      expect(query).not.toHaveBeenCalled();
    });

    it('propagates session errors unchanged', async () => {
      const { session, query } = createSession();
      const violation = new ValidationError('violates foreign key constraint', { code: '23503' });
      query.mockRejectedValueOnce(violation);

      await expect(
        new ClassRepositoryImpl(session).create({ course_id: 9999, venue_id: 1 })
      ).rejects.toBe(violation);
    });
  });

  describe('update', () => {
    it('sets only the supplied attributes', async () => {
      const { session, query } = createSession();
      const renamed = { ...intro, name: 'Intro II' };
      query.mockResolvedValueOnce({ rows: [renamed], rowCount: 1 });

      await expect(new CourseRepositoryImpl(session).update(1, { name: 'Intro II' })).resolves.toEqual(
        renamed
      );
      expect(query).toHaveBeenCalledWith(
        `UPDATE "course" SET "name" = $1 WHERE "course_id" = $2 RETURNING ${COURSE_COLUMNS}`,
        ['Intro II', 1]
      );
    });

    it('raises NotFoundError when no row has the key', async () => {
      const { session } = createSession();

      await expect(new CourseRepositoryImpl(session).update(3, { name: 'Intro II' })).rejects.toThrow(
        new NotFoundError('Course', 3)
      );
    });

    it('returns the current row for an empty update', async () => {
      const { session, query } = createSession();
      query.mockResolvedValueOnce({ rows: [intro], rowCount: 1 });

      await expect(new CourseRepositoryImpl(session).update(1, {})).resolves.toEqual(intro);
      expect(query).toHaveBeenCalledWith(
        `SELECT ${COURSE_COLUMNS} FROM "course" WHERE "course_id" = $1`,
        [1]
      );
    });
  });

  describe('delete', () => {
    it('reports whether a row was removed', async () => {
      const { session, query } = createSession();
      query
        .mockResolvedValueOnce({ rows: [{ course_id: 4 }], rowCount: 1 })
        .mockResolvedValueOnce({ rows: [], rowCount: 0 });
      const courses = new CourseRepositoryImpl(session);

      await expect(courses.delete(4)).resolves.toBe(true);
      await expect(courses.delete(4)).resolves.toBe(false);
      expect(query).toHaveBeenCalledWith(
        'DELETE FROM "course" WHERE "course_id" = $1 RETURNING "course_id"',
        [4]
      );
    });
  });

  describe('exists and count', () => {
    it('checks existence without selecting columns', async () => {
      const { session, query } = createSession();
      query.mockResolvedValueOnce({ rows: [{ present: 1 }], rowCount: 1 });

      await expect(new CourseRepositoryImpl(session).exists(4)).resolves.toBe(true);
      expect(query).toHaveBeenCalledWith(
        'SELECT 1 AS present FROM "course" WHERE "course_id" = $1 LIMIT 1',
        [4]
      );
    });

    it('counts rows matching a filter', async () => {
      const { session, query } = createSession();
      query.mockResolvedValueOnce({ rows: [{ count: '3' }], rowCount: 1 });

      await expect(new CourseRepositoryImpl(session).count({ institution_id: 2 })).resolves.toBe(3);
      expect(query).toHaveBeenCalledWith(
        'SELECT COUNT(*) AS "count" FROM "course" WHERE "institution_id" = $1',
        [2]
      );
    });
  });

  describe('keys outside the SERIAL range', () => {
    it('treats them as absent without querying', async () => {
      const { session, query } = createSession();
      const courses = new CourseRepositoryImpl(session);

      await expect(courses.getById(3_000_000_000)).resolves.toBeNull();
      await expect(courses.exists(1.5)).resolves.toBe(false);
      await expect(courses.exists(0)).resolves.toBe(false);
      await expect(courses.delete(Number.NaN)).resolves.toBe(false);
      await expect(courses.update(2_147_483_648, { name: 'Ghost' })).rejects.toThrow(
        'Course 2147483648 not found'
      );
      expect(query).not.toHaveBeenCalled();
    });

    it('still queries the largest storable key', async () => {
      const { session, query } = createSession();

      await expect(new CourseRepositoryImpl(session).getById(2_147_483_647)).resolves.toBeNull();

      expect(query).toHaveBeenCalledWith(
        `SELECT ${COURSE_COLUMNS} FROM "course" WHERE "course_id" = $1`,
        [2_147_483_647]
      );
    });
  });

  describe('entity queries', () => {
    it('finds a course by code with a single-row limit', async () => {
      const { session, query } = createSession();
      query.mockResolvedValueOnce({ rows: [intro], rowCount: 1 });

      await expect(new CourseRepositoryImpl(session).findByCode('CS101')).resolves.toEqual(intro);
      expect(query).toHaveBeenCalledWith(
        `SELECT ${COURSE_COLUMNS} FROM "course" WHERE "code" = $1 ORDER BY "course_id" ASC LIMIT $2`,
        ['CS101', 1]
      );
    });

    it('lists enrollments of one course', async () => {
      const { session, query } = createSession();

      await new CourseUserRepositoryImpl(session).listByCourse(2);

      expect(query).toHaveBeenCalledWith(
        'SELECT "course_user_id", "user_id", "course_id", "semester_id" FROM "course_user" WHERE "course_id" = $1 ORDER BY "course_user_id" ASC',
        [2]
      );
    });
  });

  it('never touches the transaction boundary', async () => {
    const { session } = createSession();
    const courses = new CourseRepositoryImpl(session);

    await courses.list();
    await courses.exists(1);
    await courses.delete(1);

    expect(session.begin).not.toHaveBeenCalled();
    expect(session.commit).not.toHaveBeenCalled();
    expect(session.rollback).not.toHaveBeenCalled();
  });
});
