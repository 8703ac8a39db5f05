import { SessionProvider } from '../../src/services/session-provider.service';
import { CourseRepositoryImpl, VenueRepositoryImpl } from '../../src/repositories';
import { ConnectionError, ValidationError } from '../../src/utils/errors';

function createClient() {
  return {
    query: jest.fn().mockResolvedValue({ rows: [], rowCount: 0 }),
    release: jest.fn(),
  };
}

function statements(client: ReturnType<typeof createClient>): unknown[] {
  return client.query.mock.calls.map(call => call[0]);
}

describe('SessionProvider', () => {
  it('raises ConnectionError when no connection can be acquired', async () => {
    const pool = {
      connect: jest.fn().mockRejectedValue(
        Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:5432'), { code: 'ECONNREFUSED' })
      ),
    };
    const provider = new SessionProvider(pool);

    const opening = provider.openSession();

    await expect(opening).rejects.toBeInstanceOf(ConnectionError);
    await expect(opening).rejects.toThrow('Failed to acquire database connection');
  });

  it('commits and releases around successful work', async () => {
    const client = createClient();
    const provider = new SessionProvider({ connect: jest.fn().mockResolvedValue(client) });

    const result = await provider.withSession(async session => {
      await session.query('SELECT 1');
      return 'done';
    });

    expect(result).toBe('done');
    expect(statements(client)).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('rolls back, releases and rethrows the original error on failure', async () => {
    const client = createClient();
    const provider = new SessionProvider({ connect: jest.fn().mockResolvedValue(client) });
    const failure = new ValidationError('Unknown attribute "title" for Course');

    await expect(
      provider.withSession(async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(statements(client)).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it('keeps repositories of one session on one connection and apart from other sessions', async () => {
    const first = createClient();
    const second = createClient();
    const connect = jest.fn().mockResolvedValueOnce(first).mockResolvedValueOnce(second);
    const provider = new SessionProvider({ connect });

    const shared = await provider.openSession();
    const fresh = await provider.openSession();

    await new CourseRepositoryImpl(shared).list();
    await new VenueRepositoryImpl(shared).list();
    await new CourseRepositoryImpl(fresh).exists(1);

    expect(shared.id).not.toBe(fresh.id);
    expect(first.query).toHaveBeenCalledTimes(2);
    expect(second.query).toHaveBeenCalledTimes(1);
    expect(second.query).toHaveBeenCalledWith(
      'SELECT 1 AS present FROM "course" WHERE "course_id" = $1 LIMIT 1',
      [1]
    );

    await shared.close();
    await fresh.close();
    expect(first.release).toHaveBeenCalledTimes(1);
    expect(second.release).toHaveBeenCalledTimes(1);
  });
});
