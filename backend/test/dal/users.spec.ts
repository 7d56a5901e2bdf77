import { describe, it, expect } from 'vitest';

import { createRecordingDb } from '../helpers/recording-driver';
import { UserRepo } from '../../src/modules/users/dal/user.repo';
import { containsPattern } from '../../src/modules/users/dal/user.query-sql';
import {
  countUsers,
  getRecentUsers,
  getUserByEmail,
  getUserById,
  getUsersByPhone,
  listUsers,
  searchUsersByName,
  searchUsersByNameAndEmail,
  userExistsByEmail,
} from '../../src/modules/users/queries/user.queries';

const createdAt = new Date('2024-01-02T03:04:05.000Z');

const annRow = {
  id: 1,
  name: 'Ann Lee',
  email: 'ann@x.com',
  phone: null,
  created_at: createdAt,
};

describe('users DAL reads', () => {
  it('listUsers selects every row ordered by id and shapes domain users', async () => {
    const { db, driver } = createRecordingDb();
    driver.enqueue({ rows: [annRow] });

    const users = await listUsers(db);

    expect(driver.queries).toEqual([{ sql: 'select * from "users" order by "id"', parameters: [] }]);
    expect(users).toEqual([
      { id: 1, name: 'Ann Lee', email: 'ann@x.com', phone: null, createdAt },
    ]);
  });

  it('getUserById binds the id and returns undefined when no row matches', async () => {
    const { db, driver } = createRecordingDb();

    const user = await getUserById(db, 42);

    expect(user).toBeUndefined();
    expect(driver.queries).toEqual([
      { sql: 'select * from "users" where "id" = $1', parameters: [42] },
    ]);
  });

  it('getUserByEmail matches the email exactly', async () => {
    const { db, driver } = createRecordingDb();
    driver.enqueue({ rows: [annRow] });

    const user = await getUserByEmail(db, 'ann@x.com');

    expect(user?.id).toBe(1);
    expect(driver.queries[0]).toEqual({
      sql: 'select * from "users" where "email" = $1',
      parameters: ['ann@x.com'],
    });
  });

  it('searchUsersByName uses a case-insensitive substring pattern', async () => {
    const { db, driver } = createRecordingDb();

    await searchUsersByName(db, 'john');

    expect(driver.queries).toEqual([
      {
        sql: 'select * from "users" where "name" ilike $1 order by "id"',
        parameters: ['%john%'],
      },
    ]);
  });

  it('escapes LIKE wildcards in the search term', () => {
    expect(containsPattern('50%_off')).toBe('%50\\%\\_off%');
    expect(containsPattern('a\\b')).toBe('%a\\\\b%');
  });

  it('searchUsersByNameAndEmail applies only the filters that are present', async () => {
    const { db, driver } = createRecordingDb();

    await searchUsersByNameAndEmail(db, { name: 'ann', email: 'x.com' });
    await searchUsersByNameAndEmail(db, { email: 'x.com' });

    expect(driver.queries).toEqual([
      {
        sql: 'select * from "users" where "name" ilike $1 and "email" ilike $2 order by "id"',
        parameters: ['%ann%', '%x.com%'],
      },
      {
        sql: 'select * from "users" where "email" ilike $1 order by "id"',
        parameters: ['%x.com%'],
      },
    ]);
  });

  it('getUsersByPhone matches the phone exactly', async () => {
    const { db, driver } = createRecordingDb();

    await getUsersByPhone(db, '555-0101');

    expect(driver.queries[0]).toEqual({
      sql: 'select * from "users" where "phone" = $1 order by "id"',
      parameters: ['555-0101'],
    });
  });

  it('getRecentUsers orders newest first and binds since + limit', async () => {
    const { db, driver } = createRecordingDb();
    const since = new Date('2024-01-01T00:00:00.000Z');

    await getRecentUsers(db, { limit: 5, since });
    await getRecentUsers(db, { limit: 10 });

    expect(driver.queries).toEqual([
      {
        sql: 'select * from "users" where "created_at" > $1 order by "created_at" desc, "id" desc limit $2',
        parameters: [since, 5],
      },
      {
        sql: 'select * from "users" order by "created_at" desc, "id" desc limit $1',
        parameters: [10],
      },
    ]);
  });

  it('userExistsByEmail selects a single id', async () => {
    const { db, driver } = createRecordingDb();
    driver.enqueue({ rows: [{ id: 1 }] }).enqueue({ rows: [] });

    await expect(userExistsByEmail(db, 'ann@x.com')).resolves.toBe(true);
    await expect(userExistsByEmail(db, 'bo@x.com')).resolves.toBe(false);

    expect(driver.queries[0]).toEqual({
      sql: 'select "id" from "users" where "email" = $1 limit $2',
      parameters: ['ann@x.com', 1],
    });
  });

  it('countUsers converts the bigint-as-string count to a number', async () => {
    const { db, driver } = createRecordingDb();
    driver.enqueue({ rows: [{ count: '3' }] });

    await expect(countUsers(db)).resolves.toBe(3);
    expect(driver.queries[0]?.sql).toBe('select count(*) as "count" from "users"');
  });
});

describe('users DAL writes', () => {
  it('insertUser lets the DB assign id and created_at', async () => {
    const { db, driver } = createRecordingDb();
    driver.enqueue({ rows: [annRow] });

    const row = await new UserRepo(db).insertUser({ name: 'Ann Lee', email: 'ann@x.com', phone: null });

    expect(row).toEqual(annRow);
    expect(driver.queries).toEqual([
      {
        sql: 'insert into "users" ("name", "email", "phone") values ($1, $2, $3) returning *',
        parameters: ['Ann Lee', 'ann@x.com', null],
      },
    ]);
  });

  it('updateUser overwrites only name, email and phone', async () => {
    const { db, driver } = createRecordingDb();

    const row = await new UserRepo(db).updateUser(7, {
      name: 'Ann Lee',
      email: 'ann@x.com',
      phone: '555-0101',
    });

    expect(row).toBeUndefined();
    expect(driver.queries).toEqual([
      {
        sql: 'update "users" set "name" = $1, "email" = $2, "phone" = $3 where "id" = $4 returning *',
        parameters: ['Ann Lee', 'ann@x.com', '555-0101', 7],
      },
    ]);
  });

  it('deleteUser reports whether a row was removed', async () => {
    const { db, driver } = createRecordingDb();
    driver.enqueue({ rows: [], numAffectedRows: 1n }).enqueue({ rows: [], numAffectedRows: 0n });

    const repo = new UserRepo(db);

    await expect(repo.deleteUser(1)).resolves.toBe(true);
    await expect(repo.deleteUser(1)).resolves.toBe(false);
    expect(driver.queries[0]).toEqual({
      sql: 'delete from "users" where "id" = $1',
      parameters: [1],
    });
  });
});
