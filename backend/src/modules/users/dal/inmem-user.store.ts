/**
 * backend/src/modules/users/dal/inmem-user.store.ts
 *
 * WHY:
 * - Lets local dev (USER_STORE=memory) and tests run without Postgres.
 * - Mirrors the DB contract: serial ids, unique email, created_at set on insert.
 *
 * HOW TO USE:
 * - const store = new InMemUserStore()
 * - new InMemUserStore({ now: () => fixedDate }) for deterministic timestamps.
 *
 * RULES:
 * - Returned records are copies; callers can't mutate stored state.
 * - transaction() keeps an undo log of its own writes and replays it backwards when fn
 *   throws, so overlapping transactions never erase each other's committed rows.
 * - Writes are not isolated from concurrent callers; the unique check in insert/update
 *   still holds.
 */

import { UniqueViolationError } from '../../../shared/db/db-errors';
import type { UserStore } from '../user.store';
import type { RecentUsersFilter, User, UserInput, UserSearchFilter } from '../user.types';

const EMAIL_CONSTRAINT = 'users_email_key';

function copy(user: User): User {
  return { ...user, createdAt: new Date(user.createdAt.getTime()) };
}

function containsIgnoreCase(haystack: string, needle: string): boolean {
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

type UserTable = {
  rows: Map<number, User>;
  nextId: number;
};

type UndoLog = Array<() => void>;

export class InMemUserStore implements UserStore {
  private table: UserTable = { rows: new Map(), nextId: 1 };
  // set only on a store bound to a running transaction
  private undoLog: UndoLog | null = null;
  private readonly now: () => Date;

  constructor(opts: { now?: () => Date } = {}) {
    this.now = opts.now ?? (() => new Date());
  }

  private get rows(): Map<number, User> {
    return this.table.rows;
  }

  private bindTo(undoLog: UndoLog): InMemUserStore {
    const scoped = new InMemUserStore({ now: this.now });
    scoped.table = this.table;
    scoped.undoLog = undoLog;
    return scoped;
  }

  private recordUndo(step: () => void): void {
    this.undoLog?.push(step);
  }

  private sortedById(): User[] {
    return Array.from(this.rows.values())
      .sort((a, b) => a.id - b.id)
      .map(copy);
  }

  private assertEmailFree(email: string, exceptId?: number): void {
    for (const row of this.rows.values()) {
      if (row.email === email && row.id !== exceptId) {
        throw new UniqueViolationError(EMAIL_CONSTRAINT);
      }
    }
  }

  findAll(): Promise<User[]> {
    return Promise.resolve(this.sortedById());
  }

  findById(id: number): Promise<User | undefined> {
    const row = this.rows.get(id);
    return Promise.resolve(row ? copy(row) : undefined);
  }

  findByEmail(email: string): Promise<User | undefined> {
    const row = Array.from(this.rows.values()).find((u) => u.email === email);
    return Promise.resolve(row ? copy(row) : undefined);
  }

  findByNameContaining(term: string): Promise<User[]> {
    return Promise.resolve(this.sortedById().filter((u) => containsIgnoreCase(u.name, term)));
  }

  findByNameAndEmail(filter: UserSearchFilter): Promise<User[]> {
    const { name, email } = filter;
    return Promise.resolve(
      this.sortedById().filter(
        (u) =>
          (!name || containsIgnoreCase(u.name, name)) &&
          (!email || containsIgnoreCase(u.email, email)),
      ),
    );
  }

  findByPhone(phone: string): Promise<User[]> {
    return Promise.resolve(this.sortedById().filter((u) => u.phone === phone));
  }

  findRecent(filter: RecentUsersFilter): Promise<User[]> {
    const { since } = filter;
    const rows = this.sortedById()
      .filter((u) => !since || u.createdAt.getTime() > since.getTime())
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);

    return Promise.resolve(rows.slice(0, filter.limit));
  }

  existsByEmail(email: string): Promise<boolean> {
    return Promise.resolve(Array.from(this.rows.values()).some((u) => u.email === email));
  }

  count(): Promise<number> {
    return Promise.resolve(this.rows.size);
  }

  async insert(input: UserInput): Promise<User> {
    this.assertEmailFree(input.email);

    const user: User = {
      id: this.table.nextId++,
      name: input.name,
      email: input.email,
      phone: input.phone,
      createdAt: this.now(),
    };
    this.rows.set(user.id, user);
    this.recordUndo(() => {
      this.rows.delete(user.id);
    });

    return copy(user);
  }

  async update(id: number, input: UserInput): Promise<User | undefined> {
    const current = this.rows.get(id);
    if (!current) return undefined;

    this.assertEmailFree(input.email, id);

    const updated: User = { ...current, name: input.name, email: input.email, phone: input.phone };
    this.rows.set(id, updated);
    this.recordUndo(() => {
      if (this.rows.has(id)) this.rows.set(id, current);
    });

    return copy(updated);
  }

  deleteById(id: number): Promise<boolean> {
    const current = this.rows.get(id);
    if (!current) return Promise.resolve(false);

    this.rows.delete(id);
    this.recordUndo(() => {
      if (!this.rows.has(id)) this.rows.set(id, current);
    });

    return Promise.resolve(true);
  }

  async transaction<T>(fn: (store: UserStore) => Promise<T>): Promise<T> {
    if (this.undoLog) return fn(this);

    const undoLog: UndoLog = [];

    try {
      return await fn(this.bindTo(undoLog));
    } catch (err: unknown) {
      // ids are not handed out again, same as a rolled-back serial sequence
      for (const step of undoLog.reverse()) step();
      throw err;
    }
  }

  close(): Promise<void> {
    this.rows.clear();
    return Promise.resolve();
  }
}
