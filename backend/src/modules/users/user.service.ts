/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Business layer for user records.
 * - Only place allowed to start transactions.
 *
 * RULES:
 * - Email is unique and case-sensitive; it is stored as sent, only trimmed.
 * - create/update run check-then-write inside one transaction; the unique constraint
 *   still decides races, and its violation is reported as the same duplicate-email error.
 * - delete reports absence as `false`; the controller decides the HTTP meaning.
 * - Blank search terms list everything.
 */

import type { Logger } from '../../shared/logger/logger';
import { UniqueViolationError } from '../../shared/db/db-errors';

import type { UserStore } from './user.store';
import type { RecentUsersFilter, User, UserId, UserInput } from './user.types';
import { UserErrors } from './user.errors';

export type UserDraft = {
  name: string;
  email: string;
  phone?: string | null;
};

export type RequestMeta = {
  requestId?: string;
};

export function normalizeEmail(email: string): string {
  return email.trim();
}

export function normalizeUserInput(draft: UserDraft): UserInput {
  const phone = draft.phone?.trim() ?? '';

  return {
    name: draft.name.trim(),
    email: normalizeEmail(draft.email),
    phone: phone.length > 0 ? phone : null,
  };
}

export class UserService {
  constructor(
    private readonly deps: {
      store: UserStore;
      logger: Logger;
    },
  ) {}

  /**
   * Runs fn in a store transaction and maps a unique-email race to duplicateEmail.
   */
  private async inTransaction<T>(flow: string, fn: (store: UserStore) => Promise<T>): Promise<T> {
    try {
      return await this.deps.store.transaction(fn);
    } catch (err: unknown) {
      if (err instanceof UniqueViolationError) {
        throw UserErrors.duplicateEmail({ flow, constraint: err.constraint });
      }
      throw err;
    }
  }

  list(): Promise<User[]> {
    return this.deps.store.findAll();
  }

  getById(id: UserId): Promise<User | undefined> {
    return this.deps.store.findById(id);
  }

  getByEmail(email: string): Promise<User | undefined> {
    return this.deps.store.findByEmail(normalizeEmail(email));
  }

  async create(params: UserDraft & RequestMeta): Promise<User> {
    const flow = 'users.create';
    const input = normalizeUserInput(params);

    this.deps.logger.info('users.create.start', { flow, requestId: params.requestId });

    const user = await this.inTransaction(flow, async (store) => {
      if (await store.existsByEmail(input.email)) {
        throw UserErrors.duplicateEmail({ flow });
      }

      return store.insert(input);
    });

    this.deps.logger.info('users.create.success', {
      flow,
      requestId: params.requestId,
      userId: user.id,
    });

    return user;
  }

  async update(params: UserDraft & RequestMeta & { id: UserId }): Promise<User> {
    const flow = 'users.update';
    const input = normalizeUserInput(params);

    this.deps.logger.info('users.update.start', {
      flow,
      requestId: params.requestId,
      userId: params.id,
    });

    const user = await this.inTransaction(flow, async (store) => {
      const current = await store.findById(params.id);
      if (!current) {
        throw UserErrors.userNotFound({ flow, userId: params.id });
      }

      if (current.email !== input.email && (await store.existsByEmail(input.email))) {
        throw UserErrors.duplicateEmail({ flow, userId: params.id });
      }

      const updated = await store.update(params.id, input);
      if (!updated) {
        // removed between the read and the write
        throw UserErrors.userNotFound({ flow, userId: params.id });
      }

      return updated;
    });

    this.deps.logger.info('users.update.success', {
      flow,
      requestId: params.requestId,
      userId: user.id,
    });

    return user;
  }

  async delete(params: RequestMeta & { id: UserId }): Promise<boolean> {
    const flow = 'users.delete';

    const deleted = await this.deps.store.deleteById(params.id);

    this.deps.logger.info('users.delete.done', {
      flow,
      requestId: params.requestId,
      userId: params.id,
      deleted,
    });

    return deleted;
  }

  search(term: string | undefined): Promise<User[]> {
    const trimmed = term?.trim() ?? '';
    if (!trimmed) return this.deps.store.findAll();

    return this.deps.store.findByNameContaining(trimmed);
  }

  searchByNameAndEmail(filter: { name?: string; email?: string }): Promise<User[]> {
    const name = filter.name?.trim() ?? '';
    const email = filter.email?.trim() ?? '';

    if (!email) return this.search(name);

    return this.deps.store.findByNameAndEmail({ name: name || undefined, email });
  }

  findByPhone(phone: string): Promise<User[]> {
    return this.deps.store.findByPhone(phone.trim());
  }

  recent(filter: RecentUsersFilter): Promise<User[]> {
    return this.deps.store.findRecent(filter);
  }

  count(): Promise<number> {
    return this.deps.store.count();
  }
}
