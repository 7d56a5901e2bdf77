/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap.
 *
 * Creates a handful of sample users so the UI has something to show.
 *
 * Idempotent: users whose email already exists are skipped, so it is
 * safe to run on every start.
 */

import type { UserService, UserDraft } from '../../../modules/users/user.service';
import { logger } from '../../logger/logger';

export const DEV_SEED_USERS: readonly UserDraft[] = [
  { name: 'Ann Lee', email: 'ann.lee@example.com', phone: '555-0101' },
  { name: 'John Carter', email: 'john.carter@example.com', phone: '555-0102' },
  { name: 'Maria Johnson', email: 'maria.johnson@example.com', phone: null },
];

export async function runDevSeed(opts: {
  userService: UserService;
  users?: readonly UserDraft[];
}): Promise<number> {
  const flow = 'seed.dev';
  let inserted = 0;

  for (const draft of opts.users ?? DEV_SEED_USERS) {
    const existing = await opts.userService.getByEmail(draft.email);
    if (existing) {
      logger.debug('seed.user_exists', { flow, userId: existing.id });
      continue;
    }

    const user = await opts.userService.create({ ...draft, requestId: 'seed' });
    logger.info('seed.user_created', { flow, userId: user.id });
    inserted += 1;
  }

  return inserted;
}
