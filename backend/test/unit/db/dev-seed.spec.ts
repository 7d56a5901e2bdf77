import { describe, it, expect } from 'vitest';

import { DEV_SEED_USERS, runDevSeed } from '../../../src/shared/db/seed/dev-seed';
import { InMemUserStore } from '../../../src/modules/users/dal/inmem-user.store';
import { UserService } from '../../../src/modules/users/user.service';
import { logger } from '../../../src/shared/logger/logger';

describe('runDevSeed', () => {
  it('inserts the sample users once and skips them on the next run', async () => {
    const userService = new UserService({ store: new InMemUserStore(), logger });

    await expect(runDevSeed({ userService })).resolves.toBe(DEV_SEED_USERS.length);
    await expect(runDevSeed({ userService })).resolves.toBe(0);
    await expect(userService.count()).resolves.toBe(DEV_SEED_USERS.length);
  });

  it('only creates users whose email is not taken yet', async () => {
    const userService = new UserService({ store: new InMemUserStore(), logger });
    await userService.create({ name: 'Existing', email: 'bo@example.com' });

    const inserted = await runDevSeed({
      userService,
      users: [
        { name: 'Bo', email: 'bo@example.com' },
        { name: 'Cy', email: 'cy@example.com', phone: '555-0103' },
      ],
    });

    expect(inserted).toBe(1);
    const names = (await userService.list()).map((u) => u.name);
    expect(names).toEqual(['Existing', 'Cy']);
  });
});
