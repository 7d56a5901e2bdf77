/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Duplicate email is a 400 in the public contract, not a 409.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User not found', meta);
  },

  duplicateEmail(meta?: AppErrorMeta) {
    return new AppError({
      code: 'DUPLICATE_EMAIL',
      status: 400,
      message: 'A user with this email already exists',
      meta,
    });
  },

  invalidBody(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid request body', meta);
  },

  invalidId(meta?: AppErrorMeta) {
    return AppError.validationError('User id must be a positive integer', meta);
  },

  invalidQuery(meta?: AppErrorMeta) {
    return AppError.validationError('Invalid query parameters', meta);
  },
} as const;
