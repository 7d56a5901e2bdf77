/**
 * backend/src/modules/users/user.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the /users endpoints.
 * - Validates params/query/body and picks the status code.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import {
  phoneQuerySchema,
  recentQuerySchema,
  searchQuerySchema,
  userBodySchema,
  userIdParamsSchema,
  type UserBodyInput,
  type UserIdParams,
} from './user.schemas';
import { UserErrors } from './user.errors';
import type { UserService } from './user.service';

const DELETE_RESPONSE = { message: 'User deleted successfully' } as const;

export class UserController {
  constructor(private readonly userService: UserService) {}

  private parseId(req: FastifyRequest): UserIdParams['id'] {
    const parsed = userIdParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw UserErrors.invalidId({ issues: parsed.error.issues });
    }
    return parsed.data.id;
  }

  private parseBody(req: FastifyRequest): UserBodyInput {
    const parsed = userBodySchema.safeParse(req.body);
    if (!parsed.success) {
      throw UserErrors.invalidBody({ issues: parsed.error.issues });
    }
    return parsed.data;
  }

  async listUsers(_req: FastifyRequest, reply: FastifyReply) {
    const users = await this.userService.list();
    return reply.status(200).send(users);
  }

  async getUser(req: FastifyRequest, reply: FastifyReply) {
    const id = this.parseId(req);

    const user = await this.userService.getById(id);
    if (!user) {
      throw UserErrors.userNotFound({ userId: id });
    }

    return reply.status(200).send(user);
  }

  async createUser(req: FastifyRequest, reply: FastifyReply) {
    const body = this.parseBody(req);

    const user = await this.userService.create({
      name: body.name,
      email: body.email,
      phone: body.phone,
      requestId: req.requestContext.requestId,
    });

    return reply.status(201).send(user);
  }

  async updateUser(req: FastifyRequest, reply: FastifyReply) {
    const id = this.parseId(req);
    const body = this.parseBody(req);

    const user = await this.userService.update({
      id,
      name: body.name,
      email: body.email,
      phone: body.phone,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(user);
  }

  async deleteUser(req: FastifyRequest, reply: FastifyReply) {
    const id = this.parseId(req);

    const deleted = await this.userService.delete({
      id,
      requestId: req.requestContext.requestId,
    });
    if (!deleted) {
      throw UserErrors.userNotFound({ userId: id });
    }

    return reply.status(200).send(DELETE_RESPONSE);
  }

  async searchUsers(req: FastifyRequest, reply: FastifyReply) {
    const parsed = searchQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw UserErrors.invalidQuery({ issues: parsed.error.issues });
    }

    const users = await this.userService.searchByNameAndEmail(parsed.data);
    return reply.status(200).send(users);
  }

  async countUsers(_req: FastifyRequest, reply: FastifyReply) {
    const count = await this.userService.count();
    return reply.status(200).send(count);
  }

  async recentUsers(req: FastifyRequest, reply: FastifyReply) {
    const parsed = recentQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw UserErrors.invalidQuery({ issues: parsed.error.issues });
    }

    const users = await this.userService.recent(parsed.data);
    return reply.status(200).send(users);
  }

  async usersByPhone(req: FastifyRequest, reply: FastifyReply) {
    const parsed = phoneQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw UserErrors.invalidQuery({ issues: parsed.error.issues });
    }

    const users = await this.userService.findByPhone(parsed.data.phone);
    return reply.status(200).send(users);
  }
}
