import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import { requireCurrentSession } from '../auth/context.js';
import { PermissionDeniedError } from '../auth/errors.js';
import type { AuthorizationGates } from '../auth/gate.js';
import type { PasswordHasher } from '../auth/password.js';
import { Scopes } from '../auth/scopes.js';
import type { RoleRepository } from '../db/roleRepository.js';
import type { UserRepository } from '../db/userRepository.js';
import { isClient, Roles, toPublicUser, type CredentialRecord, type RoleId } from '../types/users.js';
import { sendError, type ErrorBody } from '../utils/errors.js';

const RoleListSchema = z.array(z.string().min(1)).nonempty();

const CreateUserSchema = z.object({
  username: z
    .string()
    .min(3)
    .max(32)
    .regex(/^[a-zA-Z0-9._-]+$/, 'Username may contain letters, digits, dots, dashes and underscores'),
  email: z.string().email(),
  firstName: z.string().min(1).max(64),
  lastName: z.string().min(1).max(64),
  password: z.string().min(8).max(128),
  roles: RoleListSchema.default([Roles.CUSTOMER]),
});

const UpdateUserSchema = z
  .object({
    email: z.string().email(),
    firstName: z.string().min(1).max(64),
    lastName: z.string().min(1).max(64),
    roles: RoleListSchema,
  })
  .partial()
  .strict();

const UserIdParamsSchema = z.object({ id: z.string().uuid() });

type TargetLookup = { target: CredentialRecord; body: null } | { target: null; body: ErrorBody };

interface RegisterUserRoutesOptions {
  users: UserRepository;
  roles: RoleRepository;
  passwords: PasswordHasher;
  gates: AuthorizationGates;
}

/** Anonymous callers and customers may only hand out the customer role. */
function assertRolesGrantable(caller: CredentialRecord | undefined, roles: readonly RoleId[]): void {
  const customerOnly = roles.length === 1 && roles[0] === Roles.CUSTOMER;
  if ((!caller || isClient(caller)) && !customerOnly) {
    throw new PermissionDeniedError();
  }
}

export async function registerUserRoutes(app: FastifyInstance, options: RegisterUserRoutesOptions) {
  const { users, roles, passwords, gates } = options;

  async function findUnknownRoles(requested: readonly RoleId[]): Promise<RoleId[]> {
    const known = new Set((await roles.list()).map((role) => role.machineName));
    return requested.filter((role) => !known.has(role));
  }

  // Resolves the `:id` target; on 400/404 `target` is null and `body` is the reply.
  async function loadTarget(params: unknown, reply: FastifyReply): Promise<TargetLookup> {
    const parsed = UserIdParamsSchema.safeParse(params);
    if (!parsed.success) {
      return { target: null, body: sendError(reply, 400, 'invalid_request', 'Invalid identifier.') };
    }
    const target = await users.getById(parsed.data.id);
    if (!target || target.deleted) {
      return { target: null, body: sendError(reply, 404, 'not_found', 'User is not found.') };
    }
    return { target, body: null };
  }

  app.get('/users/me', { preHandler: gates.strict.guard([Scopes.USERS_GET_ME]) }, async (request) => {
    const { user } = requireCurrentSession(request);
    return toPublicUser(user);
  });

  // Anonymous sign-up goes through here too, which is why the gate is optional.
  app.post('/users', { preHandler: gates.optional.guard([Scopes.USERS_CREATE_USER]) }, async (request, reply) => {
    const parsed = CreateUserSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendError(reply, 400, 'invalid_request', 'Invalid request', parsed.error.issues);
    }
    const input = parsed.data;
    const requestedRoles = [...new Set(input.roles)];

    const caller = request.currentSession?.user;
    assertRolesGrantable(caller, requestedRoles);

    const unknownRoles = await findUnknownRoles(requestedRoles);
    if (unknownRoles.length > 0) {
      return sendError(reply, 400, 'invalid_request', 'Unknown roles', { roles: unknownRoles });
    }

    const conflict = await users.findConflict(input.username, input.email);
    if (conflict) {
      return sendError(reply, 409, 'conflict', `User with such ${conflict} already exists.`);
    }

    const created = await users.create({
      username: input.username,
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      roles: requestedRoles,
      hashedPassword: await passwords.hash(input.password),
    });

    request.log.info({ userId: created.id, createdBy: caller?.id ?? null }, 'Created user');
    reply.status(201);
    return toPublicUser(created);
  });

  // Customers may only edit themselves; staff may edit staff but not customers.
  app.patch('/users/:id', { preHandler: gates.strict.guard([Scopes.USERS_UPDATE_USER]) }, async (request, reply) => {
    const { user: caller } = requireCurrentSession(request);
    const lookup = await loadTarget(request.params, reply);
    if (lookup.target === null) {
      return lookup.body;
    }
    const { target } = lookup;

    if (isClient(caller) ? target.id !== caller.id : isClient(target)) {
      throw new PermissionDeniedError();
    }

    const parsed = UpdateUserSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendError(reply, 400, 'invalid_request', 'Invalid request', parsed.error.issues);
    }
    const patch = parsed.data;
    const requestedRoles = patch.roles ? [...new Set(patch.roles)] : undefined;

    if (requestedRoles) {
      assertRolesGrantable(caller, requestedRoles);
      const unknownRoles = await findUnknownRoles(requestedRoles);
      if (unknownRoles.length > 0) {
        return sendError(reply, 400, 'invalid_request', 'Unknown roles', { roles: unknownRoles });
      }
    }

    if (patch.email && (await users.findConflict(target.username, patch.email, target.id))) {
      return sendError(reply, 409, 'conflict', 'User with such email already exists.');
    }

    const updated = await users.update(target.id, { ...patch, roles: requestedRoles });
    if (!updated) {
      return sendError(reply, 404, 'not_found', 'User is not found.');
    }

    request.log.info({ userId: updated.id, updatedBy: caller.id }, 'Updated user');
    return toPublicUser(updated);
  });

  // Soft delete: outstanding tokens of the account stop resolving at the gate.
  app.delete('/users/:id', { preHandler: gates.strict.guard([Scopes.USERS_DELETE_USER]) }, async (request, reply) => {
    const { user: caller } = requireCurrentSession(request);
    const lookup = await loadTarget(request.params, reply);
    if (lookup.target === null) {
      return lookup.body;
    }
    const { target } = lookup;

    if (isClient(caller) && target.id !== caller.id) {
      throw new PermissionDeniedError();
    }

    await users.markDeleted(target.id);
    request.log.info({ userId: target.id, deletedBy: caller.id }, 'Deleted user');
    reply.status(204);
    return reply.send();
  });
}
