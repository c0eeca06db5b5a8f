import type { FastifyInstance } from 'fastify';
import type { AuthorizationGates } from '../auth/gate.js';
import { Scopes } from '../auth/scopes.js';
import type { RoleRepository } from '../db/roleRepository.js';

interface RegisterRoleRoutesOptions {
  roles: RoleRepository;
  gates: AuthorizationGates;
}

export async function registerRoleRoutes(app: FastifyInstance, options: RegisterRoleRoutesOptions) {
  const { roles, gates } = options;

  app.get('/roles', { preHandler: gates.optional.guard([Scopes.ROLES_GET_ROLES]) }, async () => {
    const records = await roles.list();
    // Scopes stay internal; clients only pick roles by name.
    const data = records.map(({ machineName, name, createdAt, updatedAt }) => ({
      machineName,
      name,
      createdAt,
      updatedAt,
    }));
    return { data, total: data.length };
  });
}
