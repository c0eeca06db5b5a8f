import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import logger from '../logger.js';
import type { RoleRepository } from './roleRepository.js';

const RoleSeedSchema = z.object({
  roles: z
    .array(
      z.object({
        machineName: z.string().min(1),
        name: z.string().min(1),
        scopes: z.array(z.string().min(1)),
      }),
    )
    .min(1),
});

export type RoleSeed = z.infer<typeof RoleSeedSchema>;

export async function loadRoleSeed(seedPath: string): Promise<RoleSeed> {
  const raw = await readFile(seedPath, 'utf-8');
  return RoleSeedSchema.parse(JSON.parse(raw));
}

/**
 * Roles are reference data: seeding overwrites names and scopes in place.
 * Cached role-scope unions pick the change up once their TTL runs out.
 */
export async function seedRoles(repository: RoleRepository, seed: RoleSeed): Promise<number> {
  for (const role of seed.roles) {
    await repository.upsert(role);
  }
  logger.info({ count: seed.roles.length }, 'Seeded roles');
  return seed.roles.length;
}
