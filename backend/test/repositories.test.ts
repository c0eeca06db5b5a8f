import { test } from 'node:test';
import assert from 'node:assert/strict';
import { RoleRepository } from '../src/db/roleRepository.js';
import { UserRepository } from '../src/db/userRepository.js';
import { Roles } from '../src/types/users.js';
import { createSeededDatabase, scopesOf } from './helpers.js';

const newUser = {
  username: 'jane.doe',
  email: 'jane.doe@example.test',
  firstName: 'Jane',
  lastName: 'Doe',
  roles: [Roles.CUSTOMER],
  hashedPassword: 'hash-placeholder',
};

test('seeded roles are listed by machine name', async () => {
  const { db } = await createSeededDatabase();
  const roles = await new RoleRepository(db).list();

  assert.deepEqual(
    roles.map((role) => role.machineName),
    ['Admin', 'Content manager', 'Customer', 'Marketing manager', 'Support', 'Warehouse staff'],
  );
});

test('a single role resolves to its own scopes', async () => {
  const { db, seed } = await createSeededDatabase();
  const scopes = await new RoleRepository(db).getScopesForRoles([Roles.CUSTOMER]);

  assert.deepEqual(scopes, scopesOf(seed, Roles.CUSTOMER));
});

test('several roles resolve to the union of their scopes', async () => {
  const { db, seed } = await createSeededDatabase();
  const scopes = await new RoleRepository(db).getScopesForRoles([Roles.WAREHOUSE_STAFF, Roles.CUSTOMER]);

  assert.deepEqual(scopes, [
    ...scopesOf(seed, Roles.CUSTOMER),
    'PRODUCTS_CREATE_PRODUCT',
    'PRODUCTS_UPDATE_PRODUCT',
  ]);
});

test('unknown and empty role sets resolve to no scopes', async () => {
  const { db } = await createSeededDatabase();
  const repository = new RoleRepository(db);

  assert.deepEqual(await repository.getScopesForRoles(['Ghost']), []);
  assert.deepEqual(await repository.getScopesForRoles([]), []);
});

test('upsert replaces the scopes of an existing role', async () => {
  const { db } = await createSeededDatabase();
  const repository = new RoleRepository(db);
  await repository.upsert({ machineName: Roles.CUSTOMER, name: 'Customer', scopes: ['USERS_GET_ME'] });

  assert.deepEqual(await repository.getScopesForRoles([Roles.CUSTOMER]), ['USERS_GET_ME']);
  assert.equal((await repository.list()).length, 6);
});

test('created users can be read back by username and id', async () => {
  const { db } = await createSeededDatabase();
  const repository = new UserRepository(db);

  const created = await repository.create(newUser);
  const byUsername = await repository.getByUsername('jane.doe');
  const byId = await repository.getById(created.id);

  assert.deepEqual(byUsername, created);
  assert.deepEqual(byId, created);
  assert.deepEqual(created.roles, ['Customer']);
  assert.equal(created.deleted, false);
  assert.equal(created.hashedPassword, 'hash-placeholder');
  assert.equal(await repository.getByUsername('nobody'), null);
});

test('findConflict names the clashing field', async () => {
  const { db } = await createSeededDatabase();
  const repository = new UserRepository(db);
  await repository.create(newUser);

  assert.equal(await repository.findConflict('jane.doe', 'other@example.test'), 'username');
  assert.equal(await repository.findConflict('someone.else', 'jane.doe@example.test'), 'email');
  assert.equal(await repository.findConflict('someone.else', 'other@example.test'), null);
});

test('markDeleted soft-deletes once', async () => {
  const { db } = await createSeededDatabase();
  const repository = new UserRepository(db);
  const created = await repository.create(newUser);

  assert.equal(await repository.markDeleted(created.id), true);
  assert.equal(await repository.markDeleted(created.id), false);

  const record = await repository.getById(created.id);
  assert.equal(record?.deleted, true);
  assert.notEqual(record?.updatedAt, null);
});

test('update changes only the given fields of an active account', async () => {
  const { db } = await createSeededDatabase();
  const repository = new UserRepository(db);
  const created = await repository.create(newUser);

  const updated = await repository.update(created.id, { lastName: 'Roe', roles: [Roles.SUPPORT] });

  assert.equal(updated?.lastName, 'Roe');
  assert.equal(updated?.firstName, 'Jane');
  assert.equal(updated?.email, 'jane.doe@example.test');
  assert.deepEqual(updated?.roles, ['Support']);
  assert.notEqual(updated?.updatedAt, null);
});

test('update leaves deleted accounts alone', async () => {
  const { db } = await createSeededDatabase();
  const repository = new UserRepository(db);
  const created = await repository.create(newUser);
  await repository.markDeleted(created.id);

  assert.equal(await repository.update(created.id, { firstName: 'Ghost' }), null);
  assert.equal((await repository.getById(created.id))?.firstName, 'Jane');
});

test('findConflict can skip the account being edited', async () => {
  const { db } = await createSeededDatabase();
  const repository = new UserRepository(db);
  const created = await repository.create(newUser);

  assert.equal(await repository.findConflict('jane.doe', 'jane.doe@example.test', created.id), null);
});
