import { before, test } from 'node:test';
import assert from 'node:assert/strict';
import { CredentialAuthenticator } from '../src/auth/authenticator.js';
import { IncorrectCredentialsError, PermissionDeniedError } from '../src/auth/errors.js';
import { BcryptPasswordHasher } from '../src/auth/password.js';
import { RoleScopeResolver } from '../src/auth/roleScopeResolver.js';
import { Scopes } from '../src/auth/scopes.js';
import { TokenCodec } from '../src/auth/tokenCodec.js';
import { MemoryCache } from '../src/cache/memoryCache.js';
import {
  credentialRecord,
  InMemoryCredentialStore,
  RecordingRoleStore,
  TEST_ACCESS_SECRET,
  TEST_REFRESH_SECRET,
} from './helpers.js';

const PASSWORD = 'correct-horse-placeholder';
const passwords = new BcryptPasswordHasher(4);

const roleTable = {
  Customer: [Scopes.USERS_GET_ME, Scopes.AUTH_REFRESH_TOKEN, Scopes.ROLES_GET_ROLES],
  Support: [Scopes.USERS_GET_ME, Scopes.USERS_UPDATE_USER],
};
const johnsScopes = [Scopes.USERS_GET_ME, Scopes.AUTH_REFRESH_TOKEN, Scopes.ROLES_GET_ROLES, Scopes.USERS_UPDATE_USER];

let authenticator: CredentialAuthenticator;

before(async () => {
  const hashedPassword = await passwords.hash(PASSWORD);
  const credentials = new InMemoryCredentialStore([
    credentialRecord({ id: 'user-john', username: 'john.smith', roles: ['Support', 'Customer'], hashedPassword }),
    credentialRecord({ id: 'user-gone', username: 'gone.user', hashedPassword, deleted: true }),
    credentialRecord({ id: 'user-broken', username: 'broken.hash', hashedPassword: 'not-a-bcrypt-hash' }),
  ]);
  const resolver = new RoleScopeResolver(new RecordingRoleStore(roleTable), new MemoryCache(), { ttlSeconds: 3600 });
  authenticator = new CredentialAuthenticator({ credentials, resolver, passwords });
});

function isIncorrectCredentials(error: unknown): boolean {
  assert.ok(error instanceof IncorrectCredentialsError);
  assert.equal(error.message, 'Incorrect username or password.');
  assert.equal(error.statusCode, 401);
  return true;
}

test('without requested scopes the session gets every scope the roles permit', async () => {
  const session = await authenticator.authenticate('john.smith', PASSWORD);

  assert.equal(session.subject, 'user-john');
  assert.deepEqual(session.grantedScopes, johnsScopes);
});

test('issued tokens carry the granted scopes back through decode', async () => {
  const codec = new TokenCodec({
    algorithm: 'HS256',
    access: { secret: TEST_ACCESS_SECRET, ttlMinutes: 15 },
    refresh: { secret: TEST_REFRESH_SECRET, ttlMinutes: 1440 },
  });
  const session = await authenticator.authenticate('john.smith', PASSWORD);
  const { access } = await codec.issueSessionPair(session.subject, session.grantedScopes);

  const claims = await codec.decode(access, 'access');
  assert.equal(claims.subject, 'user-john');
  assert.deepEqual(claims.scopes, johnsScopes);
});

test('requested scopes narrow the session to exactly that set', async () => {
  const session = await authenticator.authenticate('john.smith', PASSWORD, [
    Scopes.USERS_GET_ME,
    Scopes.AUTH_REFRESH_TOKEN,
  ]);

  assert.deepEqual(session.grantedScopes, [Scopes.USERS_GET_ME, Scopes.AUTH_REFRESH_TOKEN]);
});

test('requesting a scope the roles do not permit is denied', async () => {
  await assert.rejects(
    authenticator.authenticate('john.smith', PASSWORD, [Scopes.USERS_GET_ME, 'ADMIN_ONLY_SCOPE']),
    (error: unknown) => {
      assert.ok(error instanceof PermissionDeniedError);
      assert.deepEqual(error.missingScopes, ['ADMIN_ONLY_SCOPE']);
      return true;
    },
  );
});

test('a wrong password is rejected', async () => {
  await assert.rejects(authenticator.authenticate('john.smith', 'wrong-password'), isIncorrectCredentials);
});

test('an unknown username is rejected the same way', async () => {
  await assert.rejects(authenticator.authenticate('nobody', PASSWORD), isIncorrectCredentials);
});

test('a deleted account is rejected the same way', async () => {
  await assert.rejects(authenticator.authenticate('gone.user', PASSWORD), isIncorrectCredentials);
});

test('a malformed stored hash is a mismatch', async () => {
  await assert.rejects(authenticator.authenticate('broken.hash', PASSWORD), isIncorrectCredentials);
});

test('credentials are checked before requested scopes', async () => {
  await assert.rejects(
    authenticator.authenticate('john.smith', 'wrong-password', ['ADMIN_ONLY_SCOPE']),
    isIncorrectCredentials,
  );
});
