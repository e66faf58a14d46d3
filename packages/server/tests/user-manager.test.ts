import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { DuplicateUsernameError } from '../src/errors.js';
import { PasswordHasher } from '../src/passwords.js';
import { TokenService } from '../src/tokens.js';
import { UserManager, toPublicUser } from '../src/user-manager.js';
import { TEST_SECRET, memoryDb } from './helpers.js';

describe('UserManager', () => {
  let tokens: TokenService;
  let users: UserManager;

  beforeEach(() => {
    tokens = new TokenService({ secret: TEST_SECRET });
    users = new UserManager(
      memoryDb(),
      new PasswordHasher({ timeCost: 2, memoryCost: 4096, parallelism: 1 }),
      tokens,
    );
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('registers a player by default and can find it again', async () => {
    const user = await users.register('alice', 'alice-pass');

    expect(toPublicUser(user)).toEqual({ id: 1, username: 'alice', role: 'player' });
    expect(user.passwordHash).not.toContain('alice-pass');

    expect(users.getUserByUsername('alice')).toEqual(user);
    expect(users.getUserById(user.id)).toEqual(user);
    expect(users.getUserById(99)).toBeUndefined();
  });

  test('records who registered the user', async () => {
    const gm = await users.register('gm', 'gm-pass', 'gm');
    const player = await users.register('bob', 'bob-pass', 'player', gm.id);

    expect(player.registeredBy).toBe(gm.id);
    expect(users.getUserByUsername('bob')?.registeredBy).toBe(gm.id);
  });

  test('refuses a second registration under the same name', async () => {
    await users.register('alice', 'first');

    await expect(users.register('alice', 'second')).rejects.toBeInstanceOf(DuplicateUsernameError);
    await expect(users.register('alice', 'second')).rejects.toThrow("Username 'alice' already exists");
  });

  test('keeps only one row when two registrations race', async () => {
    const results = await Promise.allSettled([users.register('carol', 'a'), users.register('carol', 'b')]);

    expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
    const rejected = results.find((r) => r.status === 'rejected');
    expect(rejected?.status === 'rejected' && rejected.reason).toBeInstanceOf(DuplicateUsernameError);
  });

  test('authenticates with a token that resolves to the user', async () => {
    const gm = await users.register('gm', 'gm-pass', 'gm');
    const result = await users.authenticate('gm', 'gm-pass');

    expect(result.user?.id).toBe(gm.id);
    expect(result.token).not.toBeNull();
    expect(tokens.validateToken(result.token ?? '')).toEqual({ userId: gm.id, role: 'gm' });
  });

  test('answers a wrong password and an unknown user the same way', async () => {
    await users.register('alice', 'alice-pass');

    expect(await users.authenticate('alice', 'wrong')).toEqual({ user: null, token: null });
    expect(await users.authenticate('nobody', 'alice-pass')).toEqual({ user: null, token: null });
  });

  test('checks a password hash even when the user does not exist', async () => {
    const verify = vi.spyOn(PasswordHasher.prototype, 'verify');

    expect(await users.authenticate('nobody', 'some-pass')).toEqual({ user: null, token: null });
    expect(await users.authenticate('nobody', 'other-pass')).toEqual({ user: null, token: null });

    expect(verify).toHaveBeenCalledTimes(2);
    expect(verify.mock.calls[0][0]).toBe('some-pass');
    expect(verify.mock.calls[0][1]).toMatch(/^\$argon2id\$/);
    expect(verify.mock.calls[1][1]).toBe(verify.mock.calls[0][1]);
  });

  test('bootstraps a gm only while none exists', async () => {
    expect(users.needsFirstUser()).toBe(true);

    const admin = await users.ensureAdminUser('admin', 'admin-pass');
    expect(admin?.role).toBe('gm');
    expect(users.needsFirstUser()).toBe(false);

    expect(await users.ensureAdminUser('admin2', 'admin-pass')).toBeNull();
    expect(users.getUserByUsername('admin2')).toBeUndefined();
  });

  test('a registered player does not count as the bootstrap gm', async () => {
    await users.register('alice', 'alice-pass');

    expect(users.needsFirstUser()).toBe(true);
  });
});
