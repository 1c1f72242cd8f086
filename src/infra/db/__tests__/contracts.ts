import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { randomUUID } from 'crypto';
import type { RefreshTokenStore, UserRepository } from '../../../application/auth/ports.js';
import {
  DuplicateEmailError,
  DuplicateUsernameError,
  NotFoundError,
  StorageError,
} from '../../../application/errors.js';

export interface AdapterFixture {
  users: UserRepository;
  refreshTokens: RefreshTokenStore;
  cleanup(): Promise<void>;
}

/** Prefix of every username the contract suites create. */
export const CONTRACT_PREFIX = 'contract-';

const uniqueName = (label: string) => `${CONTRACT_PREFIX}${label}-${randomUUID().slice(0, 8)}`;

/**
 * Behaviour every UserRepository / RefreshTokenStore pair must share,
 * whichever engine is behind it.
 */
export function describeAdapterContract(engine: string, setup: () => Promise<AdapterFixture>) {
  describe(`${engine} UserRepository`, () => {
    let fixture: AdapterFixture;

    beforeEach(async () => {
      fixture = await setup();
    });

    afterEach(async () => {
      await fixture.cleanup();
    });

    const createUser = async (label: string) => {
      const username = uniqueName(label);
      const created = await fixture.users.create({
        username,
        email: `${username}@example.com`,
        passwordHash: '$argon2id$placeholder',
      });
      if (!created.ok) throw created.error;
      return created.value;
    };

    it('should create a user with a UUID id and a creation time', async () => {
      const before = Date.now();
      const user = await createUser('create');

      expect(user.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(user.passwordHash).toBe('$argon2id$placeholder');
      expect(user.createdAt).toBeInstanceOf(Date);
      // Engine clocks may round to the second
      expect(user.createdAt.getTime()).toBeGreaterThanOrEqual(before - 1000);
      expect(user.createdAt.getTime()).toBeLessThanOrEqual(Date.now() + 1000);
    });

    it('should find a user by username and by id', async () => {
      const user = await createUser('find');

      expect(await fixture.users.findByUsername(user.username)).toEqual({ ok: true, value: user });
      expect(await fixture.users.findById(user.id)).toEqual({ ok: true, value: user });
    });

    it('should report NotFound for a missing username or id', async () => {
      const byName = await fixture.users.findByUsername(uniqueName('missing'));
      const byId = await fixture.users.findById(randomUUID());
      const byBadId = await fixture.users.findById('not-a-uuid');

      for (const result of [byName, byId, byBadId]) {
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(NotFoundError);
      }
    });

    it('should match usernames case-sensitively', async () => {
      const user = await createUser('case');

      const result = await fixture.users.findByUsername(user.username.toUpperCase());

      expect(result.ok).toBe(false);
    });

    it('should reject a duplicate username', async () => {
      const user = await createUser('dup-name');

      const result = await fixture.users.create({
        username: user.username,
        email: `other-${user.email}`,
        passwordHash: 'x',
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(DuplicateUsernameError);
    });

    it('should reject a duplicate email', async () => {
      const user = await createUser('dup-mail');

      const result = await fixture.users.create({
        username: `${user.username}-b`,
        email: user.email,
        passwordHash: 'x',
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(DuplicateEmailError);
    });

    it('should let exactly one of two concurrent creates win', async () => {
      const username = uniqueName('race');
      const results = await Promise.all(
        ['a', 'b'].map((suffix) =>
          fixture.users.create({
            username,
            email: `${username}-${suffix}@example.com`,
            passwordHash: 'x',
          })
        )
      );

      expect(results.filter((r) => r.ok)).toHaveLength(1);
    });

    it('should refuse a username or email longer than the column allows', async () => {
      const tooLongName = await fixture.users.create({
        username: `${CONTRACT_PREFIX}${'n'.repeat(51 - CONTRACT_PREFIX.length)}`,
        email: `${uniqueName('long-name')}@example.com`,
        passwordHash: 'x',
      });
      const tooLongEmail = await fixture.users.create({
        username: uniqueName('long-mail'),
        email: `${'m'.repeat(243)}@example.com`,
        passwordHash: 'x',
      });

      for (const result of [tooLongName, tooLongEmail]) {
        expect(result.ok).toBe(false);
        if (result.ok) return;
        expect(result.error).toBeInstanceOf(StorageError);
      }
    });

    it('should accept a username of exactly 50 characters', async () => {
      const username = `${CONTRACT_PREFIX}${randomUUID().replace(/-/g, '').slice(0, 41)}`;

      const result = await fixture.users.create({
        username,
        email: `${username}@example.com`,
        passwordHash: 'x',
      });

      expect(username).toHaveLength(50);
      expect(result.ok).toBe(true);
    });

    it('should delete a user once', async () => {
      const user = await createUser('delete');

      expect(await fixture.users.deleteById(user.id)).toEqual({ ok: true, value: true });
      expect(await fixture.users.deleteById(user.id)).toEqual({ ok: true, value: false });
      expect(await fixture.users.deleteById('not-a-uuid')).toEqual({ ok: true, value: false });
      expect((await fixture.users.findById(user.id)).ok).toBe(false);
    });

    it('should answer a ping', async () => {
      expect(await fixture.users.ping()).toEqual({ ok: true, value: undefined });
    });
  });

  describe(`${engine} RefreshTokenStore`, () => {
    let fixture: AdapterFixture;
    let userId: string;
    const now = new Date('2026-01-15T12:00:00.000Z');
    const inOneDay = new Date('2026-01-16T12:00:00.000Z');

    beforeEach(async () => {
      fixture = await setup();
      const username = uniqueName('tokens');
      const created = await fixture.users.create({
        username,
        email: `${username}@example.com`,
        passwordHash: 'x',
      });
      if (!created.ok) throw created.error;
      userId = created.value.id;
    });

    afterEach(async () => {
      await fixture.cleanup();
    });

    const tokenHash = () => randomUUID().replace(/-/g, '');

    it('should rotate a live token into its successor', async () => {
      const first = tokenHash();
      const second = tokenHash();
      await fixture.refreshTokens.insert({ tokenHash: first, userId, expiresAt: inOneDay, createdAt: now });

      const rotated = await fixture.refreshTokens.rotate(
        first,
        { tokenHash: second, expiresAt: inOneDay, createdAt: now },
        now
      );
      const next = await fixture.refreshTokens.rotate(
        second,
        { tokenHash: tokenHash(), expiresAt: inOneDay, createdAt: now },
        now
      );

      expect(rotated).toEqual({ ok: true, value: { status: 'rotated', userId } });
      expect(next).toEqual({ ok: true, value: { status: 'rotated', userId } });
    });

    it('should report a consumed token and store no successor for it', async () => {
      const first = tokenHash();
      const orphan = tokenHash();
      await fixture.refreshTokens.insert({ tokenHash: first, userId, expiresAt: inOneDay, createdAt: now });
      await fixture.refreshTokens.rotate(
        first,
        { tokenHash: tokenHash(), expiresAt: inOneDay, createdAt: now },
        now
      );

      const again = await fixture.refreshTokens.rotate(
        first,
        { tokenHash: orphan, expiresAt: inOneDay, createdAt: now },
        now
      );

      expect(again).toEqual({ ok: true, value: { status: 'consumed' } });
      expect(await fixture.refreshTokens.revoke(orphan, now)).toEqual({ ok: true, value: false });
    });

    it('should report an unknown token', async () => {
      const rotated = await fixture.refreshTokens.rotate(
        tokenHash(),
        { tokenHash: tokenHash(), expiresAt: inOneDay, createdAt: now },
        now
      );

      expect(rotated).toEqual({ ok: true, value: { status: 'unknown' } });
    });

    it('should report an expired token and consume it', async () => {
      const first = tokenHash();
      await fixture.refreshTokens.insert({ tokenHash: first, userId, expiresAt: inOneDay, createdAt: now });

      const rotated = await fixture.refreshTokens.rotate(
        first,
        { tokenHash: tokenHash(), expiresAt: inOneDay, createdAt: inOneDay },
        inOneDay
      );

      expect(rotated).toEqual({ ok: true, value: { status: 'expired' } });
      expect(await fixture.refreshTokens.revoke(first, inOneDay)).toEqual({ ok: true, value: false });
    });

    it('should revoke a live token once', async () => {
      const first = tokenHash();
      await fixture.refreshTokens.insert({ tokenHash: first, userId, expiresAt: inOneDay, createdAt: now });

      expect(await fixture.refreshTokens.revoke(first, now)).toEqual({ ok: true, value: true });
      expect(await fixture.refreshTokens.revoke(first, now)).toEqual({ ok: true, value: false });
    });

    it('should let exactly one of two concurrent rotations win', async () => {
      const first = tokenHash();
      await fixture.refreshTokens.insert({ tokenHash: first, userId, expiresAt: inOneDay, createdAt: now });

      const results = await Promise.all(
        [tokenHash(), tokenHash()].map((successor) =>
          fixture.refreshTokens.rotate(
            first,
            { tokenHash: successor, expiresAt: inOneDay, createdAt: now },
            now
          )
        )
      );

      const statuses = results.map((r) => (r.ok ? r.value.status : 'error')).sort();
      expect(statuses).toEqual(['consumed', 'rotated']);
    });

    it('should drop the tokens of a deleted user', async () => {
      const first = tokenHash();
      await fixture.refreshTokens.insert({ tokenHash: first, userId, expiresAt: inOneDay, createdAt: now });

      await fixture.users.deleteById(userId);
      const rotated = await fixture.refreshTokens.rotate(
        first,
        { tokenHash: tokenHash(), expiresAt: inOneDay, createdAt: now },
        now
      );

      expect(rotated).toEqual({ ok: true, value: { status: 'unknown' } });
    });
  });
}
