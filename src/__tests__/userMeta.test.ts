/**
 * Unit tests for users/UserMetaStorage.ts
 */
import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('@wgtechlabs/log-engine', () => ({
  LogEngine: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    configure: vi.fn()
  },
  LogMode: { DEBUG: 0, INFO: 1, WARN: 2, ERROR: 3, SILENT: 4, OFF: 5 }
}));

import { MemoryStorage } from '../storage/MemoryStorage.js';
import { UserMetaStorage } from '../users/UserMetaStorage.js';
import { StorageError, UserMetaError } from '../utils/errorHandler.js';

describe('UserMetaStorage', () => {
  let storage: MemoryStorage;
  let userMeta: UserMetaStorage;

  beforeEach(() => {
    storage = new MemoryStorage({
      Users: [
        { _id: 1, Username: 'ann', First_Name: 'Ann', Last_Name: 'Lee', Locale: 'en', Roles: ['user'] },
        { _id: 2, Roles: ['user'] }
      ]
    });
    userMeta = new UserMetaStorage(storage);
  });

  it('should tell whether a user exists', async () => {
    expect(await userMeta.userExists(1)).toBe(true);
    expect(await userMeta.userExists(3)).toBe(false);
  });

  describe('userInitialize', () => {
    it('should create a record for a new user', async () => {
      const created = await userMeta.userInitialize(3, { Roles: ['user'], State: 'free', State_Params: {} });

      expect(created).toBe(true);
      expect(await storage.getDataByColumn('Users', '_id', 3)).toEqual([
        { Roles: ['user'], State: 'free', State_Params: {}, _id: 3 }
      ]);
    });

    it('should leave an existing record untouched', async () => {
      const created = await userMeta.userInitialize(1, { Roles: [] });

      expect(created).toBe(false);
      expect(await storage.getDataByColumn('Users', '_id', 1, { columns: ['Roles'] })).toEqual([{ Roles: ['user'] }]);
    });

    it('should not let the init document override the id', async () => {
      await userMeta.userInitialize(4, { _id: 99 });

      expect(await userMeta.userExists(4)).toBe(true);
      expect(await userMeta.userExists(99)).toBe(false);
    });

    it('should create a single record when called twice at once', async () => {
      const results = await Promise.all([
        userMeta.userInitialize(7, { Roles: ['user'] }),
        userMeta.userInitialize(7, { Roles: ['user'] })
      ]);

      expect(results.filter(Boolean)).toHaveLength(1);
      expect(await storage.getDataByColumn('Users', '_id', 7)).toEqual([{ Roles: ['user'], _id: 7 }]);
    });
  });

  describe('profile fields', () => {
    it('should read names and locale', async () => {
      expect(await userMeta.getUsername(1)).toBe('ann');
      expect(await userMeta.getFirstName(1)).toBe('Ann');
      expect(await userMeta.getLastName(1)).toBe('Lee');
      expect(await userMeta.getLocale(1)).toBe('en');
    });

    it('should return empty values for fields never set', async () => {
      expect(await userMeta.getUsername(2)).toBe('');
      expect(await userMeta.getLocale(2)).toBeUndefined();
    });

    it('should fail for an unknown user', async () => {
      await expect(userMeta.getUsername(3)).rejects.toThrow(new UserMetaError('User was not found!'));
      await expect(userMeta.getLocale(3)).rejects.toBeInstanceOf(UserMetaError);
    });

    it('should update names, blanking the missing ones', async () => {
      await userMeta.userUpdate(1, { username: 'ann_l', firstName: 'Ann' });

      expect(await userMeta.getUser(1)).toEqual({
        _id: 1,
        Username: 'ann_l',
        First_Name: 'Ann',
        Last_Name: '',
        Locale: 'en',
        Roles: ['user']
      });
    });

    it('should wrap failed updates', async () => {
      vi.spyOn(storage, 'updateOne').mockRejectedValue(new StorageError('disk full'));

      await expect(userMeta.userUpdate(1, {})).rejects.toThrow(new UserMetaError('Failed to update user'));
    });

    it('should set the locale', async () => {
      await userMeta.setLocale(2, 'de');

      expect(await userMeta.getLocale(2)).toBe('de');
    });
  });

  it('should return null for a missing user record', async () => {
    expect(await userMeta.getUser(3)).toBeNull();
  });
});
