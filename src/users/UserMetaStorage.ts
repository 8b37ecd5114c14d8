/**
 * User Metadata Storage
 *
 * Profile fields (username, names, locale) kept on the user record next to
 * the role and state columns.
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';
import type { Storage } from '../storage/Storage.js';
import type { StorageDocument, UserRecord } from '../types/index.js';
import { UserMetaError, getErrorMessage } from '../utils/errorHandler.js';

export interface UserMetaStorageOptions {
  usersCollection?: string;
  idColumn?: string;
  usernameColumn?: string;
  firstNameColumn?: string;
  lastNameColumn?: string;
  localeColumn?: string;
}

export interface UserProfileUpdate {
  username?: string;
  firstName?: string;
  lastName?: string;
}

export class UserMetaStorage {
  private readonly usersCollection: string;
  private readonly idColumn: string;
  private readonly usernameColumn: string;
  private readonly firstNameColumn: string;
  private readonly lastNameColumn: string;
  private readonly localeColumn: string;

  constructor(
    private readonly storage: Storage,
    options: UserMetaStorageOptions = {}
  ) {
    this.usersCollection = options.usersCollection ?? 'Users';
    this.idColumn = options.idColumn ?? '_id';
    this.usernameColumn = options.usernameColumn ?? 'Username';
    this.firstNameColumn = options.firstNameColumn ?? 'First_Name';
    this.lastNameColumn = options.lastNameColumn ?? 'Last_Name';
    this.localeColumn = options.localeColumn ?? 'Locale';
  }

  async userExists(userId: number): Promise<boolean> {
    const users = await this.storage.getDataByColumn(this.usersCollection, this.idColumn, userId, { count: 1 });
    return users.length > 0;
  }

  /**
   * Inserts `initDocument` for the user unless a record already exists
   *
   * @returns whether a record was created
   */
  async userInitialize(userId: number, initDocument: StorageDocument): Promise<boolean> {
    const created = await this.storage.insertIfAbsent(this.usersCollection, this.idColumn, userId, initDocument);
    if (created) {
      LogEngine.info('User record initialized', { userId });
    }
    return created;
  }

  async userUpdate(userId: number, profile: UserProfileUpdate = {}): Promise<void> {
    try {
      await this.storage.updateOne(this.usersCollection, this.idColumn, userId, {
        [this.usernameColumn]: profile.username ?? '',
        [this.firstNameColumn]: profile.firstName ?? '',
        [this.lastNameColumn]: profile.lastName ?? ''
      });
    } catch (error) {
      LogEngine.error('Failed to update user profile', {
        userId,
        error: getErrorMessage(error)
      });
      throw new UserMetaError('Failed to update user', { context: { userId }, cause: error });
    }
  }

  async getUsername(userId: number): Promise<string> {
    return this.getStringColumn(userId, this.usernameColumn);
  }

  async getFirstName(userId: number): Promise<string> {
    return this.getStringColumn(userId, this.firstNameColumn);
  }

  async getLastName(userId: number): Promise<string> {
    return this.getStringColumn(userId, this.lastNameColumn);
  }

  /**
   * The user's locale code, or `undefined` when none was chosen yet
   */
  async getLocale(userId: number): Promise<string | undefined> {
    const value = await this.getColumn(userId, this.localeColumn);
    return typeof value === 'string' && value !== '' ? value : undefined;
  }

  async setLocale(userId: number, locale: string): Promise<void> {
    await this.storage.updateOne(this.usersCollection, this.idColumn, userId, {
      [this.localeColumn]: locale
    });
  }

  async getUser(userId: number): Promise<UserRecord | null> {
    const [found] = await this.storage.getDataByColumn(this.usersCollection, this.idColumn, userId, { count: 1 });
    if (!found) {
      return null;
    }
    const record: UserRecord = { _id: userId };
    Object.assign(record, found, { _id: userId });
    return record;
  }

  private async getStringColumn(userId: number, column: string): Promise<string> {
    const value = await this.getColumn(userId, column);
    return typeof value === 'string' ? value : '';
  }

  private async getColumn(userId: number, column: string): Promise<unknown> {
    const found = await this.storage.getDataByColumn(this.usersCollection, this.idColumn, userId, {
      columns: [column]
    });
    if (found.length === 0) {
      throw new UserMetaError('User was not found!', { context: { userId } });
    }
    return found[0][column];
  }
}
