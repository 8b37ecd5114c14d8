/**
 * Role System
 *
 * Associates users with named roles from a static, password-protected role
 * mapping. Role membership is persisted on the user record; the mapping itself
 * never changes after construction.
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';
import type { Storage } from '../storage/Storage.js';
import type { RoleDefinition, RoleMap } from '../types/index.js';
import { AlreadyLoggedError, PasswordError, RoleError } from '../utils/errorHandler.js';

export interface RoleAuthOptions {
  usersCollection?: string;
  idColumn?: string;
  rolesColumn?: string;
}

export class RoleAuth {
  private readonly roles: ReadonlyMap<string, Readonly<RoleDefinition>>;
  private readonly usersCollection: string;
  private readonly idColumn: string;
  private readonly rolesColumn: string;

  constructor(
    private readonly storage: Storage,
    roles: RoleMap,
    options: RoleAuthOptions = {}
  ) {
    this.roles = new Map(Object.entries(roles).map(([name, definition]) => [name, { ...definition }]));
    this.usersCollection = options.usersCollection ?? 'Users';
    this.idColumn = options.idColumn ?? '_id';
    this.rolesColumn = options.rolesColumn ?? 'Roles';
  }

  getListOfRoles(): string[] {
    return [...this.roles.keys()];
  }

  hasRole(role: string): boolean {
    return this.roles.has(role);
  }

  /**
   * Roles currently held by the user
   *
   * @throws RoleError when the user has no record
   */
  async getUserRoles(userId: number): Promise<string[]> {
    const found = await this.storage.getDataByColumn(this.usersCollection, this.idColumn, userId, {
      columns: [this.rolesColumn]
    });
    if (found.length === 0) {
      throw new RoleError('User not found!', { context: { userId } });
    }

    const roles = found[0][this.rolesColumn];
    if (!Array.isArray(roles)) {
      return [];
    }
    return roles.filter((role): role is string => typeof role === 'string');
  }

  async isLoggedInAs(role: string, userId: number): Promise<boolean> {
    const userRoles = await this.getUserRoles(userId);
    return userRoles.includes(role);
  }

  /**
   * True when no roles are required or the user holds at least one of them
   */
  async hasAnyRole(userId: number, roles: string[]): Promise<boolean> {
    if (roles.length === 0) {
      return true;
    }
    const userRoles = await this.getUserRoles(userId);
    return roles.some(role => userRoles.includes(role));
  }

  async loginAs(role: string, userId: number, password: string = ''): Promise<void> {
    this.checkRole(role);
    this.checkPassword(role, password);

    const userRoles = await this.getUserRoles(userId);
    if (userRoles.includes(role)) {
      throw new AlreadyLoggedError(`User has already logged in as a(n) ${role}!`, {
        context: { userId, role }
      });
    }

    await this.saveUserRoles(userId, [...userRoles, role]);
    LogEngine.info('User logged in as role', { userId, role });
  }

  async logoutAs(role: string, userId: number): Promise<void> {
    this.checkRole(role);

    const userRoles = await this.getUserRoles(userId);
    if (!userRoles.includes(role)) {
      throw new AlreadyLoggedError(`User has already logged out as a(n) ${role}!`, {
        context: { userId, role }
      });
    }

    await this.saveUserRoles(userId, userRoles.filter(held => held !== role));
    LogEngine.info('User logged out of role', { userId, role });
  }

  private async saveUserRoles(userId: number, roles: string[]): Promise<void> {
    await this.storage.updateOne(this.usersCollection, this.idColumn, userId, {
      [this.rolesColumn]: roles
    });
  }

  private checkRole(role: string): void {
    if (!this.roles.has(role)) {
      throw new RoleError('Role is not found!', { context: { role } });
    }
  }

  private checkPassword(role: string, password: string): void {
    if (this.roles.get(role)?.password !== password) {
      throw new PasswordError('Wrong password!', { context: { role } });
    }
  }
}
