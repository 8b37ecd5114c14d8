/**
 * Bot Services
 *
 * Builds the storage-backed components of a bot from one configuration
 * object, without a Telegram connection.
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';
import { parseBotConfig, type BotConfig } from '../config/botConfig.js';
import { LocaleManager } from '../locales/LocaleManager.js';
import { BotLogger } from '../logs/BotLogger.js';
import { RoleAuth } from '../roles/RoleAuth.js';
import { StateManager } from '../states/StateManager.js';
import { createStorage, type Storage } from '../storage/index.js';
import { UserMetaStorage } from '../users/UserMetaStorage.js';

/** Role given to every user on first contact */
export const DEFAULT_ROLE = 'user';

export interface BotServices {
  config: BotConfig;
  storage: Storage;
  roleAuth: RoleAuth;
  stateManager: StateManager;
  userMeta: UserMetaStorage;
  logger: BotLogger;
  /** Reads the locale folder; call after the files are in place */
  loadLocales(): Promise<LocaleManager>;
}

export interface BotServicesOverrides {
  /** Storage to use instead of the one the configuration describes */
  storage?: Storage;
  /** Clock for log entries, in epoch milliseconds */
  now?: () => number;
}

/**
 * @throws InitError when the configuration is invalid
 */
export function createBotServices(config: unknown, overrides: BotServicesOverrides = {}): BotServices {
  const parsed = parseBotConfig(config);
  const storage = overrides.storage ?? createStorage(parsed.storage);
  const usersCollection = parsed.usersCollection;
  // every user starts with the `user` role, so it exists even when not configured
  const roles = { [DEFAULT_ROLE]: { password: '' }, ...parsed.roles };

  const services: BotServices = {
    config: parsed,
    storage,
    roleAuth: new RoleAuth(storage, roles, { usersCollection }),
    stateManager: new StateManager(storage, parsed.states, {
      usersCollection,
      freeState: parsed.freeState,
      withParams: parsed.stateWithParams
    }),
    userMeta: new UserMetaStorage(storage, { usersCollection }),
    logger: new BotLogger(storage, parsed.logsCollection, {
      level: parsed.logLevel,
      now: overrides.now
    }),
    loadLocales: () => LocaleManager.load(parsed.localesFolder, { defaultLocale: parsed.defaultLocale })
  };

  LogEngine.debug('Bot services created', {
    storage: overrides.storage ? 'custom' : 'storageFolder' in parsed.storage ? 'local' : 'mongodb',
    roles: Object.keys(parsed.roles).length,
    states: parsed.states.length,
    stateWithParams: parsed.stateWithParams
  });

  return services;
}
