/**
 * Telegram Bot
 *
 * One object wiring Telegraf to the storage-backed services, the router and
 * the sender. Handlers are registered with `route`, `documentRoute` and
 * `imageRoute`; `start()` connects storage, loads locales and begins polling.
 *
 * @example
 * ```ts
 * const bot = new TelegramBot({
 *   token: getBotToken(),
 *   roles: { admin: { password: 'test-secret' } },
 *   states: ['waiting_name'],
 *   storage: { storageFolder: './data' }
 * });
 *
 * bot.route({ commands: ['hello'] })(async ({ user }) => {
 *   await bot.sender.sendText(user.id, `Hello, ${user.firstName ?? 'there'}!`);
 * });
 *
 * await bot.start();
 * ```
 *
 * @since 2025
 */
import type { Telegraf } from 'telegraf';
import { LogEngine } from '@wgtechlabs/log-engine';
import { createBot, startPolling, stopPolling } from './bot.js';
import type { LocaleManager } from './locales/LocaleManager.js';
import type { BotLogger } from './logs/BotLogger.js';
import { MessageSender } from './messaging/MessageSender.js';
import type { RoleAuth } from './roles/RoleAuth.js';
import { Router } from './routing/Router.js';
import {
  CATCH_ALL_PATTERN,
  CommandRoute,
  DocumentRoute,
  ImageRoute,
  MessageRoute,
  type DocumentFilterOptions,
  type DocumentRouteRequest,
  type ImageRouteRequest,
  type RouteAccess,
  type RouteHandler,
  type RouteRequest
} from './routing/routes.js';
import { DEFAULT_ROLE, createBotServices, type BotServices, type BotServicesOverrides } from './services/botServices.js';
import type { StateManager } from './states/StateManager.js';
import type { Storage } from './storage/Storage.js';
import type { BotContext } from './types/index.js';
import type { UserMetaStorage } from './users/UserMetaStorage.js';
import { InitError, getErrorMessage } from './utils/errorHandler.js';

export interface RouteOptions extends RouteAccess {
  /** Commands without the leading slash */
  commands?: string[];
  /** Patterns that must match the whole message text */
  messages?: string[];
}

export interface DocumentRouteOptions extends RouteAccess, DocumentFilterOptions {}

export type ImageRouteOptions = RouteAccess;

export interface TelegramBotOverrides extends BotServicesOverrides {
  /** Telegraf instance to use instead of one built from the token */
  telegraf?: Telegraf<BotContext>;
}

export class TelegramBot {
  readonly services: BotServices;
  readonly telegraf: Telegraf<BotContext>;
  readonly router: Router;
  readonly sender: MessageSender;
  private localeManager: LocaleManager | null = null;
  private running = false;
  private starting: Promise<void> | null = null;

  /**
   * @throws InitError when the configuration is invalid
   */
  constructor(config: unknown, overrides: TelegramBotOverrides = {}) {
    this.services = createBotServices(config, overrides);
    this.telegraf = overrides.telegraf ?? createBot(this.services.config.token);
    this.router = new Router(this.services.stateManager, this.services.roleAuth, this.services.logger, {
      defaultState: this.services.config.freeState,
      defaultRoles: [DEFAULT_ROLE]
    });
    this.sender = new MessageSender(this.telegraf.telegram, this.services.logger);

    this.router.registerCommandRoute(new CommandRoute('start', request => this.initializeUser(request)));
  }

  get storage(): Storage {
    return this.services.storage;
  }

  get roleAuth(): RoleAuth {
    return this.services.roleAuth;
  }

  get stateManager(): StateManager {
    return this.services.stateManager;
  }

  get userMeta(): UserMetaStorage {
    return this.services.userMeta;
  }

  get logger(): BotLogger {
    return this.services.logger;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * @throws InitError before `start()` has loaded the locales
   */
  get locales(): LocaleManager {
    if (!this.localeManager) {
      throw new InitError('Locales are loaded when the bot starts');
    }
    return this.localeManager;
  }

  /**
   * Registers a command and/or text message handler. With neither commands nor
   * messages the handler receives every text message that is not a command.
   */
  route(options: RouteOptions = {}): <H extends RouteHandler>(handler: H) => H {
    const { commands = [], messages = [], states, roles } = options;
    const patterns = commands.length === 0 && messages.length === 0 ? [CATCH_ALL_PATTERN] : messages;

    return handler => {
      for (const command of commands) {
        this.router.registerCommandRoute(new CommandRoute(command, handler, { states, roles }));
      }
      for (const pattern of patterns) {
        this.router.registerMessageRoute(new MessageRoute(pattern, handler, { states, roles }));
      }
      return handler;
    };
  }

  documentRoute(options: DocumentRouteOptions = {}): <H extends RouteHandler<DocumentRouteRequest>>(handler: H) => H {
    const { fileNames, mimeTypes, states, roles } = options;
    return handler => {
      this.router.registerDocumentRoute(new DocumentRoute({ fileNames, mimeTypes }, handler, { states, roles }));
      return handler;
    };
  }

  imageRoute(options: ImageRouteOptions = {}): <H extends RouteHandler<ImageRouteRequest>>(handler: H) => H {
    const { states, roles } = options;
    return handler => {
      this.router.registerImageRoute(new ImageRoute(handler, { states, roles }));
      return handler;
    };
  }

  /**
   * Connects storage, loads locales and starts polling. Concurrent calls share
   * one startup.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }
    if (!this.starting) {
      this.starting = this.launch().finally(() => {
        this.starting = null;
      });
    }
    return this.starting;
  }

  private async launch(): Promise<void> {
    await this.storage.connect();
    try {
      this.localeManager = await this.services.loadLocales();
      this.router.attach(this.telegraf);
    } catch (error) {
      LogEngine.error('Bot startup failed', { error: getErrorMessage(error) });
      await this.storage.disconnect().catch((disconnectError: unknown) => {
        LogEngine.warn('Failed to release storage after startup failure', {
          error: getErrorMessage(disconnectError)
        });
      });
      throw error;
    }

    startPolling(this.telegraf, () => {
      this.running = false;
    });
    this.running = true;

    await this.logger.logStart();
    LogEngine.info('Bot startup complete', {
      routes: this.router.routeCount,
      locales: this.localeManager.getLocaleCodes()
    });
  }

  async stop(reason: string = 'stop'): Promise<void> {
    if (!this.running) {
      return;
    }

    stopPolling(this.telegraf, reason);
    this.running = false;
    await this.logger.logStop();
    await this.storage.disconnect();
    LogEngine.info('Bot stopped', { reason });
  }

  /**
   * `/start`: creates the user record on first contact and refreshes the profile fields
   */
  private async initializeUser({ user }: RouteRequest): Promise<void> {
    await this.userMeta.userInitialize(user.id, {
      Roles: [DEFAULT_ROLE],
      State: this.stateManager.freeState,
      State_Params: {}
    });
    await this.userMeta.userUpdate(user.id, {
      username: user.username,
      firstName: user.firstName,
      lastName: user.lastName
    });
  }
}
