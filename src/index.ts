/**
 * Telegram Bot Utilities
 *
 * Building blocks for Telegraf bots: storage adapter (MongoDB or local JSON),
 * role and state systems, user metadata, locales, a persisted bot log, an
 * update router and a message sender, composed by `TelegramBot`.
 *
 * @since 2025
 */

// Logging must be configured before any other module logs
import './config/logging.js';

export { TelegramBot } from './TelegramBot.js';
export type { DocumentRouteOptions, ImageRouteOptions, RouteOptions, TelegramBotOverrides } from './TelegramBot.js';
export { DEFAULT_ROLE, createBotServices } from './services/botServices.js';
export type { BotServices, BotServicesOverrides } from './services/botServices.js';
export { BotConfigSchema, parseBotConfig } from './config/botConfig.js';
export type { BotConfig, BotConfigInput } from './config/botConfig.js';
export { getBotToken, getEnvVar, getStorageConfigFromEnv, isDevelopment, isProduction } from './config/env.js';
export { createBot, handleBotError, startPolling, stopPolling } from './bot.js';

export * from './storage/index.js';
export { RoleAuth } from './roles/RoleAuth.js';
export type { RoleAuthOptions } from './roles/RoleAuth.js';
export { StateManager } from './states/StateManager.js';
export type { StateManagerOptions } from './states/StateManager.js';
export { UserMetaStorage } from './users/UserMetaStorage.js';
export type { UserMetaStorageOptions, UserProfileUpdate } from './users/UserMetaStorage.js';
export { LocaleManager, fillTemplate } from './locales/LocaleManager.js';
export type { LocaleData, LocaleManagerOptions } from './locales/LocaleManager.js';
export { BotLogger, formatLogParam, isLogLevel } from './logs/BotLogger.js';
export type { BotLoggerOptions, LogParams } from './logs/BotLogger.js';

export { Router } from './routing/Router.js';
export type { RouterOptions } from './routing/Router.js';
export {
  CATCH_ALL_PATTERN,
  CommandRoute,
  DocumentRoute,
  ImageRoute,
  MessageRoute,
  Route,
  parseCommand
} from './routing/routes.js';
export type {
  DocumentFilterOptions,
  DocumentRouteRequest,
  ImageRouteRequest,
  RouteAccess,
  RouteHandler,
  RouteRequest
} from './routing/routes.js';
export { DocumentLink, identityFromChat } from './routing/models.js';
export type { BotUser, BotUserIdentity, DocumentLinkInit, FileLinkResolver } from './routing/models.js';
export { MessageSender, buildReplyMarkup } from './messaging/MessageSender.js';
export type { MessageTransport, OutgoingDocument, SendDocumentOptions, SendTextOptions } from './messaging/MessageSender.js';

export * from './utils/errorHandler.js';
export { retryStorageOperation, retryWithExponentialBackoff } from './utils/retryUtils.js';
export type { RetryOptions, RetryResult } from './utils/retryUtils.js';
export { ConditionalLogger, getLogConfig, initializeLogConfig, resolveLogConfig } from './utils/logConfig.js';
export type { LogConfig, LogLevelName } from './utils/logConfig.js';
export * from './types/index.js';
