/**
 * Error Hierarchy and Telegram Error Classification
 *
 * Every error raised by the library extends `TelegramBotError`, so callers can
 * catch the whole family at once or a single subsystem (roles, states, storage,
 * locales, logs). Failures of external collaborators are wrapped and kept as
 * `cause`.
 *
 * Telegram API failures are classified so the sender can decide between
 * dropping a message (blocked user, vanished chat, rate limit) and rethrowing.
 *
 * @since 2025
 */
import type { TelegramError } from '../types/index.js';

export type ErrorContext = Record<string, unknown>;

export interface TelegramBotErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Base class for every library error
 */
export class TelegramBotError extends Error {
  public readonly context: ErrorContext;
  public readonly timestamp: Date;

  constructor(message: string, options: TelegramBotErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.context = options.context ?? {};
    this.timestamp = new Date();
  }
}

/** Invalid constructor configuration */
export class InitError extends TelegramBotError {}

/** Storage backend failure */
export class StorageError extends TelegramBotError {}

export class RoleError extends TelegramBotError {}

export class PasswordError extends RoleError {}

/** Login as an already held role, or logout from a role the user does not hold */
export class AlreadyLoggedError extends RoleError {}

export class StateError extends TelegramBotError {}

export class UserMetaError extends TelegramBotError {}

export class LocaleError extends TelegramBotError {}

export class BotLoggerError extends TelegramBotError {}

/** A received document or image could not be fetched from Telegram */
export class DownloadError extends TelegramBotError {}

export class WrongLogLevelError extends BotLoggerError {
  public readonly level: string;

  constructor(level: string) {
    super(`Unknown log level: ${level}`, { context: { level } });
    this.level = level;
  }
}

/**
 * Returns the message of an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export enum TelegramFailure {
  BLOCKED = 'BLOCKED',
  CHAT_NOT_FOUND = 'CHAT_NOT_FOUND',
  RATE_LIMITED = 'RATE_LIMITED',
  OTHER = 'OTHER'
}

/**
 * Narrows an unknown thrown value to a Telegram API error carrying a response
 */
export function isTelegramError(error: unknown): error is TelegramError {
  if (!(error instanceof Error) || !('response' in error)) {
    return false;
  }
  const response: unknown = error.response;
  return typeof response === 'object' && response !== null && 'error_code' in response;
}

/**
 * Classifies a failed Telegram API call.
 *
 * 403 with "bot was blocked by the user" is BLOCKED, 403/400 with "chat not found"
 * is CHAT_NOT_FOUND and 429 is RATE_LIMITED. Anything else is OTHER.
 */
export function classifyTelegramError(error: unknown): TelegramFailure {
  if (!isTelegramError(error) || !error.response) {
    return TelegramFailure.OTHER;
  }

  const { error_code: code, description = '' } = error.response;

  if (code === 429) {
    return TelegramFailure.RATE_LIMITED;
  }
  if (code === 403 && description.includes('bot was blocked by the user')) {
    return TelegramFailure.BLOCKED;
  }
  if ((code === 403 || code === 400) && description.includes('chat not found')) {
    return TelegramFailure.CHAT_NOT_FOUND;
  }
  return TelegramFailure.OTHER;
}
