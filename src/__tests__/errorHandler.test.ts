/**
 * Unit tests for utils/errorHandler.ts
 */
import { describe, expect, it } from 'vitest';
import { TelegramError } from 'telegraf';
import {
  AlreadyLoggedError,
  DownloadError,
  InitError,
  PasswordError,
  RoleError,
  StorageError,
  TelegramBotError,
  TelegramFailure,
  WrongLogLevelError,
  BotLoggerError,
  classifyTelegramError,
  getErrorMessage,
  isTelegramError
} from '../utils/errorHandler.js';

describe('error hierarchy', () => {
  it('should name errors after their class', () => {
    expect(new StorageError('disk full').name).toBe('StorageError');
    expect(new PasswordError('Wrong password!').name).toBe('PasswordError');
  });

  it('should let callers catch a whole subsystem', () => {
    const error = new AlreadyLoggedError('User has already logged in as a(n) admin!');

    expect(error).toBeInstanceOf(RoleError);
    expect(error).toBeInstanceOf(TelegramBotError);
    expect(error).toBeInstanceOf(Error);
    expect(new DownloadError('x')).toBeInstanceOf(TelegramBotError);
  });

  it('should keep context and cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new InitError('Could not initialize storage class', { context: { folder: '' }, cause });

    expect(error.message).toBe('Could not initialize storage class');
    expect(error.context).toEqual({ folder: '' });
    expect(error.cause).toBe(cause);
    expect(error.timestamp).toBeInstanceOf(Date);
  });

  it('should default to an empty context and no cause', () => {
    const error = new StorageError('disk full');

    expect(error.context).toEqual({});
    expect(error.cause).toBeUndefined();
  });

  it('should describe a wrong log level', () => {
    const error = new WrongLogLevelError('LOUD');

    expect(error).toBeInstanceOf(BotLoggerError);
    expect(error.message).toBe('Unknown log level: LOUD');
    expect(error.level).toBe('LOUD');
  });
});

describe('getErrorMessage', () => {
  it('should read error messages', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
  });

  it('should stringify other thrown values', () => {
    expect(getErrorMessage('plain')).toBe('plain');
    expect(getErrorMessage(42)).toBe('42');
    expect(getErrorMessage(undefined)).toBe('undefined');
  });
});

describe('Telegram error classification', () => {
  function apiError(code: number, description: string): TelegramError {
    return new TelegramError({ error_code: code, description });
  }

  it('should recognise Telegram API errors', () => {
    expect(isTelegramError(apiError(400, 'Bad Request'))).toBe(true);
    expect(isTelegramError(new Error('network down'))).toBe(false);
    expect(isTelegramError({ response: { error_code: 400 } })).toBe(false);
  });

  it('should classify blocked users', () => {
    expect(classifyTelegramError(apiError(403, 'Forbidden: bot was blocked by the user'))).toBe(TelegramFailure.BLOCKED);
  });

  it('should classify missing chats', () => {
    expect(classifyTelegramError(apiError(400, 'Bad Request: chat not found'))).toBe(TelegramFailure.CHAT_NOT_FOUND);
    expect(classifyTelegramError(apiError(403, 'Forbidden: chat not found'))).toBe(TelegramFailure.CHAT_NOT_FOUND);
  });

  it('should classify rate limits', () => {
    expect(classifyTelegramError(apiError(429, 'Too Many Requests: retry after 3'))).toBe(TelegramFailure.RATE_LIMITED);
  });

  it('should classify everything else as other', () => {
    expect(classifyTelegramError(apiError(403, 'Forbidden: user is deactivated'))).toBe(TelegramFailure.OTHER);
    expect(classifyTelegramError(apiError(500, 'Internal Server Error'))).toBe(TelegramFailure.OTHER);
    expect(classifyTelegramError(new Error('socket hang up'))).toBe(TelegramFailure.OTHER);
    expect(classifyTelegramError('boom')).toBe(TelegramFailure.OTHER);
  });
});
