/**
 * Unit tests for routing/Router.ts
 */
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { Context, Telegraf, Telegram } from 'telegraf';
import type { Chat, Message, Update, UserFromGetMe } from 'telegraf/types';

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

import { LogEngine } from '@wgtechlabs/log-engine';
import { BotLogger } from '../logs/BotLogger.js';
import { RoleAuth } from '../roles/RoleAuth.js';
import { Router } from '../routing/Router.js';
import type { DocumentRouteRequest, ImageRouteRequest, RouteRequest } from '../routing/routes.js';
import { CATCH_ALL_PATTERN, CommandRoute, DocumentRoute, ImageRoute, MessageRoute } from '../routing/routes.js';
import { StateManager } from '../states/StateManager.js';
import { MemoryStorage } from '../storage/MemoryStorage.js';
import type { BotContext } from '../types/index.js';
import { StorageError } from '../utils/errorHandler.js';

const botInfo: UserFromGetMe = {
  id: 1,
  is_bot: true,
  first_name: 'Test',
  username: 'test_bot',
  can_join_groups: true,
  can_read_all_group_messages: false,
  supports_inline_queries: false
};

const telegram = new Telegram('test-token');

function chat(id: number): Chat.PrivateChat {
  return { id, type: 'private', first_name: 'Ann', username: 'ann' };
}

function textUpdate(text: string, chatId: number = 10): Update.MessageUpdate<Message.TextMessage> {
  return { update_id: 1, message: { message_id: 1, date: 0, chat: chat(chatId), text } };
}

function documentUpdate(chatId: number = 10): Update.MessageUpdate<Message.DocumentMessage> {
  return {
    update_id: 2,
    message: {
      message_id: 2,
      date: 0,
      chat: chat(chatId),
      caption: 'monthly',
      document: { file_id: 'doc-1', file_unique_id: 'u-doc-1', file_name: 'report.pdf', mime_type: 'application/pdf' }
    }
  };
}

function photoUpdate(chatId: number = 10): Update.MessageUpdate<Message.PhotoMessage> {
  return {
    update_id: 3,
    message: {
      message_id: 3,
      date: 0,
      chat: chat(chatId),
      photo: [
        { file_id: 'small', file_unique_id: 'u-small', width: 90, height: 90 },
        { file_id: 'large', file_unique_id: 'u-large', width: 800, height: 800 }
      ]
    }
  };
}

function contextFor(update: Update): BotContext {
  return new Context<Update>(update, telegram, botInfo);
}

describe('Router', () => {
  let storage: MemoryStorage;
  let logger: BotLogger;
  let router: Router;

  beforeEach(() => {
    vi.clearAllMocks();
    storage = new MemoryStorage({
      Users: [
        { _id: 10, State: 'free', Roles: ['user'] },
        { _id: 20, State: 'waiting', Roles: ['user', 'admin'] }
      ]
    });
    const states = new StateManager(storage, ['waiting']);
    const roles = new RoleAuth(storage, { user: { password: '' }, admin: { password: 'test-secret' } });
    logger = new BotLogger(storage, 'Logs', { now: () => 0 });
    router = new Router(states, roles, logger);
  });

  async function loggedEvents(): Promise<unknown[]> {
    return storage.getData('Logs', { columns: ['event', 'params'] });
  }

  describe('commands', () => {
    it('should call matching command routes only', async () => {
      const start = vi.fn();
      const other = vi.fn();
      const message = vi.fn();
      router.registerCommandRoute(new CommandRoute('start', start));
      router.registerCommandRoute(new CommandRoute('help', other));
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, message));

      const invoked = await router.dispatchText(contextFor(textUpdate('/start now')));

      expect(invoked).toBe(1);
      expect(start).toHaveBeenCalledTimes(1);
      expect(other).not.toHaveBeenCalled();
      expect(message).not.toHaveBeenCalled();
      expect(await loggedEvents()).toEqual([
        { event: 'Command received', params: { id: '10', command: 'start' } }
      ]);
    });

    it('should pass the sender and full text to the handler', async () => {
      const handler = vi.fn<[RouteRequest], void>();
      router.registerCommandRoute(new CommandRoute('start', handler));

      await router.dispatchText(contextFor(textUpdate('/start now')));

      const [request] = handler.mock.calls[0];
      expect(request.user).toEqual({ id: 10, username: 'ann', firstName: 'Ann', state: 'free', roles: ['user'] });
      expect(request.message).toBe('/start now');
    });

    it('should accept commands addressed to this bot', async () => {
      const start = vi.fn();
      router.registerCommandRoute(new CommandRoute('start', start));

      expect(await router.dispatchText(contextFor(textUpdate('/start@test_bot')))).toBe(1);
      expect(start).toHaveBeenCalledTimes(1);
    });

    it('should log but skip commands for other bots', async () => {
      const start = vi.fn();
      router.registerCommandRoute(new CommandRoute('start', start));

      expect(await router.dispatchText(contextFor(textUpdate('/start@other_bot')))).toBe(0);
      expect(start).not.toHaveBeenCalled();
      expect(await loggedEvents()).toEqual([
        { event: 'Command received', params: { id: '10', command: '/start@other_bot' } }
      ]);
    });

    it('should call every matching route in registration order', async () => {
      const calls: string[] = [];
      router.registerCommandRoute(new CommandRoute('start', () => {
        calls.push('first');
      }));
      router.registerCommandRoute(new CommandRoute('start', () => {
        calls.push('second');
      }));

      expect(await router.dispatchText(contextFor(textUpdate('/start')))).toBe(2);
      expect(calls).toEqual(['first', 'second']);
    });
  });

  describe('messages', () => {
    it('should call routes whose pattern covers the text', async () => {
      const greeting = vi.fn();
      const fallback = vi.fn();
      router.registerMessageRoute(new MessageRoute('hi|hello', greeting));
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, fallback));

      expect(await router.dispatchText(contextFor(textUpdate('hello there')))).toBe(1);
      expect(greeting).not.toHaveBeenCalled();
      expect(fallback).toHaveBeenCalledTimes(1);
      expect(await loggedEvents()).toEqual([
        { event: 'Message received', params: { id: '10', text: 'hello there' } }
      ]);
    });

    it('should honour state requirements', async () => {
      const waiting = vi.fn();
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, waiting, { states: ['waiting'] }));

      expect(await router.dispatchText(contextFor(textUpdate('Ann', 10)))).toBe(0);
      expect(await router.dispatchText(contextFor(textUpdate('Ann', 20)))).toBe(1);
    });

    it('should honour role requirements', async () => {
      const admin = vi.fn();
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, admin, { roles: ['admin'] }));

      expect(await router.dispatchText(contextFor(textUpdate('stats', 10)))).toBe(0);
      expect(await router.dispatchText(contextFor(textUpdate('stats', 20)))).toBe(1);
    });

    it('should give users without a record the default state and roles', async () => {
      const handler = vi.fn<[RouteRequest], void>();
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, handler, { states: ['free'], roles: ['user'] }));

      expect(await router.dispatchText(contextFor(textUpdate('hi', 99)))).toBe(1);
      expect(handler.mock.calls[0][0].user).toEqual({ id: 99, username: 'ann', firstName: 'Ann', state: 'free', roles: ['user'] });
    });

    it('should keep going when a handler fails', async () => {
      const after = vi.fn();
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, () => {
        throw new Error('boom');
      }));
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, after));

      expect(await router.dispatchText(contextFor(textUpdate('hi')))).toBe(2);
      expect(after).toHaveBeenCalledTimes(1);
      expect(await loggedEvents()).toEqual([
        { event: 'Message received', params: { id: '10', text: 'hi' } },
        { event: 'Route handler failed', params: { kind: 'message', id: '10', error: 'boom' } }
      ]);
    });

    it('should keep going when recording a handler failure fails too', async () => {
      const after = vi.fn();
      vi.spyOn(logger, 'logError').mockRejectedValue(new StorageError('db down'));
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, () => {
        throw new Error('boom');
      }));
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, after));

      expect(await router.dispatchText(contextFor(textUpdate('hi')))).toBe(2);
      expect(after).toHaveBeenCalledTimes(1);
      expect(LogEngine.error).toHaveBeenCalledWith('Failed to record route handler failure', {
        kind: 'message',
        userId: 10,
        error: 'db down'
      });
    });

    it('should ignore updates without text', async () => {
      const fallback = vi.fn();
      router.registerMessageRoute(new MessageRoute(CATCH_ALL_PATTERN, fallback));

      expect(await router.dispatchText(contextFor(photoUpdate()))).toBe(0);
      expect(fallback).not.toHaveBeenCalled();
    });
  });

  describe('documents', () => {
    it('should pass a link to the received document', async () => {
      const handler = vi.fn<[DocumentRouteRequest], void>();
      router.registerDocumentRoute(new DocumentRoute({ mimeTypes: ['application/pdf'] }, handler));
      router.registerDocumentRoute(new DocumentRoute({ fileNames: ['other.pdf'] }, vi.fn()));

      expect(await router.dispatchDocument(contextFor(documentUpdate()))).toBe(1);
      const [request] = handler.mock.calls[0];
      expect(request.message).toBe('monthly');
      expect(request.document.fileId).toBe('doc-1');
      expect(request.document.name).toBe('report.pdf');
      expect(await loggedEvents()).toEqual([
        { event: 'Document received', params: { id: '10', filename: 'report.pdf' } }
      ]);
    });
  });

  describe('images', () => {
    it('should pass every photo size', async () => {
      const handler = vi.fn<[ImageRouteRequest], void>();
      router.registerImageRoute(new ImageRoute(handler));

      expect(await router.dispatchImage(contextFor(photoUpdate()))).toBe(1);
      const [request] = handler.mock.calls[0];
      expect(request.images.map(image => image.fileId)).toEqual(['small', 'large']);
      expect(request.message).toBe('');
      expect(await loggedEvents()).toEqual([
        { event: 'Image received', params: { id: '10', sizes: '2' } }
      ]);
    });
  });

  describe('attach', () => {
    it('should install one handler per update kind once', () => {
      const bot = new Telegraf<BotContext>('test-token');
      const on = vi.spyOn(bot, 'on');

      router.attach(bot);
      router.attach(bot);

      expect(on).toHaveBeenCalledTimes(3);
      expect(on.mock.calls.map(call => call[0])).toEqual(['text', 'document', 'photo']);
    });

    it('should route updates handled by the bot', async () => {
      const bot = new Telegraf<BotContext>('test-token');
      bot.botInfo = botInfo;
      const start = vi.fn();
      router.registerCommandRoute(new CommandRoute('start', start));
      router.attach(bot);

      await bot.handleUpdate(textUpdate('/start'));

      expect(start).toHaveBeenCalledTimes(1);
      expect(router.routeCount).toBe(1);
    });
  });
});
