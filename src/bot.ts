/**
 * Core Bot Utilities - Bot lifecycle
 *
 * Key Features:
 * - Bot instance creation
 * - Long polling start and stop with logged failures
 * - Last-resort handler for errors escaping the middleware chain
 *
 * @since 2025
 */
import { Telegraf } from 'telegraf';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { BotContext } from './types/index.js';
import { TelegramFailure, classifyTelegramError, getErrorMessage, isTelegramError } from './utils/errorHandler.js';

/**
 * Creates a new Telegraf bot instance
 *
 * @param token - Telegram Bot API token
 * @returns Initialized bot instance
 */
export function createBot(token: string): Telegraf<BotContext> {
    if (!token) {
        throw new Error('Telegram bot token is required');
    }
    const bot = new Telegraf<BotContext>(token);
    bot.catch(handleBotError);
    return bot;
}

/**
 * Starts bot polling to receive Telegram updates.
 *
 * Polling runs in the background; a launch or polling failure is logged and passed to `onStopped`.
 */
export function startPolling(bot: Telegraf<BotContext>, onStopped?: (error: unknown) => void): void {
    bot.launch().catch((error: unknown) => {
        LogEngine.error('Bot polling stopped with an error', {
            error: getErrorMessage(error)
        });
        onStopped?.(error);
    });
}

export function stopPolling(bot: Telegraf<BotContext>, reason: string = 'stop'): void {
    try {
        bot.stop(reason);
    } catch (error) {
        // Telegraf throws when the bot was never launched
        LogEngine.warn('Bot polling was not running', {
            reason,
            error: getErrorMessage(error)
        });
    }
}

/**
 * Global error handler for errors raised while processing an update.
 *
 * Telegram delivery failures (blocked bot, missing chat, rate limit) are logged
 * as warnings; everything else as an error. Never rethrows, so one bad update
 * does not stop polling.
 */
export function handleBotError(error: unknown, ctx?: BotContext): void {
    const failure = classifyTelegramError(error);
    const context = {
        chatId: ctx?.chat?.id,
        userId: ctx?.from?.id,
        errorCode: isTelegramError(error) ? error.response?.error_code : undefined,
        description: isTelegramError(error) ? error.response?.description : undefined
    };

    if (failure === TelegramFailure.OTHER) {
        LogEngine.error('Telegram Bot Error', {
            ...context,
            error: getErrorMessage(error),
            stack: error instanceof Error ? error.stack : undefined
        });
        return;
    }

    LogEngine.warn(`Telegram delivery failed: ${failure}`, context);
}
