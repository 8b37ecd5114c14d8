/**
 * Message Sender - outgoing text and documents with safe error handling
 *
 * Key Features:
 * - Reply keyboards built from rows of button labels
 * - Every delivered message recorded through the bot logger
 * - Blocked users, vanished chats and rate limits logged and skipped
 *
 * @since 2025
 */
import path from 'path';
import type { Telegram } from 'telegraf';
import type { Message, ParseMode, ReplyKeyboardMarkup, ReplyKeyboardRemove } from 'telegraf/types';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { BotLogger } from '../logs/BotLogger.js';
import { TelegramFailure, classifyTelegramError, getErrorMessage, isTelegramError } from '../utils/errorHandler.js';

export type MessageTransport = Pick<Telegram, 'sendMessage' | 'sendDocument'>;

export interface SendTextOptions {
    /** Rows of button labels */
    replyKeyboard?: string[][];
    resizeKeyboard?: boolean;
    /** Hide the keyboard after use; without a keyboard, remove the one shown */
    oneTimeKeyboard?: boolean;
    parseMode?: ParseMode;
}

export type OutgoingDocument =
    | { path: string; filename?: string }
    | { buffer: Buffer; filename: string }
    | { fileId: string; filename?: string };

export interface SendDocumentOptions {
    caption?: string;
    parseMode?: ParseMode;
}

type DocumentInput = Parameters<Telegram['sendDocument']>[1];

/**
 * Reply markup for `sendText`: a keyboard when one is given, a keyboard removal
 * when none is given and `oneTime` is set, nothing otherwise
 */
export function buildReplyMarkup(
    replyKeyboard: string[][] | undefined,
    resize: boolean,
    oneTime: boolean
): ReplyKeyboardMarkup | ReplyKeyboardRemove | undefined {
    if (replyKeyboard) {
        return {
            keyboard: replyKeyboard.map(row => row.map(text => ({ text }))),
            resize_keyboard: resize,
            one_time_keyboard: oneTime
        };
    }
    return oneTime ? { remove_keyboard: true } : undefined;
}

function toDocumentInput(document: OutgoingDocument): { input: DocumentInput; filename: string } {
    if ('path' in document) {
        const filename = document.filename ?? path.basename(document.path);
        return { input: { source: document.path, filename }, filename };
    }
    if ('buffer' in document) {
        return { input: { source: document.buffer, filename: document.filename }, filename: document.filename };
    }
    return { input: document.fileId, filename: document.filename ?? document.fileId };
}

export class MessageSender {
    constructor(
        private readonly telegram: MessageTransport,
        private readonly logger: BotLogger
    ) {}

    /**
     * Sends a text message
     *
     * @returns the sent message, or `null` when the chat cannot be reached right now
     */
    async sendText(userId: number, text: string, options: SendTextOptions = {}): Promise<Message.TextMessage | null> {
        const { replyKeyboard, resizeKeyboard = true, oneTimeKeyboard = true, parseMode } = options;
        const replyMarkup = buildReplyMarkup(replyKeyboard, resizeKeyboard, oneTimeKeyboard);

        let sent: Message.TextMessage;
        try {
            sent = await this.telegram.sendMessage(userId, text, {
                ...(replyMarkup ? { reply_markup: replyMarkup } : {}),
                ...(parseMode ? { parse_mode: parseMode } : {})
            });
        } catch (error) {
            return this.handleSendError(error, 'message', userId, { textLength: text.length });
        }
        await this.logger.logSendMsg(userId, text);
        return sent;
    }

    /**
     * Sends a file from disk, from memory or by Telegram file id
     *
     * @returns the sent message, or `null` when the chat cannot be reached right now
     */
    async sendDocument(
        userId: number,
        document: OutgoingDocument,
        options: SendDocumentOptions = {}
    ): Promise<Message.DocumentMessage | null> {
        const { input, filename } = toDocumentInput(document);

        let sent: Message.DocumentMessage;
        try {
            sent = await this.telegram.sendDocument(userId, input, {
                ...(options.caption !== undefined ? { caption: options.caption } : {}),
                ...(options.parseMode ? { parse_mode: options.parseMode } : {})
            });
        } catch (error) {
            return this.handleSendError(error, 'document', userId, { filename });
        }
        await this.logger.logSendDocument(userId, filename);
        return sent;
    }

    private async handleSendError(
        error: unknown,
        kind: 'message' | 'document',
        userId: number,
        details: Record<string, unknown>
    ): Promise<null> {
        const failure = classifyTelegramError(error);

        if (failure === TelegramFailure.BLOCKED) {
            LogEngine.warn(`Bot was blocked by user - ${kind} not sent`, { chatId: userId, ...details });
            return null;
        }
        if (failure === TelegramFailure.CHAT_NOT_FOUND) {
            LogEngine.warn(`Chat not found - ${kind} not sent`, { chatId: userId, ...details });
            return null;
        }
        if (failure === TelegramFailure.RATE_LIMITED) {
            LogEngine.warn(`Rate limit exceeded - ${kind} not sent`, {
                chatId: userId,
                retryAfter: isTelegramError(error) ? error.response?.parameters?.retry_after : undefined,
                ...details
            });
            return null;
        }

        LogEngine.error(`Error sending ${kind}`, {
            error: getErrorMessage(error),
            chatId: userId,
            ...details
        });
        await this.logger.logError(`Failed to send ${kind}`, { id: userId, error });
        throw error;
    }
}
