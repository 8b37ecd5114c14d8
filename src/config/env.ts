/**
 * Environment Configuration
 *
 * Reads the bot token and storage connection parameters from the process
 * environment (and a `.env` file, when present).
 *
 * Environment Variables:
 * - TELEGRAM_BOT_TOKEN: Telegram Bot API token (from @BotFather)
 * - MONGO_ADDRESS, MONGO_PORT, MONGO_USERNAME, MONGO_PASSWORD, MONGO_DATABASE: MongoDB storage
 * - STORAGE_FOLDER: local JSON storage folder, used when the MongoDB variables are incomplete
 * - LOCALES_FOLDER: folder of locale files
 * - NODE_ENV, LOG_LEVEL: process logging
 *
 * @since 2025
 */
import dotenv from 'dotenv';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { StorageConfig } from '../storage/Storage.js';
import { InitError } from '../utils/errorHandler.js';

dotenv.config();

const PLACEHOLDER_VALUES = [
    'your_token_here',
    'replace_with_your_token',
    'bot_token_from_botfather',
    'your_telegram_bot_token'
];

// numeric_bot_id:secret, e.g. 123456:ABCdefGHIjklMNOpqrsTUVwxyz-1234567890
const TELEGRAM_TOKEN_PATTERN = /^\d{6,10}:[A-Za-z0-9_-]{35,}$/;

/**
 * Get environment variable with optional default
 */
export function getEnvVar(key: string, defaultValue: string = ''): string {
    return process.env[key] || defaultValue;
}

/**
 * Check if running in production
 */
export function isProduction(): boolean {
    return process.env.NODE_ENV === 'production';
}

/**
 * Determines whether the application is running in development mode.
 *
 * Unset NODE_ENV counts as development.
 */
export function isDevelopment(): boolean {
    return !process.env.NODE_ENV || process.env.NODE_ENV === 'development';
}

/**
 * Returns `TELEGRAM_BOT_TOKEN` after checking it is set, is not a placeholder and has the BotFather format
 *
 * @throws InitError when the token is missing or malformed
 */
export function getBotToken(): string {
    const token = getEnvVar('TELEGRAM_BOT_TOKEN');
    if (!token) {
        throw new InitError('TELEGRAM_BOT_TOKEN is not set. Message @BotFather on Telegram and create a bot with /newbot');
    }

    if (PLACEHOLDER_VALUES.some(placeholder => token.toLowerCase().includes(placeholder))) {
        throw new InitError('TELEGRAM_BOT_TOKEN contains placeholder values. Please replace with actual credentials.');
    }

    if (!TELEGRAM_TOKEN_PATTERN.test(token)) {
        throw new InitError(
            'TELEGRAM_BOT_TOKEN format is invalid. Expected format: NNNNNN:XXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXXX'
        );
    }

    return token;
}

const MONGO_ENV_VARS = ['MONGO_ADDRESS', 'MONGO_PORT', 'MONGO_USERNAME', 'MONGO_PASSWORD', 'MONGO_DATABASE'] as const;

/**
 * Builds the storage configuration from the environment.
 *
 * All MongoDB variables set: MongoDB storage. Otherwise `STORAGE_FOLDER`: local JSON storage.
 *
 * @throws InitError when neither is configured or `MONGO_PORT` is not a port number
 */
export function getStorageConfigFromEnv(): StorageConfig {
    const missing = MONGO_ENV_VARS.filter(name => !getEnvVar(name));

    if (missing.length === 0) {
        const port = Number(getEnvVar('MONGO_PORT'));
        if (!Number.isInteger(port) || port < 1 || port > 65535) {
            throw new InitError(`MONGO_PORT must be a port number, got "${getEnvVar('MONGO_PORT')}"`);
        }
        return {
            address: getEnvVar('MONGO_ADDRESS'),
            port,
            username: getEnvVar('MONGO_USERNAME'),
            password: getEnvVar('MONGO_PASSWORD'),
            database: getEnvVar('MONGO_DATABASE')
        };
    }

    const storageFolder = getEnvVar('STORAGE_FOLDER');
    if (storageFolder) {
        if (missing.length < MONGO_ENV_VARS.length) {
            LogEngine.warn('Incomplete MongoDB configuration, using local JSON storage', {
                missingVariables: missing,
                storageFolder
            });
        }
        return { storageFolder };
    }

    throw new InitError('Could not initialize storage class', {
        context: { missingVariables: missing }
    });
}
