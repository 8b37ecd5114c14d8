/**
 * Bot Configuration Schema
 *
 * Validates the configuration object handed to `createBotServices` and
 * `TelegramBot`, filling in collection and folder defaults.
 *
 * @since 2025
 */
import { z } from 'zod';
import { InitError } from '../utils/errorHandler.js';

const MongoStorageSchema = z.object({
  address: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
  username: z.string().min(1),
  password: z.string().min(1),
  database: z.string().min(1)
});

const LocalStorageSchema = z.object({
  storageFolder: z.string().min(1)
});

const BotLevelSchema = z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']);

export const BotConfigSchema = z.object({
  token: z.string().min(1, 'Telegram bot token is required'),
  roles: z.record(z.object({ password: z.string() }))
    .refine(roles => Object.keys(roles).length > 0, 'At least one role is required'),
  states: z.array(z.string().min(1)).min(1, 'At least one state is required'),
  freeState: z.string().min(1).default('free'),
  stateWithParams: z.boolean().default(false),
  usersCollection: z.string().min(1).default('Users'),
  logsCollection: z.string().min(1).default('Logs'),
  localesFolder: z.string().min(1).default('Locales'),
  defaultLocale: z.string().min(1).optional(),
  logLevel: BotLevelSchema.default('INFO'),
  storage: z.union([MongoStorageSchema, LocalStorageSchema])
});

/** Configuration as written by the caller */
export type BotConfigInput = z.input<typeof BotConfigSchema>;

/** Configuration with defaults applied */
export type BotConfig = z.output<typeof BotConfigSchema>;

/**
 * @throws InitError listing every invalid field
 */
export function parseBotConfig(config: unknown): BotConfig {
  const result = BotConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new InitError(`Invalid bot configuration: ${issues.join('; ')}`, {
      context: { issues }
    });
  }
  return result.data;
}
