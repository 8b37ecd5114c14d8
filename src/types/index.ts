/**
 * Core Type Definitions
 *
 * Shared types for the storage adapter, role and state systems, user metadata
 * and the persisted bot log.
 *
 * @since 2025
 */
import type { Context } from 'telegraf';
import type { Update, UserFromGetMe } from 'telegraf/types';

// Bot context extensions - extending the base context
export interface BotContext extends Context<Update> {
  botInfo: UserFromGetMe;
}

// Error types
export interface TelegramError extends Error {
  response?: {
    error_code: number;
    description: string;
    parameters?: {
      retry_after?: number;
    };
  };
  on?: {
    method: string;
    payload: unknown;
  };
}

/**
 * A stored document. Field values are whatever JSON (or BSON) can hold.
 */
export type StorageDocument = Record<string, unknown>;

/**
 * Comparison operators accepted on a single field of a filter.
 */
export interface FieldOperators {
  $lt?: number | string;
  $lte?: number | string;
  $gt?: number | string;
  $gte?: number | string;
  $ne?: unknown;
  $in?: unknown[];
}

/**
 * Field -> exact value or operator object.
 */
export type DocumentFilter = Record<string, unknown>;

export interface QueryOptions {
  /** Fields to keep; every field when empty */
  columns?: string[];
  filter?: DocumentFilter;
  /** Maximum number of documents; unlimited when 0 or absent */
  count?: number;
}

export type ColumnQueryOptions = Omit<QueryOptions, 'filter'>;

// Role system
export interface RoleDefinition {
  password: string;
}

export type RoleMap = Record<string, RoleDefinition>;

// State system
export type StateParams = Record<string, unknown>;

/**
 * Users collection record with the default column names.
 */
export interface UserRecord {
  _id: number;
  Roles?: string[];
  State?: string;
  State_Params?: StateParams;
  Username?: string;
  First_Name?: string;
  Last_Name?: string;
  Locale?: string;
  [column: string]: unknown;
}

// Persisted bot log
export const LOG_LEVELS = {
  DEBUG: 1,
  INFO: 2,
  WARNING: 3,
  ERROR: 4,
  CRITICAL: 5
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export interface LogEntry {
  time: number;
  level: LogLevel;
  event: string;
  params?: Record<string, string>;
}
