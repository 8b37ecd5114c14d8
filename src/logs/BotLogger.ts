/**
 * Bot Logger
 *
 * Append-only log of received and sent traffic, written through the storage
 * adapter into a logs collection. Each written entry is mirrored to LogEngine.
 *
 * @since 2025
 */
import { LogEngine } from '@wgtechlabs/log-engine';
import type { Storage } from '../storage/Storage.js';
import { LOG_LEVELS, type LogEntry, type LogLevel } from '../types/index.js';
import { WrongLogLevelError } from '../utils/errorHandler.js';

export interface BotLoggerOptions {
  /** Clock in epoch milliseconds */
  now?: () => number;
  level?: LogLevel;
  /** Cut multi-line parameter values to their first line */
  shortParams?: boolean;
}

export type LogParams = Record<string, unknown>;

const TRUNCATION_MARK = ' <...>';

export function isLogLevel(level: string): level is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, level);
}

/**
 * Stringifies a parameter value, keeping only the first line of multi-line text when `short` is set
 */
export function formatLogParam(value: unknown, short: boolean): string {
  let text: string;
  if (typeof value === 'string') {
    text = value;
  } else if (value === undefined) {
    text = 'undefined';
  } else if (value instanceof Error) {
    text = value.message;
  } else if (typeof value === 'object' && value !== null) {
    text = JSON.stringify(value);
  } else {
    text = String(value);
  }

  if (!short) {
    return text;
  }
  const lineBreak = text.indexOf('\n');
  return lineBreak === -1 ? text : `${text.slice(0, lineBreak)}${TRUNCATION_MARK}`;
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every(item => typeof item === 'string');
}

function isLogEntry(document: Record<string, unknown>): document is Record<string, unknown> & LogEntry {
  return typeof document.time === 'number'
    && typeof document.event === 'string'
    && typeof document.level === 'string'
    && isLogLevel(document.level)
    && (document.params === undefined || isStringRecord(document.params));
}

export class BotLogger {
  private readonly now: () => number;
  private readonly shortParams: boolean;
  private level: LogLevel;

  constructor(
    private readonly storage: Storage,
    private readonly collection: string,
    options: BotLoggerOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.shortParams = options.shortParams ?? true;
    this.level = options.level ?? 'INFO';
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: string): void {
    if (!isLogLevel(level)) {
      throw new WrongLogLevelError(level);
    }
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  /**
   * Writes one entry unless `level` is below the current level
   *
   * @returns whether the entry was written
   */
  async log(level: LogLevel, event: string, params?: LogParams): Promise<boolean> {
    if (!this.isEnabled(level)) {
      return false;
    }

    const entry: LogEntry = { time: this.now(), level, event };
    if (params !== undefined) {
      entry.params = Object.fromEntries(
        Object.entries(params).map(([key, value]) => [key, formatLogParam(value, this.shortParams)])
      );
    }

    await this.storage.insertOne(this.collection, { ...entry });
    this.mirror(entry);
    return true;
  }

  async logError(event: string, params?: LogParams): Promise<void> {
    await this.log('ERROR', event, params);
  }

  async logReceiveCommand(userId: number, command: string): Promise<void> {
    await this.log('INFO', 'Command received', { id: userId, command });
  }

  async logReceiveDocument(userId: number, filename: string): Promise<void> {
    await this.log('INFO', 'Document received', { id: userId, filename });
  }

  async logReceiveMsg(userId: number, text: string): Promise<void> {
    await this.log('INFO', 'Message received', { id: userId, text });
  }

  async logReceiveImage(userId: number, sizes: number): Promise<void> {
    await this.log('INFO', 'Image received', { id: userId, sizes });
  }

  async logSendDocument(userId: number, filename: string): Promise<void> {
    await this.log('INFO', 'Document sent', { id: userId, filename });
  }

  async logSendMsg(userId: number, text: string): Promise<void> {
    await this.log('INFO', 'Message sent', { id: userId, text });
  }

  async logStart(): Promise<void> {
    await this.log('INFO', 'Bot started');
  }

  async logStop(): Promise<void> {
    await this.log('INFO', 'Bot stopped');
  }

  /**
   * Removes entries at least `minAgeMs` old
   *
   * @returns the number of removed entries
   */
  async cleanOld(minAgeMs: number): Promise<number> {
    const removed = await this.storage.removeManyByFilter(this.collection, {
      time: { $lte: this.now() - minAgeMs }
    });
    await this.log('INFO', 'Old logs cleaned', { removed });
    return removed;
  }

  /**
   * The last `count` entries, oldest first
   */
  async dumpLast(count: number): Promise<LogEntry[]> {
    if (count <= 0) {
      return [];
    }
    const documents = await this.storage.getData(this.collection);
    return documents
      .filter(isLogEntry)
      .slice(-count)
      .map((document): LogEntry => {
        const entry: LogEntry = { time: document.time, level: document.level, event: document.event };
        if (document.params !== undefined) {
          entry.params = document.params;
        }
        return entry;
      });
  }

  private mirror(entry: LogEntry): void {
    const context = { collection: this.collection, ...entry.params };
    switch (entry.level) {
      case 'DEBUG':
        LogEngine.debug(entry.event, context);
        break;
      case 'INFO':
        LogEngine.info(entry.event, context);
        break;
      case 'WARNING':
        LogEngine.warn(entry.event, context);
        break;
      default:
        LogEngine.error(entry.event, context);
    }
  }
}
