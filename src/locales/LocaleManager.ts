/**
 * Locale Storage
 *
 * Per-language replies, keyboards and free-form values loaded once from a folder
 * of JSON files, one file per locale:
 *
 * ```json
 * {
 *   "code": "en",
 *   "replies": { "simple": { "hello": "Hi!" }, "format": { "welcome": "Welcome, {name}!" } },
 *   "keyboards": {
 *     "buttons": { "yes": "Yes", "no": "No" },
 *     "arrangements": { "confirm": [["yes", "no"]] }
 *   },
 *   "other": { "currency": "USD" }
 * }
 * ```
 *
 * @since 2025
 */
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { LogEngine } from '@wgtechlabs/log-engine';
import { LocaleError, getErrorMessage } from '../utils/errorHandler.js';

const LocaleSchema = z.object({
  code: z.string().min(1),
  replies: z.object({
    simple: z.record(z.string()).default({}),
    format: z.record(z.string()).default({})
  }).default({}),
  keyboards: z.object({
    buttons: z.record(z.string()).default({}),
    arrangements: z.record(z.array(z.array(z.string()))).default({})
  }).default({}),
  other: z.record(z.unknown()).default({})
});

export type LocaleData = z.infer<typeof LocaleSchema>;

export interface LocaleManagerOptions {
  /** Locale used when a lookup names a locale that was not loaded */
  defaultLocale?: string;
}

const PLACEHOLDER_PATTERN = /\{(\w+)\}/g;

/**
 * Replaces `{key}` placeholders with the matching values; unknown placeholders stay as written
 */
export function fillTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(PLACEHOLDER_PATTERN, (placeholder: string, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? String(values[key]) : placeholder);
}

export class LocaleManager {
  private readonly locales: ReadonlyMap<string, LocaleData>;
  private readonly defaultLocale: string | undefined;

  constructor(locales: LocaleData[], options: LocaleManagerOptions = {}) {
    const byCode = new Map<string, LocaleData>();
    for (const locale of locales) {
      if (byCode.has(locale.code)) {
        throw new LocaleError(`Duplicate locale code: ${locale.code}`, { context: { code: locale.code } });
      }
      byCode.set(locale.code, locale);
    }

    if (options.defaultLocale !== undefined && !byCode.has(options.defaultLocale)) {
      throw new LocaleError(`Default locale ${options.defaultLocale} was not loaded`, {
        context: { defaultLocale: options.defaultLocale, loaded: [...byCode.keys()] }
      });
    }

    this.locales = byCode;
    this.defaultLocale = options.defaultLocale;
  }

  /**
   * Reads and validates every `*.json` file directly inside the folder
   */
  static async load(localesFolder: string, options: LocaleManagerOptions = {}): Promise<LocaleManager> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(localesFolder, { withFileTypes: true });
    } catch (error) {
      throw new LocaleError(`Locales folder ${localesFolder} cannot be read`, {
        context: { localesFolder },
        cause: error
      });
    }

    const files = entries
      .filter(entry => entry.isFile() && entry.name.endsWith('.json'))
      .map(entry => path.join(localesFolder, entry.name))
      .sort();

    const locales: LocaleData[] = [];
    for (const file of files) {
      locales.push(await LocaleManager.readLocaleFile(file));
    }

    const manager = new LocaleManager(locales, options);
    LogEngine.info('Locales loaded', {
      folder: localesFolder,
      locales: manager.getLocaleCodes()
    });
    return manager;
  }

  static parseLocale(data: unknown, source: string = 'locale'): LocaleData {
    const result = LocaleSchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new LocaleError(`Invalid locale file ${source}: ${issues.join('; ')}`, {
        context: { source, issues }
      });
    }
    return result.data;
  }

  private static async readLocaleFile(file: string): Promise<LocaleData> {
    let data: unknown;
    try {
      data = JSON.parse(await fs.promises.readFile(file, 'utf8'));
    } catch (error) {
      LogEngine.error('Failed to read locale file', { file, error: getErrorMessage(error) });
      throw new LocaleError(`Invalid locale file ${file}: ${getErrorMessage(error)}`, {
        context: { file },
        cause: error
      });
    }
    return LocaleManager.parseLocale(data, file);
  }

  getLocaleCodes(): string[] {
    return [...this.locales.keys()];
  }

  hasLocale(code: string): boolean {
    return this.locales.has(code);
  }

  getSimpleReply(name: string, locale: string): string {
    return this.lookup(this.resolve(locale).replies.simple, name, locale, 'replies.simple');
  }

  getFormatReply(name: string, locale: string): string {
    return this.lookup(this.resolve(locale).replies.format, name, locale, 'replies.format');
  }

  /**
   * A format reply with its `{key}` placeholders filled in
   */
  formatReply(name: string, locale: string, values: Record<string, string | number>): string {
    return fillTemplate(this.getFormatReply(name, locale), values);
  }

  getKeyboardButton(button: string, locale: string): string {
    return this.lookup(this.resolve(locale).keyboards.buttons, button, locale, 'keyboards.buttons');
  }

  /**
   * Rows of button labels for the named arrangement
   */
  getKeyboard(name: string, locale: string): string[][] {
    const arrangement = this.lookup(this.resolve(locale).keyboards.arrangements, name, locale, 'keyboards.arrangements');
    return arrangement.map(row => row.map(button => this.getKeyboardButton(button, locale)));
  }

  getOther(name: string, locale: string): unknown {
    return this.lookup(this.resolve(locale).other, name, locale, 'other');
  }

  private resolve(code: string): LocaleData {
    const locale = this.locales.get(code) ?? (this.defaultLocale === undefined ? undefined : this.locales.get(this.defaultLocale));
    if (!locale) {
      throw new LocaleError(`Locale ${code} is not loaded`, { context: { locale: code } });
    }
    return locale;
  }

  private lookup<T>(section: Record<string, T>, key: string, locale: string, sectionPath: string): T {
    if (!Object.prototype.hasOwnProperty.call(section, key)) {
      throw new LocaleError(`Missing ${sectionPath}.${key} for locale ${locale}`, {
        context: { locale, key, section: sectionPath }
      });
    }
    return section[key];
  }
}
