/**
 * Routes
 *
 * A route pairs a handler with the states and roles allowed to reach it, plus
 * the trigger for its update kind.
 *
 * @since 2025
 */
import type { BotContext } from '../types/index.js';
import type { BotUser, DocumentLink } from './models.js';

export interface RouteRequest {
  user: BotUser;
  /** Text or caption of the received message; empty when there is none */
  message: string;
  ctx: BotContext;
}

export interface DocumentRouteRequest extends RouteRequest {
  document: DocumentLink;
}

export interface ImageRouteRequest extends RouteRequest {
  /** Every size Telegram offers for the photo, smallest first */
  images: DocumentLink[];
}

export type RouteHandler<TRequest extends RouteRequest = RouteRequest> =
  (request: TRequest) => void | Promise<void>;

export interface RouteAccess {
  /** States the user may be in; any state when empty */
  states?: string[];
  /** Roles of which the user needs one; any user when empty */
  roles?: string[];
}

export abstract class Route<TRequest extends RouteRequest = RouteRequest> {
  readonly states: readonly string[];
  readonly roles: readonly string[];

  constructor(readonly callback: RouteHandler<TRequest>, access: RouteAccess = {}) {
    this.states = [...(access.states ?? [])];
    this.roles = [...(access.roles ?? [])];
  }

  isAccessibleWith(state: string, roles: readonly string[]): boolean {
    if (this.states.length > 0 && !this.states.includes(state)) {
      return false;
    }
    if (this.roles.length === 0) {
      return true;
    }
    return this.roles.some(role => roles.includes(role));
  }
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?$/;

/**
 * Command name of a `/command` or `/command@botname` first word, lower-cased.
 * `null` when the text is not a command, or names another bot.
 */
export function parseCommand(text: string, botUsername?: string): string | null {
  const [firstWord = ''] = text.trim().split(/\s+/, 1);
  const match = COMMAND_PATTERN.exec(firstWord);
  if (!match) {
    return null;
  }
  const [, command, addressee] = match;
  if (addressee && botUsername && addressee.toLowerCase() !== botUsername.toLowerCase()) {
    return null;
  }
  return command.toLowerCase();
}

export class CommandRoute extends Route {
  readonly command: string;

  constructor(command: string, callback: RouteHandler, access: RouteAccess = {}) {
    super(callback, access);
    this.command = command.replace(/^\//, '').toLowerCase();
  }

  matches(command: string): boolean {
    return this.command === command;
  }
}

/**
 * Matches when the pattern covers the whole text
 */
export class MessageRoute extends Route {
  readonly pattern: string;
  private readonly regex: RegExp;

  constructor(pattern: string, callback: RouteHandler, access: RouteAccess = {}) {
    super(callback, access);
    this.pattern = pattern;
    this.regex = new RegExp(`^(?:${pattern})$`);
  }

  matches(text: string): boolean {
    return this.regex.test(text);
  }
}

/** Matches any text, including empty and multi-line */
export const CATCH_ALL_PATTERN = '[\\s\\S]*';

export interface DocumentFilterOptions {
  /** Accepted file names; any name when empty */
  fileNames?: string[];
  /** Accepted MIME types; any type when empty */
  mimeTypes?: string[];
}

export class DocumentRoute extends Route<DocumentRouteRequest> {
  readonly fileNames: readonly string[];
  readonly mimeTypes: readonly string[];

  constructor(filter: DocumentFilterOptions, callback: RouteHandler<DocumentRouteRequest>, access: RouteAccess = {}) {
    super(callback, access);
    this.fileNames = [...(filter.fileNames ?? [])];
    this.mimeTypes = [...(filter.mimeTypes ?? [])];
  }

  matches(fileName: string | undefined, mimeType: string | undefined): boolean {
    if (this.fileNames.length > 0 && (fileName === undefined || !this.fileNames.includes(fileName))) {
      return false;
    }
    if (this.mimeTypes.length > 0 && (mimeType === undefined || !this.mimeTypes.includes(mimeType))) {
      return false;
    }
    return true;
  }
}

export class ImageRoute extends Route<ImageRouteRequest> {}
