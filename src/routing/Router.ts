/**
 * Router
 *
 * Dispatches incoming text, document and photo messages to every registered
 * route whose trigger matches and whose state and role requirements the sender
 * meets. One Telegraf handler is installed per update kind; routes registered
 * later are picked up on the next update.
 *
 * @since 2025
 */
import type { Telegraf } from 'telegraf';
import { LogEngine } from '@wgtechlabs/log-engine';
import type { BotLogger } from '../logs/BotLogger.js';
import type { RoleAuth } from '../roles/RoleAuth.js';
import type { StateManager } from '../states/StateManager.js';
import type { BotContext } from '../types/index.js';
import { RoleError, StateError, getErrorMessage } from '../utils/errorHandler.js';
import { ConditionalLogger } from '../utils/logConfig.js';
import { DocumentLink, identityFromChat, type BotUser, type BotUserIdentity } from './models.js';
import {
  CommandRoute,
  DocumentRoute,
  ImageRoute,
  MessageRoute,
  parseCommand,
  type Route,
  type RouteRequest
} from './routes.js';

export interface RouterOptions {
  /** State assumed for users without a record */
  defaultState?: string;
  /** Roles assumed for users without a record */
  defaultRoles?: string[];
}

export class Router {
  private readonly commandRoutes: CommandRoute[] = [];
  private readonly messageRoutes: MessageRoute[] = [];
  private readonly documentRoutes: DocumentRoute[] = [];
  private readonly imageRoutes: ImageRoute[] = [];
  private readonly defaultState: string;
  private readonly defaultRoles: readonly string[];
  private attached = false;

  constructor(
    private readonly stateManager: StateManager,
    private readonly roleAuth: RoleAuth,
    private readonly logger: BotLogger,
    options: RouterOptions = {}
  ) {
    this.defaultState = options.defaultState ?? 'free';
    this.defaultRoles = [...(options.defaultRoles ?? ['user'])];
  }

  registerCommandRoute(route: CommandRoute): void {
    this.commandRoutes.push(route);
  }

  registerMessageRoute(route: MessageRoute): void {
    this.messageRoutes.push(route);
  }

  registerDocumentRoute(route: DocumentRoute): void {
    this.documentRoutes.push(route);
  }

  registerImageRoute(route: ImageRoute): void {
    this.imageRoutes.push(route);
  }

  get routeCount(): number {
    return this.commandRoutes.length + this.messageRoutes.length + this.documentRoutes.length + this.imageRoutes.length;
  }

  /**
   * Installs the text, document and photo handlers. Calling it again is a no-op.
   */
  attach(telegraf: Telegraf<BotContext>): void {
    if (this.attached) {
      return;
    }
    this.attached = true;

    telegraf.on('text', async ctx => {
      await this.dispatchText(ctx);
    });
    telegraf.on('document', async ctx => {
      await this.dispatchDocument(ctx);
    });
    telegraf.on('photo', async ctx => {
      await this.dispatchImage(ctx);
    });

    LogEngine.debug('Router attached', { routes: this.routeCount });
  }

  /**
   * @returns the number of handlers invoked
   */
  async dispatchText(ctx: BotContext): Promise<number> {
    const message = ctx.message;
    if (!message || !('text' in message) || !ctx.chat) {
      return 0;
    }

    const text = message.text;
    const user = await this.resolveUser(identityFromChat(ctx.chat));

    if (text.startsWith('/')) {
      const command = parseCommand(text, ctx.botInfo?.username);
      await this.logger.logReceiveCommand(user.id, command ?? text.split(/\s+/, 1)[0]);
      if (command === null) {
        return 0;
      }
      const routes = this.commandRoutes.filter(route =>
        route.matches(command) && route.isAccessibleWith(user.state, user.roles));
      ConditionalLogger.logRouting('command', { userId: user.id, command, routes: routes.length });
      return this.invoke(routes, { user, message: text, ctx }, 'command');
    }

    await this.logger.logReceiveMsg(user.id, text);
    const routes = this.messageRoutes.filter(route =>
      route.matches(text) && route.isAccessibleWith(user.state, user.roles));
    ConditionalLogger.logRouting('message', { userId: user.id, routes: routes.length });
    return this.invoke(routes, { user, message: text, ctx }, 'message');
  }

  async dispatchDocument(ctx: BotContext): Promise<number> {
    const message = ctx.message;
    if (!message || !('document' in message) || !ctx.chat) {
      return 0;
    }

    const user = await this.resolveUser(identityFromChat(ctx.chat));
    const document = DocumentLink.fromDocument(ctx.telegram, message.document, message.media_group_id);
    await this.logger.logReceiveDocument(user.id, document.name ?? document.fileId);

    const routes = this.documentRoutes.filter(route =>
      route.matches(document.name, document.mimeType) && route.isAccessibleWith(user.state, user.roles));
    ConditionalLogger.logRouting('document', { userId: user.id, routes: routes.length });
    return this.invoke(routes, { user, message: message.caption ?? '', ctx, document }, 'document');
  }

  async dispatchImage(ctx: BotContext): Promise<number> {
    const message = ctx.message;
    if (!message || !('photo' in message) || !ctx.chat) {
      return 0;
    }

    const user = await this.resolveUser(identityFromChat(ctx.chat));
    const images = message.photo.map(photo => DocumentLink.fromPhoto(ctx.telegram, photo, message.media_group_id));
    await this.logger.logReceiveImage(user.id, images.length);

    const routes = this.imageRoutes.filter(route => route.isAccessibleWith(user.state, user.roles));
    ConditionalLogger.logRouting('image', { userId: user.id, routes: routes.length });
    return this.invoke(routes, { user, message: message.caption ?? '', ctx, images }, 'image');
  }

  /**
   * Adds state and roles to the identity. Users without a record get the defaults.
   */
  private async resolveUser(identity: BotUserIdentity): Promise<BotUser> {
    try {
      const state = await this.stateManager.getState(identity.id);
      const roles = await this.roleAuth.getUserRoles(identity.id);
      return { ...identity, state, roles };
    } catch (error) {
      if (error instanceof StateError || error instanceof RoleError) {
        return { ...identity, state: this.defaultState, roles: [...this.defaultRoles] };
      }
      throw error;
    }
  }

  private async invoke<TRequest extends RouteRequest>(
    routes: Route<TRequest>[],
    request: TRequest,
    kind: string
  ): Promise<number> {
    let invoked = 0;
    for (const route of routes) {
      invoked++;
      try {
        await route.callback(request);
      } catch (error) {
        LogEngine.error('Route handler failed', {
          kind,
          userId: request.user.id,
          error: getErrorMessage(error)
        });
        await this.logger.logError('Route handler failed', {
          kind,
          id: request.user.id,
          error
        }).catch((logError: unknown) => {
          LogEngine.error('Failed to record route handler failure', {
            kind,
            userId: request.user.id,
            error: getErrorMessage(logError)
          });
        });
      }
    }
    return invoked;
  }
}
