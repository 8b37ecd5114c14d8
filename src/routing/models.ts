/**
 * Routing Models
 *
 * Plain values handed to route handlers: the sender of an update and links to
 * the files it carried.
 *
 * @since 2025
 */
import fs from 'fs';
import path from 'path';
import fetch from 'node-fetch';
import type { Telegram } from 'telegraf';
import type { Chat, Document, PhotoSize } from 'telegraf/types';
import { LogEngine } from '@wgtechlabs/log-engine';
import { DownloadError, getErrorMessage } from '../utils/errorHandler.js';

/**
 * The user behind an update, with the state and roles resolved at dispatch time
 */
export interface BotUser {
  id: number;
  username?: string;
  firstName?: string;
  lastName?: string;
  roles: string[];
  state: string;
}

export type BotUserIdentity = Omit<BotUser, 'roles' | 'state'>;

/**
 * Identity fields of a chat. Group chats carry no names.
 */
export function identityFromChat(chat: Chat): BotUserIdentity {
  const identity: BotUserIdentity = { id: chat.id };
  if ('username' in chat && chat.username) {
    identity.username = chat.username;
  }
  if ('first_name' in chat) {
    identity.firstName = chat.first_name;
    if (chat.last_name) {
      identity.lastName = chat.last_name;
    }
  }
  return identity;
}

export type FileLinkResolver = Pick<Telegram, 'getFileLink'>;

export interface DocumentLinkInit {
  fileId: string;
  name?: string;
  mimeType?: string;
  size?: number;
  mediaGroupId?: string;
}

/**
 * A downloadable file received from a user
 */
export class DocumentLink {
  readonly fileId: string;
  readonly name?: string;
  readonly mimeType?: string;
  readonly size?: number;
  readonly mediaGroupId?: string;

  constructor(private readonly telegram: FileLinkResolver, init: DocumentLinkInit) {
    this.fileId = init.fileId;
    this.name = init.name;
    this.mimeType = init.mimeType;
    this.size = init.size;
    this.mediaGroupId = init.mediaGroupId;
  }

  static fromDocument(telegram: FileLinkResolver, document: Document, mediaGroupId?: string): DocumentLink {
    return new DocumentLink(telegram, {
      fileId: document.file_id,
      name: document.file_name,
      mimeType: document.mime_type,
      size: document.file_size,
      mediaGroupId
    });
  }

  static fromPhoto(telegram: FileLinkResolver, photo: PhotoSize, mediaGroupId?: string): DocumentLink {
    return new DocumentLink(telegram, {
      fileId: photo.file_id,
      size: photo.file_size,
      mediaGroupId
    });
  }

  /**
   * Saves the file as `directory/name`, falling back to the document's own name and then its file id
   *
   * @returns the written path
   */
  async download(directory: string, name?: string): Promise<string> {
    const fileName = path.basename(name ?? this.name ?? this.fileId);
    const target = path.join(directory, fileName);

    let url: URL;
    try {
      url = await this.telegram.getFileLink(this.fileId);
    } catch (error) {
      throw new DownloadError(`Failed to resolve file ${this.fileId}`, {
        context: { fileId: this.fileId },
        cause: error
      });
    }

    const response = await fetch(url.toString());
    if (!response.ok) {
      LogEngine.error('File download failed', {
        fileId: this.fileId,
        status: response.status
      });
      throw new DownloadError(`Failed to download file: ${response.statusText}`, {
        context: { fileId: this.fileId, status: response.status }
      });
    }

    try {
      const buffer = Buffer.from(await response.arrayBuffer());
      await fs.promises.mkdir(directory, { recursive: true });
      await fs.promises.writeFile(target, buffer);
      LogEngine.debug('File downloaded', { fileId: this.fileId, path: target, bytes: buffer.length });
    } catch (error) {
      LogEngine.error('Failed to save downloaded file', {
        fileId: this.fileId,
        path: target,
        error: getErrorMessage(error)
      });
      throw new DownloadError(`Failed to save file to ${target}`, {
        context: { fileId: this.fileId, path: target },
        cause: error
      });
    }

    return target;
  }
}
