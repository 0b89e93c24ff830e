import { google, type Auth, type drive_v3 } from 'googleapis';
import { Readable } from 'stream';
import { toServiceError } from '../errors/googleErrors.js';
import { withGoogleRetry } from '../utils/googleRetry.js';
import logger from '../utils/logger.js';
import type { FileStore, FolderHandle, UploadOutcome } from './fileStore.js';

const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

const quote = (value: string): string => value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");

export type GoogleDriveFileStoreOptions = {
  drive: drive_v3.Drive;
  parentId: string | null;
};

export const createDriveClient = (auth: Auth.JWT): drive_v3.Drive => google.drive({ version: 'v3', auth });

export class GoogleDriveFileStore implements FileStore {
  constructor(private readonly options: GoogleDriveFileStoreOptions) {}

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await withGoogleRetry(operation, run);
    } catch (error) {
      throw toServiceError(`drive.${operation}`, error);
    }
  }

  private async findByName(name: string, parentId: string | null, folder: boolean): Promise<string | null> {
    const query = [
      `name = '${quote(name)}'`,
      folder ? `mimeType = '${FOLDER_MIME_TYPE}'` : `mimeType != '${FOLDER_MIME_TYPE}'`,
      'trashed = false',
      parentId ? `'${quote(parentId)}' in parents` : "'root' in parents",
    ].join(' and ');

    const { data } = await this.call('files.list', () =>
      this.options.drive.files.list({
        q: query,
        fields: 'files(id)',
        pageSize: 1,
        supportsAllDrives: true,
        includeItemsFromAllDrives: true,
      }),
    );
    return data.files?.[0]?.id ?? null;
  }

  async ensureDatedFolder(title: string): Promise<FolderHandle> {
    const { parentId } = this.options;
    const existing = await this.findByName(title, parentId, true);
    if (existing) {
      return { id: existing, title };
    }

    const created = await this.call('files.create folder', () =>
      this.options.drive.files.create({
        requestBody: {
          name: title,
          mimeType: FOLDER_MIME_TYPE,
          parents: parentId ? [parentId] : undefined,
        },
        fields: 'id',
        supportsAllDrives: true,
      }),
    );
    const folderId = created.data.id;
    if (!folderId) {
      throw toServiceError('drive.files.create folder', new Error(`Failed to create Google Drive folder ${title}`));
    }
    logger.info(`[drive] Created folder ${title} (${folderId})`);
    return { id: folderId, title };
  }

  async upload(content: Buffer, name: string, folder: FolderHandle, contentType: string): Promise<UploadOutcome> {
    if (content.length === 0) {
      throw toServiceError('drive.files.create', new Error(`Cannot upload empty file ${name}`));
    }
    // Drive allows duplicate names, so a taken name is reported as a conflict
    if (await this.findByName(name, folder.id, false)) {
      return { status: 'conflict', name };
    }

    const response = await this.call('files.create', () =>
      this.options.drive.files.create({
        requestBody: { name, mimeType: contentType, parents: [folder.id] },
        media: { mimeType: contentType, body: Readable.from(content) },
        fields: 'id',
        supportsAllDrives: true,
      }),
    );
    const { id } = response.data;
    if (!id) {
      throw toServiceError('drive.files.create', new Error(`Drive upload did not return an id for ${name}`));
    }
    return { status: 'uploaded', name, id };
  }

  async publishLink(folder: FolderHandle): Promise<string> {
    await this.call('permissions.create', () =>
      this.options.drive.permissions.create({
        fileId: folder.id,
        requestBody: { role: 'reader', type: 'anyone' },
        supportsAllDrives: true,
      }),
    );
    const { data } = await this.call('files.get', () =>
      this.options.drive.files.get({ fileId: folder.id, fields: 'webViewLink', supportsAllDrives: true }),
    );
    return data.webViewLink ?? `https://drive.google.com/drive/folders/${folder.id}`;
  }
}
