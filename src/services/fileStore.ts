export type FolderHandle = {
  id: string;
  title: string;
};

export type UploadOutcome = { status: 'uploaded'; name: string; id: string } | { status: 'conflict'; name: string };

/**
 * Remote file storage for materials photos.
 * Rejected credentials surface as AuthorizationError, other failures as ExternalServiceError.
 */
export interface FileStore {
  ensureDatedFolder(title: string): Promise<FolderHandle>;
  upload(content: Buffer, name: string, folder: FolderHandle, contentType: string): Promise<UploadOutcome>;
  publishLink(folder: FolderHandle): Promise<string>;
}

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp',
  '.heic': 'image/heic',
};

export const contentTypeOf = (extension: string): string =>
  CONTENT_TYPES[extension.toLowerCase()] ?? 'application/octet-stream';
