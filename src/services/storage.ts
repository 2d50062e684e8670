/**
 * Storage Service
 * Keeps generated media on local disk under STORAGE_PATH and exposes it as /storage/... URLs
 */

import { promises as fs } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { getEnvironment } from '@/config/environment.js';
import { logger } from '@/config/logger.js';
import { REQUEST_TIMEOUTS_MS } from '@/config/providers.js';
import { ProcessingError } from '@/shared/errors.js';
import { sanitizeFilename } from '@/shared/security.js';
import { requestFailureMessage } from '@/utils/errorHandling.js';

export const STORAGE_URL_PREFIX = '/storage';

export const STORAGE_SUBFOLDERS = ['audio', 'covers', 'temp', 'references'] as const;

export type StorageSubfolder = (typeof STORAGE_SUBFOLDERS)[number];

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export interface StorageServiceOptions {
  rootPath?: string;
  storageType?: 'local' | 'google_drive';
  fetchImpl?: FetchLike;
  downloadTimeoutMs?: number;
}

export interface StorageStats {
  total_size_mb: number;
  by_folder: Record<'audio' | 'covers' | 'temp', number>;
}

function roundMb(bytes: number): number {
  return Math.round((bytes / (1024 * 1024)) * 100) / 100;
}

export class StorageService {
  readonly rootPath: string;
  private readonly storageType: 'local' | 'google_drive';
  private readonly fetchImpl: FetchLike;
  private readonly downloadTimeoutMs: number;
  private initialized: Promise<void> | null = null;

  constructor(options: StorageServiceOptions = {}) {
    const env = getEnvironment();
    this.rootPath = path.resolve(options.rootPath ?? env.STORAGE_PATH);
    this.storageType = options.storageType ?? env.STORAGE_TYPE;
    this.fetchImpl = options.fetchImpl ?? ((url, init) => fetch(url, init));
    this.downloadTimeoutMs = options.downloadTimeoutMs ?? REQUEST_TIMEOUTS_MS.download;

    logger.info('Storage Service initialized', {
      rootPath: this.rootPath,
      storageType: this.storageType,
    });
  }

  /**
   * Create the storage root and its subfolders
   */
  initialize(): Promise<void> {
    if (!this.initialized) {
      this.initialized = Promise.all(
        STORAGE_SUBFOLDERS.map((sub) => fs.mkdir(path.join(this.rootPath, sub), { recursive: true })),
      ).then(() => undefined);
    }
    return this.initialized;
  }

  /**
   * Save bytes and return the public /storage URL
   */
  async saveFile(
    data: Buffer,
    subfolder: StorageSubfolder,
    filename?: string,
    extension = 'mp3',
  ): Promise<string> {
    if (this.storageType === 'google_drive') {
      logger.warn('Google Drive storage is not available, saving locally', { subfolder });
    }

    await this.initialize();

    let name: string;
    if (filename) {
      name = sanitizeFilename(filename);
      if (!name.includes('.')) {
        name = `${name}.${extension}`;
      }
    } else {
      name = `${randomUUID()}.${extension}`;
    }

    const relative = `${subfolder}/${name}`;
    try {
      await fs.writeFile(path.join(this.rootPath, subfolder, name), data);
    } catch (error) {
      logger.error('Failed to save file', {
        error: error instanceof Error ? error.message : String(error),
        subfolder,
        name,
      });
      throw error;
    }

    logger.debug('File saved', { path: relative, size: data.length });
    return `${STORAGE_URL_PREFIX}/${relative}`;
  }

  /**
   * Read a stored file, or download it when given an absolute URL
   */
  async getFile(filePath: string): Promise<Buffer> {
    if (filePath.startsWith(`${STORAGE_URL_PREFIX}/`)) {
      const absolute = this.getAbsolutePath(filePath);
      try {
        return await fs.readFile(absolute);
      } catch {
        throw new ProcessingError(`File not found: ${filePath}`);
      }
    }

    if (filePath.startsWith('http://') || filePath.startsWith('https://')) {
      return this.download(filePath);
    }

    throw new ProcessingError('Invalid file path');
  }

  async deleteFile(filePath: string | null | undefined): Promise<boolean> {
    if (!filePath || !filePath.startsWith(`${STORAGE_URL_PREFIX}/`)) {
      return false;
    }

    try {
      await fs.unlink(this.getAbsolutePath(filePath));
      logger.debug('File deleted', { filePath });
      return true;
    } catch (error) {
      logger.warn('Failed to delete file', {
        filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(this.getAbsolutePath(filePath));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Map a /storage URL to a path on disk; rejects anything outside the root
   */
  getAbsolutePath(filePath: string): string {
    const relative = filePath.startsWith(`${STORAGE_URL_PREFIX}/`)
      ? filePath.slice(STORAGE_URL_PREFIX.length + 1)
      : filePath.replace(/^\/+/, '');
    const absolute = path.resolve(this.rootPath, relative);
    if (absolute !== this.rootPath && !absolute.startsWith(this.rootPath + path.sep)) {
      throw new ProcessingError('Invalid file path');
    }
    return absolute;
  }

  /**
   * Download a remote file (e.g. a generated cover) into storage
   */
  async saveFromUrl(url: string, subfolder: StorageSubfolder, extension?: string): Promise<string> {
    const data = await this.download(url);
    return this.saveFile(data, subfolder, undefined, extension ?? extensionFromUrl(url));
  }

  /**
   * Delete temp files older than maxAgeHours; returns how many were removed
   */
  async cleanupTemp(maxAgeHours = 24): Promise<number> {
    await this.initialize();
    const tempDir = path.join(this.rootPath, 'temp');
    const cutoff = Date.now() - maxAgeHours * 3600 * 1000;
    let removed = 0;

    for (const entry of await fs.readdir(tempDir)) {
      const entryPath = path.join(tempDir, entry);
      const stat = await fs.stat(entryPath);
      if (stat.isFile() && stat.mtimeMs < cutoff) {
        await fs.unlink(entryPath);
        removed++;
      }
    }

    logger.info('Temp cleanup finished', { removed, maxAgeHours });
    return removed;
  }

  async getStorageStats(): Promise<StorageStats> {
    await this.initialize();
    const byFolder: StorageStats['by_folder'] = { audio: 0, covers: 0, temp: 0 };
    let total = 0;

    for (const folder of ['audio', 'covers', 'temp'] as const) {
      const size = await directorySize(path.join(this.rootPath, folder));
      byFolder[folder] = roundMb(size);
      total += size;
    }

    return { total_size_mb: roundMb(total), by_folder: byFolder };
  }

  private async download(url: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.downloadTimeoutMs) });
    } catch (error) {
      throw new ProcessingError(`Failed to download file: ${requestFailureMessage(error, this.downloadTimeoutMs)}`, {
        url,
      });
    }
    if (!response.ok) {
      throw new ProcessingError(`Failed to download file: HTTP ${response.status}`, { url });
    }
    return Buffer.from(await response.arrayBuffer());
  }
}

/**
 * Extension from the last path segment of a URL, query string ignored.
 * Falls back to jpg when missing or longer than 4 characters.
 */
export function extensionFromUrl(url: string): string {
  const withoutQuery = url.split('?')[0] ?? '';
  const lastSegment = withoutQuery.split('/').pop() ?? '';
  const dot = lastSegment.lastIndexOf('.');
  if (dot === -1) {
    return 'jpg';
  }
  const ext = lastSegment.slice(dot + 1);
  return ext && ext.length <= 4 ? ext : 'jpg';
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch {
    return 0;
  }
  for (const entry of entries) {
    const stat = await fs.stat(path.join(dir, entry));
    total += stat.isDirectory() ? await directorySize(path.join(dir, entry)) : stat.size;
  }
  return total;
}
