import * as fs from 'fs/promises';
import * as path from 'path';
import { randomUUID } from 'crypto';
import {
  ConflictError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../middleware/error.middleware';
import { logger } from '../utils/logger';
import {
  EntryKind,
  MakeDirectoryOptions,
  StoreEntry,
  StorePath,
  TreeStore,
  WriteOptions,
} from './store.types';

const MAX_SEGMENT_LENGTH = 255;
/** In-flight writes live under this prefix, which no caller segment may use */
export const TEMP_PREFIX = '.~';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Reject segments that could change directory level or smuggle a separator.
 * Runs before any filesystem call.
 */
export function assertSafeSegment(segment: string): void {
  if (segment.length === 0 || segment.length > MAX_SEGMENT_LENGTH) {
    throw new ValidationError(`Invalid path segment: length must be 1-${MAX_SEGMENT_LENGTH} characters`);
  }
  if (segment === '.' || segment === '..') {
    throw new ValidationError('Invalid path segment: relative references are not allowed');
  }
  if (/[/\\\0]/.test(segment)) {
    throw new ValidationError('Invalid path segment: contains path separator or NUL character');
  }
  if (segment.startsWith(TEMP_PREFIX)) {
    throw new ValidationError(`Invalid path segment: names starting with "${TEMP_PREFIX}" are reserved`);
  }
}

/**
 * TreeStore backed by a directory on the local filesystem.
 *
 * Writes go through temp-file-then-rename so readers never observe a
 * half-written file. Errors are translated into the AppError taxonomy and
 * carry store-relative paths only.
 */
export class FileSystemTreeStore implements TreeStore {
  private readonly root: string;

  constructor(rootPath: string) {
    this.root = path.resolve(rootPath);
  }

  getRoot(): string {
    return this.root;
  }

  /**
   * Create the root directory. Idempotent.
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.root, { recursive: true });
    } catch (error) {
      throw this.translate(error, []);
    }
  }

  /**
   * Map segments to an absolute path confined to the root
   */
  resolve(segments: StorePath): string {
    for (const segment of segments) {
      assertSafeSegment(segment);
    }

    const resolved = path.resolve(this.root, ...segments);
    const relative = path.relative(this.root, resolved);
    if (relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new ValidationError('Invalid path: resolves outside of the storage root');
    }

    return resolved;
  }

  async kind(target: StorePath): Promise<EntryKind | null> {
    const absolute = this.resolve(target);
    try {
      const stats = await fs.stat(absolute);
      return stats.isDirectory() ? 'directory' : 'file';
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')) {
        return null;
      }
      throw this.translate(error, target);
    }
  }

  async readFile(target: StorePath): Promise<Buffer> {
    const absolute = this.resolve(target);
    try {
      return await fs.readFile(absolute);
    } catch (error) {
      throw this.translate(error, target);
    }
  }

  async writeFile(target: StorePath, data: Buffer | string, options: WriteOptions = {}): Promise<void> {
    const absolute = this.resolve(target);
    try {
      await fs.mkdir(path.dirname(absolute), { recursive: true });

      if (options.exclusive) {
        await fs.writeFile(absolute, data, { flag: 'wx' });
        return;
      }

      const tempPath = path.join(path.dirname(absolute), `${TEMP_PREFIX}${randomUUID()}.tmp`);
      try {
        await fs.writeFile(tempPath, data);
        await fs.rename(tempPath, absolute);
      } catch (error) {
        await fs.rm(tempPath, { force: true });
        throw error;
      }
    } catch (error) {
      throw this.translate(error, target);
    }
  }

  async makeDirectory(target: StorePath, options: MakeDirectoryOptions = {}): Promise<void> {
    const absolute = this.resolve(target);
    try {
      await fs.mkdir(absolute, { recursive: !options.exclusive });
    } catch (error) {
      throw this.translate(error, target);
    }
  }

  async list(target: StorePath): Promise<StoreEntry[]> {
    const absolute = this.resolve(target);
    try {
      const dirents = await fs.readdir(absolute, { withFileTypes: true });
      return dirents
        .filter((dirent) => dirent.isFile() || dirent.isDirectory())
        .filter((dirent) => !dirent.name.startsWith(TEMP_PREFIX))
        .map((dirent): StoreEntry => ({
          name: dirent.name,
          kind: dirent.isDirectory() ? 'directory' : 'file',
        }));
    } catch (error) {
      throw this.translate(error, target);
    }
  }

  async remove(target: StorePath, options: { recursive?: boolean } = {}): Promise<void> {
    const absolute = this.resolve(target);
    if (absolute === this.root) {
      throw new ValidationError('Invalid path: cannot remove the storage root');
    }
    try {
      await fs.access(absolute);
      await fs.rm(absolute, { recursive: options.recursive ?? false });
    } catch (error) {
      throw this.translate(error, target);
    }
  }

  async move(from: StorePath, to: StorePath): Promise<void> {
    const source = this.resolve(from);
    const destination = this.resolve(to);

    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await this.rename(source, destination);
      return;
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EXDEV') {
        throw this.translate(error, from);
      }
    }

    // Source and destination live on different devices
    logger.debug('Rename crossed devices, falling back to copy', { from: from.join('/') });
    try {
      await fs.copyFile(source, destination);
    } catch (error) {
      await fs.rm(destination, { force: true });
      throw this.translate(error, from);
    }

    try {
      await fs.unlink(source);
    } catch (error) {
      // Keep a single copy: undo the destination rather than leave two
      await fs.rm(destination, { force: true });
      throw this.translate(error, from);
    }
  }

  protected async rename(source: string, destination: string): Promise<void> {
    await fs.rename(source, destination);
  }

  private translate(error: unknown, target: StorePath): Error {
    const display = target.length > 0 ? target.join('/') : '<root>';

    if (!isErrnoException(error)) {
      return error instanceof Error ? error : new StorageError(String(error));
    }

    switch (error.code) {
      case 'ENOENT':
      case 'ENOTDIR':
        return new NotFoundError(`Not found: ${display}`);
      case 'EEXIST':
      case 'ENOTEMPTY':
        return new ConflictError(`Already exists: ${display}`);
      default:
        logger.error('Filesystem operation failed', { path: display, code: error.code, message: error.message });
        return new StorageError(`Storage operation failed: ${display}`);
    }
  }
}
