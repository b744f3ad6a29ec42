/**
 * Document Storage
 *
 * Opens TMX files and saves alignment documents atomically: the previous file
 * is copied to `<path>.bak`, the new content is written to a temporary file
 * beside the target and renamed over it. Until the rename, the original file
 * is untouched.
 */

import fs from 'fs';
import { basename, dirname, join } from 'pathe';
import { v4 as uuidv4 } from 'uuid';
import { type AlignmentDocument, getMutator } from '@/services/alignment/document';
import { parseTmx } from '@/services/tmx/parser';
import { serializeTmx } from '@/services/tmx/serializer';
import { PersistenceError, describeCause } from '@/services/utils/errors';
import { logger } from '@/services/utils/logger';

export const BACKUP_SUFFIX = '.bak';

/**
 * The file operations storage needs. Swapped out in tests to simulate
 * failures at each step.
 */
export interface FileSystemAdapter {
  readFile(path: string): Promise<Uint8Array>;
  writeFile(path: string, data: Uint8Array): Promise<void>;
  copyFile(from: string, to: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error;

export const nodeFileSystem: FileSystemAdapter = {
  readFile: (path) => fs.promises.readFile(path),
  writeFile: (path, data) => fs.promises.writeFile(path, data),
  copyFile: (from, to) => fs.promises.copyFile(from, to),
  rename: (from, to) => fs.promises.rename(from, to),
  unlink: (path) => fs.promises.unlink(path),
  exists: (path) =>
    fs.promises.stat(path).then(
      () => true,
      (error: unknown) => {
        if (isErrnoException(error) && error.code === 'ENOENT') return false;
        throw error;
      }
    ),
};

export interface SaveOptions {
  /** Aborting before the rename abandons the save with no visible change. */
  signal?: AbortSignal;
}

export const backupPathFor = (path: string): string => `${path}${BACKUP_SUFFIX}`;

export const tempPathFor = (path: string): string =>
  join(dirname(path), `.${basename(path)}.${uuidv4()}.tmp`);

export class DocumentStorage {
  constructor(private readonly fileSystem: FileSystemAdapter = nodeFileSystem) {}

  async open(path: string): Promise<AlignmentDocument> {
    let bytes: Uint8Array;
    try {
      bytes = await this.fileSystem.readFile(path);
    } catch (error) {
      throw new PersistenceError('READ_FAILED', { path, detail: describeCause(error) }, { cause: error });
    }
    logger.info(`[Storage] Opening ${path}`, { bytes: bytes.byteLength });
    return parseTmx(bytes, { originPath: path });
  }

  /**
   * Save `doc` to `path`. The document is serialized before the first await,
   * so the written file is a point-in-time snapshot. The dirty flag is
   * cleared only once the rename has succeeded.
   */
  async save(doc: AlignmentDocument, path: string, options: SaveOptions = {}): Promise<void> {
    const bytes = serializeTmx(doc);
    const tempPath = tempPathFor(path);
    const backupPath = backupPathFor(path);

    this.throwIfAborted(options.signal, path);

    try {
      if (await this.fileSystem.exists(path)) {
        await this.fileSystem.copyFile(path, backupPath);
        logger.debug(`[Storage] Backed up ${path} to ${backupPath}`);
      }
    } catch (error) {
      throw new PersistenceError(
        'BACKUP_FAILED',
        { path: backupPath, detail: describeCause(error) },
        { cause: error }
      );
    }

    try {
      await this.fileSystem.writeFile(tempPath, bytes);
    } catch (error) {
      await this.discard(tempPath);
      throw new PersistenceError('WRITE_FAILED', { path, detail: describeCause(error) }, { cause: error });
    }

    if (options.signal?.aborted) {
      await this.discard(tempPath);
      this.throwIfAborted(options.signal, path);
    }

    try {
      await this.fileSystem.rename(tempPath, path);
    } catch (error) {
      await this.discard(tempPath);
      throw new PersistenceError('RENAME_FAILED', { path, detail: describeCause(error) }, { cause: error });
    }

    getMutator(doc).markSaved(path);
    logger.info(`[Storage] Saved ${doc.rowCount} row(s) to ${path}`, { bytes: bytes.byteLength });
  }

  private throwIfAborted(signal: AbortSignal | undefined, path: string) {
    if (signal?.aborted) {
      logger.info(`[Storage] Save of ${path} abandoned before rename`);
      throw new PersistenceError('ABORTED', { path });
    }
  }

  private async discard(tempPath: string) {
    try {
      await this.fileSystem.unlink(tempPath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') return;
      logger.warn(`[Storage] Could not remove temporary file ${tempPath}`, {
        detail: describeCause(error),
      });
    }
  }
}

export const documentStorage = new DocumentStorage();
