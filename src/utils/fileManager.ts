/**
 * File management utilities
 */
import { mkdir, writeFile, unlink, access, rename, stat } from 'fs/promises';
import { basename, dirname, extname, join } from 'path';
import { constants } from 'fs';
import { logger } from './logger.js';

let tempCounter = 0;

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export class FileManager {
  /**
   * Ensure a directory exists, creating it if necessary
   */
  static async ensureDir(dirPath: string): Promise<void> {
    try {
      await access(dirPath, constants.F_OK);
    } catch {
      await mkdir(dirPath, { recursive: true });
      logger.debug(`Created directory: ${dirPath}`);
    }
  }

  /**
   * Create the directory if needed and prove it accepts writes.
   */
  static async assertWritableDir(dirPath: string): Promise<void> {
    await this.ensureDir(dirPath);
    const checkFile = join(dirPath, `.write-check-${process.pid}`);
    await writeFile(checkFile, '');
    await unlink(checkFile);
  }

  /**
   * Write to a temp file beside the target, then rename over it.
   * Readers see either the old content or the new, never a partial file.
   */
  static async writeFileAtomic(filePath: string, data: string | Uint8Array): Promise<void> {
    await this.ensureDir(dirname(filePath));
    tempCounter += 1;
    const tempPath = `${filePath}.${process.pid}.${tempCounter}.tmp`;
    try {
      await writeFile(tempPath, data);
      await rename(tempPath, filePath);
    } catch (error) {
      await this.deleteFile(tempPath);
      throw error;
    }
  }

  /**
   * Move a file, replacing anything at the destination.
   * Returns false when the source no longer exists.
   */
  static async moveFile(source: string, destination: string): Promise<boolean> {
    await this.ensureDir(dirname(destination));
    try {
      await rename(source, destination);
      logger.debug(`Moved ${source} -> ${destination}`);
      return true;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Delete a file
   */
  static async deleteFile(filePath: string): Promise<void> {
    try {
      await unlink(filePath);
      logger.debug(`Deleted file: ${filePath}`);
    } catch (error) {
      if (errnoCode(error) !== 'ENOENT') {
        logger.warn(`Failed to delete file ${filePath}:`, error instanceof Error ? error.message : error);
      }
    }
  }

  /**
   * Check if a file exists
   */
  static async fileExists(filePath: string): Promise<boolean> {
    try {
      await access(filePath, constants.F_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Size in bytes, or undefined when the file is missing.
   */
  static async fileSize(filePath: string): Promise<number | undefined> {
    try {
      const info = await stat(filePath);
      return info.size;
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * True when `filename` names an entry directly inside a folder: no path
   * separators and not `.` or `..`.
   */
  static isPlainFilename(filename: string): boolean {
    if (!filename || filename === '.' || filename === '..') {
      return false;
    }
    return !/[\\/\0]/.test(filename) && basename(filename) === filename;
  }

  /**
   * Reduce a client-supplied name to a bare filename with safe characters.
   */
  static sanitizeFilename(filename: string): string {
    const name = basename(filename.replace(/\\/g, '/'));
    return name
      .replace(/[^a-z0-9._-]/gi, '_')
      .replace(/_+/g, '_')
      .replace(/^\.+/, '');
  }

  /**
   * First free name in `dir`: `name.ext`, then `name_1.ext`, `name_2.ext`...
   */
  static async uniqueFilename(dir: string, filename: string): Promise<string> {
    const extension = extname(filename);
    const stem = filename.slice(0, filename.length - extension.length);
    let candidate = filename;
    let counter = 1;
    while (await this.fileExists(join(dir, candidate))) {
      candidate = `${stem}_${counter}${extension}`;
      counter += 1;
    }
    return candidate;
  }
}
