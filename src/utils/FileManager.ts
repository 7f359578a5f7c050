import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { causeMessage, errorCode } from './errors';
import { logger } from './logger';

/**
 * FileManager - file operations for the cache and download directories
 * Everything that lands at a final path gets there through a rename
 */
export class FileManager {
  /**
   * Create a directory (and parents) if it does not exist
   */
  async ensureDir(dir: string): Promise<string> {
    try {
      await fs.mkdir(dir, { recursive: true });
      return dir;
    } catch (error) {
      logger.error('Failed to create directory', { path: dir, error });
      throw error;
    }
  }

  /**
   * Unique sibling path for writing before the final rename
   */
  createTempPath(finalPath: string, suffix: string = 'part'): string {
    return `${finalPath}.${uuidv4()}.${suffix}`;
  }

  /**
   * Write a file atomically: temp file in the same directory, then rename
   */
  async writeFileAtomic(filePath: string, contents: string): Promise<void> {
    await this.ensureDir(path.dirname(filePath));
    const tempPath = this.createTempPath(filePath, 'tmp');
    try {
      await fs.writeFile(tempPath, contents, 'utf-8');
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await this.deleteFile(tempPath);
      throw error;
    }
  }

  /**
   * Move a finished file into place, replacing what is there
   */
  async moveIntoPlace(tempPath: string, finalPath: string): Promise<void> {
    await fs.rename(tempPath, finalPath);
  }

  /**
   * Read a UTF-8 file, undefined when it does not exist
   */
  async readFileIfExists(filePath: string): Promise<string | undefined> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (errorCode(error) === 'ENOENT') {
        return undefined;
      }
      throw error;
    }
  }

  /**
   * Delete a file, ignoring one that is already gone
   */
  async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      logger.debug('File deleted', { path: filePath });
    } catch (error: unknown) {
      if (errorCode(error) !== 'ENOENT') {
        logger.error('Failed to delete file', {
          path: filePath,
          error: causeMessage(error),
        });
      }
    }
  }

  /**
   * Size in bytes of a regular file, undefined when there is none
   */
  async getFileSize(filePath: string): Promise<number | undefined> {
    try {
      const stats = await fs.stat(filePath);
      return stats.isFile() ? stats.size : undefined;
    } catch {
      return undefined;
    }
  }

  async isDirectory(dirPath: string): Promise<boolean> {
    try {
      return (await fs.stat(dirPath)).isDirectory();
    } catch {
      return false;
    }
  }

  async listDir(dirPath: string): Promise<string[]> {
    return fs.readdir(dirPath);
  }

  /**
   * Remove a directory tree; a missing one is fine
   */
  async removeDir(dirPath: string): Promise<void> {
    await fs.rm(dirPath, { recursive: true, force: true });
  }

  /**
   * Remove leftover partial downloads older than maxAgeMinutes
   */
  async cleanupPartialFiles(dir: string, maxAgeMinutes: number = 60): Promise<number> {
    let removed = 0;
    let files: string[];
    try {
      files = await fs.readdir(dir);
    } catch {
      return 0;
    }

    const now = Date.now();
    const cleanupPromises = files
      .filter((file) => file.endsWith('.part'))
      .map(async (file) => {
        const filePath = path.join(dir, file);
        try {
          const stats = await fs.stat(filePath);
          const ageMinutes = (now - stats.mtimeMs) / 1000 / 60;
          if (ageMinutes > maxAgeMinutes) {
            await fs.unlink(filePath);
            removed++;
            logger.info('Stale partial download removed', {
              path: filePath,
              ageMinutes: ageMinutes.toFixed(1),
            });
          }
        } catch (err: unknown) {
          logger.warn('Failed to process file for cleanup', {
            filePath,
            error: causeMessage(err),
          });
        }
      });

    await Promise.allSettled(cleanupPromises);
    return removed;
  }
}
