import * as fs from 'fs-extra';
import * as path from 'path';
import { FilesystemError, errorMessage } from '../types/Errors';

export class FileSystem {
  static async pathExists(filePath: string): Promise<boolean> {
    return fs.pathExists(filePath);
  }

  static async ensureDirExists(dirPath: string): Promise<void> {
    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      throw new FilesystemError(
        dirPath,
        `Failed to create directory ${dirPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Names of the entries directly inside `dirPath`, sorted; empty when the
   * directory does not exist.
   */
  static async listDir(dirPath: string): Promise<string[]> {
    if (!(await fs.pathExists(dirPath))) {
      return [];
    }

    try {
      const entries = await fs.readdir(dirPath);
      return entries.sort();
    } catch (error) {
      throw new FilesystemError(
        dirPath,
        `Failed to read directory ${dirPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  static async firstEntry(dirPath: string): Promise<string> {
    const entries = await this.listDir(dirPath);
    if (entries.length === 0) {
      throw new FilesystemError(dirPath, `Directory ${dirPath} is empty or missing`);
    }
    return path.join(dirPath, entries[0]);
  }

  static async writeFile(filePath: string, data: Buffer | string): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeFile(filePath, data);
    } catch (error) {
      throw new FilesystemError(
        filePath,
        `Failed to write file ${filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Rename `source` onto `destination`. Both must live on the same volume for
   * the rename to be atomic, so callers stage next to the destination.
   */
  static async publish(source: string, destination: string): Promise<void> {
    try {
      await fs.rename(source, destination);
    } catch (error) {
      throw new FilesystemError(
        destination,
        `Failed to move ${source} to ${destination}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  static async remove(targetPath: string): Promise<void> {
    try {
      await fs.remove(targetPath);
    } catch (error) {
      throw new FilesystemError(
        targetPath,
        `Failed to delete ${targetPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  static async isExecutable(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath, fs.constants.F_OK | fs.constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }
}
