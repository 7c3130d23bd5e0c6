import { promises as fs } from 'fs';
import { dirname, basename, join } from 'path';
import { randomBytes } from 'crypto';

/**
 * Byte storage addressed by absolute file path.
 * Every method rejects with the underlying I/O error on failure.
 */
export interface StorageBackend {
  write(path: string, data: Buffer): Promise<void>;
  read(path: string): Promise<Buffer>;
  delete(path: string): Promise<void>;
}

/**
 * File system storage layer. Writes go through a temp file in the target's
 * directory and are renamed into place, so a failed write never leaves a
 * partial file at `path`.
 */
export class FileStore implements StorageBackend {
  /**
   * Generate a temporary file path next to the target so the rename
   * stays on one filesystem
   */
  private getTempPath(filePath: string): string {
    const id = randomBytes(8).toString('hex');
    return join(dirname(filePath), `.${basename(filePath)}.${id}.tmp`);
  }

  /**
   * Atomic file write: write to temp, then rename
   */
  async write(filePath: string, data: Buffer): Promise<void> {
    await fs.mkdir(dirname(filePath), { recursive: true });

    const tempPath = this.getTempPath(filePath);
    try {
      await fs.writeFile(tempPath, data, { flag: 'wx' });
      await this.moveIntoPlace(tempPath, filePath);
    } catch (err) {
      // Clean up temp file on failure
      await fs.unlink(tempPath).catch(() => {});
      throw err;
    }
  }

  /**
   * Rename the temp file onto `filePath`. A directory tree at `filePath` that
   * holds no files (left behind by removed nested keys) is cleared first.
   */
  private async moveIntoPlace(tempPath: string, filePath: string): Promise<void> {
    try {
      await fs.rename(tempPath, filePath);
    } catch (err) {
      if (!(await this.removeEmptyTree(filePath))) throw err;
      await fs.rename(tempPath, filePath);
    }
  }

  /**
   * Remove `dirPath` if it is a directory containing only empty directories.
   * Resolves false, leaving everything in place, if it is anything else.
   */
  private async removeEmptyTree(dirPath: string): Promise<boolean> {
    const entries = await fs.readdir(dirPath, { withFileTypes: true }).catch(() => null);
    if (entries === null) return false;

    for (const entry of entries) {
      if (!entry.isDirectory()) return false;
      if (!(await this.removeEmptyTree(join(dirPath, entry.name)))) return false;
    }
    return fs.rmdir(dirPath).then(
      () => true,
      () => false,
    );
  }

  async read(filePath: string): Promise<Buffer> {
    return fs.readFile(filePath);
  }

  async delete(filePath: string): Promise<void> {
    await fs.unlink(filePath);
  }
}
