/**
 * UTF-8 text file access for the JSON repository.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Reads and writes whole text files.
 */
export interface TextStorage {
  read(path: string): Promise<string>;
  write(path: string, content: string): Promise<void>;
}

/**
 * Filesystem-backed {@link TextStorage}. Writes go to a sibling temp file
 * first and are renamed over the target, so a failed write never leaves a
 * half-written data file behind. The temp file is removed when either step
 * fails.
 */
export class FileStorage implements TextStorage {
  async read(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }

  async write(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tempPath = `${path}.${process.pid}.tmp`;
    try {
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, path);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw error;
    }
  }
}
