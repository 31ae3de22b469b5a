/**
 * FileSystemAdapter - IFileSystem over Node.js fs/promises
 */

import type { IFileSystem } from '@procward/core';
import fs from 'fs/promises';

export class FileSystemAdapter implements IFileSystem {
  async readFile(pathStr: string, encoding: 'utf-8'): Promise<string> {
    return fs.readFile(pathStr, encoding);
  }

  async exists(pathStr: string): Promise<boolean> {
    try {
      await fs.access(pathStr);
      return true;
    } catch {
      return false;
    }
  }
}
