import { readFileSync, statSync } from 'node:fs';
import * as path from 'node:path';
import type { SourceTree } from './types.js';

/**
 * Source tree backed by a directory on disk.
 * Missing files read as null; paths that resolve outside the root are refused.
 */
export class DirectorySourceTree implements SourceTree {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  /**
   * Open a checkout that must already exist.
   * Throws when `root` is missing or not a directory, so a mistyped path is not
   * read as a tree with every file absent.
   */
  static open(root: string): DirectorySourceTree {
    let isDirectory: boolean;
    try {
      isDirectory = statSync(root).isDirectory();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`Source directory ${root} is not readable: ${message}`);
    }
    if (!isDirectory) {
      throw new Error(`Source directory ${root} is not a directory`);
    }
    return new DirectorySourceTree(root);
  }

  readFile(relativePath: string): string | null {
    const resolved = path.resolve(this.root, relativePath);
    // Boundary check: resolved path must stay inside the checkout
    if (!resolved.startsWith(this.root + path.sep)) return null;

    try {
      return readFileSync(resolved, 'utf-8');
    } catch (error: unknown) {
      if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
        return null;
      }
      throw error;
    }
  }
}

/** Source tree over an in-memory map of relative path to content */
export class MemorySourceTree implements SourceTree {
  private readonly files: Map<string, string>;

  constructor(files: Record<string, string>) {
    this.files = new Map(Object.entries(files));
  }

  readFile(relativePath: string): string | null {
    return this.files.get(relativePath) ?? null;
  }
}
