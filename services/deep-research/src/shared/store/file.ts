/**
 * File Store
 * File system implementation of IStore
 */

import fs from "fs/promises";
import path from "path";
import type { IStore, StoreOptions } from "./types.js";

/**
 * File system based store
 */
export class FileStore implements IStore {
  private readonly basePath: string;
  private readonly prettyPrint: boolean;

  constructor(options: StoreOptions) {
    this.basePath = options.basePath;
    this.prettyPrint = options.prettyPrint ?? true;
  }

  /**
   * Get full path for a key
   */
  getPath(key: string): string {
    // Keys without an extension are JSON documents
    const normalizedKey = path.extname(key) ? key : `${key}.json`;
    return path.join(this.basePath, normalizedKey);
  }

  /**
   * Read data from file
   */
  async read<T>(key: string): Promise<T | null> {
    const filePath = this.getPath(key);

    try {
      const content = await fs.readFile(filePath, "utf-8");
      return JSON.parse(content) as T;
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Write data to file
   */
  async write<T>(key: string, data: T): Promise<void> {
    const content = this.prettyPrint
      ? JSON.stringify(data, null, 2)
      : JSON.stringify(data);

    await this.writeFile(this.getPath(key), content);
  }

  /**
   * Write a text artifact to file
   */
  async writeText(key: string, content: string): Promise<void> {
    await this.writeFile(path.join(this.basePath, key), content);
  }

  private async writeFile(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
  }
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

/**
 * Create a file store
 */
export function createFileStore(basePath: string, options?: Partial<StoreOptions>): IStore {
  return new FileStore({
    basePath,
    prettyPrint: options?.prettyPrint ?? true,
  });
}
