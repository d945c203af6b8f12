/**
 * Store Types
 * Interface for data persistence layer
 */

// ============================================
// STORE INTERFACE
// ============================================

/**
 * Store interface - abstracts data persistence
 */
export interface IStore {
  /**
   * Read JSON data from store, null when the key does not exist
   */
  read<T>(key: string): Promise<T | null>;

  /**
   * Write JSON data to store
   */
  write<T>(key: string, data: T): Promise<void>;

  /**
   * Write a text artifact (markdown); the key carries its own extension
   */
  writeText(key: string, content: string): Promise<void>;

  /**
   * Get the actual path/location for a key
   * Useful for passing to agents that need file paths
   */
  getPath(key: string): string;
}

// ============================================
// STORE OPTIONS
// ============================================

/**
 * Options for creating a store
 */
export interface StoreOptions {
  /** Base directory or namespace */
  basePath: string;

  /** Pretty print JSON */
  prettyPrint?: boolean;
}
