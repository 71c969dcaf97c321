import * as path from 'node:path';
import type { SourceCleaner } from './types.js';
import { cleanSwiftSource } from './operations/swift-cleaner.js';
import { cleanObjcSource } from './operations/objc-cleaner.js';

/** A source language the sweep knows how to clean */
export interface SourceDialect {
  /** Unique identifier for this dialect */
  readonly id: string;
  /** Human-readable name */
  readonly name: string;
  /** File extensions handled, with the leading dot */
  readonly extensions: readonly string[];
  readonly clean: SourceCleaner;
}

/**
 * Registry for source dialects
 * Manages which cleaner handles which file extensions
 */
export class DialectRegistry {
  private dialects: Map<string, SourceDialect> = new Map();
  private dialectsByExtension: Map<string, SourceDialect> = new Map();

  register(dialect: SourceDialect): void {
    this.dialects.set(dialect.id, dialect);
    for (const ext of dialect.extensions) {
      this.dialectsByExtension.set(ext.toLowerCase(), dialect);
    }
  }

  getById(id: string): SourceDialect | undefined {
    return this.dialects.get(id);
  }

  /**
   * Get the dialect for a file based on its extension
   */
  getForFile(filePath: string): SourceDialect | undefined {
    const ext = path.extname(filePath).toLowerCase();
    return this.dialectsByExtension.get(ext);
  }

  isSupported(filePath: string): boolean {
    return this.getForFile(filePath) !== undefined;
  }

  getSupportedExtensions(): string[] {
    return Array.from(this.dialectsByExtension.keys());
  }
}

export const swiftDialect: SourceDialect = {
  id: 'swift',
  name: 'Swift',
  extensions: ['.swift'],
  clean: cleanSwiftSource,
};

export const objcDialect: SourceDialect = {
  id: 'objc',
  name: 'Objective-C',
  extensions: ['.m', '.mm', '.h'],
  clean: cleanObjcSource,
};

// Global default registry
export const defaultRegistry = new DialectRegistry();
defaultRegistry.register(swiftDialect);
defaultRegistry.register(objcDialect);
