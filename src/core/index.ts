// Core exports
export { loadProjectConfig, mergeWithDefaults, isPositiveInteger, DEFAULT_CONCURRENCY } from './config.js';
export type { FlagsweepConfig, ResolvedConfig } from './config.js';
export { collectSourceFiles, findFlaggedFiles, DEFAULT_IGNORE } from './search.js';
export type { SearchDependencies, SearchOptions, SearchResult } from './search.js';
export { nodeFileSystem } from './files.js';
export type { SourceFileSystem } from './files.js';

import { loadProjectConfig, mergeWithDefaults, type ResolvedConfig } from './config.js';

/**
 * Resolve the project config for `rootDir`, automatically loaded and merged
 * with defaults
 */
export function resolveProjectConfig(
  rootDir: string,
  supportedExtensions: string[],
  fallbackConcurrency?: number
): ResolvedConfig {
  const projectConfig = loadProjectConfig(rootDir);
  return mergeWithDefaults(projectConfig, supportedExtensions, fallbackConcurrency);
}
