/**
 * Refactoring Module
 *
 * Resolves a feature flag out of conditional compilation blocks, one file at
 * a time or as a batch sweep.
 */

export type {
  CleanErrorKind,
  CleanError,
  SkippedBlock,
  CleanOutcome,
  SourceCleaner,
  FileStatus,
  FileReport,
  SweepOptions,
  SweepResult,
  CleanCommandOptions,
} from './types.js';

export { DialectRegistry, defaultRegistry, swiftDialect, objcDialect, type SourceDialect } from './registry.js';

// Operations
export { collectFlagReferences, evaluateCondition, type FlagReferences } from './operations/conditions.js';
export { selectClause } from './operations/clauses.js';
export { rewriteFlag, type RewriteResult } from './operations/rewriter.js';
export { isContentFree } from './operations/emptiness.js';
export { cleanSwiftSource } from './operations/swift-cleaner.js';
export { cleanObjcSource } from './operations/objc-cleaner.js';
export { sweep, type SweepDependencies } from './operations/sweep.js';
export { generateDiffPreview, diffLines, type FileChangePreview } from './operations/preview.js';
