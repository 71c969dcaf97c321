// ============================================================================
// Clean Errors
// ============================================================================

/** Which step of processing a file failed */
export type CleanErrorKind =
  | 'parse'   // lexer or parser rejected the source
  | 'read'    // the file could not be read
  | 'write'   // the rewritten text could not be written
  | 'delete'; // the emptied file could not be removed

/** A per-file failure, returned as a value and never thrown across modules */
export interface CleanError {
  kind: CleanErrorKind;
  message: string;
  /** 1-based line the parser stopped at, for parse failures */
  line?: number;
}

// ============================================================================
// Clean Outcomes
// ============================================================================

/** A conditional block that mentions the flag but could not be resolved */
export interface SkippedBlock {
  /** 1-based line of the opening `#if` */
  line: number;
  /** Why the block was left alone */
  reason: string;
}

/** Result of cleaning the text of one file */
export type CleanOutcome =
  | {
      ok: true;
      /** Whether any block on the flag was resolved */
      edited: boolean;
      /** Rewritten text; absent when unedited or when the file should go */
      newText?: string;
      /** The rewritten file has no meaningful declaration left */
      deleteRequested: boolean;
      skipped: SkippedBlock[];
    }
  | { ok: false; error: CleanError };

/** Cleans the source text of one dialect for one flag */
export type SourceCleaner = (sourceText: string, flag: string) => CleanOutcome;

// ============================================================================
// File Reports
// ============================================================================

/** Terminal state of one file after a sweep */
export type FileStatus = 'written' | 'deleted' | 'unchanged' | 'failed';

export interface FileReport {
  /** Absolute path of the file */
  filePath: string;
  status: FileStatus;
  /** Present when status is 'failed' */
  error?: CleanError;
  /** Blocks mentioning the flag that need manual review */
  skipped: SkippedBlock[];
  /** Text before cleaning, when it was read */
  originalText?: string;
  /** Text after cleaning, for 'written' files */
  newText?: string;
}

/** Options for a batch run over many files */
export interface SweepOptions {
  /** Flag to resolve as permanently enabled */
  flag: string;
  /** Absolute paths of the files to process */
  files: string[];
  /** Compute outcomes without touching the disk */
  dryRun?: boolean;
  /** Files processed at the same time (default 8) */
  concurrency?: number;
}

export interface SweepResult {
  /** One report per input file, in input order */
  reports: FileReport[];
  written: string[];
  deleted: string[];
  unchanged: string[];
  failed: FileReport[];
}

// ============================================================================
// Command Options
// ============================================================================

/** Options for the clean command */
export interface CleanCommandOptions {
  /** Flag to remove */
  flag: string;
  /** Directory to search (defaults to the working directory) */
  path?: string;
  /** Preview without making changes */
  dryRun?: boolean;
  /** Skip confirmation prompt */
  yes?: boolean;
  /** Output as JSON */
  json?: boolean;
  /** Print one line per file */
  verbose?: boolean;
  /** Files processed at the same time */
  concurrency?: number;
}
