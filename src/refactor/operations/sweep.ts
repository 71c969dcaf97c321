/**
 * Sweep operation - Remove a feature flag from many source files
 *
 * Each file goes through read → clean → write or delete, independently of
 * the others. Files run in batches of `concurrency`; reports come back in the
 * order the files were given.
 */

import * as path from 'node:path';
import { nodeFileSystem, type SourceFileSystem } from '../../core/files.js';
import { DEFAULT_CONCURRENCY } from '../../core/config.js';
import { defaultRegistry, type DialectRegistry } from '../registry.js';
import type { FileReport, SweepOptions, SweepResult } from '../types.js';

export interface SweepDependencies {
  fileSystem?: SourceFileSystem;
  registry?: DialectRegistry;
}

export async function sweep(options: SweepOptions, deps: SweepDependencies = {}): Promise<SweepResult> {
  const fileSystem = deps.fileSystem ?? nodeFileSystem;
  const registry = deps.registry ?? defaultRegistry;
  const batchSize = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);

  const reports: FileReport[] = [];
  for (let i = 0; i < options.files.length; i += batchSize) {
    const batch = options.files.slice(i, i + batchSize);
    const results = await Promise.all(
      batch.map((filePath) => processFile(filePath, options, fileSystem, registry))
    );
    reports.push(...results);
  }

  return summarize(reports);
}

async function processFile(
  filePath: string,
  options: SweepOptions,
  fileSystem: SourceFileSystem,
  registry: DialectRegistry
): Promise<FileReport> {
  const dialect = registry.getForFile(filePath);
  if (!dialect) {
    return {
      filePath,
      status: 'failed',
      error: { kind: 'parse', message: `Unsupported file type: ${path.extname(filePath) || '(none)'}` },
      skipped: [],
    };
  }

  let originalText: string;
  try {
    originalText = await fileSystem.readFile(filePath);
  } catch (error) {
    return { filePath, status: 'failed', error: { kind: 'read', message: errorMessage(error) }, skipped: [] };
  }

  const outcome = dialect.clean(originalText, options.flag);
  if (!outcome.ok) {
    return { filePath, status: 'failed', error: outcome.error, skipped: [], originalText };
  }

  const { skipped } = outcome;

  if (!outcome.edited) {
    return { filePath, status: 'unchanged', skipped, originalText };
  }

  if (outcome.deleteRequested) {
    if (!options.dryRun) {
      try {
        await fileSystem.removeFile(filePath);
      } catch (error) {
        return { filePath, status: 'failed', error: { kind: 'delete', message: errorMessage(error) }, skipped, originalText };
      }
    }
    return { filePath, status: 'deleted', skipped, originalText };
  }

  const newText = outcome.newText ?? originalText;
  if (!options.dryRun) {
    try {
      await fileSystem.writeFileAtomic(filePath, newText);
    } catch (error) {
      return { filePath, status: 'failed', error: { kind: 'write', message: errorMessage(error) }, skipped, originalText };
    }
  }
  return { filePath, status: 'written', skipped, originalText, newText };
}

function summarize(reports: FileReport[]): SweepResult {
  const pathsWith = (status: FileReport['status']) =>
    reports.filter((report) => report.status === status).map((report) => report.filePath);

  return {
    reports,
    written: pathsWith('written'),
    deleted: pathsWith('deleted'),
    unchanged: pathsWith('unchanged'),
    failed: reports.filter((report) => report.status === 'failed'),
  };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
