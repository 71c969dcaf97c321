import { parseSwiftSource, printSourceFile } from '../../parsers/index.js';
import type { CleanOutcome } from '../types.js';
import { isContentFree } from './emptiness.js';
import { rewriteFlag } from './rewriter.js';

/**
 * Remove `flag` from Swift source text.
 *
 * When nothing depends on the flag alone the outcome is `edited: false` and
 * the caller should leave the file as it is. When the rewritten text has no
 * meaningful declaration left, `deleteRequested` is set instead of `newText`.
 */
export function cleanSwiftSource(sourceText: string, flag: string): CleanOutcome {
  const parsed = parseSwiftSource(sourceText);
  if (!parsed.ok) {
    return { ok: false, error: { kind: 'parse', message: parsed.message, line: parsed.line } };
  }

  const { file, edited, skipped } = rewriteFlag(parsed.file, flag);
  if (!edited) {
    return { ok: true, edited: false, deleteRequested: false, skipped };
  }

  const newText = printSourceFile(file);
  const reparsed = parseSwiftSource(newText);
  if (!reparsed.ok) {
    return {
      ok: false,
      error: { kind: 'parse', message: `rewritten source does not parse: ${reparsed.message}`, line: reparsed.line },
    };
  }

  if (isContentFree(reparsed.file)) {
    return { ok: true, edited: true, deleteRequested: true, skipped };
  }

  return { ok: true, edited: true, newText, deleteRequested: false, skipped };
}
