import type { CleanOutcome, SkippedBlock } from '../types.js';

const DIRECTIVES = ['if', 'ifdef'] as const;

const CONDITIONAL_LINE = /^[ \t]*#[ \t]*(?:if|ifdef|ifndef|elif)\b/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function blockPattern(directive: (typeof DIRECTIVES)[number], flag: string): RegExp {
  return new RegExp(
    `#${directive}[ \\t]+${escapeRegExp(flag)}(?![A-Za-z0-9_])[ \\t]*(?://.*|/\\*.*?\\*/[ \\t]*)?\\r?\\n` +
      '([\\s\\S]*?)' +
      '(?:#elif.*\\n[\\s\\S]*?)?' +
      '(?:#else.*\\n[\\s\\S]*?)?' +
      '#endif.*\\n?',
    'g'
  );
}

/** Conditional directives still naming the flag, by line of `text` */
function findLeftoverDirectives(text: string, flag: string): SkippedBlock[] {
  const mention = new RegExp(`(?<![A-Za-z0-9_])${escapeRegExp(flag)}(?![A-Za-z0-9_])`);
  const skipped: SkippedBlock[] = [];
  text.split('\n').forEach((line, index) => {
    if (CONDITIONAL_LINE.test(line) && mention.test(line)) {
      skipped.push({ line: index + 1, reason: `unsupported directive '${line.trim()}'` });
    }
  });
  return skipped;
}

/**
 * Remove `flag` from Objective-C or C header text by pattern substitution.
 *
 * Every `#if FLAG` or `#ifdef FLAG` block is replaced by its first branch.
 * Only a comment may follow the flag on the directive line. Blocks are
 * matched lazily and do not nest. Directives with negated or compound
 * conditions are left alone and reported as skipped, by their line in the
 * cleaned text. Never requests deletion.
 */
export function cleanObjcSource(sourceText: string, flag: string): CleanOutcome {
  let text = sourceText;
  for (const directive of DIRECTIVES) {
    text = text.replace(blockPattern(directive, flag), '$1');
  }

  const skipped = findLeftoverDirectives(text, flag);
  if (text === sourceText) {
    return { ok: true, edited: false, deleteRequested: false, skipped };
  }
  return { ok: true, edited: true, newText: text, deleteRequested: false, skipped };
}
