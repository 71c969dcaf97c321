/** Before and after text of one file */
export interface FileChangePreview {
  filePath: string;
  originalContent: string;
  newContent: string;
}

type LineOp = { type: 'same' | 'removed' | 'added'; text: string };

const PREFIX: Record<LineOp['type'], string> = { same: '  ', removed: '- ', added: '+ ' };

/** Largest changed region, in table cells, aligned line by line */
export const MAX_ALIGNED_CELLS = 4_000_000;

/**
 * Line diff of two texts. Common leading and trailing lines are matched
 * first; the middle is aligned on its longest common subsequence, or shown
 * as removed then added when it is larger than `MAX_ALIGNED_CELLS`.
 */
export function diffLines(original: string[], updated: string[]): LineOp[] {
  let start = 0;
  while (start < original.length && start < updated.length && original[start] === updated[start]) {
    start++;
  }

  let end = 0;
  while (
    end < original.length - start &&
    end < updated.length - start &&
    original[original.length - 1 - end] === updated[updated.length - 1 - end]
  ) {
    end++;
  }

  const a = original.slice(start, original.length - end);
  const b = updated.slice(start, updated.length - end);
  const ops: LineOp[] = original.slice(0, start).map((text): LineOp => ({ type: 'same', text }));
  const tail = original.slice(original.length - end).map((text): LineOp => ({ type: 'same', text }));

  if (a.length * b.length > MAX_ALIGNED_CELLS) {
    for (const text of a) ops.push({ type: 'removed', text });
    for (const text of b) ops.push({ type: 'added', text });
    return [...ops, ...tail];
  }

  // lcs[i][j] = length of the longest common subsequence of a[i..] and b[j..]
  const lcs: number[][] = Array.from({ length: a.length + 1 }, () => new Array<number>(b.length + 1).fill(0));
  for (let i = a.length - 1; i >= 0; i--) {
    for (let j = b.length - 1; j >= 0; j--) {
      lcs[i][j] = a[i] === b[j] ? lcs[i + 1][j + 1] + 1 : Math.max(lcs[i + 1][j], lcs[i][j + 1]);
    }
  }

  let i = 0;
  let j = 0;
  while (i < a.length || j < b.length) {
    if (i < a.length && j < b.length && a[i] === b[j]) {
      ops.push({ type: 'same', text: a[i] });
      i++;
      j++;
    } else if (i < a.length && (j >= b.length || lcs[i + 1][j] >= lcs[i][j + 1])) {
      ops.push({ type: 'removed', text: a[i] });
      i++;
    } else {
      ops.push({ type: 'added', text: b[j] });
      j++;
    }
  }
  return [...ops, ...tail];
}

/**
 * Generate a diff preview for a file change
 */
export function generateDiffPreview(change: FileChangePreview, contextLines = 3): string {
  const lines: string[] = [];
  lines.push(`--- ${change.filePath}`);
  lines.push(`+++ ${change.filePath}`);
  lines.push('');

  const ops = diffLines(change.originalContent.split('\n'), change.newContent.split('\n'));
  const shown = new Array<boolean>(ops.length).fill(false);
  ops.forEach((op, index) => {
    if (op.type === 'same') return;
    const from = Math.max(0, index - contextLines);
    const to = Math.min(ops.length - 1, index + contextLines);
    for (let k = from; k <= to; k++) shown[k] = true;
  });

  let skipped = false;
  let printed = false;
  ops.forEach((op, index) => {
    if (!shown[index]) {
      skipped = true;
      return;
    }
    if (skipped && printed) lines.push('...');
    skipped = false;
    printed = true;
    lines.push(`${PREFIX[op.type]}${op.text}`);
  });

  return lines.join('\n');
}
