import { describe, it, expect } from 'vitest';
import { diffLines, generateDiffPreview, MAX_ALIGNED_CELLS } from '../../src/refactor/operations/preview.js';

describe('diffLines', () => {
  it('marks removed lines', () => {
    expect(diffLines(['a', 'b', 'c'], ['a', 'c'])).toEqual([
      { type: 'same', text: 'a' },
      { type: 'removed', text: 'b' },
      { type: 'same', text: 'c' },
    ]);
  });

  it('lists removals before additions for a replaced line', () => {
    expect(diffLines(['a', 'b', 'c'], ['a', 'x', 'c'])).toEqual([
      { type: 'same', text: 'a' },
      { type: 'removed', text: 'b' },
      { type: 'added', text: 'x' },
      { type: 'same', text: 'c' },
    ]);
  });

  it('handles identical input', () => {
    expect(diffLines(['a'], ['a'])).toEqual([{ type: 'same', text: 'a' }]);
  });

  it('shows a large changed region as removed then added', () => {
    const size = Math.ceil(Math.sqrt(MAX_ALIGNED_CELLS)) + 1;
    const original = Array.from({ length: size }, (_, i) => `line ${i}`);
    const updated = [...original];
    updated[0] = 'first';
    updated[size - 1] = 'last';

    const ops = diffLines(original, updated);

    expect(ops).toHaveLength(size * 2);
    expect(ops[0]).toEqual({ type: 'removed', text: 'line 0' });
    expect(ops[size - 1]).toEqual({ type: 'removed', text: `line ${size - 1}` });
    expect(ops[size]).toEqual({ type: 'added', text: 'first' });
    expect(ops[size * 2 - 1]).toEqual({ type: 'added', text: 'last' });
  });
});

describe('generateDiffPreview', () => {
  it('shows a header and the changed lines with context', () => {
    const preview = generateDiffPreview({
      filePath: 'App/Feature.swift',
      originalContent: '#if FLAG\nlet a = 1\n#endif',
      newContent: 'let a = 1',
    });

    expect(preview).toBe(['--- App/Feature.swift', '+++ App/Feature.swift', '', '- #if FLAG', '  let a = 1', '- #endif'].join('\n'));
  });

  it('separates distant changes', () => {
    const original = Array.from({ length: 10 }, (_, i) => `l${i + 1}`);
    const updated = [...original];
    updated[0] = 'x1';
    updated[9] = 'x10';

    const preview = generateDiffPreview(
      { filePath: 'a.swift', originalContent: original.join('\n'), newContent: updated.join('\n') },
      1
    );

    expect(preview.split('\n').slice(3)).toEqual(['- l1', '+ x1', '  l2', '...', '  l9', '- l10', '+ x10']);
  });
});
