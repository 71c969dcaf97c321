import { describe, it, expect } from 'vitest';
import { collectFlagReferences, evaluateCondition } from '../../src/refactor/operations/conditions.js';
import { selectClause } from '../../src/refactor/operations/clauses.js';
import { parseCondition } from '../../src/parsers/condition.js';
import { parseSwiftSource } from '../../src/parsers/swift.js';
import { tokenizeSwift } from '../../src/parsers/swift-lexer.js';
import type { ConditionalBlock, ConditionExpr } from '../../src/parsers/types.js';

function firstBlock(source: string): ConditionalBlock {
  const result = parseSwiftSource(source);
  if (!result.ok) throw new Error(result.message);
  const block = result.file.items.find((item) => item.kind === 'conditionalBlock');
  if (!block || block.kind !== 'conditionalBlock') throw new Error('no conditional block');
  return block;
}

function expr(source: string): ConditionExpr {
  const parsed = parseCondition(tokenizeSwift(source).filter((token) => token.tokenKind !== 'endOfFile'));
  if (!parsed.ok) throw new Error(parsed.reason);
  return parsed.expr;
}

describe('collectFlagReferences', () => {
  it('collects names from every clause condition', () => {
    const refs = collectFlagReferences(firstBlock('#if A && !B\n#elseif C\n#else\n#endif'));

    expect([...refs.names].sort()).toEqual(['A', 'B', 'C']);
    expect(refs.unsupported).toEqual([]);
  });

  it('ignores literals', () => {
    const refs = collectFlagReferences(firstBlock('#if FLAG || 0 && false\n#endif'));

    expect([...refs.names]).toEqual(['FLAG']);
  });

  it('reports conditions it cannot parse', () => {
    const refs = collectFlagReferences(firstBlock('#if FLAG\n#elseif os(iOS)\n#endif'));

    expect([...refs.names]).toEqual(['FLAG']);
    expect(refs.unsupported).toEqual(['os(iOS)']);
  });

  it('does not look into nested blocks', () => {
    const refs = collectFlagReferences(firstBlock('#if A\n#if B\n#endif\n#endif'));

    expect([...refs.names]).toEqual(['A']);
  });
});

describe('evaluateCondition', () => {
  const cases: Array<[string, boolean]> = [
    ['FLAG', true],
    ['!FLAG', false],
    ['(FLAG)', true],
    ['!(0)', true],
    ['FLAG && 0', false],
    ['FLAG || 0', true],
    ['0 || FLAG', true],
    ['!(FLAG && 0)', true],
    ['!FLAG || FLAG', true],
    ['true && !FLAG', false],
    ['false || FLAG', true],
    ['1', true],
    ['0', false],
  ];

  it.each(cases)('%s is %s', (source, expected) => {
    expect(evaluateCondition(expr(source))).toBe(expected);
  });

  it('evaluates && and || strictly left to right', () => {
    expect(evaluateCondition(expr('FLAG || 0 && 0'))).toBe(false);
  });
});

describe('selectClause', () => {
  it('picks the first clause that holds', () => {
    const block = firstBlock('#if !FLAG\nlet a = 1\n#elseif FLAG\nlet b = 2\n#else\nlet c = 3\n#endif');

    expect(selectClause(block)).toBe(block.clauses[1]);
  });

  it('falls back to #else', () => {
    const block = firstBlock('#if !FLAG\n#else\nlet c = 3\n#endif');

    expect(selectClause(block)).toBe(block.clauses[1]);
  });

  it('returns undefined when nothing holds', () => {
    expect(selectClause(firstBlock('#if !FLAG\nlet a = 1\n#endif'))).toBeUndefined();
  });

  it('prefers an earlier clause over #else even with an empty body', () => {
    const block = firstBlock('#if FLAG\n#else\nlet c = 3\n#endif');

    expect(selectClause(block)).toBe(block.clauses[0]);
  });
});
