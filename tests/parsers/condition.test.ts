import { describe, it, expect } from 'vitest';
import { conditionText, parseCondition } from '../../src/parsers/condition.js';
import { tokenizeSwift } from '../../src/parsers/swift-lexer.js';
import type { Token } from '../../src/parsers/types.js';

function tokens(source: string): Token[] {
  return tokenizeSwift(source).filter((token) => token.tokenKind !== 'endOfFile');
}

describe('parseCondition', () => {
  it('parses a bare flag', () => {
    expect(parseCondition(tokens('FLAG'))).toEqual({ ok: true, expr: { kind: 'identifier', name: 'FLAG' } });
  });

  it('parses negation', () => {
    expect(parseCondition(tokens('!FLAG'))).toEqual({
      ok: true,
      expr: { kind: 'not', operand: { kind: 'identifier', name: 'FLAG' } },
    });
  });

  it('binds && tighter than ||', () => {
    expect(parseCondition(tokens('A && B || C'))).toEqual({
      ok: true,
      expr: {
        kind: 'or',
        left: {
          kind: 'and',
          left: { kind: 'identifier', name: 'A' },
          right: { kind: 'identifier', name: 'B' },
        },
        right: { kind: 'identifier', name: 'C' },
      },
    });
  });

  it('splits operator runs written without spaces', () => {
    expect(parseCondition(tokens('A&&!B'))).toEqual({
      ok: true,
      expr: {
        kind: 'and',
        left: { kind: 'identifier', name: 'A' },
        right: { kind: 'not', operand: { kind: 'identifier', name: 'B' } },
      },
    });
  });

  it('keeps parentheses', () => {
    expect(parseCondition(tokens('(A || B) && C'))).toEqual({
      ok: true,
      expr: {
        kind: 'and',
        left: {
          kind: 'parenthesized',
          inner: {
            kind: 'or',
            left: { kind: 'identifier', name: 'A' },
            right: { kind: 'identifier', name: 'B' },
          },
        },
        right: { kind: 'identifier', name: 'C' },
      },
    });
  });

  it('parses integer and boolean literals', () => {
    expect(parseCondition(tokens('0'))).toEqual({ ok: true, expr: { kind: 'integerLiteral', text: '0', value: 0 } });
    expect(parseCondition(tokens('1_0'))).toEqual({ ok: true, expr: { kind: 'integerLiteral', text: '1_0', value: 10 } });
    expect(parseCondition(tokens('true'))).toEqual({ ok: true, expr: { kind: 'booleanLiteral', value: true } });
  });

  describe('unsupported conditions', () => {
    const cases: Array<[string, string]> = [
      ['os(iOS)', "'os(...)' checks are not supported"],
      ['swift(>=5.9)', "'swift(...)' checks are not supported"],
      ['!!A', "unsupported operator '!!'"],
      ['A == B', "unsupported operator '=='"],
      ['A ||', 'condition ends unexpectedly'],
      ['(A', "expected ')' but found 'end of condition'"],
      ['A B', "unexpected 'B'"],
      ['A, B', "unexpected ','"],
      ['', 'empty condition'],
    ];

    it.each(cases)('rejects %j', (source, reason) => {
      expect(parseCondition(tokens(source))).toEqual({ ok: false, reason });
    });
  });
});

describe('conditionText', () => {
  it('keeps the spacing of the source', () => {
    expect(conditionText(tokens('A && !B'))).toBe('A && !B');
    expect(conditionText(tokens('A&&!B'))).toBe('A&&!B');
    expect(conditionText(tokens('os(iOS) || FLAG'))).toBe('os(iOS) || FLAG');
  });
});
