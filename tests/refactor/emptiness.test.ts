import { describe, it, expect } from 'vitest';
import { isContentFree } from '../../src/refactor/operations/emptiness.js';
import { parseSwiftSource } from '../../src/parsers/swift.js';

function contentFree(source: string): boolean {
  const result = parseSwiftSource(source);
  if (!result.ok) throw new Error(result.message);
  return isContentFree(result.file);
}

describe('isContentFree', () => {
  it('accepts an empty file', () => {
    expect(contentFree('')).toBe(true);
  });

  it('accepts comments only', () => {
    expect(contentFree('// Comment\n/*\n  Comment\n*/\n/// Comment\n')).toBe(true);
  });

  it('accepts imports only', () => {
    expect(contentFree('import UIKit\nimport ABC\n')).toBe(true);
  });

  it('accepts top-level statements', () => {
    expect(contentFree('print("hi")\n')).toBe(true);
  });

  it.each([
    ['struct A {}'],
    ['enum E { case a }'],
    ['protocol P {}'],
    ['extension String {}'],
    ['actor Store {}'],
    ['typealias ID = String'],
    ['func f() {}'],
    ['@discardableResult\npublic func f() -> Int { 1 }'],
    ['let x = 1'],
    ['private var y = 2'],
    ['macro M() = #externalMacro(module: "A", type: "B")'],
    ['#Preview {}'],
  ])('rejects %j', (source) => {
    expect(contentFree(`import Foundation\n${source}\n`)).toBe(false);
  });

  it('looks inside the clauses of remaining blocks', () => {
    expect(contentFree('#if DEBUG\n#else\nlet x = 1\n#endif\n')).toBe(false);
  });

  it('looks inside groups of other statements', () => {
    expect(contentFree('run {\n    let x = 1\n}\n')).toBe(false);
  });
});
