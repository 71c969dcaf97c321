import { describe, it, expect } from 'vitest';
import { cleanSwiftSource } from '../../src/refactor/operations/swift-cleaner.js';

const FLAG = 'FEATURE_FLAG';

function lines(...text: string[]): string {
  return text.join('\n');
}

describe('cleanSwiftSource', () => {
  it('rewrites a file with a simple flag', () => {
    const source = lines(
      'import Foundation',
      '',
      '#if FEATURE_FLAG',
      'let enabledFeature = true',
      '#endif',
      '',
      'class MyClass {}'
    );

    expect(cleanSwiftSource(source, FLAG)).toEqual({
      ok: true,
      edited: true,
      newText: lines('import Foundation', '', 'let enabledFeature = true', '', 'class MyClass {}'),
      deleteRequested: false,
      skipped: [],
    });
  });

  it('keeps the enabled side of an if/else', () => {
    const source = lines(
      'import Foundation',
      '',
      '#if FEATURE_FLAG',
      'let enabledFeature = true',
      '#else',
      'let enabledFeature = false',
      '#endif',
      '',
      'class MyClass {}'
    );

    const outcome = cleanSwiftSource(source, FLAG);

    expect(outcome.ok && outcome.newText).toBe(
      lines('import Foundation', '', 'let enabledFeature = true', '', 'class MyClass {}')
    );
  });

  it('keeps the #else side of a negated flag', () => {
    const source = lines(
      'import Foundation',
      '',
      '#if !FEATURE_FLAG',
      'let disabledFeature = true',
      '#else',
      'let enabledFeature = true',
      '#endif'
    );

    const outcome = cleanSwiftSource(source, FLAG);

    expect(outcome.ok && outcome.newText).toBe(lines('import Foundation', '', 'let enabledFeature = true'));
  });

  it('resolves blocks nested in other conditions', () => {
    const source = lines(
      'import Foundation',
      '',
      '#if DEBUG',
      '#if FEATURE_FLAG',
      '    let debugFeatureEnabled = true',
      '#else',
      '    let debugFeatureDisabled = true',
      '#endif',
      '#else',
      '#if FEATURE_FLAG',
      '    let releaseFeatureEnabled = true',
      '#else',
      '    let releaseFeatureDisabled = true',
      '#endif',
      '#endif'
    );

    const outcome = cleanSwiftSource(source, FLAG);

    expect(outcome.ok && outcome.newText).toBe(
      lines(
        'import Foundation',
        '',
        '#if DEBUG',
        '    let debugFeatureEnabled = true',
        '#else',
        '    let releaseFeatureEnabled = true',
        '#endif'
      )
    );
  });

  it('resolves several blocks in one file', () => {
    const source = lines(
      'import Foundation',
      '',
      '#if FEATURE_FLAG',
      'let enabledFeature1 = true',
      '#endif',
      '',
      'class MyClass {}',
      '',
      '#if FEATURE_FLAG',
      'extension MyClass {',
      '    func extraFeature() {}',
      '}',
      '#endif'
    );

    const outcome = cleanSwiftSource(source, FLAG);

    expect(outcome.ok && outcome.newText).toBe(
      lines(
        'import Foundation',
        '',
        'let enabledFeature1 = true',
        '',
        'class MyClass {}',
        '',
        'extension MyClass {',
        '    func extraFeature() {}',
        '}'
      )
    );
  });

  it('has nothing left to do on a second pass', () => {
    const source = lines('import Foundation', '', '#if FEATURE_FLAG', 'let enabledFeature = true', '#endif', '');
    const first = cleanSwiftSource(source, FLAG);
    if (!first.ok || first.newText === undefined) throw new Error('expected rewritten text');

    expect(cleanSwiftSource(first.newText, FLAG)).toEqual({
      ok: true,
      edited: false,
      deleteRequested: false,
      skipped: [],
    });
  });

  it('cleans files that use regex literals', () => {
    const source = lines('#if FEATURE_FLAG', 'let pattern = /a(b/', '#endif', '');

    const outcome = cleanSwiftSource(source, FLAG);

    expect(outcome.ok && outcome.newText).toBe('let pattern = /a(b/\n');
  });

  it('leaves a file with an unrelated flag unedited', () => {
    const source = lines('import Foundation', '', '#if UNRELATED_FLAG', 'let unrelatedFeature = true', '#endif');

    expect(cleanSwiftSource(source, FLAG)).toEqual({ ok: true, edited: false, deleteRequested: false, skipped: [] });
  });

  it('requests deletion when only comments remain', () => {
    const source = lines('#if FEATURE_FLAG', '// This file will be empty after processing', '#endif');

    expect(cleanSwiftSource(source, FLAG)).toEqual({ ok: true, edited: true, deleteRequested: true, skipped: [] });
  });

  it('requests deletion when only imports remain', () => {
    const source = lines('import UIKit', '', '#if !FEATURE_FLAG', 'func legacyScreen() {}', '#endif', '');

    const outcome = cleanSwiftSource(source, FLAG);

    expect(outcome).toEqual({ ok: true, edited: true, deleteRequested: true, skipped: [] });
  });

  it('reports blocks that need manual review', () => {
    const source = lines('#if FEATURE_FLAG && DEBUG', 'let a = 1', '#endif', '');

    expect(cleanSwiftSource(source, FLAG)).toEqual({
      ok: true,
      edited: false,
      deleteRequested: false,
      skipped: [{ line: 1, reason: 'condition also depends on DEBUG' }],
    });
  });

  it('returns a parse error for malformed input', () => {
    const source = lines('#if FEATURE_FLAG', 'let a = 1', '');

    expect(cleanSwiftSource(source, FLAG)).toEqual({
      ok: false,
      error: { kind: 'parse', message: "unterminated '#if' starting on line 1", line: 1 },
    });
  });
});
