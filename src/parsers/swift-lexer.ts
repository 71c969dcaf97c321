import type { Token, TokenKind, TriviaPiece } from './types.js';

/**
 * Raised by the lexer and parser for input that cannot be turned into a tree.
 * Never escapes `parseSwiftSource`, which turns it into a failed ParseResult.
 */
export class SwiftSyntaxError extends Error {
  constructor(
    message: string,
    readonly line: number
  ) {
    super(message);
    this.name = 'SwiftSyntaxError';
  }
}

const POUND_KEYWORDS = new Map<string, TokenKind>([
  ['#if', 'poundIf'],
  ['#elseif', 'poundElseif'],
  ['#elif', 'poundElseif'],
  ['#else', 'poundElse'],
  ['#endif', 'poundEndif'],
]);

const OPERATOR_CHARS = new Set('/=-+!*%<>&|^~?.');
const PUNCTUATION_CHARS = new Set('(){}[],:;@\\');

/** Keywords after which `/` opens a regex literal rather than dividing */
const EXPRESSION_KEYWORDS = new Set(['return', 'case', 'in', 'where', 'try', 'await', 'throw', 'if', 'guard', 'while', 'else']);

const IDENTIFIER_START = /[\p{L}_$]/u;
const IDENTIFIER_PART = /[\p{L}\p{N}\p{M}_$]/u;

const INTEGER_PATTERN = /0[xX][0-9a-fA-F_]+|0[oO][0-7_]+|0[bB][01_]+|\d[\d_]*/y;
const FRACTION_PATTERN = /\.\d[\d_]*/y;
const EXPONENT_PATTERN = /[eEpP][+-]?\d[\d_]*/y;

/**
 * Swift tokenizer that keeps every character of the input.
 *
 * Each token owns the trivia before it (leading) and the trivia after it up to
 * the next line break (trailing), so printing all tokens in order gives back
 * the original text.
 */
export class SwiftLexer {
  private pos = 0;
  private line = 1;

  constructor(private readonly source: string) {}

  tokenize(): Token[] {
    const tokens: Token[] = [];

    for (;;) {
      const leadingTrivia = this.scanTrivia(false);
      const line = this.line;
      const start = this.pos;

      if (this.pos >= this.source.length) {
        tokens.push({ kind: 'token', tokenKind: 'endOfFile', text: '', leadingTrivia, trailingTrivia: [], line });
        return tokens;
      }

      const tokenKind = this.scanToken(tokens[tokens.length - 1]);
      const text = this.source.slice(start, this.pos);
      const trailingTrivia = this.scanTrivia(true);

      tokens.push({
        kind: 'token',
        tokenKind: tokenKind === 'poundIdentifier' ? POUND_KEYWORDS.get(text) ?? tokenKind : tokenKind,
        text,
        leadingTrivia,
        trailingTrivia,
        line,
      });
    }
  }

  // --- Trivia ---

  private scanTrivia(stopAtLineBreak: boolean): TriviaPiece[] {
    const pieces: TriviaPiece[] = [];

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      const next = this.source[this.pos + 1];

      if (ch === '\n' || ch === '\r') {
        if (stopAtLineBreak) break;
        if (ch === '\r' && next === '\n') {
          this.advance(2);
          pushCount(pieces, 'carriageReturnLineFeeds');
        } else {
          this.advance(1);
          pushCount(pieces, ch === '\n' ? 'newlines' : 'carriageReturns');
        }
      } else if (ch === ' ') {
        this.advance(1);
        pushCount(pieces, 'spaces');
      } else if (ch === '\t') {
        this.advance(1);
        pushCount(pieces, 'tabs');
      } else if (ch === '\v' || ch === '\f') {
        this.advance(1);
        pieces.push({ kind: 'otherWhitespace', text: ch });
      } else if (ch === '/' && next === '/') {
        const text = this.readToLineEnd();
        pieces.push({ kind: text.startsWith('///') ? 'docLineComment' : 'lineComment', text });
      } else if (ch === '/' && next === '*') {
        const text = this.readBlockComment();
        const isDoc = text.startsWith('/**') && text !== '/**/';
        pieces.push({ kind: isDoc ? 'docBlockComment' : 'blockComment', text });
      } else if (ch === '#' && next === '!' && this.pos === 0) {
        pieces.push({ kind: 'shebang', text: this.readToLineEnd() });
      } else {
        break;
      }
    }

    return pieces;
  }

  private readToLineEnd(): string {
    const start = this.pos;
    let end = start;
    while (end < this.source.length && this.source[end] !== '\n' && this.source[end] !== '\r') {
      end++;
    }
    this.advance(end - start);
    return this.source.slice(start, end);
  }

  private readBlockComment(): string {
    const start = this.pos;
    const startLine = this.line;
    let depth = 0;
    let i = start;

    while (i < this.source.length) {
      if (this.source.startsWith('/*', i)) {
        depth++;
        i += 2;
      } else if (this.source.startsWith('*/', i)) {
        depth--;
        i += 2;
        if (depth === 0) {
          this.advance(i - start);
          return this.source.slice(start, i);
        }
      } else {
        i++;
      }
    }

    throw new SwiftSyntaxError('unterminated block comment', startLine);
  }

  // --- Tokens ---

  private scanToken(previous: Token | undefined): TokenKind {
    const ch = this.source[this.pos];
    const next = this.source[this.pos + 1];

    if (ch === '/' && startsExpression(previous)) {
      const end = this.scanRegexLiteral(this.pos);
      if (end !== -1) {
        this.advanceTo(end);
        return 'regexLiteral';
      }
    }

    if (ch === '"') {
      this.advanceTo(this.scanString(this.pos));
      return 'stringLiteral';
    }

    if (ch === '#') {
      const hashes = this.countHashes(this.pos);
      if (this.source[this.pos + hashes] === '"') {
        this.advanceTo(this.scanString(this.pos));
        return 'stringLiteral';
      }
      if (this.source[this.pos + hashes] === '/') {
        const close = this.source.indexOf('/' + '#'.repeat(hashes), this.pos + hashes + 1);
        if (close === -1) {
          throw new SwiftSyntaxError('unterminated regex literal', this.line);
        }
        this.advanceTo(close + 1 + hashes);
        return 'regexLiteral';
      }
      if (next !== undefined && IDENTIFIER_START.test(next)) {
        this.advance(1);
        this.skipIdentifierPart();
        return 'poundIdentifier';
      }
      this.advance(1);
      return 'unknown';
    }

    if (ch === '@' && next !== undefined && IDENTIFIER_START.test(next)) {
      this.advance(1);
      this.skipIdentifierPart();
      return 'attribute';
    }

    if (ch === '`') {
      const close = this.source.indexOf('`', this.pos + 1);
      const lineEnd = this.source.slice(this.pos + 1, close === -1 ? undefined : close).search(/[\r\n]/);
      if (close === -1 || lineEnd !== -1) {
        throw new SwiftSyntaxError('unterminated backtick identifier', this.line);
      }
      this.advanceTo(close + 1);
      return 'identifier';
    }

    if (IDENTIFIER_START.test(ch)) {
      this.skipIdentifierPart();
      return 'identifier';
    }

    if (ch >= '0' && ch <= '9') {
      return this.scanNumber();
    }

    if (OPERATOR_CHARS.has(ch)) {
      this.advance(1);
      while (this.pos < this.source.length && OPERATOR_CHARS.has(this.source[this.pos])) {
        if (this.source[this.pos] === '/' && '/*'.includes(this.source[this.pos + 1] ?? '')) break;
        this.advance(1);
      }
      return 'operator';
    }

    this.advance(1);
    return PUNCTUATION_CHARS.has(ch) ? 'punctuation' : 'unknown';
  }

  private skipIdentifierPart(): void {
    while (this.pos < this.source.length && IDENTIFIER_PART.test(this.source[this.pos])) {
      this.advance(1);
    }
  }

  private scanNumber(): TokenKind {
    const integer = matchAt(INTEGER_PATTERN, this.source, this.pos);
    let end = this.pos + integer.length;
    let kind: TokenKind = 'integerLiteral';

    if (!/^0[xXoObB]/.test(integer)) {
      const fraction = matchAt(FRACTION_PATTERN, this.source, end);
      end += fraction.length;
      const exponent = matchAt(EXPONENT_PATTERN, this.source, end);
      end += exponent.length;
      if (fraction || exponent) kind = 'floatLiteral';
    }

    this.advanceTo(end);
    return kind;
  }

  /** Offset just past a single-line `/.../` literal at `from`, or -1 */
  private scanRegexLiteral(from: number): number {
    const first = this.source[from + 1];
    if (first === undefined || ' \t\r\n'.includes(first)) return -1;

    let i = from + 1;
    while (i < this.source.length) {
      const ch = this.source[i];
      if (ch === '\r' || ch === '\n') return -1;
      if (ch === '/') return i + 1;
      i += ch === '\\' ? 2 : 1;
    }
    return -1;
  }

  private countHashes(from: number): number {
    let count = 0;
    while (this.source[from + count] === '#') count++;
    return count;
  }

  /**
   * Returns the offset just past the string literal starting at `from`
   * (at its first `#` for raw strings, otherwise at its opening quote).
   */
  private scanString(from: number): number {
    const hashes = this.countHashes(from);
    const pounds = '#'.repeat(hashes);
    const quoteStart = from + hashes;
    const multiline = this.source.startsWith('"""', quoteStart);
    const delimiter = (multiline ? '"""' : '"') + pounds;
    const startLine = this.lineAt(from);
    let i = quoteStart + (multiline ? 3 : 1);

    while (i < this.source.length) {
      const ch = this.source[i];

      if (!multiline && (ch === '\n' || ch === '\r')) break;

      if (ch === '\\' && this.source.startsWith(pounds, i + 1)) {
        const escaped = i + 1 + hashes;
        if (this.source[escaped] === '(') {
          i = this.skipInterpolation(escaped + 1, startLine);
        } else {
          i = escaped + 1;
        }
        continue;
      }

      if (this.source.startsWith(delimiter, i)) {
        return i + delimiter.length;
      }

      i++;
    }

    throw new SwiftSyntaxError('unterminated string literal', startLine);
  }

  private skipInterpolation(from: number, startLine: number): number {
    let depth = 1;
    let i = from;

    while (i < this.source.length) {
      const ch = this.source[i];

      if (ch === '"' || (ch === '#' && this.source[i + this.countHashes(i)] === '"')) {
        i = this.scanString(i);
        continue;
      }
      if (ch === '(') depth++;
      if (ch === ')') {
        depth--;
        if (depth === 0) return i + 1;
      }
      i++;
    }

    throw new SwiftSyntaxError('unterminated string interpolation', startLine);
  }

  // --- Position tracking ---

  private advance(count: number): void {
    this.advanceTo(this.pos + count);
  }

  private advanceTo(end: number): void {
    for (let i = this.pos; i < end; i++) {
      const ch = this.source[i];
      if (ch === '\n' || (ch === '\r' && this.source[i + 1] !== '\n')) {
        this.line++;
      }
    }
    this.pos = end;
  }

  private lineAt(offset: number): number {
    let line = this.line;
    for (let i = this.pos; i < offset; i++) {
      if (this.source[i] === '\n') line++;
    }
    return line;
  }
}

/** Whether the token before a `/` leaves room for an expression to begin */
function startsExpression(previous: Token | undefined): boolean {
  if (!previous) return true;
  switch (previous.tokenKind) {
    case 'identifier':
      return EXPRESSION_KEYWORDS.has(previous.text);
    case 'integerLiteral':
    case 'floatLiteral':
    case 'stringLiteral':
    case 'regexLiteral':
    case 'poundIdentifier':
      return false;
    case 'punctuation':
      return previous.text !== ')' && previous.text !== ']' && previous.text !== '}';
    default:
      return true;
  }
}

function pushCount(
  pieces: TriviaPiece[],
  kind: 'newlines' | 'carriageReturns' | 'carriageReturnLineFeeds' | 'spaces' | 'tabs'
): void {
  const last = pieces[pieces.length - 1];
  if (last && last.kind === kind && 'count' in last) {
    pieces[pieces.length - 1] = { kind, count: last.count + 1 };
  } else {
    pieces.push({ kind, count: 1 });
  }
}

function matchAt(pattern: RegExp, source: string, offset: number): string {
  pattern.lastIndex = offset;
  return pattern.exec(source)?.[0] ?? '';
}

export function tokenizeSwift(source: string): Token[] {
  return new SwiftLexer(source).tokenize();
}
