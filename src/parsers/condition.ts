import type { ConditionExpr, ConditionParse, Token } from './types.js';

type ConditionPiece =
  | { kind: 'operand'; expr: ConditionExpr }
  | { kind: 'operator'; text: '!' | '&&' | '||' }
  | { kind: 'paren'; text: '(' | ')' };

class UnsupportedCondition extends Error {}

/**
 * Parse the tokens of an `#if`/`#elseif` condition.
 *
 * Supported forms are identifiers, integer and boolean literals, `!`, `&&`,
 * `||` and parentheses. Anything else, including platform checks such as
 * `os(iOS)` or `swift(>=5.9)`, yields `{ ok: false }`.
 */
export function parseCondition(tokens: readonly Token[]): ConditionParse {
  try {
    const pieces = splitPieces(tokens);
    if (pieces.length === 0) {
      return { ok: false, reason: 'empty condition' };
    }
    const parser = new ConditionParser(pieces);
    const expr = parser.parseOr();
    if (!parser.atEnd()) {
      throw new UnsupportedCondition(`unexpected '${describe(parser.peek())}'`);
    }
    return { ok: true, expr };
  } catch (error) {
    if (error instanceof UnsupportedCondition) {
      return { ok: false, reason: error.message };
    }
    throw error;
  }
}

/** Source text of a condition, for messages */
export function conditionText(tokens: readonly Token[]): string {
  return tokens
    .map((token, index) => {
      const previous = tokens[index - 1];
      const spaced = previous !== undefined && (previous.trailingTrivia.length > 0 || token.leadingTrivia.length > 0);
      return (spaced ? ' ' : '') + token.text;
    })
    .join('');
}

function splitPieces(tokens: readonly Token[]): ConditionPiece[] {
  const pieces: ConditionPiece[] = [];

  tokens.forEach((token, index) => {
    switch (token.tokenKind) {
      case 'identifier': {
        const following = tokens[index + 1];
        if (following && following.tokenKind === 'punctuation' && following.text === '(') {
          throw new UnsupportedCondition(`'${token.text}(...)' checks are not supported`);
        }
        if (token.text === 'true' || token.text === 'false') {
          pieces.push({ kind: 'operand', expr: { kind: 'booleanLiteral', value: token.text === 'true' } });
        } else {
          pieces.push({ kind: 'operand', expr: { kind: 'identifier', name: token.text } });
        }
        break;
      }
      case 'integerLiteral': {
        const value = Number(token.text.replace(/_/g, ''));
        if (!Number.isFinite(value)) {
          throw new UnsupportedCondition(`invalid integer '${token.text}'`);
        }
        pieces.push({ kind: 'operand', expr: { kind: 'integerLiteral', text: token.text, value } });
        break;
      }
      case 'operator':
        pieces.push(...splitOperator(token.text));
        break;
      case 'punctuation':
        if (token.text === '(' || token.text === ')') {
          pieces.push({ kind: 'paren', text: token.text });
          break;
        }
        throw new UnsupportedCondition(`unexpected '${token.text}'`);
      default:
        throw new UnsupportedCondition(`unexpected '${token.text}'`);
    }
  });

  return pieces;
}

// `A&&!B` lexes as one operator run; split it back into its parts.
function splitOperator(text: string): ConditionPiece[] {
  const pieces: ConditionPiece[] = [];
  const pattern = /&&|\|\||!/y;
  let offset = 0;

  while (offset < text.length) {
    pattern.lastIndex = offset;
    const match = pattern.exec(text);
    if (!match) {
      throw new UnsupportedCondition(`unsupported operator '${text}'`);
    }
    const op = match[0];
    if (op !== '!' && op !== '&&' && op !== '||') {
      throw new UnsupportedCondition(`unsupported operator '${text}'`);
    }
    const previous = pieces[pieces.length - 1];
    if (op === '!' && previous && previous.kind === 'operator' && previous.text === '!') {
      throw new UnsupportedCondition(`unsupported operator '${text}'`);
    }
    pieces.push({ kind: 'operator', text: op });
    offset += op.length;
  }

  return pieces;
}

function describe(piece: ConditionPiece | undefined): string {
  if (!piece) return 'end of condition';
  if (piece.kind === 'operand') {
    switch (piece.expr.kind) {
      case 'identifier':
        return piece.expr.name;
      case 'integerLiteral':
        return piece.expr.text;
      case 'booleanLiteral':
        return String(piece.expr.value);
      default:
        return 'expression';
    }
  }
  return piece.text;
}

/**
 * Recursive descent over the grammar
 *   or      := and ('||' and)*
 *   and     := unary ('&&' unary)*
 *   unary   := '!' unary | primary
 *   primary := operand | '(' or ')'
 */
class ConditionParser {
  private index = 0;

  constructor(private readonly pieces: ConditionPiece[]) {}

  peek(): ConditionPiece | undefined {
    return this.pieces[this.index];
  }

  atEnd(): boolean {
    return this.index >= this.pieces.length;
  }

  parseOr(): ConditionExpr {
    let left = this.parseAnd();
    while (this.isOperator('||')) {
      this.index++;
      left = { kind: 'or', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ConditionExpr {
    let left = this.parseUnary();
    while (this.isOperator('&&')) {
      this.index++;
      left = { kind: 'and', left, right: this.parseUnary() };
    }
    return left;
  }

  private parseUnary(): ConditionExpr {
    if (this.isOperator('!')) {
      this.index++;
      return { kind: 'not', operand: this.parseUnary() };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): ConditionExpr {
    const piece = this.peek();
    if (!piece) {
      throw new UnsupportedCondition('condition ends unexpectedly');
    }
    if (piece.kind === 'operand') {
      this.index++;
      return piece.expr;
    }
    if (piece.kind === 'paren' && piece.text === '(') {
      this.index++;
      const inner = this.parseOr();
      const close = this.peek();
      if (!close || close.kind !== 'paren' || close.text !== ')') {
        throw new UnsupportedCondition(`expected ')' but found '${describe(close)}'`);
      }
      this.index++;
      return { kind: 'parenthesized', inner };
    }
    throw new UnsupportedCondition(`unexpected '${describe(piece)}'`);
  }

  private isOperator(text: '!' | '&&' | '||'): boolean {
    const piece = this.peek();
    return piece !== undefined && piece.kind === 'operator' && piece.text === text;
  }
}
