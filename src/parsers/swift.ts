import { parseCondition } from './condition.js';
import { SwiftLexer, SwiftSyntaxError } from './swift-lexer.js';
import type {
  Clause,
  ClauseKind,
  ConditionalBlock,
  Declaration,
  DeclarationKind,
  DeclarationNode,
  Group,
  Item,
  ParseResult,
  SourceFile,
  Token,
} from './types.js';
import { startsNewLine } from './types.js';

const CLOSERS = new Map([
  ['(', ')'],
  ['{', '}'],
  ['[', ']'],
]);

const MODIFIERS = new Set([
  'public',
  'private',
  'fileprivate',
  'internal',
  'open',
  'package',
  'static',
  'final',
  'override',
  'mutating',
  'nonmutating',
  'lazy',
  'weak',
  'unowned',
  'dynamic',
  'optional',
  'required',
  'convenience',
  'indirect',
  'nonisolated',
  'isolated',
  'distributed',
  'prefix',
  'postfix',
  'infix',
  'consuming',
  'borrowing',
]);

const DECLARATION_KEYWORDS = new Map<string, DeclarationKind>([
  ['struct', 'type'],
  ['enum', 'type'],
  ['protocol', 'type'],
  ['class', 'type'],
  ['extension', 'type'],
  ['actor', 'type'],
  ['typealias', 'typeAlias'],
  ['func', 'function'],
  ['init', 'function'],
  ['deinit', 'function'],
  ['subscript', 'function'],
  ['let', 'variable'],
  ['var', 'variable'],
  ['macro', 'macro'],
  ['import', 'import'],
]);

/** Keywords that may start a line yet still belong to the previous one */
const CONTINUATION_KEYWORDS = new Set(['{', 'else', 'catch', 'where', 'throws', 'rethrows', 'async']);

/** `class` acts as a modifier before these */
const CLASS_MEMBER_KEYWORDS = new Set(['func', 'var', 'let', 'subscript', 'init']);

/**
 * Parse Swift source text into a trivia-preserving tree.
 *
 * The tree is coarse: it models conditional compilation blocks, bracketed
 * groups and line-delimited declarations, which is all the flag rewriting
 * needs. Printing the tree reproduces `source` exactly.
 */
export function parseSwiftSource(source: string): ParseResult {
  try {
    const tokens = new SwiftLexer(source).tokenize();
    const file = new SwiftParser(tokens).parseFile();
    return { ok: true, file };
  } catch (error) {
    if (error instanceof SwiftSyntaxError) {
      return { ok: false, line: error.line, message: error.message };
    }
    throw error;
  }
}

export class SwiftParser {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  parseFile(): SourceFile {
    const items = this.parseItems();
    const token = this.peek();

    if (token.tokenKind !== 'endOfFile') {
      if (isPoundDirective(token)) {
        throw new SwiftSyntaxError(`'${token.text}' without a matching '#if'`, token.line);
      }
      throw new SwiftSyntaxError(`unexpected '${token.text}'`, token.line);
    }

    return { kind: 'sourceFile', items, endOfFile: token };
  }

  // --- Items ---

  /** Parse items until end of file, a closing bracket or a clause directive */
  private parseItems(): Item[] {
    const items: Item[] = [];

    for (;;) {
      const token = this.peek();
      if (token.tokenKind === 'endOfFile' || isCloser(token)) break;
      if (token.tokenKind === 'poundIf') {
        items.push(this.parseConditionalBlock());
        continue;
      }
      if (isPoundDirective(token)) break;
      items.push(this.parseDeclaration());
    }

    return items;
  }

  private parseDeclaration(): Declaration {
    const nodes: DeclarationNode[] = [];

    for (;;) {
      const token = this.peek();
      if (token.tokenKind === 'endOfFile' || isCloser(token) || isPoundDirective(token)) break;
      if (nodes.length > 0 && startsNewLine(token) && !continuesDeclaration(token, nodes)) break;

      if (isOpener(token)) {
        nodes.push(this.parseGroup());
        continue;
      }

      this.index++;
      nodes.push(token);
      if (token.tokenKind === 'punctuation' && token.text === ';') break;
    }

    return { kind: 'declaration', declarationKind: classifyDeclaration(nodes), nodes };
  }

  private parseGroup(): Group {
    const open = this.advance();
    const expected = CLOSERS.get(open.text);
    const items = this.parseItems();
    const close = this.peek();

    if (close.tokenKind === 'endOfFile') {
      throw new SwiftSyntaxError(`unterminated '${open.text}' opened on line ${open.line}`, open.line);
    }
    if (close.text !== expected) {
      const found = isPoundDirective(close) ? close.text : `'${close.text}'`;
      throw new SwiftSyntaxError(
        `expected '${expected}' to close '${open.text}' from line ${open.line} but found ${found}`,
        close.line
      );
    }

    this.index++;
    return { kind: 'group', open, items, close };
  }

  // --- Conditional compilation ---

  private parseConditionalBlock(): ConditionalBlock {
    const ifToken = this.peek();
    const clauses: Clause[] = [];
    let clauseKind: ClauseKind = 'if';

    for (;;) {
      const poundKeyword = this.advance();
      let clause: Clause;

      if (clauseKind === 'else') {
        this.expectLineEnd(poundKeyword);
        clause = { clauseKind, poundKeyword, conditionTokens: [], body: this.parseItems() };
      } else {
        const conditionTokens = this.parseConditionTokens();
        clause = {
          clauseKind,
          poundKeyword,
          conditionTokens,
          condition: parseCondition(conditionTokens),
          body: this.parseItems(),
        };
      }
      clauses.push(clause);

      const next = this.peek();
      switch (next.tokenKind) {
        case 'poundElseif':
          if (clauseKind === 'else') {
            throw new SwiftSyntaxError(`'${next.text}' after '#else'`, next.line);
          }
          clauseKind = 'elseif';
          break;
        case 'poundElse':
          if (clauseKind === 'else') {
            throw new SwiftSyntaxError(`duplicate '#else'`, next.line);
          }
          clauseKind = 'else';
          break;
        case 'poundEndif': {
          const endif = this.advance();
          this.expectLineEnd(endif);
          return { kind: 'conditionalBlock', clauses, endif };
        }
        case 'endOfFile':
          throw new SwiftSyntaxError(`unterminated '#if' starting on line ${ifToken.line}`, ifToken.line);
        default:
          throw new SwiftSyntaxError(
            `unexpected '${next.text}' inside '#if' block from line ${ifToken.line}`,
            next.line
          );
      }
    }
  }

  /** Condition tokens run to the end of the line, or further while unbalanced */
  private parseConditionTokens(): Token[] {
    const tokens: Token[] = [];
    let depth = 0;

    for (;;) {
      const token = this.peek();
      if (token.tokenKind === 'endOfFile' || isPoundDirective(token)) break;

      const last = tokens[tokens.length - 1];
      const continues = depth > 0 || (last !== undefined && last.tokenKind === 'operator');
      if (startsNewLine(token) && !continues) break;

      if (token.text === '(' && token.tokenKind === 'punctuation') depth++;
      if (token.text === ')' && token.tokenKind === 'punctuation') depth--;
      tokens.push(token);
      this.index++;
    }

    return tokens;
  }

  private expectLineEnd(directive: Token): void {
    const next = this.peek();
    if (next.tokenKind !== 'endOfFile' && !startsNewLine(next)) {
      throw new SwiftSyntaxError(`unexpected '${next.text}' after '${directive.text}'`, next.line);
    }
  }

  // --- Cursor ---

  private peek(): Token {
    return this.tokens[Math.min(this.index, this.tokens.length - 1)];
  }

  private advance(): Token {
    const token = this.peek();
    this.index++;
    return token;
  }
}

function isOpener(token: Token): boolean {
  return token.tokenKind === 'punctuation' && CLOSERS.has(token.text);
}

function isCloser(token: Token): boolean {
  return token.tokenKind === 'punctuation' && (token.text === ')' || token.text === '}' || token.text === ']');
}

function isPoundDirective(token: Token): boolean {
  return (
    token.tokenKind === 'poundIf' ||
    token.tokenKind === 'poundElseif' ||
    token.tokenKind === 'poundElse' ||
    token.tokenKind === 'poundEndif'
  );
}

function isModifierToken(node: DeclarationNode, next: DeclarationNode | undefined): boolean {
  if (node.kind !== 'token') return false;
  if (node.tokenKind === 'attribute') return true;
  if (node.tokenKind !== 'identifier') return false;
  if (MODIFIERS.has(node.text)) return true;
  return (
    node.text === 'class' && next !== undefined && next.kind === 'token' && CLASS_MEMBER_KEYWORDS.has(next.text)
  );
}

function lastToken(node: DeclarationNode): Token {
  return node.kind === 'group' ? node.close : node;
}

/**
 * Whether `token`, which starts a new line, still belongs to the declaration
 * made of `nodes`.
 */
function continuesDeclaration(token: Token, nodes: DeclarationNode[]): boolean {
  if (token.tokenKind === 'operator' && token.text !== '!') return true;
  if (CONTINUATION_KEYWORDS.has(token.text)) return true;

  const last = lastToken(nodes[nodes.length - 1]);
  // An operator with whitespace before it is binary and wants a right operand.
  if (last.tokenKind === 'operator' && spacedBefore(last, nodes[nodes.length - 2])) return true;
  if (last.tokenKind === 'punctuation' && (last.text === ',' || last.text === ':')) return true;

  return nodes.every((node, index) => isModifierToken(node, nodes[index + 1]) || isModifierArguments(nodes, index));
}

function spacedBefore(token: Token, previous: DeclarationNode | undefined): boolean {
  if (token.leadingTrivia.length > 0) return true;
  return previous !== undefined && lastToken(previous).trailingTrivia.length > 0;
}

/** `private(set)`, `@available(...)`: a group right after a modifier */
function isModifierArguments(nodes: DeclarationNode[], index: number): boolean {
  const node = nodes[index];
  if (node.kind !== 'group' || index === 0) return false;
  return isModifierToken(nodes[index - 1], node);
}

export function classifyDeclaration(nodes: DeclarationNode[]): DeclarationKind {
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    if (isModifierToken(node, nodes[i + 1]) || isModifierArguments(nodes, i)) continue;
    if (node.kind !== 'token') return 'other';
    if (node.tokenKind === 'poundIdentifier') return 'macroExpansion';
    if (node.tokenKind !== 'identifier') return 'other';
    return DECLARATION_KEYWORDS.get(node.text) ?? 'other';
  }
  return 'other';
}
