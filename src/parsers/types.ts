/**
 * Syntax tree types shared by the Swift lexer, parser, printer and the
 * flag rewriting passes.
 */

/** One classified run of whitespace or comment text */
export type TriviaPiece =
  | { kind: 'newlines'; count: number }
  | { kind: 'carriageReturns'; count: number }
  | { kind: 'carriageReturnLineFeeds'; count: number }
  | { kind: 'spaces'; count: number }
  | { kind: 'tabs'; count: number }
  | { kind: 'otherWhitespace'; text: string }
  | { kind: 'lineComment'; text: string }
  | { kind: 'docLineComment'; text: string }
  | { kind: 'blockComment'; text: string }
  | { kind: 'docBlockComment'; text: string }
  | { kind: 'shebang'; text: string };

export type Trivia = readonly TriviaPiece[];

/** Line-break pieces; each counts as a run of blank lines */
export type LineBreakPiece = Extract<
  TriviaPiece,
  { kind: 'newlines' | 'carriageReturns' | 'carriageReturnLineFeeds' }
>;

export type TokenKind =
  | 'identifier'
  | 'integerLiteral'
  | 'floatLiteral'
  | 'stringLiteral'
  | 'regexLiteral'
  | 'operator'
  | 'punctuation'
  | 'attribute'
  | 'poundIf'
  | 'poundElseif'
  | 'poundElse'
  | 'poundEndif'
  | 'poundIdentifier'
  | 'unknown'
  | 'endOfFile';

export interface Token {
  kind: 'token';
  tokenKind: TokenKind;
  text: string;
  leadingTrivia: Trivia;
  trailingTrivia: Trivia;
  /** 1-based line of the first character of `text` */
  line: number;
}

/** What a declaration introduces, as far as emptiness checks care */
export type DeclarationKind =
  | 'type'
  | 'typeAlias'
  | 'function'
  | 'variable'
  | 'macro'
  | 'macroExpansion'
  | 'import'
  | 'other';

export interface Declaration {
  kind: 'declaration';
  declarationKind: DeclarationKind;
  nodes: DeclarationNode[];
}

/** A bracketed region: `{ }`, `( )` or `[ ]` */
export interface Group {
  kind: 'group';
  open: Token;
  items: Item[];
  close: Token;
}

export type DeclarationNode = Token | Group;

// ============================================================================
// Conditions
// ============================================================================

export type ConditionExpr =
  | { kind: 'identifier'; name: string }
  | { kind: 'integerLiteral'; text: string; value: number }
  | { kind: 'booleanLiteral'; value: boolean }
  | { kind: 'not'; operand: ConditionExpr }
  | { kind: 'and'; left: ConditionExpr; right: ConditionExpr }
  | { kind: 'or'; left: ConditionExpr; right: ConditionExpr }
  | { kind: 'parenthesized'; inner: ConditionExpr };

/** Result of parsing an `#if`/`#elseif` condition */
export type ConditionParse =
  | { ok: true; expr: ConditionExpr }
  | { ok: false; reason: string };

// ============================================================================
// Conditional compilation
// ============================================================================

export type ClauseKind = 'if' | 'elseif' | 'else';

export interface Clause {
  clauseKind: ClauseKind;
  poundKeyword: Token;
  /** Tokens after the pound keyword that make up the condition */
  conditionTokens: Token[];
  /** Absent only for `#else` */
  condition?: ConditionParse;
  body: Item[];
}

export interface ConditionalBlock {
  kind: 'conditionalBlock';
  clauses: Clause[];
  endif: Token;
}

// ============================================================================
// Rewrite output
// ============================================================================

/** Surviving clause body standing where a resolved block used to be */
export interface Splice {
  kind: 'splice';
  leadingTrivia: Trivia;
  items: Item[];
}

/** A resolved block with nothing left but its surrounding trivia */
export interface Vacancy {
  kind: 'vacancy';
  leadingTrivia: Trivia;
  trailingTrivia: Trivia;
}

export type Item = Declaration | ConditionalBlock | Splice | Vacancy;

export interface SourceFile {
  kind: 'sourceFile';
  items: Item[];
  /** Zero-width token holding the trivia after the last real token */
  endOfFile: Token;
}

/** Outcome of parsing a whole file */
export type ParseResult =
  | { ok: true; file: SourceFile }
  | { ok: false; line: number; message: string };

export function isLineBreak(piece: TriviaPiece): piece is LineBreakPiece {
  return (
    piece.kind === 'newlines' ||
    piece.kind === 'carriageReturns' ||
    piece.kind === 'carriageReturnLineFeeds'
  );
}

export function startsNewLine(token: Token): boolean {
  return token.leadingTrivia.some(isLineBreak);
}
