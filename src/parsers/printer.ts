import type { DeclarationNode, Item, SourceFile, Token, Trivia, TriviaPiece } from './types.js';

const COUNTED_TEXT = {
  newlines: '\n',
  carriageReturns: '\r',
  carriageReturnLineFeeds: '\r\n',
  spaces: ' ',
  tabs: '\t',
} as const;

export function printTriviaPiece(piece: TriviaPiece): string {
  switch (piece.kind) {
    case 'newlines':
    case 'carriageReturns':
    case 'carriageReturnLineFeeds':
    case 'spaces':
    case 'tabs':
      return COUNTED_TEXT[piece.kind].repeat(piece.count);
    default:
      return piece.text;
  }
}

export function printTrivia(trivia: Trivia): string {
  return trivia.map(printTriviaPiece).join('');
}

export function printToken(token: Token): string {
  return printTrivia(token.leadingTrivia) + token.text + printTrivia(token.trailingTrivia);
}

/**
 * Print a (possibly rewritten) tree back to source text.
 */
export function printSourceFile(file: SourceFile): string {
  const out: string[] = [];
  printItems(file.items, out);
  out.push(printToken(file.endOfFile));
  return out.join('');
}

function printItems(items: readonly Item[], out: string[]): void {
  for (const item of items) {
    printItem(item, out);
  }
}

function printItem(item: Item, out: string[]): void {
  switch (item.kind) {
    case 'declaration':
      for (const node of item.nodes) {
        printNode(node, out);
      }
      break;
    case 'conditionalBlock':
      for (const clause of item.clauses) {
        out.push(printToken(clause.poundKeyword));
        for (const token of clause.conditionTokens) {
          out.push(printToken(token));
        }
        printItems(clause.body, out);
      }
      out.push(printToken(item.endif));
      break;
    case 'splice':
      out.push(printTrivia(item.leadingTrivia));
      printItems(item.items, out);
      break;
    case 'vacancy':
      out.push(printTrivia(item.leadingTrivia), printTrivia(item.trailingTrivia));
      break;
  }
}

function printNode(node: DeclarationNode, out: string[]): void {
  if (node.kind === 'token') {
    out.push(printToken(node));
    return;
  }
  out.push(printToken(node.open));
  printItems(node.items, out);
  out.push(printToken(node.close));
}
