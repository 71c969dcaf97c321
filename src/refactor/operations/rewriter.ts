import type {
  Clause,
  ConditionalBlock,
  DeclarationNode,
  Item,
  SourceFile,
  Splice,
  Trivia,
  Vacancy,
} from '../../parsers/types.js';
import { isLineBreak } from '../../parsers/types.js';
import type { SkippedBlock } from '../types.js';
import { selectClause } from './clauses.js';
import { collectFlagReferences } from './conditions.js';

export interface RewriteResult {
  file: SourceFile;
  /** At least one block on the flag was resolved */
  edited: boolean;
  /** Blocks that mention the flag but were kept as they are */
  skipped: SkippedBlock[];
}

/**
 * Resolve every conditional block that depends on `flag` alone, as if the
 * flag were always defined. The input tree is left untouched.
 */
export function rewriteFlag(file: SourceFile, flag: string): RewriteResult {
  const rewriter = new BlockRewriter(flag);
  const items = rewriter.rewriteItems(file.items);

  return {
    file: { ...file, items },
    edited: rewriter.edited,
    skipped: rewriter.skipped,
  };
}

class BlockRewriter {
  edited = false;
  readonly skipped: SkippedBlock[] = [];

  constructor(private readonly flag: string) {}

  rewriteItems(items: readonly Item[]): Item[] {
    return items.map((item) => this.rewriteItem(item));
  }

  private rewriteItem(item: Item): Item {
    switch (item.kind) {
      case 'declaration':
        return { ...item, nodes: item.nodes.map((node) => this.rewriteNode(node)) };
      case 'conditionalBlock':
        return this.rewriteBlock(item);
      case 'splice':
        return { ...item, items: this.rewriteItems(item.items) };
      case 'vacancy':
        return item;
    }
  }

  private rewriteNode(node: DeclarationNode): DeclarationNode {
    if (node.kind === 'token') return node;
    return { ...node, items: this.rewriteItems(node.items) };
  }

  private rewriteBlock(block: ConditionalBlock): Item {
    const refs = collectFlagReferences(block);
    const onlyFlag = refs.names.size === 1 && refs.names.has(this.flag);

    if (refs.unsupported.length > 0 || !onlyFlag) {
      if (mentionsFlag(block, this.flag)) {
        this.skipped.push({
          line: block.clauses[0].poundKeyword.line,
          reason:
            refs.unsupported.length > 0
              ? `unsupported condition '${refs.unsupported[0]}'`
              : `condition also depends on ${[...refs.names].filter((name) => name !== this.flag).join(', ')}`,
        });
      }
      return {
        ...block,
        clauses: block.clauses.map((clause): Clause => ({ ...clause, body: this.rewriteItems(clause.body) })),
      };
    }

    this.edited = true;
    const leadingTrivia = block.clauses[0].poundKeyword.leadingTrivia;
    const winner = selectClause(block);

    if (!winner || winner.body.length === 0) {
      const vacancy: Vacancy = { kind: 'vacancy', leadingTrivia, trailingTrivia: block.endif.trailingTrivia };
      return vacancy;
    }

    const splice: Splice = {
      kind: 'splice',
      leadingTrivia: dropIndentation(leadingTrivia),
      items: dropLeadingLineBreak(this.rewriteItems(winner.body)),
    };
    return splice;
  }
}

function mentionsFlag(block: ConditionalBlock, flag: string): boolean {
  return block.clauses.some((clause) =>
    clause.conditionTokens.some((token) => token.tokenKind === 'identifier' && token.text === flag)
  );
}

/** The body's first line break belonged to the directive line; give it back */
function dropOneLineBreak(trivia: Trivia): Trivia {
  const first = trivia[0];
  if (!first || !isLineBreak(first)) return trivia;
  if (first.count > 1) {
    return [{ kind: first.kind, count: first.count - 1 }, ...trivia.slice(1)];
  }
  return trivia.slice(1);
}

/** The body's own lines carry their indentation; the directive's is dropped */
function dropIndentation(trivia: Trivia): Trivia {
  let end = trivia.length;
  while (end > 0 && (trivia[end - 1].kind === 'spaces' || trivia[end - 1].kind === 'tabs')) {
    end--;
  }
  return trivia.slice(0, end);
}

/**
 * Drop one line break from the first item that prints something. Nested
 * blocks resolved to bare vacancies in front of it are passed over.
 */
function dropLeadingLineBreak(items: Item[]): Item[] {
  const result = [...items];
  for (let i = 0; i < result.length; i++) {
    result[i] = withLeadingTrivia(result[i], dropOneLineBreak);
    if (!isBlankVacancy(result[i])) break;
  }
  return result;
}

function isBlankVacancy(item: Item): boolean {
  return item.kind === 'vacancy' && item.leadingTrivia.length === 0 && item.trailingTrivia.length === 0;
}

/** Apply `transform` to the leading trivia of the first token an item prints */
function withLeadingTrivia(item: Item, transform: (trivia: Trivia) => Trivia): Item {
  switch (item.kind) {
    case 'declaration': {
      const [first, ...rest] = item.nodes;
      if (!first) return item;
      const node: DeclarationNode =
        first.kind === 'token'
          ? { ...first, leadingTrivia: transform(first.leadingTrivia) }
          : { ...first, open: { ...first.open, leadingTrivia: transform(first.open.leadingTrivia) } };
      return { ...item, nodes: [node, ...rest] };
    }
    case 'conditionalBlock': {
      const [first, ...rest] = item.clauses;
      const poundKeyword = { ...first.poundKeyword, leadingTrivia: transform(first.poundKeyword.leadingTrivia) };
      return { ...item, clauses: [{ ...first, poundKeyword }, ...rest] };
    }
    case 'splice':
    case 'vacancy':
      return { ...item, leadingTrivia: transform(item.leadingTrivia) };
  }
}
