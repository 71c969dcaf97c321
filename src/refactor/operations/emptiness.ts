import type { DeclarationKind, Item, SourceFile } from '../../parsers/types.js';

const MEANINGFUL_KINDS: ReadonlySet<DeclarationKind> = new Set<DeclarationKind>([
  'type',
  'typeAlias',
  'function',
  'variable',
  'macro',
  'macroExpansion',
]);

/**
 * A file is content-free when nothing in it declares a type, function,
 * variable or macro. Comments and imports alone do not count.
 */
export function isContentFree(file: SourceFile): boolean {
  return !containsMeaningful(file.items);
}

function containsMeaningful(items: readonly Item[]): boolean {
  return items.some((item) => {
    switch (item.kind) {
      case 'declaration':
        if (MEANINGFUL_KINDS.has(item.declarationKind)) return true;
        return item.nodes.some((node) => node.kind === 'group' && containsMeaningful(node.items));
      case 'conditionalBlock':
        return item.clauses.some((clause) => containsMeaningful(clause.body));
      case 'splice':
        return containsMeaningful(item.items);
      case 'vacancy':
        return false;
    }
  });
}
