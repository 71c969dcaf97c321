import type { Clause, ConditionalBlock } from '../../parsers/types.js';
import { evaluateCondition } from './conditions.js';

/**
 * Pick the clause that survives once the flag is on: the first `#if` or
 * `#elseif` whose condition holds, else the `#else` clause, else nothing.
 *
 * Only meaningful for blocks that passed the single-flag guard; a clause whose
 * condition failed to parse never wins.
 */
export function selectClause(block: ConditionalBlock): Clause | undefined {
  for (const clause of block.clauses) {
    if (clause.clauseKind === 'else') return clause;
    const condition = clause.condition;
    if (condition && condition.ok && evaluateCondition(condition.expr)) return clause;
  }
  return undefined;
}
