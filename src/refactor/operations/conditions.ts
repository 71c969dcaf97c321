import type { ConditionalBlock, ConditionExpr } from '../../parsers/types.js';
import { conditionText } from '../../parsers/condition.js';

/** Names referenced by one conditional block's own conditions */
export interface FlagReferences {
  names: Set<string>;
  /** Source text of each condition that could not be parsed */
  unsupported: string[];
}

/**
 * Collect the distinct identifiers used by the `#if`/`#elseif` conditions of
 * a block. Nested blocks are not visited.
 */
export function collectFlagReferences(block: ConditionalBlock): FlagReferences {
  const names = new Set<string>();
  const unsupported: string[] = [];

  for (const clause of block.clauses) {
    if (!clause.condition) continue;
    if (clause.condition.ok) {
      addNames(clause.condition.expr, names);
    } else {
      unsupported.push(conditionText(clause.conditionTokens));
    }
  }

  return { names, unsupported };
}

function addNames(expr: ConditionExpr, names: Set<string>): void {
  switch (expr.kind) {
    case 'identifier':
      names.add(expr.name);
      break;
    case 'integerLiteral':
    case 'booleanLiteral':
      break;
    case 'not':
      addNames(expr.operand, names);
      break;
    case 'and':
    case 'or':
      addNames(expr.left, names);
      addNames(expr.right, names);
      break;
    case 'parenthesized':
      addNames(expr.inner, names);
      break;
  }
}

// ============================================================================
// Evaluation
// ============================================================================

type EvalToken = boolean | '&&' | '||' | '!' | '(' | ')';
type StackEntry = boolean | '&&' | '||' | '!' | '(';

/** Put the expression back into source order */
function flatten(expr: ConditionExpr, out: EvalToken[]): void {
  switch (expr.kind) {
    case 'identifier':
      out.push(true);
      break;
    case 'integerLiteral':
      out.push(expr.value > 0);
      break;
    case 'booleanLiteral':
      out.push(expr.value);
      break;
    case 'not':
      out.push('!');
      flatten(expr.operand, out);
      break;
    case 'and':
    case 'or':
      flatten(expr.left, out);
      out.push(expr.kind === 'and' ? '&&' : '||');
      flatten(expr.right, out);
      break;
    case 'parenthesized':
      out.push('(');
      flatten(expr.inner, out);
      out.push(')');
      break;
  }
}

/**
 * Evaluate a condition whose only identifier is the flag being removed, with
 * that flag taken as true.
 *
 * Evaluation runs left to right over the source tokens: a pending operator
 * collapses as soon as its right operand is known, so `&&` and `||` share a
 * precedence level. `F || 0 && 0` is therefore false.
 */
export function evaluateCondition(expr: ConditionExpr): boolean {
  const tokens: EvalToken[] = [];
  flatten(expr, tokens);

  const stack: StackEntry[] = [];

  for (const token of tokens) {
    if (typeof token === 'boolean') {
      pushOperand(stack, token);
    } else if (token === ')') {
      const value = stack.pop();
      let popped = stack.pop();
      while (popped !== undefined && popped !== '(') {
        popped = stack.pop();
      }
      if (typeof value === 'boolean') {
        pushOperand(stack, value);
      }
    } else {
      stack.push(token);
    }
  }

  return stack.length === 0 ? true : stack[stack.length - 1] === true;
}

function pushOperand(stack: StackEntry[], value: boolean): void {
  const pending = stack[stack.length - 1];

  if (pending === '!') {
    stack.pop();
    pushOperand(stack, !value);
    return;
  }

  if (pending === '&&' || pending === '||') {
    stack.pop();
    const left = stack.pop();
    const leftValue = left === true;
    pushOperand(stack, pending === '&&' ? leftValue && value : leftValue || value);
    return;
  }

  stack.push(value);
}
