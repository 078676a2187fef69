import type { ScalarOperator } from './types.js';

export type Arity = 1 | 2 | 'n';

export type OperatorSpec =
  | { operator: ScalarOperator; arity: 1; negated: boolean }
  | { operator: 'inSet'; arity: 'n'; negated: boolean }
  | { operator: 'betweenInclusive'; arity: 2; negated: boolean };

/**
 * Surface keywords and the operators they compile to.
 * Negated keywords compile to the positive operator wrapped in `not`.
 */
export const OPERATORS = {
  equals: { operator: 'equals', arity: 1, negated: false },
  not_equals: { operator: 'equals', arity: 1, negated: true },
  equals_ignore_case: { operator: 'iEquals', arity: 1, negated: false },
  not_equals_ignore_case: { operator: 'iEquals', arity: 1, negated: true },
  one_of: { operator: 'inSet', arity: 'n', negated: false },
  not_one_of: { operator: 'inSet', arity: 'n', negated: true },
  contains: { operator: 'iContains', arity: 1, negated: false },
  not_contains: { operator: 'iContains', arity: 1, negated: true },
  starts_with: { operator: 'iStartsWith', arity: 1, negated: false },
  not_starts_with: { operator: 'iStartsWith', arity: 1, negated: true },
  ends_with: { operator: 'iEndsWith', arity: 1, negated: false },
  not_ends_with: { operator: 'iEndsWith', arity: 1, negated: true },
  between: { operator: 'betweenInclusive', arity: 2, negated: false },
  not_between: { operator: 'betweenInclusive', arity: 2, negated: true },
  greater_than: { operator: 'greaterThan', arity: 1, negated: false },
  less_than: { operator: 'lessThan', arity: 1, negated: false },
} as const satisfies Record<string, OperatorSpec>;

export type OperatorKeyword = keyof typeof OPERATORS;

export function isOperatorKeyword(keyword: string): keyword is OperatorKeyword {
  return Object.prototype.hasOwnProperty.call(OPERATORS, keyword);
}

export const OPERATOR_KEYWORDS: OperatorKeyword[] =
  Object.keys(OPERATORS).filter(isOperatorKeyword);

export function lookupOperator(keyword: string): OperatorSpec | undefined {
  return isOperatorKeyword(keyword) ? OPERATORS[keyword] : undefined;
}

/** True when `count` values satisfy `arity`. */
export function arityAccepts(arity: Arity, count: number): boolean {
  return arity === 'n' ? count >= 1 : count === arity;
}
