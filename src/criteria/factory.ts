/**
 * Constructors for compiled criteria, mirroring the record-query API's own
 * criteria helpers. Callers can use these to assemble criteria directly.
 */

import type {
  CompositeCriterion,
  Criterion,
  RangeCriterion,
  RecordKey,
  ScalarOperator,
  SetCriterion,
  ValueCriterion,
} from './types.js';

export function compare(
  fieldName: string,
  operator: ScalarOperator,
  value: string
): ValueCriterion {
  return { fieldName, operator, value };
}

export function equals(fieldName: string, value: string): ValueCriterion {
  return compare(fieldName, 'equals', value);
}

export function isOneOf(fieldName: string, values: readonly RecordKey[]): SetCriterion {
  return { fieldName, operator: 'inSet', values: [...values] };
}

export function betweenInclusive(fieldName: string, start: string, end: string): RangeCriterion {
  return { fieldName, operator: 'betweenInclusive', start, end };
}

export function conjunction(...criteria: Criterion[]): CompositeCriterion {
  return { operator: 'and', criteria };
}

export function disjunction(...criteria: Criterion[]): CompositeCriterion {
  return { operator: 'or', criteria };
}

export function negation(criterion: Criterion): CompositeCriterion {
  return { operator: 'not', criteria: [criterion] };
}

export function isComposite(criterion: Criterion): criterion is CompositeCriterion {
  return !('fieldName' in criterion);
}
