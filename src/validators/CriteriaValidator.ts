import { ArityError, UnknownFieldError, UnknownOperatorError } from '../criteria/errors.js';
import { arityAccepts, lookupOperator, OPERATOR_KEYWORDS } from '../criteria/operators.js';
import type { ComparisonNode, CriteriaNode, FieldLookup } from '../criteria/types.js';
import type { CriteriaConfig } from '../config/criteria.js';
import { debugLog } from '../utils/logger.js';

/** Accepts exactly the given field names. */
export function fieldSetLookup(names: Iterable<string>): FieldLookup {
  const allowed = new Set(names);
  return (name) => allowed.has(name);
}

/** Accepts any field name carrying `prefix` followed by at least one character. */
export function fieldPrefixLookup(prefix: string): FieldLookup {
  return (name) => name.length > prefix.length && name.startsWith(prefix);
}

/**
 * Field lookup described by configuration: the explicit allow list when one is
 * configured, otherwise the field prefix.
 */
export function defaultFieldLookup(
  config: Pick<CriteriaConfig, 'fieldPrefix' | 'validFields'>
): FieldLookup {
  return config.validFields
    ? fieldSetLookup(config.validFields)
    : fieldPrefixLookup(config.fieldPrefix);
}

function validateComparison(node: ComparisonNode, isValidField: FieldLookup): void {
  const spec = lookupOperator(node.operator);
  if (!spec) {
    throw new UnknownOperatorError(
      node.operator,
      node.position,
      `Valid operators are: ${OPERATOR_KEYWORDS.join(', ')}`
    );
  }

  if (!arityAccepts(spec.arity, node.values.length)) {
    throw new ArityError(node.operator, spec.arity, node.values.length, node.position);
  }

  if (!isValidField(node.field)) {
    throw new UnknownFieldError(node.field, node.position);
  }
}

/**
 * Check every comparison in the tree against the operator table and the field
 * lookup. Throws on the first failure.
 *
 * @throws UnknownOperatorError, ArityError or UnknownFieldError
 */
export function validateCriteria(node: CriteriaNode, isValidField: FieldLookup): void {
  switch (node.type) {
    case 'comparison':
      validateComparison(node, isValidField);
      debugLog('validation', 'comparison accepted', {
        field: node.field,
        operator: node.operator,
        values: node.values.length,
      });
      return;
    case 'not':
      validateCriteria(node.child, isValidField);
      return;
    case 'and':
    case 'or':
      for (const child of node.children) {
        validateCriteria(child, isValidField);
      }
      return;
  }
}
