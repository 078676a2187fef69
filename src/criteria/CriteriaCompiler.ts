import { CriteriaError } from './errors.js';
import {
  betweenInclusive,
  compare,
  conjunction,
  disjunction,
  isOneOf,
  negation,
} from './factory.js';
import { lookupOperator } from './operators.js';
import { parse } from './Parser.js';
import { tokenize } from './Tokenizer.js';
import type {
  ComparisonNode,
  Criterion,
  CriteriaNode,
  FieldLookup,
  LeafCriterion,
} from './types.js';
import { validateCriteria } from '../validators/CriteriaValidator.js';

function compileLeaf(node: ComparisonNode): Criterion {
  const spec = lookupOperator(node.operator);
  if (!spec) {
    // Unreachable for validated trees
    throw new CriteriaError({
      message: `Cannot compile unknown operator '${node.operator}'`,
      stage: 'validator',
      position: node.position,
      snippet: node.operator,
    });
  }

  let leaf: LeafCriterion;
  switch (spec.operator) {
    case 'inSet':
      leaf = isOneOf(node.field, node.values);
      break;
    case 'betweenInclusive':
      leaf = betweenInclusive(node.field, node.values[0], node.values[1]);
      break;
    default:
      leaf = compare(node.field, spec.operator, node.values[0]);
  }

  return spec.negated ? negation(leaf) : leaf;
}

/**
 * Translate a validated AST into compiled criteria. The tree shape is kept as
 * the parser produced it.
 */
export function compileNode(node: CriteriaNode): Criterion {
  switch (node.type) {
    case 'comparison':
      return compileLeaf(node);
    case 'not':
      return negation(compileNode(node.child));
    case 'and':
      return conjunction(...node.children.map(compileNode));
    case 'or':
      return disjunction(...node.children.map(compileNode));
  }
}

/**
 * Compile a single expression segment (no derivation separators).
 *
 * Runs the tokenizer, parser, validator and compiler in sequence.
 *
 * @throws CriteriaSyntaxError, UnknownOperatorError, ArityError or UnknownFieldError
 */
export function compileExpression(segment: string, isValidField: FieldLookup): Criterion {
  const ast = parse(tokenize(segment));
  validateCriteria(ast, isValidField);
  return compileNode(ast);
}
