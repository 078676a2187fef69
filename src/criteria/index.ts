/**
 * Criteria expression compiler.
 *
 * Turns expressions such as `cntn_a equals 1 and cntn_b one_of x y -> cntn_c
 * contains z` into the nested criteria the record-query service accepts, one
 * criterion per derivation step.
 *
 * @example
 * ```typescript
 * compileCriteria('cntn_a equals 1337 and cntn_b equals 1338 or cntn_c equals 1339');
 * // [{ operator: 'and', criteria: [
 * //   { fieldName: 'cntn_a', operator: 'equals', value: '1337' },
 * //   { operator: 'or', criteria: [...] },
 * // ] }]
 * ```
 */

export type {
  AndNode,
  ComparisonNode,
  CompileOptions,
  CompiledStep,
  CompositeCriterion,
  Criterion,
  CriteriaNode,
  FieldLookup,
  LeafCriterion,
  NotNode,
  OrNode,
  ParentRecord,
  RangeCriterion,
  RecordKey,
  SetCriterion,
  Token,
  TokenType,
  ValueCriterion,
} from './types.js';

export * from './errors.js';
export * from './factory.js';
export { OPERATORS, OPERATOR_KEYWORDS, lookupOperator } from './operators.js';
export type { Arity, OperatorKeyword, OperatorSpec } from './operators.js';
export { Tokenizer, tokenize } from './Tokenizer.js';
export { Parser, parse } from './Parser.js';
export { compileExpression, compileNode } from './CriteriaCompiler.js';
export {
  compileCriteria,
  compileDerivationStep,
  linkToParents,
  parentKeys,
  parseDerivationChain,
  splitDerivation,
} from './DerivationResolver.js';
export type { DerivationChain, LinkFields, ResolveOptions } from './DerivationResolver.js';
export {
  defaultFieldLookup,
  fieldPrefixLookup,
  fieldSetLookup,
  validateCriteria,
} from '../validators/CriteriaValidator.js';
