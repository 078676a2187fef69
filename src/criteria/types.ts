/**
 * Shared types for the criteria expression compiler.
 *
 * Three layers live here: the token stream produced by the tokenizer, the AST
 * built by the parser, and the compiled criteria that the record-query service
 * consumes.
 */

// ============================================================================
// Tokens
// ============================================================================

export type TokenType =
  | 'IDENTIFIER'
  | 'OPERATOR'
  | 'VALUE'
  | 'AND'
  | 'OR'
  | 'LPAREN'
  | 'RPAREN'
  | 'ARROW'
  | 'EOF';

export interface Token {
  type: TokenType;
  value: string;
  position: number;
}

// ============================================================================
// AST
// ============================================================================

export type CriteriaNode = ComparisonNode | NotNode | AndNode | OrNode;

export interface ComparisonNode {
  type: 'comparison';
  field: string;
  /** Surface keyword as written, e.g. `not_equals` */
  operator: string;
  values: string[];
  position: number;
}

export interface NotNode {
  type: 'not';
  child: CriteriaNode;
}

export interface AndNode {
  type: 'and';
  children: CriteriaNode[];
}

export interface OrNode {
  type: 'or';
  children: CriteriaNode[];
}

// ============================================================================
// Compiled criteria
// ============================================================================

export type RecordKey = string | number;

export type ScalarOperator =
  | 'equals'
  | 'iEquals'
  | 'iContains'
  | 'iStartsWith'
  | 'iEndsWith'
  | 'greaterThan'
  | 'lessThan';

export type LeafOperator = ScalarOperator | 'inSet' | 'betweenInclusive';

export interface ValueCriterion {
  fieldName: string;
  operator: ScalarOperator;
  value: string;
}

export interface SetCriterion {
  fieldName: string;
  operator: 'inSet';
  values: RecordKey[];
}

export interface RangeCriterion {
  fieldName: string;
  operator: 'betweenInclusive';
  start: string;
  end: string;
}

export type LeafCriterion = ValueCriterion | SetCriterion | RangeCriterion;

export interface CompositeCriterion {
  operator: 'and' | 'or' | 'not';
  criteria: Criterion[];
}

export type Criterion = LeafCriterion | CompositeCriterion;

/** One derivation step. `undefined` is an empty step: no criteria, every record matches. */
export type CompiledStep = Criterion | undefined;

// ============================================================================
// Collaborators
// ============================================================================

/** Decides whether a field name may appear in an expression. */
export type FieldLookup = (name: string) => boolean;

/** A previously fetched record that later derivation steps link to. */
export interface ParentRecord {
  pk(): RecordKey;
}

export interface CompileOptions {
  isValidField?: FieldLookup;
  parentRecords?: readonly ParentRecord[];
}
