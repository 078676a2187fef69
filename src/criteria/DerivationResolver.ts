/**
 * Derivation chains.
 *
 * An expression such as `a equals 1 -> b equals 2` describes a chain of
 * queries: the second step matches records derived from whatever the first
 * step matched. The compiler never runs queries, so it emits one criterion per
 * step and links a step to its parents only when the parent records are known
 * at compile time. The executing caller links the remaining steps as results
 * arrive (see `compileDerivationStep` and `linkToParents`).
 */

import { compileExpression } from './CriteriaCompiler.js';
import { CriteriaSyntaxError, MissingParentError } from './errors.js';
import { conjunction, isOneOf } from './factory.js';
import type {
  CompileOptions,
  CompiledStep,
  Criterion,
  FieldLookup,
  ParentRecord,
  RecordKey,
} from './types.js';
import { DEFAULT_CRITERIA_CONFIG } from '../config/criteria.js';
import { debugLog } from '../utils/logger.js';
import { defaultFieldLookup } from '../validators/CriteriaValidator.js';

const ARROW = '->';

export interface LinkFields {
  /** Restricts a non-derived query to the parent records themselves */
  primaryKey: string;
  /** Links a derived record to the record it was derived from */
  derivation: string;
}

export interface ResolveOptions extends CompileOptions {
  linkFields?: LinkFields;
}

/**
 * A parsed derivation chain. `anchored` is set when the expression starts with
 * `->`: the chain then derives directly from the caller's parent records.
 */
export interface DerivationChain {
  segments: string[];
  derived: boolean;
  anchored: boolean;
}

const DEFAULT_LINK_FIELDS: LinkFields = {
  primaryKey: DEFAULT_CRITERIA_CONFIG.primaryKeyField,
  derivation: DEFAULT_CRITERIA_CONFIG.derivationLinkField,
};

/**
 * Split an expression on `->` separators that are not inside parentheses.
 * Segments are trimmed; only the first may be empty.
 *
 * @throws CriteriaSyntaxError for an empty step after the first
 */
export function splitDerivation(expression: string): string[] {
  const segments: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < expression.length; i++) {
    const ch = expression[i];
    if (ch === '(') {
      depth++;
    } else if (ch === ')') {
      depth = Math.max(0, depth - 1);
    } else if (depth === 0 && expression.startsWith(ARROW, i)) {
      segments.push(expression.slice(start, i));
      start = i + ARROW.length;
      i += ARROW.length - 1;
    }
  }
  segments.push(expression.slice(start));

  const trimmed = segments.map((segment) => segment.trim());
  trimmed.forEach((segment, index) => {
    if (index > 0 && segment === '') {
      throw new CriteriaSyntaxError({
        message: `Derivation step ${index} is empty`,
        stage: 'resolver',
        position: 0,
        snippet: expression,
        hint: 'Only the first step of a derivation chain may be left empty',
      });
    }
  });

  return trimmed;
}

export function parseDerivationChain(expression: string): DerivationChain {
  const split = splitDerivation(expression);
  const derived = split.length > 1;
  const anchored = derived && split[0] === '';
  return { segments: anchored ? split.slice(1) : split, derived, anchored };
}

export function parentKeys(parentRecords: readonly ParentRecord[]): RecordKey[] {
  return parentRecords.map((record) => record.pk());
}

/**
 * AND-combine a step with a set restriction on `field`. The restriction comes
 * first; a missing step yields the restriction alone.
 */
export function linkToParents(
  criterion: CompiledStep,
  field: string,
  keys: readonly RecordKey[]
): Criterion {
  const link = isOneOf(field, keys);
  return criterion ? conjunction(link, criterion) : link;
}

function compileSegment(segment: string, isValidField: FieldLookup): CompiledStep {
  return segment === '' ? undefined : compileExpression(segment, isValidField);
}

function resolveOptions(options: ResolveOptions): {
  isValidField: FieldLookup;
  linkFields: LinkFields;
} {
  return {
    isValidField: options.isValidField ?? defaultFieldLookup(DEFAULT_CRITERIA_CONFIG),
    linkFields: options.linkFields ?? DEFAULT_LINK_FIELDS,
  };
}

/**
 * Compile a complete expression into its ordered derivation steps.
 *
 * A blank expression has no criteria of its own: it compiles to `[undefined]`,
 * or to the bare primary-key restriction when parent records are given.
 *
 * Parent records, when given, are used as follows:
 * - without `->` they restrict the single step by primary key;
 * - with a leading `->` they are the records the chain derives from, and
 *   are required;
 * - otherwise they are the records the first step already matched, and link
 *   the second step.
 *
 * Steps after that are returned unlinked.
 *
 * @throws CriteriaSyntaxError, CriteriaValidationError or MissingParentError
 */
export function compileCriteria(
  expression: string,
  options: ResolveOptions = {}
): CompiledStep[] {
  const { isValidField, linkFields } = resolveOptions(options);
  const chain = parseDerivationChain(expression);
  const parents = options.parentRecords;

  if (chain.anchored && !parents) {
    throw new MissingParentError(0);
  }

  const steps = chain.segments.map((segment) => compileSegment(segment, isValidField));

  if (parents) {
    const keys = parentKeys(parents);
    if (!chain.derived) {
      steps[0] = linkToParents(steps[0], linkFields.primaryKey, keys);
    } else {
      const linked = chain.anchored ? 0 : 1;
      steps[linked] = linkToParents(steps[linked], linkFields.derivation, keys);
    }
  }

  debugLog('derivation', 'compiled criteria', {
    expression,
    steps: steps.length,
    anchored: chain.anchored,
    parents: parents?.length,
  });

  return steps;
}

/**
 * Compile one step of a chain with fresh parent context, for callers that run
 * the chain step by step. Step 0 follows the rules of `compileCriteria` for
 * the first step; every later step is linked to `parentRecords`, which are
 * the records the previous step returned.
 *
 * @throws MissingParentError when the step needs parent records and none are given
 */
export function compileDerivationStep(
  expression: string,
  index: number,
  parentRecords?: readonly ParentRecord[],
  options: Omit<ResolveOptions, 'parentRecords'> = {}
): CompiledStep {
  const { isValidField, linkFields } = resolveOptions(options);
  const chain = parseDerivationChain(expression);

  if (!Number.isInteger(index) || index < 0 || index >= chain.segments.length) {
    throw new RangeError(
      `Step ${index} is out of range for a chain of ${chain.segments.length} step(s)`
    );
  }

  const step = compileSegment(chain.segments[index], isValidField);

  if (index === 0 && !chain.anchored) {
    if (chain.derived || !parentRecords) {
      return step;
    }
    return linkToParents(step, linkFields.primaryKey, parentKeys(parentRecords));
  }

  if (!parentRecords) {
    throw new MissingParentError(index);
  }
  return linkToParents(step, linkFields.derivation, parentKeys(parentRecords));
}
