/**
 * Error hierarchy for criteria compilation.
 *
 * Every failure aborts the compile call. Validation failures share a single
 * kind (`CriteriaValidationError`) and are told apart by `reason`.
 */

export type CriteriaErrorStage = 'tokenizer' | 'parser' | 'validator' | 'resolver';

export interface CriteriaErrorOptions {
  message: string;
  stage: CriteriaErrorStage;
  position: number;
  snippet?: string;
  hint?: string;
}

/**
 * Structured error for criteria compilation failures with detailed context
 */
export class CriteriaError extends Error {
  /** Stage where the error occurred */
  public readonly stage: CriteriaErrorStage;

  /** Position in the segment where the error occurred */
  public readonly position: number;

  /** Snippet of the problematic part of the expression */
  public readonly snippet?: string;

  /** Human-readable troubleshooting hint */
  public readonly hint?: string;

  constructor(options: CriteriaErrorOptions) {
    super(options.message);
    this.name = 'CriteriaError';
    this.stage = options.stage;
    this.position = options.position;
    this.snippet = options.snippet;
    this.hint = options.hint;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** Unbalanced parentheses, malformed boolean structure or a missing operand. */
export class CriteriaSyntaxError extends CriteriaError {
  constructor(options: Omit<CriteriaErrorOptions, 'stage'> & { stage?: CriteriaErrorStage }) {
    super({ ...options, stage: options.stage ?? 'parser' });
    this.name = 'CriteriaSyntaxError';
  }
}

export type ValidationReason = 'unknown_operator' | 'arity' | 'unknown_field';

export class CriteriaValidationError extends CriteriaError {
  public readonly reason: ValidationReason;

  constructor(reason: ValidationReason, options: Omit<CriteriaErrorOptions, 'stage'>) {
    super({ ...options, stage: 'validator' });
    this.name = 'CriteriaValidationError';
    this.reason = reason;
  }
}

export class UnknownOperatorError extends CriteriaValidationError {
  public readonly keyword: string;

  constructor(keyword: string, position: number, hint?: string) {
    super('unknown_operator', {
      message: `Unknown operator '${keyword}' at position ${position}`,
      position,
      snippet: keyword,
      hint,
    });
    this.name = 'UnknownOperatorError';
    this.keyword = keyword;
  }
}

export class ArityError extends CriteriaValidationError {
  public readonly expected: number | 'n';
  public readonly received: number;

  constructor(keyword: string, expected: number | 'n', received: number, position: number) {
    const wanted = expected === 'n' ? 'at least 1 value' : `${expected} value(s)`;
    super('arity', {
      message: `Operator '${keyword}' expects ${wanted}, got ${received} at position ${position}`,
      position,
      snippet: keyword,
      hint:
        expected === 2
          ? `Use: <field> ${keyword} <start> <end>`
          : expected === 'n'
            ? `Use: <field> ${keyword} <value> [<value> ...]`
            : `Use: <field> ${keyword} <value>`,
    });
    this.name = 'ArityError';
    this.expected = expected;
    this.received = received;
  }
}

export class UnknownFieldError extends CriteriaValidationError {
  public readonly field: string;

  constructor(field: string, position: number) {
    super('unknown_field', {
      message: `Unknown field '${field}' at position ${position}`,
      position,
      snippet: field,
    });
    this.name = 'UnknownFieldError';
    this.field = field;
  }
}

/** A derivation step needs parent records that were not supplied. */
export class MissingParentError extends CriteriaError {
  public readonly step: number;

  constructor(step: number) {
    super({
      message: `Derivation step ${step} requires parent records, but none were supplied`,
      stage: 'resolver',
      position: 0,
      hint: 'Pass the records of the previous step as parent records',
    });
    this.name = 'MissingParentError';
    this.step = step;
  }
}
