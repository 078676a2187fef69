import type { CriteriaConfig, QueryRetryConfig } from '../config/criteria.js';
import { DEFAULT_CRITERIA_CONFIG, loadQueryRetryConfig } from '../config/criteria.js';
import {
  compileCriteria,
  linkToParents,
  parentKeys,
  parseDerivationChain,
} from '../criteria/DerivationResolver.js';
import type { CompiledStep, FieldLookup, ParentRecord } from '../criteria/types.js';
import { debugLog, trackOperation } from '../utils/logger.js';
import { executeWithRetry } from '../utils/RetryStrategy.js';
import { defaultFieldLookup } from '../validators/CriteriaValidator.js';
import type { QueryRecord, RecordQueryClient } from './RecordQueryClient.js';

export interface StepResult {
  index: number;
  criterion: CompiledStep;
  records: QueryRecord[];
}

export interface DerivationResult {
  steps: StepResult[];
  /** Records matched by the last step that ran */
  records: QueryRecord[];
}

export interface DerivationExecutorOptions {
  config?: CriteriaConfig;
  /** Defaults to the `CRITERIA_QUERY_*` environment settings */
  retry?: QueryRetryConfig;
  isValidField?: FieldLookup;
}

/**
 * Runs a derivation chain against the record-query service, one step at a
 * time, linking each step to the primary keys the previous step returned.
 */
export class DerivationExecutor {
  private readonly client: RecordQueryClient;
  private readonly config: CriteriaConfig;
  private readonly retry: QueryRetryConfig;
  private readonly isValidField: FieldLookup;

  constructor(client: RecordQueryClient, options: DerivationExecutorOptions = {}) {
    this.client = client;
    this.config = options.config ?? DEFAULT_CRITERIA_CONFIG;
    this.retry = options.retry ?? loadQueryRetryConfig();
    this.isValidField = options.isValidField ?? defaultFieldLookup(this.config);
  }

  /**
   * Compile `expression` and execute its steps in order.
   *
   * Compile errors are thrown before any query runs. A step that matches
   * nothing ends the chain, since nothing can derive from it.
   */
  async run(
    expression: string,
    parentRecords?: readonly ParentRecord[]
  ): Promise<DerivationResult> {
    const steps = compileCriteria(expression, {
      isValidField: this.isValidField,
      parentRecords,
      linkFields: {
        primaryKey: this.config.primaryKeyField,
        derivation: this.config.derivationLinkField,
      },
    });

    // With a plain chain and parent records, the parents are what the first
    // step matched and step 1 is already linked to them
    const chain = parseDerivationChain(expression);
    const first = parentRecords && chain.derived && !chain.anchored ? 1 : 0;

    const finish = trackOperation<number>('executor', 'derivation chain', {
      expression,
      steps: steps.length,
      first,
    });

    const results: StepResult[] = [];
    let previous: QueryRecord[] = [];

    for (let index = first; index < steps.length; index++) {
      const criterion =
        index === first
          ? steps[index]
          : linkToParents(steps[index], this.config.derivationLinkField, parentKeys(previous));

      const records = await executeWithRetry(
        () => this.client.fetch(this.config.recordTable, criterion),
        { ...this.retry, label: `derivation step ${index}` }
      );

      debugLog('executor', 'step complete', { index, matched: records.length });
      results.push({ index, criterion, records });
      previous = records;

      if (records.length === 0) {
        break;
      }
    }

    finish(previous.length);
    return { steps: results, records: previous };
  }
}
