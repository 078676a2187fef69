export * from './criteria/index.js';
export { DerivationExecutor } from './records/DerivationExecutor.js';
export type {
  DerivationExecutorOptions,
  DerivationResult,
  StepResult,
} from './records/DerivationExecutor.js';
export { groupByOriginal, parseRecordKey } from './records/RecordQueryClient.js';
export type { QueryRecord, RecordQueryClient } from './records/RecordQueryClient.js';
export { loadCriteriaConfig, loadQueryRetryConfig } from './config/criteria.js';
export type { CriteriaConfig, QueryRetryConfig } from './config/criteria.js';
