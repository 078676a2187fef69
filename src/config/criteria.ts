import { toList, toNumber, toText } from './env.js';

export interface CriteriaConfig {
  /** Prefix every field must carry when no explicit allow list is configured */
  fieldPrefix: string;
  /** Explicit field allow list; takes precedence over `fieldPrefix` */
  validFields?: string[];
  /** Field used to restrict a non-derived query to the parent records themselves */
  primaryKeyField: string;
  /** Field linking a derived record to the record it was derived from */
  derivationLinkField: string;
  /** Table the derivation executor queries */
  recordTable: string;
}

export interface QueryRetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_CRITERIA_CONFIG: CriteriaConfig = {
  fieldPrefix: 'cntn_',
  primaryKeyField: 'cntn_pk',
  derivationLinkField: 'cntn_fk_originalContent',
  recordTable: 'Content',
};

export function loadCriteriaConfig(): CriteriaConfig {
  return {
    fieldPrefix: toText(process.env.CRITERIA_FIELD_PREFIX, DEFAULT_CRITERIA_CONFIG.fieldPrefix),
    validFields: toList(process.env.CRITERIA_VALID_FIELDS),
    primaryKeyField: toText(
      process.env.CRITERIA_PRIMARY_KEY_FIELD,
      DEFAULT_CRITERIA_CONFIG.primaryKeyField
    ),
    derivationLinkField: toText(
      process.env.CRITERIA_DERIVATION_LINK_FIELD,
      DEFAULT_CRITERIA_CONFIG.derivationLinkField
    ),
    recordTable: toText(process.env.CRITERIA_RECORD_TABLE, DEFAULT_CRITERIA_CONFIG.recordTable),
  };
}

export function loadQueryRetryConfig(): QueryRetryConfig {
  return {
    maxRetries: toNumber(process.env.CRITERIA_QUERY_MAX_RETRIES, 3),
    initialDelayMs: toNumber(process.env.CRITERIA_QUERY_INITIAL_DELAY_MS, 100),
    maxDelayMs: toNumber(process.env.CRITERIA_QUERY_MAX_DELAY_MS, 5000),
  };
}
