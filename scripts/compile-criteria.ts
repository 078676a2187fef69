#!/usr/bin/env tsx
/**
 * Criteria compiler CLI
 *
 * Compiles an expression with the configured field lookup and prints the
 * derivation steps as JSON.
 *
 * Usage:
 *   npm run compile -- "cntn_a equals 1 -> cntn_b one_of x y" [--parent <pk> ...]
 */

import { config } from 'dotenv';
import { loadCriteriaConfig } from '../src/config/criteria.js';
import { compileCriteria } from '../src/criteria/DerivationResolver.js';
import { CriteriaError } from '../src/criteria/errors.js';
import type { ParentRecord, RecordKey } from '../src/criteria/types.js';
import { parseRecordKey } from '../src/records/RecordQueryClient.js';
import { defaultFieldLookup } from '../src/validators/CriteriaValidator.js';

config();

function parseArgs(argv: string[]): { expression: string; parents?: ParentRecord[] } {
  const words: string[] = [];
  const keys: RecordKey[] = [];

  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--parent') {
      const value = argv[++i];
      if (value === undefined) {
        throw new Error('--parent requires a primary key');
      }
      keys.push(parseRecordKey(value));
    } else {
      words.push(argv[i]);
    }
  }

  return {
    expression: words.join(' '),
    parents: keys.length > 0 ? keys.map((key) => ({ pk: () => key })) : undefined,
  };
}

function main(): void {
  const { expression, parents } = parseArgs(process.argv.slice(2));
  const criteriaConfig = loadCriteriaConfig();

  const steps = compileCriteria(expression, {
    isValidField: defaultFieldLookup(criteriaConfig),
    parentRecords: parents,
    linkFields: {
      primaryKey: criteriaConfig.primaryKeyField,
      derivation: criteriaConfig.derivationLinkField,
    },
  });

  console.log(JSON.stringify(steps, null, 2));
}

try {
  main();
} catch (err) {
  console.error('❌ Could not compile criteria');

  if (err instanceof CriteriaError) {
    console.error(`${err.name}: ${err.message}`);
    if (err.hint) {
      console.error(`💡 ${err.hint}`);
    }
  } else {
    console.error(err);
  }

  process.exit(1);
}
