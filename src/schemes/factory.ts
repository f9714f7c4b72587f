/**
 * Scheme factory
 *
 * Tables are plain data keyed by policy. buildScheme() populates a fresh
 * scheme from the table; getScheme() picks the policy from a single flag.
 */

import { GenotypeConcordanceScheme } from '../core/scheme.js';
import type { SchemePolicy, SchemeTable } from '../core/scheme.js';
import { ga4ghTable } from './ga4gh.js';
import { missingAsNoCallTable } from './missing-as-no-call.js';

export const SCHEME_TABLES: Readonly<Record<SchemePolicy, SchemeTable>> = {
  'missing-as-no-call': missingAsNoCallTable,
  ga4gh: ga4ghTable,
};

/**
 * Populate a scheme from a table, row by row. The result is not validated.
 */
export function populateScheme(policy: SchemePolicy, table: SchemeTable): GenotypeConcordanceScheme {
  const scheme = new GenotypeConcordanceScheme(policy);
  for (const [callState, ...columns] of table) {
    scheme.addRow(callState, ...columns);
  }
  return scheme;
}

export function buildScheme(policy: SchemePolicy): GenotypeConcordanceScheme {
  return populateScheme(policy, SCHEME_TABLES[policy]);
}

export function policyFor(missingAsNoCall: boolean): SchemePolicy {
  return missingAsNoCall ? 'missing-as-no-call' : 'ga4gh';
}

/**
 * Populated (not yet validated) scheme for the given missing-site convention
 */
export function getScheme(missingAsNoCall: boolean): GenotypeConcordanceScheme {
  return buildScheme(policyFor(missingAsNoCall));
}
