export { SCHEME_TABLES, buildScheme, getScheme, policyFor, populateScheme } from './factory.js';
export { ga4ghTable } from './ga4gh.js';
export { missingAsNoCallTable } from './missing-as-no-call.js';
export * as outcomes from './outcomes.js';
