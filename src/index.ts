// Main entry point for genotype-concordance (library usage).
// The CLI lives in ./cli.ts and is exposed as the package bin.

export {
  TRUTH_STATES,
  CALL_STATES,
  CONTINGENCY_STATES,
  isTruthState,
  isCallState,
  isContingencyState,
  isCountableState,
  parseTruthState,
  parseCallState,
  truthOrdinal,
  type TruthState,
  type CallState,
  type ContingencyState,
  type CountableState,
} from './core/states.js';

export { TruthAndCallStates } from './core/comparison-key.js';

export {
  GenotypeConcordanceScheme,
  SCHEME_POLICIES,
  type OutcomeSequence,
  type SchemePolicy,
  type SchemeRow,
  type SchemeRowOutcomes,
  type SchemeTable,
  type ValidatedScheme,
} from './core/scheme.js';

export {
  ConcordanceError,
  ErrorCodes,
  SchemeDefinitionError,
  SchemeValidationError,
  UnreachableComparisonError,
  type ErrorCode,
} from './core/errors.js';

export {
  SCHEME_TABLES,
  buildScheme,
  getScheme,
  policyFor,
  populateScheme,
  ga4ghTable,
  missingAsNoCallTable,
  outcomes,
} from './schemes/index.js';

export {
  ConcordanceClassifier,
  createClassifier,
  type ClassificationRow,
  type ClassifierServiceConfig,
  type IConcordanceClassifier,
} from './services/classifier.service.js';

export { VERSION } from './version.js';
