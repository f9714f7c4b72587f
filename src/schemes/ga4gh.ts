/**
 * Default GA4GH scheme
 *
 * A site absent from the truth set is scored as homozygous reference, so the
 * MISSING column repeats the HOM_REF column. The one exception is a site that
 * is missing from both sources: it is never compared, hence NA.
 */

import type { SchemeTable } from '../core/scheme.js';
import {
  EMPTY,
  FN_ONLY,
  FP_FN,
  FP_ONLY,
  FP_TN,
  FP_TN_FN,
  NA,
  TN_FN,
  TN_ONLY,
  TP_FN,
  TP_FP,
  TP_FP_FN,
  TP_ONLY,
  TP_TN,
} from './outcomes.js';

// prettier-ignore
export const ga4ghTable: SchemeTable = [
  // call state       MISSING   HOM_REF  HET_REF_VAR1 HET_VAR1_VAR2 HOM_VAR1  NO_CALL LOW_GQ LOW_DP VC_FILTERED GT_FILTERED IS_MIXED
  ['MISSING',         NA,       TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HOM_REF',         TN_ONLY,  TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HET_REF_VAR1',    FP_TN,    FP_TN,   TP_TN,       TP_FN,        TP_FN,    EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HET_REF_VAR2',    NA,       NA,      FP_TN_FN,    NA,           FP_FN,    NA,     NA,    NA,    NA,         NA,         NA],
  ['HET_REF_VAR3',    NA,       NA,      NA,          FP_FN,        NA,       NA,     NA,    NA,    NA,         NA,         NA],
  ['HET_VAR1_VAR2',   FP_ONLY,  FP_ONLY, TP_FP,       TP_ONLY,      TP_FP_FN, EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HET_VAR1_VAR3',   NA,       NA,      NA,          TP_FP_FN,     NA,       NA,     NA,    NA,    NA,         NA,         NA],
  ['HET_VAR3_VAR4',   FP_ONLY,  FP_ONLY, FP_FN,       FP_FN,        FP_FN,    NA,     NA,    NA,    NA,         NA,         NA],
  ['HOM_VAR1',        FP_ONLY,  FP_ONLY, TP_FP,       TP_FN,        TP_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HOM_VAR2',        NA,       NA,      FP_FN,       TP_FN,        FP_FN,    NA,     NA,    NA,    NA,         NA,         NA],
  ['HOM_VAR3',        NA,       NA,      NA,          FP_FN,        NA,       NA,     NA,    NA,    NA,         NA,         NA],
  ['NO_CALL',         EMPTY,    EMPTY,   EMPTY,       EMPTY,        EMPTY,    EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['VC_FILTERED',     TN_ONLY,  TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['GT_FILTERED',     TN_ONLY,  TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['LOW_GQ',          TN_ONLY,  TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['LOW_DP',          TN_ONLY,  TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['IS_MIXED',        EMPTY,    EMPTY,   EMPTY,       EMPTY,        EMPTY,    EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
];
