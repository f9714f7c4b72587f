/**
 * GA4GH scheme with missing truth sites treated as no-calls
 *
 * Derived from the GA4GH Benchmarking Work Group's proposed evaluation scheme.
 * A truth genotype absent from the truth set carries no information, so most
 * calls against it contribute nothing (EMPTY). Only a call that is itself
 * missing scores a TN.
 *
 * There is no HET_VAR2_VAR3 row: VAR2/VAR3 are symbolic, so that case is
 * written as HET_VAR3_VAR4.
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
export const missingAsNoCallTable: SchemeTable = [
  // call state       MISSING   HOM_REF  HET_REF_VAR1 HET_VAR1_VAR2 HOM_VAR1  NO_CALL LOW_GQ LOW_DP VC_FILTERED GT_FILTERED IS_MIXED
  ['MISSING',         TN_ONLY,  TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HOM_REF',         EMPTY,    TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HET_REF_VAR1',    EMPTY,    FP_TN,   TP_TN,       TP_FN,        TP_FN,    EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HET_REF_VAR2',    NA,       NA,      FP_TN_FN,    NA,           FP_FN,    NA,     NA,    NA,    NA,         NA,         NA],
  ['HET_REF_VAR3',    NA,       NA,      NA,          FP_FN,        NA,       NA,     NA,    NA,    NA,         NA,         NA],
  ['HET_VAR1_VAR2',   EMPTY,    FP_ONLY, TP_FP,       TP_ONLY,      TP_FP_FN, EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HET_VAR1_VAR3',   NA,       NA,      NA,          TP_FP_FN,     NA,       NA,     NA,    NA,    NA,         NA,         NA],
  ['HET_VAR3_VAR4',   NA,       FP_ONLY, FP_FN,       FP_FN,        FP_FN,    NA,     NA,    NA,    NA,         NA,         NA],
  ['HOM_VAR1',        EMPTY,    FP_ONLY, TP_FP,       TP_FN,        TP_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['HOM_VAR2',        NA,       NA,      FP_FN,       TP_FN,        FP_FN,    NA,     NA,    NA,    NA,         NA,         NA],
  ['HOM_VAR3',        NA,       NA,      NA,          FP_FN,        NA,       NA,     NA,    NA,    NA,         NA,         NA],
  ['NO_CALL',         EMPTY,    EMPTY,   EMPTY,       EMPTY,        EMPTY,    EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['VC_FILTERED',     EMPTY,    TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['GT_FILTERED',     EMPTY,    TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['LOW_GQ',          EMPTY,    TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['LOW_DP',          EMPTY,    TN_ONLY, TN_FN,       FN_ONLY,      FN_ONLY,  EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
  ['IS_MIXED',        EMPTY,    EMPTY,   EMPTY,       EMPTY,        EMPTY,    EMPTY,  EMPTY, EMPTY, EMPTY,      EMPTY,      EMPTY],
];
