/**
 * PROGNOSIS — Encoder Table
 *
 * Maps categorical patient fields to the integer codes the models were trained on.
 * Codes follow label-encoder order: index of the value in the vocabulary sorted
 * by code point. An unknown value is always an error, never a default code.
 */

import { UnknownCategoryError } from '../../common/errors.js';
import type { ModelExpectations } from '../ml/index.js';
import {
  CANCER_TYPES,
  GRADES,
  PERFORMANCE_STATUSES,
  SEXES,
  STAGES,
  TREATMENTS,
  type CategoricalField,
  type CategoryValues,
  type PatientInput,
  type PatientPayload,
} from './prognosis.types.js';

type CategoryCodeTable = { readonly [F in CategoricalField]: Readonly<Record<CategoryValues[F], number>> };
type Vocabulary = { readonly [F in CategoricalField]: readonly CategoryValues[F][] };

export const VOCABULARY: Vocabulary = {
  sex: SEXES,
  cancer_type: CANCER_TYPES,
  stage: STAGES,
  grade: GRADES,
  treatment: TREATMENTS,
  performance_status: PERFORMANCE_STATUSES,
};

export const CATEGORY_CODES: CategoryCodeTable = {
  sex: {
    Female: 0,
    Male: 1,
  },
  cancer_type: {
    'Breast Cancer': 0,
    'Colorectal Cancer': 1,
    Leukemia: 2,
    'Lung Cancer': 3,
    Melanoma: 4,
    'Ovarian Cancer': 5,
    'Pancreatic Cancer': 6,
    'Prostate Cancer': 7,
  },
  stage: {
    I: 0,
    II: 1,
    III: 2,
    IV: 3,
  },
  grade: {
    'Moderately Differentiated': 0,
    'Poorly Differentiated': 1,
    Undifferentiated: 2,
    'Well Differentiated': 3,
  },
  treatment: {
    Chemotherapy: 0,
    'Chemotherapy + Radiation': 1,
    Immunotherapy: 2,
    Multimodal: 3,
    Radiation: 4,
    Surgery: 5,
    'Surgery + Chemotherapy': 6,
    'Surgery + Radiation': 7,
  },
  performance_status: {
    Excellent: 0,
    Fair: 1,
    Good: 2,
    Poor: 3,
  },
};

/** Column order of the feature vector, as trained */
export const FEATURE_ORDER = [
  'age',
  'tumor_size_cm',
  'sex',
  'cancer_type',
  'stage',
  'grade',
  'treatment',
  'performance_status',
] as const;

// ═══════════════════════════════════════════════════════════════
// LOOKUP
// ═══════════════════════════════════════════════════════════════

export function isCategoryValue<F extends CategoricalField>(
  field: F,
  value: string
): value is CategoryValues[F] {
  const allowed: readonly string[] = VOCABULARY[field];
  return allowed.includes(value);
}

export function parseCategory<F extends CategoricalField>(field: F, value: string): CategoryValues[F] {
  if (!isCategoryValue(field, value)) {
    throw new UnknownCategoryError(field, value, VOCABULARY[field]);
  }
  return value;
}

export function encode(field: CategoricalField, value: string): number {
  const codes: Readonly<Record<string, number>> = CATEGORY_CODES[field];
  if (!Object.hasOwn(codes, value)) {
    throw new UnknownCategoryError(field, value, VOCABULARY[field]);
  }
  return codes[value];
}

// ═══════════════════════════════════════════════════════════════
// PATIENT
// ═══════════════════════════════════════════════════════════════

/** Narrows every categorical field, failing on the first unknown one in feature order */
export function toPatientInput(payload: PatientPayload): PatientInput {
  const sex = parseCategory('sex', payload.sex);
  const cancerType = parseCategory('cancer_type', payload.cancer_type);
  const stage = parseCategory('stage', payload.stage);
  const grade = parseCategory('grade', payload.grade);
  const treatment = parseCategory('treatment', payload.treatment);
  const performanceStatus = parseCategory('performance_status', payload.performance_status);

  return {
    age: payload.age,
    sex,
    cancerType,
    stage,
    grade,
    tumorSizeCm: payload.tumor_size_cm,
    treatment,
    performanceStatus,
  };
}

export function buildFeatureVector(input: PatientInput): number[] {
  return [
    input.age,
    input.tumorSizeCm,
    CATEGORY_CODES.sex[input.sex],
    CATEGORY_CODES.cancer_type[input.cancerType],
    CATEGORY_CODES.stage[input.stage],
    CATEGORY_CODES.grade[input.grade],
    CATEGORY_CODES.treatment[input.treatment],
    CATEGORY_CODES.performance_status[input.performanceStatus],
  ];
}

export function encoderExpectations(): ModelExpectations {
  return {
    featureNames: FEATURE_ORDER,
    categories: CATEGORY_CODES,
  };
}
