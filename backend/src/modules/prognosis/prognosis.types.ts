/**
 * PROGNOSIS — Types
 *
 * Patient vocabulary, pipeline results and response bodies.
 */

// ═══════════════════════════════════════════════════════════════
// VOCABULARY (display order)
// ═══════════════════════════════════════════════════════════════

export const SEXES = ['Female', 'Male'] as const;

export const CANCER_TYPES = [
  'Breast Cancer',
  'Lung Cancer',
  'Prostate Cancer',
  'Colorectal Cancer',
  'Melanoma',
  'Pancreatic Cancer',
  'Leukemia',
  'Ovarian Cancer',
] as const;

export const STAGES = ['I', 'II', 'III', 'IV'] as const;

export const GRADES = [
  'Well Differentiated',
  'Moderately Differentiated',
  'Poorly Differentiated',
  'Undifferentiated',
] as const;

export const TREATMENTS = [
  'Surgery',
  'Chemotherapy',
  'Radiation',
  'Immunotherapy',
  'Surgery + Chemotherapy',
  'Surgery + Radiation',
  'Chemotherapy + Radiation',
  'Multimodal',
] as const;

export const PERFORMANCE_STATUSES = ['Excellent', 'Good', 'Fair', 'Poor'] as const;

export type Sex = (typeof SEXES)[number];
export type CancerType = (typeof CANCER_TYPES)[number];
export type Stage = (typeof STAGES)[number];
export type Grade = (typeof GRADES)[number];
export type Treatment = (typeof TREATMENTS)[number];
export type PerformanceStatus = (typeof PERFORMANCE_STATUSES)[number];

/** Wire name of each categorical field and its value union */
export interface CategoryValues {
  sex: Sex;
  cancer_type: CancerType;
  stage: Stage;
  grade: Grade;
  treatment: Treatment;
  performance_status: PerformanceStatus;
}

export type CategoricalField = keyof CategoryValues;

// ═══════════════════════════════════════════════════════════════
// INPUT
// ═══════════════════════════════════════════════════════════════

/** Payload after shape validation, categories not yet checked */
export interface PatientPayload {
  age: number;
  sex: string;
  cancer_type: string;
  stage: string;
  grade: string;
  tumor_size_cm: number;
  treatment: string;
  performance_status: string;
}

export interface PatientInput {
  age: number;
  sex: Sex;
  cancerType: CancerType;
  stage: Stage;
  grade: Grade;
  tumorSizeCm: number;
  treatment: Treatment;
  performanceStatus: PerformanceStatus;
}

// ═══════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════

export type ModelKind = 'survival' | 'drug-response';

export type RiskCategory = 'Low' | 'Medium' | 'High';

export type ResponseType = 'No Response' | 'Partial Response' | 'Complete Response';

export interface OutcomeProbabilities {
  negative: number;
  positive: number;
  confidence: number;
}

export interface SurvivalPrediction {
  survived: boolean;
  survivalProbability: number;
  deathProbability: number;
  confidence: number;
  riskCategory: RiskCategory;
}

export interface DrugResponsePrediction {
  responseType: ResponseType;
  responseProbability: number;
  noResponseProbability: number;
  confidence: number;
}

export interface PrognosisThresholds {
  risk: { lowBelow: number; mediumBelow: number };
  response: { partialAbove: number; completeAbove: number };
}

// ═══════════════════════════════════════════════════════════════
// RESPONSE BODIES
// ═══════════════════════════════════════════════════════════════

export interface ModelSummaryBody {
  name: string;
  accuracy: string;
  cross_validation?: string;
}

export interface SurvivalResponseBody {
  prediction: {
    survived: boolean;
    survival_probability: number;
    death_probability: number;
    confidence: number;
    risk_category: RiskCategory;
  };
  patient: {
    age: number;
    sex: Sex;
    cancer_type: CancerType;
    stage: Stage;
    tumor_size_cm: number;
  };
  model: ModelSummaryBody;
}

export interface DrugResponseBody {
  prediction: {
    response_type: ResponseType;
    response_probability: number;
    no_response_probability: number;
    confidence: number;
  };
  patient: {
    cancer_type: CancerType;
    stage: Stage;
    treatment: Treatment;
  };
  model: ModelSummaryBody;
}
