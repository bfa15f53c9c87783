/**
 * PROGNOSIS — Response Formatter
 *
 * Pure mapping from pipeline output to the documented JSON bodies.
 */

import type { ModelInfo } from '../ml/index.js';
import type {
  DrugResponseBody,
  DrugResponsePrediction,
  ModelSummaryBody,
  PatientInput,
  SurvivalPrediction,
  SurvivalResponseBody,
} from './prognosis.types.js';

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function formatModelSummary(info: Pick<ModelInfo, 'name' | 'metrics'>): ModelSummaryBody {
  const summary: ModelSummaryBody = {
    name: info.name,
    accuracy: formatPercent(info.metrics.accuracy),
  };
  const cv = info.metrics.crossValidation;
  if (cv) {
    summary.cross_validation = `${formatPercent(cv.mean)} (±${formatPercent(cv.std)})`;
  }
  return summary;
}

export function formatSurvivalResponse(
  patient: PatientInput,
  prediction: SurvivalPrediction,
  model: Pick<ModelInfo, 'name' | 'metrics'>
): SurvivalResponseBody {
  return {
    prediction: {
      survived: prediction.survived,
      survival_probability: prediction.survivalProbability,
      death_probability: prediction.deathProbability,
      confidence: prediction.confidence,
      risk_category: prediction.riskCategory,
    },
    patient: {
      age: patient.age,
      sex: patient.sex,
      cancer_type: patient.cancerType,
      stage: patient.stage,
      tumor_size_cm: patient.tumorSizeCm,
    },
    model: formatModelSummary(model),
  };
}

export function formatDrugResponse(
  patient: PatientInput,
  prediction: DrugResponsePrediction,
  model: Pick<ModelInfo, 'name' | 'metrics'>
): DrugResponseBody {
  return {
    prediction: {
      response_type: prediction.responseType,
      response_probability: prediction.responseProbability,
      no_response_probability: prediction.noResponseProbability,
      confidence: prediction.confidence,
    },
    patient: {
      cancer_type: patient.cancerType,
      stage: patient.stage,
      treatment: patient.treatment,
    },
    model: formatModelSummary(model),
  };
}

/** Short label used by /health, e.g. "Gradient Boosting Classifier (85.0% accuracy)" */
export function formatModelLabel(info: Pick<ModelInfo, 'name' | 'metrics'>): string {
  return `${info.name} (${formatPercent(info.metrics.accuracy)} accuracy)`;
}
