/**
 * PROGNOSIS — Prediction Pipeline
 *
 * PatientInput -> feature vector -> model probabilities -> derived outcome.
 * One deterministic model call per request, no retries.
 */

import type { ClassProbabilities, ModelHolder } from '../ml/index.js';
import { buildFeatureVector } from './prognosis.encoder.js';
import type {
  DrugResponsePrediction,
  ModelKind,
  OutcomeProbabilities,
  PatientInput,
  PrognosisThresholds,
  ResponseType,
  RiskCategory,
  SurvivalPrediction,
} from './prognosis.types.js';

export const SURVIVAL_THRESHOLD = 0.5;

export const DEFAULT_THRESHOLDS: PrognosisThresholds = {
  risk: { lowBelow: 0.1, mediumBelow: 0.3 },
  response: { partialAbove: 0.5, completeAbove: 0.8 },
};

// ═══════════════════════════════════════════════════════════════
// BANDS
// ═══════════════════════════════════════════════════════════════

export function classifyRisk(
  deathProbability: number,
  bands: PrognosisThresholds['risk'] = DEFAULT_THRESHOLDS.risk
): RiskCategory {
  if (deathProbability < bands.lowBelow) return 'Low';
  if (deathProbability < bands.mediumBelow) return 'Medium';
  return 'High';
}

export function classifyResponse(
  responseProbability: number,
  bands: PrognosisThresholds['response'] = DEFAULT_THRESHOLDS.response
): ResponseType {
  if (responseProbability > bands.completeAbove) return 'Complete Response';
  if (responseProbability > bands.partialAbove) return 'Partial Response';
  return 'No Response';
}

export function toOutcome([negative, positive]: ClassProbabilities): OutcomeProbabilities {
  return {
    negative,
    positive,
    confidence: Math.max(negative, positive),
  };
}

// ═══════════════════════════════════════════════════════════════
// PREDICTOR
// ═══════════════════════════════════════════════════════════════

export class PrognosisPredictor {
  constructor(
    private readonly models: Pick<ModelHolder<ModelKind>, 'predictProba'>,
    private readonly thresholds: PrognosisThresholds = DEFAULT_THRESHOLDS
  ) {}

  assess(kind: ModelKind, input: PatientInput): OutcomeProbabilities {
    const features = buildFeatureVector(input);
    return toOutcome(this.models.predictProba(kind, features));
  }

  predictSurvival(input: PatientInput): SurvivalPrediction {
    const outcome = this.assess('survival', input);
    const survivalProbability = outcome.positive;
    const deathProbability = outcome.negative;

    return {
      survived: survivalProbability >= SURVIVAL_THRESHOLD,
      survivalProbability,
      deathProbability,
      confidence: outcome.confidence,
      riskCategory: classifyRisk(deathProbability, this.thresholds.risk),
    };
  }

  predictDrugResponse(input: PatientInput): DrugResponsePrediction {
    const outcome = this.assess('drug-response', input);

    return {
      responseType: classifyResponse(outcome.positive, this.thresholds.response),
      responseProbability: outcome.positive,
      noResponseProbability: outcome.negative,
      confidence: outcome.confidence,
    };
  }
}
