/**
 * PROGNOSIS ROUTES — HTTP Endpoints
 */

import type { FastifyInstance } from 'fastify';
import type { ModelHolder } from '../ml/index.js';
import {
  formatDrugResponse,
  formatSurvivalResponse,
} from './prognosis.formatter.js';
import type { PrognosisPredictor } from './prognosis.predictor.js';
import {
  CANCER_TYPES,
  GRADES,
  PERFORMANCE_STATUSES,
  STAGES,
  TREATMENTS,
  type ModelKind,
} from './prognosis.types.js';
import { parsePatientInput } from './prognosis.validator.js';

export interface PrognosisRouteDeps {
  models: ModelHolder<ModelKind>;
  predictor: PrognosisPredictor;
}

export async function registerPrognosisRoutes(
  app: FastifyInstance,
  deps: PrognosisRouteDeps
): Promise<void> {
  const { models, predictor } = deps;

  // ═══════════════════════════════════════════════════════════════
  // PREDICTIONS
  // ═══════════════════════════════════════════════════════════════

  /**
   * POST /predict/survival
   *
   * 5-year survival probability, risk category and confidence
   */
  app.post('/predict/survival', async (request) => {
    const patient = parsePatientInput(request.body);
    const prediction = predictor.predictSurvival(patient);

    request.log.info(
      {
        survived: prediction.survived,
        riskCategory: prediction.riskCategory,
        survivalProbability: prediction.survivalProbability,
      },
      'survival prediction'
    );

    return formatSurvivalResponse(patient, prediction, models.getInfo('survival'));
  });

  /**
   * POST /predict/drug-response
   *
   * Probability that the patient responds to the given treatment
   */
  app.post('/predict/drug-response', async (request) => {
    const patient = parsePatientInput(request.body);
    const prediction = predictor.predictDrugResponse(patient);

    request.log.info(
      {
        responseType: prediction.responseType,
        responseProbability: prediction.responseProbability,
      },
      'drug response prediction'
    );

    return formatDrugResponse(patient, prediction, models.getInfo('drug-response'));
  });

  // ═══════════════════════════════════════════════════════════════
  // VOCABULARY
  // ═══════════════════════════════════════════════════════════════

  app.get('/cancer-types', async () => ({ cancer_types: CANCER_TYPES }));

  app.get('/stages', async () => ({ stages: STAGES }));

  app.get('/treatments', async () => ({ treatments: TREATMENTS }));

  app.get('/grades', async () => ({ grades: GRADES }));

  app.get('/performance-statuses', async () => ({ performance_statuses: PERFORMANCE_STATUSES }));
}
