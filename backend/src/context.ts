/**
 * Application context
 *
 * Built once at boot and handed to the HTTP layer. Everything in it is
 * read-only once the models have loaded.
 */

import path from 'path';
import type { Env } from './config/env.js';
import type { Logger } from './common/logger.js';
import { ModelHolder, type ArtifactReader } from './modules/ml/index.js';
import {
  PrognosisPredictor,
  encoderExpectations,
  type ModelKind,
  type PrognosisThresholds,
} from './modules/prognosis/index.js';

export interface AppContext {
  readonly env: Env;
  readonly models: ModelHolder<ModelKind>;
  readonly predictor: PrognosisPredictor;
}

export function modelSources(env: Env): Record<ModelKind, string> {
  return {
    survival: path.resolve(env.MODELS_DIR, env.SURVIVAL_MODEL_FILE),
    'drug-response': path.resolve(env.MODELS_DIR, env.DRUG_RESPONSE_MODEL_FILE),
  };
}

export function thresholdsFromEnv(env: Env): PrognosisThresholds {
  return {
    risk: { lowBelow: env.RISK_LOW_BELOW, mediumBelow: env.RISK_MEDIUM_BELOW },
    response: { partialAbove: env.RESPONSE_PARTIAL_ABOVE, completeAbove: env.RESPONSE_COMPLETE_ABOVE },
  };
}

export function createAppContext(
  env: Env,
  logger: Logger,
  options: { reader?: ArtifactReader } = {}
): AppContext {
  const models = new ModelHolder<ModelKind>({
    sources: modelSources(env),
    logger,
    expectations: encoderExpectations(),
    reader: options.reader,
  });

  return {
    env,
    models,
    predictor: new PrognosisPredictor(models, thresholdsFromEnv(env)),
  };
}
