import { vi } from 'vitest';
import type { Logger } from '../common/logger.js';
import { ModelLoadError } from '../common/errors.js';
import { loadEnv } from '../config/env.js';
import type { ArtifactReader } from '../modules/ml/index.js';
import { FEATURE_ORDER } from '../modules/prognosis/index.js';

export const testEnv = loadEnv({
  NODE_ENV: 'test',
  LOG_LEVEL: 'silent',
  MODELS_DIR: '/models',
});

export const SURVIVAL_SOURCE = '/models/survival_prediction_model.json';
export const DRUG_RESPONSE_SOURCE = '/models/drug_response_model.json';

/** Survives (0.95) at stage I/II, otherwise 0.4 */
export const survivalArtifact = {
  format: 'prognosis-model/v1',
  id: 'survival',
  name: 'Survival Test Forest',
  version: '0.0.1',
  metrics: { accuracy: 85, crossValidation: { mean: 85.5, std: 4.9 } },
  featureNames: [...FEATURE_ORDER],
  estimator: {
    type: 'RANDOM_FOREST',
    trees: [
      {
        type: 'split',
        feature: 4,
        threshold: 1.5,
        left: { type: 'leaf', value: 0.95 },
        right: { type: 'leaf', value: 0.4 },
      },
    ],
  },
};

export const drugResponseArtifact = {
  format: 'prognosis-model/v1',
  id: 'drug-response',
  name: 'Drug Response Test Forest',
  version: '0.0.1',
  metrics: { accuracy: 80 },
  featureNames: [...FEATURE_ORDER],
  estimator: {
    type: 'RANDOM_FOREST',
    trees: [{ type: 'leaf', value: 0.65 }],
  },
};

export function memoryReader(artifacts: Record<string, unknown>): ArtifactReader {
  return async (source) => {
    if (!Object.hasOwn(artifacts, source)) {
      throw new ModelLoadError(source, 'file not found');
    }
    return artifacts[source];
  };
}

export const testArtifacts = {
  [SURVIVAL_SOURCE]: survivalArtifact,
  [DRUG_RESPONSE_SOURCE]: drugResponseArtifact,
};

export const EXAMPLE_PAYLOAD = {
  age: 58,
  sex: 'Female',
  cancer_type: 'Breast Cancer',
  stage: 'II',
  grade: 'Moderately Differentiated',
  tumor_size_cm: 3.2,
  treatment: 'Surgery + Chemotherapy',
  performance_status: 'Good',
};

export function stubLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}
