/**
 * ML MODEL TYPES
 *
 * Serialized artifact contract plus the runtime classifier interface.
 */

export const MODEL_ARTIFACT_FORMAT = 'prognosis-model/v1';

// ═══════════════════════════════════════════════════════════════
// TREES
// ═══════════════════════════════════════════════════════════════

export type TreeNode =
  | { type: 'leaf'; value: number; n?: number }
  | { type: 'split'; feature: number; threshold: number; left: TreeNode; right: TreeNode };

// ═══════════════════════════════════════════════════════════════
// ESTIMATORS
// ═══════════════════════════════════════════════════════════════

export interface FeatureScaler {
  mean: number[];
  std: number[];
}

export interface GradientBoostingSpec {
  type: 'GRADIENT_BOOSTING';
  learningRate: number;
  initScore: number;      // log-odds prior
  trees: TreeNode[];      // leaves hold raw log-odds contributions
}

export interface RandomForestSpec {
  type: 'RANDOM_FOREST';
  trees: TreeNode[];      // leaves hold P(class 1)
}

export interface LogRegSpec {
  type: 'LOGREG';
  weights: number[];
  bias: number;
  scaler?: FeatureScaler;
}

export type EstimatorSpec = GradientBoostingSpec | RandomForestSpec | LogRegSpec;
export type EstimatorType = EstimatorSpec['type'];

// ═══════════════════════════════════════════════════════════════
// ARTIFACT
// ═══════════════════════════════════════════════════════════════

export interface ModelMetrics {
  accuracy: number;                                   // percent, e.g. 85.0
  crossValidation?: { mean: number; std: number };    // percent
}

export interface ModelArtifact {
  format: typeof MODEL_ARTIFACT_FORMAT;
  id: string;
  name: string;
  version: string;
  trainedAt?: string;
  metrics: ModelMetrics;
  featureNames: string[];
  // Label encodings used at training time, by field
  categories?: Record<string, Record<string, number>>;
  estimator: EstimatorSpec;
}

export interface ModelInfo {
  id: string;
  name: string;
  version: string;
  trainedAt?: string;
  estimator: EstimatorType;
  metrics: ModelMetrics;
  featureNames: readonly string[];
}

// ═══════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════

export interface BinaryClassifier {
  readonly featureCount: number;
  /** P(class 1) for a single row */
  predictProbaOne(x: readonly number[]): number;
}

export interface LoadedModel {
  info: ModelInfo;
  classifier: BinaryClassifier;
}
