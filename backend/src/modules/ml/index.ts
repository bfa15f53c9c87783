/**
 * ML MODULE INDEX
 */

export { ModelHolder } from './runtime/model.holder.js';
export type {
  ClassProbabilities,
  ModelExpectations,
  ModelHolderOptions,
  ModelHolderState,
} from './runtime/model.holder.js';
export { readArtifactFile, parseModelArtifact, buildModel } from './storage/model.loader.js';
export type { ArtifactReader } from './storage/model.loader.js';
export { MODEL_ARTIFACT_FORMAT } from './contracts/model.types.js';
export type {
  BinaryClassifier,
  EstimatorSpec,
  LoadedModel,
  ModelArtifact,
  ModelInfo,
  ModelMetrics,
  TreeNode,
} from './contracts/model.types.js';
