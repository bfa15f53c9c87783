/**
 * ML Model Loader
 * ===============
 * Reads serialized model artifacts from disk, validates them and builds
 * the runtime classifier. Any problem is a ModelLoadError.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ModelLoadError, errorMessage } from '../../../common/errors.js';
import {
  MODEL_ARTIFACT_FORMAT,
  type BinaryClassifier,
  type LoadedModel,
  type ModelArtifact,
  type TreeNode,
} from '../contracts/model.types.js';
import { DecisionTree } from '../models/tree.model.js';
import { GradientBoostingClassifier, RandomForestClassifier } from '../models/ensemble.model.js';
import { LogisticRegression } from '../models/logreg.model.js';

export type ArtifactReader = (source: string) => Promise<unknown>;

// ═══════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════

const finite = z.number().finite();

const TreeNodeSchema: z.ZodType<TreeNode> = z.lazy(() =>
  z.union([
    z.object({
      type: z.literal('leaf'),
      value: finite,
      n: z.number().int().nonnegative().optional(),
    }),
    z.object({
      type: z.literal('split'),
      feature: z.number().int().nonnegative(),
      threshold: finite,
      left: TreeNodeSchema,
      right: TreeNodeSchema,
    }),
  ])
);

const EstimatorSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('GRADIENT_BOOSTING'),
    learningRate: finite.positive(),
    initScore: finite,
    trees: z.array(TreeNodeSchema).min(1),
  }),
  z.object({
    type: z.literal('RANDOM_FOREST'),
    trees: z.array(TreeNodeSchema).min(1),
  }),
  z.object({
    type: z.literal('LOGREG'),
    weights: z.array(finite).min(1),
    bias: finite,
    scaler: z.object({ mean: z.array(finite), std: z.array(finite) }).optional(),
  }),
]);

const percent = z.number().min(0).max(100);

const ModelArtifactSchema = z.object({
  format: z.literal(MODEL_ARTIFACT_FORMAT),
  id: z.string().min(1),
  name: z.string().min(1),
  version: z.string().min(1),
  trainedAt: z.string().optional(),
  metrics: z.object({
    accuracy: percent,
    crossValidation: z.object({ mean: percent, std: percent }).optional(),
  }),
  featureNames: z.array(z.string().min(1)).min(1),
  categories: z.record(z.record(z.number().int().nonnegative())).optional(),
  estimator: EstimatorSchema,
});

// ═══════════════════════════════════════════════════════════════
// READ + PARSE
// ═══════════════════════════════════════════════════════════════

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export const readArtifactFile: ArtifactReader = async (filePath) => {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ModelLoadError(filePath, isNotFound(err) ? 'file not found' : errorMessage(err));
  }

  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new ModelLoadError(filePath, `corrupt artifact (${errorMessage(err)})`);
  }
};

export function parseModelArtifact(json: unknown, source: string): ModelArtifact {
  const parsed = ModelArtifactSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || 'artifact'}: ${issue.message}`);
    throw new ModelLoadError(source, `invalid artifact (${issues.join('; ')})`);
  }
  return parsed.data;
}

// ═══════════════════════════════════════════════════════════════
// BUILD
// ═══════════════════════════════════════════════════════════════

function checkTrees(trees: readonly DecisionTree[], featureCount: number, source: string): void {
  trees.forEach((tree, i) => {
    const maxFeature = tree.maxFeatureIndex();
    if (maxFeature >= featureCount) {
      throw new ModelLoadError(
        source,
        `tree ${i} splits on feature ${maxFeature} but the model has ${featureCount} features`
      );
    }
  });
}

function buildClassifier(artifact: ModelArtifact, source: string): BinaryClassifier {
  const featureCount = artifact.featureNames.length;
  const estimator = artifact.estimator;

  switch (estimator.type) {
    case 'GRADIENT_BOOSTING': {
      const model = new GradientBoostingClassifier(estimator, featureCount);
      checkTrees(model.trees, featureCount, source);
      return model;
    }
    case 'RANDOM_FOREST': {
      const model = new RandomForestClassifier(estimator, featureCount);
      checkTrees(model.trees, featureCount, source);
      const outOfRange = model.trees.some((tree) => tree.leafValues().some((p) => p < 0 || p > 1));
      if (outOfRange) {
        throw new ModelLoadError(source, 'random forest leaf probabilities must lie in [0, 1]');
      }
      return model;
    }
    case 'LOGREG': {
      if (estimator.weights.length !== featureCount) {
        throw new ModelLoadError(
          source,
          `expected ${featureCount} weights, got ${estimator.weights.length}`
        );
      }
      const scaler = estimator.scaler;
      if (scaler && (scaler.mean.length !== featureCount || scaler.std.length !== featureCount)) {
        throw new ModelLoadError(source, `scaler must have ${featureCount} entries per statistic`);
      }
      return new LogisticRegression(estimator);
    }
  }
}

export function buildModel(artifact: ModelArtifact, source: string): LoadedModel {
  return {
    info: {
      id: artifact.id,
      name: artifact.name,
      version: artifact.version,
      trainedAt: artifact.trainedAt,
      estimator: artifact.estimator.type,
      metrics: artifact.metrics,
      featureNames: [...artifact.featureNames],
    },
    classifier: buildClassifier(artifact, source),
  };
}
