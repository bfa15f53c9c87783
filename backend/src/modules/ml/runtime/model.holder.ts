/**
 * MODEL HOLDER
 *
 * Owns the process-wide set of classifiers. Loaded once at boot, all-or-nothing,
 * and read-only afterwards, so requests share it without coordination.
 */

import {
  InferenceError,
  ModelLoadError,
  ModelNotReadyError,
  errorMessage,
} from '../../../common/errors.js';
import type { Logger } from '../../../common/logger.js';
import type { LoadedModel, ModelArtifact, ModelInfo } from '../contracts/model.types.js';
import {
  buildModel,
  parseModelArtifact,
  readArtifactFile,
  type ArtifactReader,
} from '../storage/model.loader.js';

export type ModelHolderState = 'idle' | 'loading' | 'ready' | 'failed';

/** [P(class 0), P(class 1)] */
export type ClassProbabilities = readonly [number, number];

/**
 * What the serving code expects from every artifact. Checked at load time so a
 * model trained on a different feature layout never serves traffic.
 */
export interface ModelExpectations {
  featureNames: readonly string[];
  categories?: Readonly<Record<string, Readonly<Record<string, number>>>>;
}

export interface ModelHolderOptions<K extends string> {
  sources: Readonly<Record<K, string>>;
  logger: Logger;
  expectations?: ModelExpectations;
  reader?: ArtifactReader;
}

function sameCodes(
  a: Readonly<Record<string, number>>,
  b: Readonly<Record<string, number>>
): boolean {
  const keysA = Object.keys(a);
  if (keysA.length !== Object.keys(b).length) return false;
  return keysA.every((key) => Object.hasOwn(b, key) && a[key] === b[key]);
}

export class ModelHolder<K extends string> {
  private readonly sources: Readonly<Record<K, string>>;
  private readonly logger: Logger;
  private readonly expectations: ModelExpectations | undefined;
  private readonly reader: ArtifactReader;

  private models: ReadonlyMap<K, LoadedModel> = new Map();
  private state: ModelHolderState = 'idle';
  private loadError: ModelLoadError | null = null;
  private pending: Promise<void> | null = null;

  constructor(options: ModelHolderOptions<K>) {
    this.sources = options.sources;
    this.logger = options.logger;
    this.expectations = options.expectations;
    this.reader = options.reader ?? readArtifactFile;
  }

  // ═══════════════════════════════════════════════════════════════
  // LOADING
  // ═══════════════════════════════════════════════════════════════

  load(): Promise<void> {
    if (!this.pending) {
      this.pending = this.loadAll();
    }
    return this.pending;
  }

  private kinds(): K[] {
    return Object.keys(this.sources).filter((key): key is K => Object.hasOwn(this.sources, key));
  }

  private async loadAll(): Promise<void> {
    this.state = 'loading';
    this.logger.info({ sources: this.sources }, '[ML] Loading models...');

    const loaded = new Map<K, LoadedModel>();
    let source = '';
    try {
      for (const kind of this.kinds()) {
        source = this.sources[kind];
        const model = await this.loadOne(source);
        loaded.set(kind, model);
        this.logger.info(
          {
            kind,
            model: model.info.name,
            version: model.info.version,
            estimator: model.info.estimator,
            features: model.classifier.featureCount,
          },
          '[ML] Model loaded'
        );
      }
    } catch (err) {
      const loadError =
        err instanceof ModelLoadError ? err : new ModelLoadError(source, errorMessage(err));
      this.state = 'failed';
      this.loadError = loadError;
      this.logger.error({ err: loadError, path: loadError.path }, '[ML] Model loading failed');
      throw loadError;
    }

    this.models = loaded;
    this.state = 'ready';
    this.logger.info({ count: loaded.size }, '[ML] ✓ Models loaded successfully');
  }

  private async loadOne(source: string): Promise<LoadedModel> {
    const json = await this.reader(source);
    const artifact = parseModelArtifact(json, source);
    this.checkExpectations(artifact, source);
    return buildModel(artifact, source);
  }

  private checkExpectations(artifact: ModelArtifact, source: string): void {
    const expected = this.expectations;
    if (!expected) return;

    const names = artifact.featureNames;
    const sameOrder =
      names.length === expected.featureNames.length &&
      names.every((name, i) => name === expected.featureNames[i]);
    if (!sameOrder) {
      throw new ModelLoadError(
        source,
        `feature order [${names.join(', ')}] does not match [${expected.featureNames.join(', ')}]`
      );
    }

    if (!artifact.categories || !expected.categories) return;
    for (const [field, codes] of Object.entries(artifact.categories)) {
      const servingCodes = expected.categories[field];
      if (!servingCodes || !sameCodes(codes, servingCodes)) {
        throw new ModelLoadError(source, `category codes for '${field}' do not match the encoder`);
      }
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // STATUS
  // ═══════════════════════════════════════════════════════════════

  getState(): ModelHolderState {
    return this.state;
  }

  isReady(): boolean {
    return this.state === 'ready';
  }

  getLoadError(): ModelLoadError | null {
    return this.loadError;
  }

  private requireModel(kind: K): LoadedModel {
    if (this.state !== 'ready') {
      throw new ModelNotReadyError(this.state);
    }
    const model = this.models.get(kind);
    if (!model) {
      throw new InferenceError(kind, 'model is not configured');
    }
    return model;
  }

  getInfo(kind: K): ModelInfo {
    return this.requireModel(kind).info;
  }

  // ═══════════════════════════════════════════════════════════════
  // INFERENCE
  // ═══════════════════════════════════════════════════════════════

  predictProba(kind: K, features: readonly number[]): ClassProbabilities {
    const { classifier } = this.requireModel(kind);

    if (features.length !== classifier.featureCount) {
      throw new InferenceError(
        kind,
        `expected ${classifier.featureCount} features, got ${features.length}`
      );
    }
    if (!features.every(Number.isFinite)) {
      throw new InferenceError(kind, 'feature vector contains non-finite values');
    }

    let p1: number;
    try {
      p1 = classifier.predictProbaOne(features);
    } catch (err) {
      throw new InferenceError(kind, errorMessage(err));
    }

    if (!Number.isFinite(p1) || p1 < 0 || p1 > 1) {
      throw new InferenceError(kind, `model returned invalid probability ${p1}`);
    }
    return [1 - p1, p1];
  }
}
