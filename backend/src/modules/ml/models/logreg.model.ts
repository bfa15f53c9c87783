/**
 * Logistic Regression Model
 * =========================
 * Inference over serialized weights, with optional standard scaling
 */

import type { BinaryClassifier, FeatureScaler, LogRegSpec } from '../contracts/model.types.js';

export function sigmoid(z: number): number {
  // Numeric stability
  if (z >= 0) {
    const ez = Math.exp(-z);
    return 1 / (1 + ez);
  } else {
    const ez = Math.exp(z);
    return ez / (1 + ez);
  }
}

export class LogisticRegression implements BinaryClassifier {
  private readonly weights: readonly number[];
  private readonly bias: number;
  private readonly scaler: FeatureScaler | null;

  constructor(spec: Pick<LogRegSpec, 'weights' | 'bias' | 'scaler'>) {
    this.weights = [...spec.weights];
    this.bias = spec.bias;
    this.scaler = spec.scaler ?? null;
  }

  get featureCount(): number {
    return this.weights.length;
  }

  private scale(x: readonly number[]): readonly number[] {
    const scaler = this.scaler;
    if (!scaler) return x;
    return x.map((v, i) => (v - (scaler.mean[i] ?? 0)) / (scaler.std[i] || 1));
  }

  predictProbaOne(x: readonly number[]): number {
    const scaled = this.scale(x);
    let z = this.bias;
    for (let j = 0; j < this.weights.length; j++) {
      z += this.weights[j] * (scaled[j] ?? 0);
    }
    return sigmoid(z);
  }
}
