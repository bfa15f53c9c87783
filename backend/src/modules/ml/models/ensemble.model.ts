/**
 * Tree Ensembles
 * ==============
 * Gradient boosting: sigmoid(initScore + learningRate * sum of leaf scores)
 * Random forest:     mean of leaf probabilities
 */

import type {
  BinaryClassifier,
  GradientBoostingSpec,
  RandomForestSpec,
} from '../contracts/model.types.js';
import { DecisionTree } from './tree.model.js';
import { sigmoid } from './logreg.model.js';

export class GradientBoostingClassifier implements BinaryClassifier {
  readonly trees: readonly DecisionTree[];

  constructor(
    private readonly spec: Omit<GradientBoostingSpec, 'type'>,
    readonly featureCount: number
  ) {
    this.trees = spec.trees.map((root) => new DecisionTree(root));
  }

  decisionFunction(x: readonly number[]): number {
    let raw = this.spec.initScore;
    for (const tree of this.trees) {
      raw += this.spec.learningRate * tree.predictValue(x);
    }
    return raw;
  }

  predictProbaOne(x: readonly number[]): number {
    return sigmoid(this.decisionFunction(x));
  }
}

export class RandomForestClassifier implements BinaryClassifier {
  readonly trees: readonly DecisionTree[];

  constructor(spec: Omit<RandomForestSpec, 'type'>, readonly featureCount: number) {
    this.trees = spec.trees.map((root) => new DecisionTree(root));
  }

  predictProbaOne(x: readonly number[]): number {
    let sum = 0;
    for (const tree of this.trees) {
      sum += tree.predictValue(x);
    }
    return sum / this.trees.length;
  }
}
