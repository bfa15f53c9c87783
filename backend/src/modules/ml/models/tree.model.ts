/**
 * Decision Tree Model
 * ===================
 * Inference over a serialized CART tree. Rows go left when x[feature] <= threshold.
 */

import type { TreeNode } from '../contracts/model.types.js';

export class DecisionTree {
  readonly root: TreeNode;

  constructor(root: TreeNode) {
    this.root = root;
  }

  predictValue(x: readonly number[]): number {
    let node: TreeNode = this.root;
    while (node.type === 'split') {
      const v = x[node.feature] ?? 0;
      node = v <= node.threshold ? node.left : node.right;
    }
    return node.value;
  }

  /** Highest feature index referenced by any split, -1 for a single leaf */
  maxFeatureIndex(): number {
    let max = -1;
    const traverse = (node: TreeNode) => {
      if (node.type === 'leaf') return;
      max = Math.max(max, node.feature);
      traverse(node.left);
      traverse(node.right);
    };
    traverse(this.root);
    return max;
  }

  leafValues(): number[] {
    const values: number[] = [];
    const traverse = (node: TreeNode) => {
      if (node.type === 'leaf') {
        values.push(node.value);
        return;
      }
      traverse(node.left);
      traverse(node.right);
    };
    traverse(this.root);
    return values;
  }
}
