/**
 * Helpers that walk a tree through its read-only root
 */

import { axisForDepth } from '../../core/kd-tree.js';
import type { Point, ReadonlyKDNode } from '../../core/types.js';

export function collectPoints<T>(node: ReadonlyKDNode<T> | null): Point[] {
  if (!node) {
    return [];
  }
  return [node.point, ...collectPoints(node.left), ...collectPoints(node.right)];
}

/**
 * Every node whose subtrees break the left < split <= right rule
 */
export function findInvariantViolations<T>(
  node: ReadonlyKDNode<T> | null,
  depth = 0
): string[] {
  if (!node) {
    return [];
  }

  const axis = axisForDepth(depth);
  const split = node.point[axis];
  const violations: string[] = [];

  for (const point of collectPoints(node.left)) {
    if (!(point[axis] < split)) {
      violations.push(`[${point.join(',')}] left of [${node.point.join(',')}] at depth ${depth}`);
    }
  }
  for (const point of collectPoints(node.right)) {
    if (!(point[axis] >= split)) {
      violations.push(`[${point.join(',')}] right of [${node.point.join(',')}] at depth ${depth}`);
    }
  }

  return [
    ...violations,
    ...findInvariantViolations(node.left, depth + 1),
    ...findInvariantViolations(node.right, depth + 1),
  ];
}
