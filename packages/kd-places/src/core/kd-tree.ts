/**
 * Two-Dimensional k-d Tree
 *
 * Mutable spatial index over planar points, each carrying an opaque payload.
 * Supports insertion, deletion, closed-rectangle range search and
 * nearest-neighbour search.
 *
 * INVARIANT (axis-alternating partition):
 * For a node at depth d with axis = d mod 2, every point in its left subtree
 * has point[axis] < node.point[axis] and every point in its right subtree has
 * point[axis] >= node.point[axis]. The axis is derived from depth on every
 * traversal and never stored on the node.
 *
 * LIMITATIONS:
 * - No rebalancing. Monotonic insertion orders degrade the tree to a list
 *   (O(n) height, O(n) operations).
 * - Recursion depth of delete/search follows tree height.
 * - Not safe for concurrent mutation; callers serialize writes.
 *
 * @module core/kd-tree
 */

import { IndexInvariantError } from './errors.js';
import type {
  Axis,
  KDNode,
  NearestResult,
  Point,
  RangeEntry,
  ReadonlyKDNode,
} from './types.js';

// ============================================================================
// Geometry Helpers
// ============================================================================

/**
 * Splitting axis for a given depth
 */
export function axisForDepth(depth: number): Axis {
  return depth % 2 === 0 ? 0 : 1;
}

/**
 * Exact coordinate equality (no epsilon)
 */
export function pointsEqual(a: Point, b: Point): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/**
 * Straight-line planar distance
 */
export function euclideanDistance(a: Point, b: Point): number {
  const dx = a[0] - b[0];
  const dy = a[1] - b[1];
  return Math.sqrt(dx * dx + dy * dy);
}

/**
 * Closed-rectangle containment test (inclusive on both axes)
 */
export function isWithinRectangle(point: Point, min: Point, max: Point): boolean {
  return (
    min[0] <= point[0] &&
    point[0] <= max[0] &&
    min[1] <= point[1] &&
    point[1] <= max[1]
  );
}

// ============================================================================
// Minimum Along Axis
// ============================================================================

/**
 * Find the node with the smallest coordinate along `axis` in a subtree
 *
 * Two cases, decided by the subtree root's own split axis (depth mod 2):
 * - Split axis == target axis: the right subtree only holds values >= this
 *   node, so the answer is this node or the minimum of the left subtree.
 * - Split axis != target axis: neither child is bounded along the target
 *   axis, so both children are searched and compared with this node.
 *
 * Ties keep the first node encountered (this node, then left, then right).
 *
 * @param node - Subtree root; must not be absent
 * @param axis - Axis to minimise along
 * @param depth - Depth of `node` in the full tree
 * @throws {IndexInvariantError} If called on an absent subtree
 */
export function findMinAlongAxis<T>(
  node: KDNode<T> | null,
  axis: Axis,
  depth: number
): KDNode<T> {
  if (!node) {
    throw new IndexInvariantError('Minimum search called on an absent subtree', depth);
  }

  if (axisForDepth(depth) === axis) {
    if (!node.left) {
      return node;
    }
    return lowerAlong(axis, node, findMinAlongAxis(node.left, axis, depth + 1));
  }

  let best = node;
  if (node.left) {
    best = lowerAlong(axis, best, findMinAlongAxis(node.left, axis, depth + 1));
  }
  if (node.right) {
    best = lowerAlong(axis, best, findMinAlongAxis(node.right, axis, depth + 1));
  }
  return best;
}

function lowerAlong<T>(axis: Axis, current: KDNode<T>, candidate: KDNode<T>): KDNode<T> {
  return candidate.point[axis] < current.point[axis] ? candidate : current;
}

// ============================================================================
// Tree
// ============================================================================

interface DeleteStep<T> {
  readonly node: KDNode<T> | null;
  readonly removed: boolean;
}

interface NearestBest<T> {
  node: KDNode<T> | null;
  distance: number;
}

/**
 * 2-D k-d tree with payloads
 *
 * @example
 * ```typescript
 * const tree = new KDTree<string>();
 * tree.insert([2, 3], 'a');
 * tree.insert([5, 4], 'b');
 *
 * tree.nearestNeighbor([5, 5]); // { point: [5, 4], payload: 'b', distance: 1 }
 * tree.rangeSearch([0, 0], [3, 3]); // [{ point: [2, 3], payload: 'a' }]
 * tree.delete([5, 4]); // true
 * ```
 */
export class KDTree<T> {
  private rootNode: KDNode<T> | null = null;
  private count = 0;

  /**
   * Read-only view of the root (null when empty)
   */
  get root(): ReadonlyKDNode<T> | null {
    return this.rootNode;
  }

  /**
   * Number of stored nodes, duplicates included
   */
  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.rootNode === null;
  }

  clear(): void {
    this.rootNode = null;
    this.count = 0;
  }

  // --------------------------------------------------------------------------
  // Insertion
  // --------------------------------------------------------------------------

  /**
   * Insert a point with its payload
   *
   * Never rejects: duplicate points get their own node. A coordinate equal to
   * the splitting value goes right.
   */
  insert(point: Point, payload: T): void {
    const created: KDNode<T> = {
      point: [point[0], point[1]],
      payload,
      left: null,
      right: null,
    };
    this.count++;

    if (!this.rootNode) {
      this.rootNode = created;
      return;
    }

    let current = this.rootNode;
    let depth = 0;

    for (;;) {
      const axis = axisForDepth(depth);

      if (point[axis] < current.point[axis]) {
        if (!current.left) {
          current.left = created;
          return;
        }
        current = current.left;
      } else {
        if (!current.right) {
          current.right = created;
          return;
        }
        current = current.right;
      }

      depth++;
    }
  }

  // --------------------------------------------------------------------------
  // Deletion
  // --------------------------------------------------------------------------

  /**
   * Remove one node whose point equals `point`
   *
   * With duplicates, the first match on the descent path is removed.
   *
   * @returns true if a node was removed, false if no node matched
   */
  delete(point: Point): boolean {
    const step = this.deleteRecursive(this.rootNode, point, 0);
    this.rootNode = step.node;
    if (step.removed) {
      this.count--;
    }
    return step.removed;
  }

  private deleteRecursive(
    node: KDNode<T> | null,
    target: Point,
    depth: number
  ): DeleteStep<T> {
    if (!node) {
      return { node: null, removed: false };
    }

    if (pointsEqual(node.point, target)) {
      return { node: this.removeAt(node, depth), removed: true };
    }

    const axis = axisForDepth(depth);

    if (target[axis] < node.point[axis]) {
      const step = this.deleteRecursive(node.left, target, depth + 1);
      node.left = step.node;
      return { node, removed: step.removed };
    }

    const step = this.deleteRecursive(node.right, target, depth + 1);
    node.right = step.node;
    return { node, removed: step.removed };
  }

  /**
   * Remove `node` from its position and return the subtree that replaces it
   *
   * - Leaf: detached.
   * - Right child present: take the minimum along this depth's axis from the
   *   right subtree, copy it here, remove it from the right subtree.
   * - Only a left child: take the minimum along this depth's axis from the
   *   left subtree, copy it here, remove it from the left subtree and hang
   *   what remains in the right slot. The remaining points are >= the copied
   *   minimum along the axis, so they belong on the right.
   */
  private removeAt(node: KDNode<T>, depth: number): KDNode<T> | null {
    const axis = axisForDepth(depth);

    if (node.right) {
      const replacement = findMinAlongAxis(node.right, axis, depth + 1);
      node.point = replacement.point;
      node.payload = replacement.payload;
      node.right = this.removeNode(node.right, replacement, depth + 1);
      return node;
    }

    if (node.left) {
      const replacement = findMinAlongAxis(node.left, axis, depth + 1);
      node.point = replacement.point;
      node.payload = replacement.payload;
      node.right = this.removeNode(node.left, replacement, depth + 1);
      node.left = null;
      return node;
    }

    return null;
  }

  /**
   * Remove a specific node from a subtree, descending by its point
   *
   * Matching on identity instead of value keeps the copied payload paired
   * with its point when several nodes share that point. Every node with a
   * given point lies on the descent path for that point, so the victim is
   * always reached.
   *
   * @throws {IndexInvariantError} If the victim is not on the descent path
   */
  private removeNode(
    subtree: KDNode<T> | null,
    victim: KDNode<T>,
    depth: number
  ): KDNode<T> | null {
    if (!subtree) {
      throw new IndexInvariantError('Replacement node is not on its descent path', depth);
    }

    if (subtree === victim) {
      return this.removeAt(subtree, depth);
    }

    const axis = axisForDepth(depth);

    if (victim.point[axis] < subtree.point[axis]) {
      subtree.left = this.removeNode(subtree.left, victim, depth + 1);
    } else {
      subtree.right = this.removeNode(subtree.right, victim, depth + 1);
    }

    return subtree;
  }

  // --------------------------------------------------------------------------
  // Range Search
  // --------------------------------------------------------------------------

  /**
   * All entries inside the closed rectangle [min, max]
   *
   * Order follows a pre-order traversal and is not sorted. An inverted
   * rectangle matches nothing.
   */
  rangeSearch(min: Point, max: Point): RangeEntry<T>[] {
    const results: RangeEntry<T>[] = [];
    this.collectInRange(this.rootNode, min, max, 0, results);
    return results;
  }

  private collectInRange(
    node: KDNode<T> | null,
    min: Point,
    max: Point,
    depth: number,
    results: RangeEntry<T>[]
  ): void {
    if (!node) {
      return;
    }

    if (isWithinRectangle(node.point, min, max)) {
      results.push({ point: node.point, payload: node.payload });
    }

    const axis = axisForDepth(depth);

    if (min[axis] <= node.point[axis]) {
      this.collectInRange(node.left, min, max, depth + 1, results);
    }
    if (node.point[axis] <= max[axis]) {
      this.collectInRange(node.right, min, max, depth + 1, results);
    }
  }

  // --------------------------------------------------------------------------
  // Nearest Neighbour
  // --------------------------------------------------------------------------

  /**
   * Closest stored point to `target` by Euclidean distance
   *
   * On exact ties the first node visited wins.
   *
   * @returns Point, payload and distance, or null for an empty tree
   */
  nearestNeighbor(target: Point): NearestResult<T> | null {
    if (!this.rootNode) {
      return null;
    }

    const best: NearestBest<T> = { node: null, distance: Infinity };
    this.searchNearest(this.rootNode, target, 0, best);

    if (!best.node) {
      return null;
    }

    return {
      point: best.node.point,
      payload: best.node.payload,
      distance: best.distance,
    };
  }

  private searchNearest(
    node: KDNode<T> | null,
    target: Point,
    depth: number,
    best: NearestBest<T>
  ): void {
    if (!node) {
      return;
    }

    const distance = euclideanDistance(node.point, target);
    if (distance < best.distance) {
      best.node = node;
      best.distance = distance;
    }

    const axis = axisForDepth(depth);
    const goLeft = target[axis] < node.point[axis];
    const near = goLeft ? node.left : node.right;
    const far = goLeft ? node.right : node.left;

    this.searchNearest(near, target, depth + 1, best);

    // Far side only if the splitting line is closer than the current best
    if (Math.abs(target[axis] - node.point[axis]) < best.distance) {
      this.searchNearest(far, target, depth + 1, best);
    }
  }
}
