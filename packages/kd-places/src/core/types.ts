/**
 * Core Types for the k-d Place Index
 *
 * Planar points, index nodes and search results shared by the spatial index
 * and the place catalog built on top of it.
 *
 * @module core/types
 */

// ============================================================================
// Geometry
// ============================================================================

/**
 * Planar point: [axis 0, axis 1]
 *
 * The catalog stores places as [lon, lat], but the index itself never
 * interprets the coordinates geographically.
 */
export type Point = readonly [number, number];

/**
 * Splitting axis for a tree depth (depth mod 2)
 */
export type Axis = 0 | 1;

// ============================================================================
// Tree Structure
// ============================================================================

/**
 * k-d tree node
 *
 * Children are exclusively owned by their parent. The splitting axis is not
 * stored; it is derived from depth during every traversal.
 */
export interface KDNode<T> {
  point: Point;
  payload: T;
  left: KDNode<T> | null;
  right: KDNode<T> | null;
}

/**
 * Read-only view of a node, handed out for inspection
 */
export interface ReadonlyKDNode<T> {
  readonly point: Point;
  readonly payload: T;
  readonly left: ReadonlyKDNode<T> | null;
  readonly right: ReadonlyKDNode<T> | null;
}

// ============================================================================
// Search Results
// ============================================================================

/**
 * Single range search hit
 */
export interface RangeEntry<T> {
  readonly point: Point;
  readonly payload: T;
}

/**
 * Nearest neighbour hit with planar (Euclidean) distance
 */
export interface NearestResult<T> {
  readonly point: Point;
  readonly payload: T;
  readonly distance: number;
}

// ============================================================================
// Places
// ============================================================================

/**
 * Named place on the map
 *
 * Indexed as [lon, lat]: longitude on axis 0, latitude on axis 1.
 */
export interface Place {
  readonly id: string;
  readonly name: string;
  readonly type: string;
  readonly lon: number;
  readonly lat: number;
  readonly address: string;
}

/**
 * Place with its great-circle distance from a query point
 */
export interface PlaceMatch {
  readonly place: Place;
  readonly distanceKm: number;
}
