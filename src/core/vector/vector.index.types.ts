import type { VectorMetric } from "../config/config.types";

export type VectorHit = {
  position: number;
  distance: number;
};

export type VectorIndexHeader = {
  version: number;
  dimension: number;
  metric: VectorMetric;
};

/**
 * Append-only, positionally addressed vector storage. Positions are the
 * 0-based append order and are never reused; there is no delete.
 */
export type VectorIndex = {
  readonly path: string;
  readonly dimension: number;
  readonly metric: VectorMetric;
  append: (vector: readonly number[]) => number;
  search: (query: readonly number[], k: number) => VectorHit[];
  vectorAt: (position: number) => number[];
  size: () => number;
  exists: () => boolean;
  load: () => boolean;
  persist: () => void;
  reset: () => void;
};
