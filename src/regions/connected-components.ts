import type { Connectivity } from '../types';

export interface LabelResult {
  /** Component label per grid position, 0 for inactive positions */
  labels: Int32Array;
  numLabels: number;
  width: number;
  height: number;
}

/**
 * Connected component labeling using union-find (two-pass algorithm).
 *
 * Labels are renumbered 1..n in raster order (row by row, left to right) of
 * each component's first position, so identical masks always produce
 * identical labels.
 */
export function labelConnectedComponents(
  mask: Uint8Array,
  width: number,
  height: number,
  connectivity: Connectivity = 8,
): LabelResult {
  const labels = new Int32Array(width * height);
  const parent: number[] = [0]; // index 0 unused (background)
  let nextLabel = 1;

  function find(x: number): number {
    while (parent[x] !== x) {
      parent[x] = parent[parent[x]]; // path compression
      x = parent[x];
    }
    return x;
  }

  function union(a: number, b: number): void {
    const ra = find(a);
    const rb = find(b);
    if (ra !== rb) parent[Math.max(ra, rb)] = Math.min(ra, rb);
  }

  // First pass: provisional labels from already visited neighbours
  // (W and N, plus NW and NE for 8-connectivity)
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const idx = y * width + x;
      if (!mask[idx]) continue;

      const neighbors: number[] = [];
      if (x > 0 && labels[idx - 1]) neighbors.push(labels[idx - 1]);
      if (y > 0) {
        const above = idx - width;
        if (labels[above]) neighbors.push(labels[above]);
        if (connectivity === 8) {
          if (x > 0 && labels[above - 1]) neighbors.push(labels[above - 1]);
          if (x < width - 1 && labels[above + 1]) neighbors.push(labels[above + 1]);
        }
      }

      if (neighbors.length === 0) {
        labels[idx] = nextLabel;
        parent[nextLabel] = nextLabel;
        nextLabel++;
        continue;
      }

      const minLabel = Math.min(...neighbors);
      labels[idx] = minLabel;
      for (const n of neighbors) {
        union(n, minLabel);
      }
    }
  }

  // Second pass: resolve roots to sequential ids in raster order
  const labelMap = new Map<number, number>();
  let finalLabel = 0;
  for (let i = 0; i < labels.length; i++) {
    if (labels[i] === 0) continue;
    const root = find(labels[i]);
    let resolved = labelMap.get(root);
    if (resolved === undefined) {
      resolved = ++finalLabel;
      labelMap.set(root, resolved);
    }
    labels[i] = resolved;
  }

  return { labels, numLabels: finalLabel, width, height };
}
