/**
 * Static 2-d KD-tree over `[lat, lon]` pairs.
 *
 * The tree is implicit: points are reordered in place so that each range
 * `[left, right]` is split at its middle element along alternating axes
 * (0 = latitude, 1 = longitude). Leaves hold up to `nodeSize` points and are
 * scanned linearly. Built once with quickselect (O(n log n) expected) and never
 * mutated afterwards.
 */
export class StaticKdTree {
  /** Original point index of each slot. */
  readonly ids: Uint32Array;
  /** Reordered copy of the input coordinates, two numbers per slot. */
  readonly coords: Float64Array;
  readonly nodeSize: number;

  constructor(points: Float64Array, nodeSize = 16) {
    const count = Math.floor(points.length / 2);
    this.nodeSize = Math.max(1, nodeSize);
    this.ids = new Uint32Array(count);
    for (let i = 0; i < count; i++) this.ids[i] = i;
    this.coords = points.slice(0, count * 2);
    sortKd(this.ids, this.coords, this.nodeSize, 0, count - 1, 0);
  }

  get size(): number {
    return this.ids.length;
  }

  get byteLength(): number {
    return this.ids.byteLength + this.coords.byteLength;
  }

  /** Original indices of every point inside the box (bounds inclusive). */
  range(minLat: number, minLon: number, maxLat: number, maxLon: number): number[] {
    const { ids, coords, nodeSize } = this;
    const result: number[] = [];
    const stack = [0, ids.length - 1, 0];

    while (stack.length > 0) {
      const axis = stack.pop() ?? 0;
      const right = stack.pop() ?? -1;
      const left = stack.pop() ?? 0;

      if (right - left <= nodeSize) {
        for (let i = left; i <= right; i++) {
          const lat = coords[2 * i];
          const lon = coords[2 * i + 1];
          if (lat >= minLat && lat <= maxLat && lon >= minLon && lon <= maxLon) result.push(ids[i]);
        }
        continue;
      }

      const m = (left + right) >> 1;
      const lat = coords[2 * m];
      const lon = coords[2 * m + 1];
      if (lat >= minLat && lat <= maxLat && lon >= minLon && lon <= maxLon) result.push(ids[m]);

      const split = axis === 0 ? lat : lon;
      if (axis === 0 ? minLat <= split : minLon <= split) {
        stack.push(left, m - 1, 1 - axis);
      }
      if (axis === 0 ? maxLat >= split : maxLon >= split) {
        stack.push(m + 1, right, 1 - axis);
      }
    }

    return result;
  }

  /**
   * Original indices of the `k` points closest to `(lat, lon)` by planar
   * distance in degrees, closest first. Degree space distorts longitude away
   * from the equator, so callers that need true ground order must re-rank.
   */
  nearest(lat: number, lon: number, k: number): number[] {
    const { ids, coords, nodeSize } = this;
    const limit = Math.min(Math.floor(k), ids.length);
    if (!(limit > 0)) return [];

    // Kept sorted ascending by distance; small enough for insertion.
    const best: { slot: number; dist: number }[] = [];

    const consider = (slot: number) => {
      const dLat = coords[2 * slot] - lat;
      const dLon = coords[2 * slot + 1] - lon;
      const dist = dLat * dLat + dLon * dLon;
      if (best.length === limit && dist >= best[best.length - 1].dist) return;
      let at = best.length;
      while (at > 0 && best[at - 1].dist > dist) at--;
      best.splice(at, 0, { slot, dist });
      if (best.length > limit) best.pop();
    };

    const visit = (left: number, right: number, axis: number): void => {
      if (right < left) return;
      if (right - left <= nodeSize) {
        for (let i = left; i <= right; i++) consider(i);
        return;
      }

      const m = (left + right) >> 1;
      consider(m);

      const diff = axis === 0 ? lat - coords[2 * m] : lon - coords[2 * m + 1];
      if (diff < 0) {
        visit(left, m - 1, 1 - axis);
        if (best.length < limit || diff * diff < best[best.length - 1].dist) visit(m + 1, right, 1 - axis);
      } else {
        visit(m + 1, right, 1 - axis);
        if (best.length < limit || diff * diff < best[best.length - 1].dist) visit(left, m - 1, 1 - axis);
      }
    };

    visit(0, ids.length - 1, 0);
    return best.map((entry) => ids[entry.slot]);
  }
}

function sortKd(
  ids: Uint32Array,
  coords: Float64Array,
  nodeSize: number,
  left: number,
  right: number,
  axis: number,
): void {
  if (right - left <= nodeSize) return;

  const m = (left + right) >> 1;
  select(ids, coords, m, left, right, axis);

  sortKd(ids, coords, nodeSize, left, m - 1, 1 - axis);
  sortKd(ids, coords, nodeSize, m + 1, right, 1 - axis);
}

// Partially orders [left, right] so slot k holds its sorted value on `axis`,
// with smaller-or-equal values before it and greater-or-equal after.
function select(
  ids: Uint32Array,
  coords: Float64Array,
  k: number,
  left: number,
  right: number,
  axis: number,
): void {
  while (right > left) {
    const pivot = coords[2 * k + axis];
    let i = left;
    let j = right;

    swapSlots(ids, coords, left, k);
    if (coords[2 * right + axis] > pivot) swapSlots(ids, coords, left, right);

    while (i < j) {
      swapSlots(ids, coords, i, j);
      i++;
      j--;
      while (coords[2 * i + axis] < pivot) i++;
      while (coords[2 * j + axis] > pivot) j--;
    }

    if (coords[2 * left + axis] === pivot) {
      swapSlots(ids, coords, left, j);
    } else {
      j++;
      swapSlots(ids, coords, j, right);
    }

    if (j <= k) left = j + 1;
    if (k <= j) right = j - 1;
  }
}

function swapSlots(ids: Uint32Array, coords: Float64Array, a: number, b: number): void {
  const id = ids[a];
  ids[a] = ids[b];
  ids[b] = id;

  const lat = coords[2 * a];
  const lon = coords[2 * a + 1];
  coords[2 * a] = coords[2 * b];
  coords[2 * a + 1] = coords[2 * b + 1];
  coords[2 * b] = lat;
  coords[2 * b + 1] = lon;
}
