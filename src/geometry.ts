/**
 * Ray-intersectable geometry. The axis-aligned cube is the only primitive.
 */

import { add, scale, type Vec3 } from "./math";
import { BLACK_MATERIAL, type Material } from "./material";

// =============================================================================
// Hit Record
// =============================================================================

export interface Intersect {
  point: Vec3;
  normal: Vec3;
  distance: number;
  material: Material;
  isIntersecting: boolean;
}

export function createIntersect(
  point: Vec3,
  normal: Vec3,
  distance: number,
  material: Material
): Intersect {
  return { point, normal, distance, material, isIntersecting: true };
}

export function emptyIntersect(): Intersect {
  return {
    point: [0, 0, 0],
    normal: [0, 0, 0],
    distance: 0,
    material: BLACK_MATERIAL,
    isIntersecting: false,
  };
}

// =============================================================================
// Geometry Base
// =============================================================================

export abstract class Geometry {
  /** `direction` must be normalized by the caller. */
  abstract rayIntersect(origin: Vec3, direction: Vec3): Intersect;
}

// =============================================================================
// Cube
// =============================================================================

type Axis = 0 | 1 | 2;
const AXES: readonly Axis[] = [0, 1, 2];

export class Cube extends Geometry {
  /**
   * @param size - full edge length; the cube spans `center ± size / 2`.
   */
  constructor(
    public readonly center: Vec3,
    public readonly size: number,
    public readonly material: Material
  ) {
    super();
  }

  /**
   * Slab test. When the origin is inside the cube the exit face is reported,
   * so `distance` is never negative.
   */
  rayIntersect(origin: Vec3, direction: Vec3): Intersect {
    const half = this.size / 2;

    let tMin = -Infinity;
    let tMax = Infinity;
    let entryAxis: Axis | null = null;
    let exitAxis: Axis | null = null;

    for (const axis of AXES) {
      const o = origin[axis];
      const d = direction[axis];
      const lo = this.center[axis] - half;
      const hi = this.center[axis] + half;

      if (d === 0) {
        // Parallel to this slab: no constraint inside it, a miss outside it
        if (o < lo || o > hi) return emptyIntersect();
        continue;
      }

      let t0 = (lo - o) / d;
      let t1 = (hi - o) / d;
      if (t0 > t1) {
        const tmp = t0;
        t0 = t1;
        t1 = tmp;
      }

      if (t0 > tMin) {
        tMin = t0;
        entryAxis = axis;
      }
      if (t1 < tMax) {
        tMax = t1;
        exitAxis = axis;
      }
    }

    // A zero direction leaves every axis unconstrained
    if (entryAxis === null || exitAxis === null) {
      return emptyIntersect();
    }

    if (tMin > tMax || tMax < 0) {
      return emptyIntersect();
    }

    const inside = tMin < 0;
    const distance = inside ? tMax : tMin;
    const axis = inside ? exitAxis : entryAxis;
    const towardPositive = direction[axis] > 0;

    const normal: Vec3 = [0, 0, 0];
    if (inside) {
      normal[axis] = towardPositive ? 1 : -1;
    } else {
      normal[axis] = towardPositive ? -1 : 1;
    }

    const point = add(origin, scale(direction, distance));
    return createIntersect(point, normal, distance, this.material);
  }
}
