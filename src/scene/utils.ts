/**
 * Shared utilities for scene system.
 */

import { createNoise2D } from "simplex-noise";
import { Cube } from "../geometry";
import type { Material } from "../material";
import type { SceneObject, Vec3 } from "./types";

// =============================================================================
// Random
// =============================================================================

export function seededRandom(seed: number): () => number {
  return () => {
    seed = (seed * 1103515245 + 12345) & 0x7fffffff;
    return seed / 0x7fffffff;
  };
}

// =============================================================================
// Noise
// =============================================================================

/** Fractal simplex noise over the plane, normalized to [-1, 1]. */
export function createNoiseGenerator(rng: () => number) {
  const noise2D = createNoise2D(rng);

  return function fbm2(x: number, y: number, octaves: number = 1): number {
    let value = 0;
    let amplitude = 1;
    let frequency = 1;
    let maxValue = 0;

    for (let i = 0; i < octaves; i++) {
      value += noise2D(x * frequency, y * frequency) * amplitude;
      maxValue += amplitude;
      amplitude *= 0.5;
      frequency *= 2;
    }

    return value / maxValue;
  };
}

// =============================================================================
// Object Helpers
// =============================================================================

export function cube(
  center: Vec3,
  size: number,
  material: Material,
  isLight: boolean = false
): SceneObject {
  return { geometry: new Cube(center, size, material), isLight };
}

export function cubesAt(
  centers: readonly Vec3[],
  size: number,
  material: Material,
  isLight: boolean = false
): SceneObject[] {
  return centers.map((center) => cube(center, size, material, isLight));
}
