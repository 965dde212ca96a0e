/**
 * Surface shading parameters.
 */

import { Color } from "./color";

/** Weights for [diffuse, specular, reflect, refract]; they need not sum to 1. */
export type Albedo = readonly [number, number, number, number];

export interface Material {
  readonly diffuse: Color;
  readonly specular: number;
  readonly albedo: Albedo;
  readonly refractiveIndex: number;
  readonly emission: Color;
  readonly isEmissive: boolean;
}

export function createMaterial(
  diffuse: Color,
  specular: number,
  albedo: Albedo,
  refractiveIndex: number,
  emission: Color = Color.black(),
  isEmissive: boolean = false
): Material {
  return { diffuse, specular, albedo, refractiveIndex, emission, isEmissive };
}

export const BLACK_MATERIAL: Material = createMaterial(
  Color.black(),
  0,
  [0, 0, 0, 0],
  0
);

// =============================================================================
// Oasis Presets
// =============================================================================

const MATTE: Albedo = [0.9, 0.1, 0.0, 0.0];

export const materials = {
  sand: createMaterial(new Color(237, 201, 175), 1.0, MATTE, 0.0),
  trunk: createMaterial(new Color(139, 69, 19), 1.0, MATTE, 0.0),
  leaf: createMaterial(new Color(34, 139, 34), 1.0, MATTE, 0.0),
  water: createMaterial(new Color(0, 191, 255), 1.0, MATTE, 0.0),
  // Diffuse stays black: all of the light cube's color comes from emission
  lightCube: createMaterial(
    Color.black(),
    0.0,
    [0.0, 0.0, 0.0, 0.0],
    0.0,
    new Color(255, 223, 0),
    true
  ),
} as const;
