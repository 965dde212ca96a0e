/**
 * Whitted-style shading for the cube scene: nearest hit, per-light diffuse
 * and Fresnel-weighted specular, shadow attenuation, emission, sky fallback.
 */

import { Color } from "./color";
import { emptyIntersect, type Intersect } from "./geometry";
import {
  add,
  clamp,
  dot,
  length,
  negate,
  normalize,
  reflect,
  scale,
  sub,
  type Vec3,
} from "./math";
import type { SceneObject } from "./scene/types";
import { DEFAULT_SKY, skyboxColor, type SkyPalette } from "./sky";

/**
 * "first" stops at the first occluder in object-list order, "nearest" scans
 * every object and keeps the closest one.
 */
export type ShadowMode = "first" | "nearest";

export interface IntegratorConfig {
  originBias?: number;
  skyboxColor?: Color;
  maxDepth?: number;
  lightScale?: number;
  sky?: SkyPalette;
  shadowMode?: ShadowMode;
}

// =============================================================================
// Helpers
// =============================================================================

/** Schlick's approximation. A refractive index of -1 reflects nothing. */
export function fresnel(cosTheta: number, refractiveIndex: number): number {
  const denom = 1 + refractiveIndex;
  if (denom === 0) return 0;
  const r0 = ((1 - refractiveIndex) / denom) ** 2;
  return r0 + (1 - r0) * (1 - cosTheta) ** 5;
}

/**
 * Nudge a hit point off its surface: into it when `direction` points
 * against the normal, out of it otherwise.
 */
export function offsetOrigin(
  intersect: Intersect,
  direction: Vec3,
  bias: number
): Vec3 {
  const offset = scale(intersect.normal, bias);
  if (dot(direction, intersect.normal) < 0) {
    return sub(intersect.point, offset);
  }
  return add(intersect.point, offset);
}

// =============================================================================
// Integrator
// =============================================================================

export class Integrator {
  readonly originBias: number;
  readonly skyboxColor: Color;
  readonly maxDepth: number;
  readonly lightScale: number;
  readonly sky: SkyPalette;
  readonly shadowMode: ShadowMode;

  constructor(cfg: IntegratorConfig = {}) {
    this.originBias = cfg.originBias ?? 1e-4;
    this.skyboxColor = cfg.skyboxColor ?? new Color(68, 142, 228);
    this.maxDepth = cfg.maxDepth ?? 3;
    this.lightScale = cfg.lightScale ?? 1.5;
    this.sky = cfg.sky ?? DEFAULT_SKY;
    this.shadowMode = cfg.shadowMode ?? "first";
  }

  /** Nearest hit along the ray, or the empty sentinel. */
  trace(
    origin: Vec3,
    direction: Vec3,
    objects: readonly SceneObject[]
  ): Intersect {
    let intersect = emptyIntersect();
    let zbuffer = Infinity;

    for (const object of objects) {
      const hit = object.geometry.rayIntersect(origin, direction);
      if (hit.isIntersecting && hit.distance < zbuffer) {
        zbuffer = hit.distance;
        intersect = hit;
      }
    }

    return intersect;
  }

  /** 0 when the light is unobstructed, approaching 1 for close occluders. */
  castShadow(
    intersect: Intersect,
    lightPosition: Vec3,
    objects: readonly SceneObject[]
  ): number {
    const toLight = sub(lightPosition, intersect.point);
    const lightDir = normalize(toLight);
    const lightDistance = length(toLight);
    const origin = offsetOrigin(intersect, lightDir, this.originBias);

    let occluderDistance = Infinity;

    for (const object of objects) {
      const hit = object.geometry.rayIntersect(origin, lightDir);
      if (hit.isIntersecting && hit.distance < lightDistance) {
        if (this.shadowMode === "first") {
          occluderDistance = hit.distance;
          break;
        }
        occluderDistance = Math.min(occluderDistance, hit.distance);
      }
    }

    if (occluderDistance === Infinity) return 0;

    const ratio = occluderDistance / lightDistance;
    return 1 - Math.min(1, ratio ** 2);
  }

  castRay(
    origin: Vec3,
    direction: Vec3,
    objects: readonly SceneObject[],
    lightPositions: readonly Vec3[],
    depth: number,
    ambientIntensity: number
  ): Color {
    if (depth > this.maxDepth) {
      return this.skyboxColor;
    }

    const intersect = this.trace(origin, direction, objects);
    if (!intersect.isIntersecting) {
      return skyboxColor(direction, ambientIntensity, this.sky);
    }

    const { material, normal, point } = intersect;
    const white = Color.white();
    const viewDir = normalize(sub(origin, point));
    const cosTheta = Math.max(0, -dot(direction, normal));
    const reflectance = fresnel(cosTheta, material.refractiveIndex);

    let totalDiffuse = Color.black();
    let totalSpecular = Color.black();

    for (const lightPosition of lightPositions) {
      const lightDir = normalize(sub(lightPosition, point));
      const reflectDir = normalize(reflect(negate(lightDir), normal));

      const shadowIntensity = this.castShadow(intersect, lightPosition, objects);
      const lightIntensity = this.lightScale * (1 - shadowIntensity);

      const diffuseIntensity = clamp(dot(normal, lightDir), 0, 1);
      totalDiffuse = totalDiffuse.add(
        material.diffuse
          .scale(material.albedo[0])
          .scale(diffuseIntensity)
          .scale(lightIntensity)
      );

      const specularIntensity = Math.max(0, dot(viewDir, reflectDir)) ** material.specular;
      totalSpecular = totalSpecular.add(
        white
          .scale(material.albedo[1])
          .scale(specularIntensity)
          .scale(lightIntensity)
          .scale(reflectance)
      );
    }

    const emission = material.isEmissive ? material.emission : Color.black();

    return totalDiffuse.add(totalSpecular).add(emission);
  }
}
