/**
 * Shared types for scene system.
 */

import type { CameraConfig } from "../camera";
import type { Geometry } from "../geometry";
import type { Vec3 } from "../math";

export type { Vec3 };

// =============================================================================
// Scene Data Types
// =============================================================================

export interface SceneObject {
  geometry: Geometry;
  isLight: boolean;    // emitter cube; shading treats it like any other object
}

// =============================================================================
// Config Types
// =============================================================================

export interface SceneConfig {
  camera: Required<Pick<CameraConfig, "eye" | "at" | "up" | "fov">>;
  render: {
    width: number;
    height: number;
    frameDelayMs: number;
  };
}

// =============================================================================
// Scene Interface
// =============================================================================

export interface SceneFrame {
  objects: readonly SceneObject[];
  lightPositions: readonly Vec3[];
  ambientIntensity: number;    // day/night blend in [0, 1]
}

export interface Scene {
  name: string;
  config: SceneConfig;
  init(): void;
  update(t: number): SceneFrame;
}
