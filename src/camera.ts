/**
 * Look-at camera with an orthonormal basis, dolly and orbit movement.
 */

import {
  add,
  clamp,
  cross,
  degToRad,
  length,
  normalize,
  scale,
  sub,
  type Vec3,
} from "./math";

export type MoveDirection = "forward" | "backward" | "left" | "right";

export interface CameraBasis {
  right: Vec3;
  up: Vec3;
  forward: Vec3;
}

export interface CameraConfig {
  eye?: Vec3;
  at?: Vec3;
  up?: Vec3;
  fov?: number;
  moveStep?: number;
  maxPitch?: number; // degrees
}

// =============================================================================
// Camera
// =============================================================================

export class Camera {
  eye: Vec3;
  center: Vec3;
  readonly worldUp: Vec3;
  readonly fov: number;
  readonly moveStep: number;
  readonly maxPitch: number;
  private _basis: CameraBasis;

  constructor(cfg: CameraConfig = {}) {
    this.eye = cfg.eye ?? [5, 5, 10];
    this.center = cfg.at ?? [0, 2, 0];
    this.worldUp = cfg.up ?? [0, 1, 0];
    this.fov = cfg.fov ?? 60;
    this.moveStep = cfg.moveStep ?? 0.5;
    this.maxPitch = degToRad(cfg.maxPitch ?? 89);
    this._basis = this.computeBasis();
  }

  get basis(): CameraBasis {
    return this._basis;
  }

  /** Map a camera-space direction (looking down -z) into world space. */
  baseChange(direction: Vec3): Vec3 {
    const { right, up, forward } = this._basis;
    return normalize([
      direction[0] * right[0] + direction[1] * up[0] - direction[2] * forward[0],
      direction[0] * right[1] + direction[1] * up[1] - direction[2] * forward[1],
      direction[0] * right[2] + direction[1] * up[2] - direction[2] * forward[2],
    ]);
  }

  /** Translate eye and target together, keeping the view direction. */
  move(direction: MoveDirection): void {
    const { right, forward } = this._basis;
    let offset: Vec3;
    switch (direction) {
      case "forward":
        offset = scale(forward, this.moveStep);
        break;
      case "backward":
        offset = scale(forward, -this.moveStep);
        break;
      case "left":
        offset = scale(right, -this.moveStep);
        break;
      case "right":
        offset = scale(right, this.moveStep);
        break;
    }
    this.eye = add(this.eye, offset);
    this.center = add(this.center, offset);
    this._basis = this.computeBasis();
  }

  /**
   * Rotate the eye around the target on a sphere of constant radius.
   * Negative pitch raises the eye; pitch is clamped short of the poles.
   */
  orbit(yawDelta: number, pitchDelta: number): void {
    const offset = sub(this.eye, this.center);
    const radius = length(offset);
    if (radius === 0) return;

    const yaw = Math.atan2(offset[2], offset[0]);
    const radiusXZ = Math.sqrt(offset[0] * offset[0] + offset[2] * offset[2]);
    const pitch = Math.atan2(-offset[1], radiusXZ);

    const newYaw = yaw + yawDelta;
    const newPitch = clamp(pitch + pitchDelta, -this.maxPitch, this.maxPitch);

    this.eye = add(this.center, [
      radius * Math.cos(newYaw) * Math.cos(newPitch),
      -radius * Math.sin(newPitch),
      radius * Math.sin(newYaw) * Math.cos(newPitch),
    ]);
    this._basis = this.computeBasis();
  }

  private computeBasis(): CameraBasis {
    const forward = normalize(sub(this.center, this.eye));
    const right = normalize(cross(forward, this.worldUp));
    const up = cross(right, forward);
    return { right, up, forward };
  }
}
