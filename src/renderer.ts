/**
 * Per-pixel ray tracer: one primary ray per framebuffer pixel.
 */

import type { Camera } from "./camera";
import type { Framebuffer } from "./framebuffer";
import type { Integrator } from "./integrator";
import { degToRad, normalize, type Vec3 } from "./math";
import type { SceneObject } from "./scene/types";

export interface RenderStats {
  pixels: number;
  elapsedMs: number;
}

export class Renderer {
  constructor(public readonly integrator: Integrator) {}

  /** Camera-space direction for pixel (x, y); screen-up is +y. */
  primaryDirection(
    x: number,
    y: number,
    width: number,
    height: number,
    fov: number
  ): Vec3 {
    const aspect = width / height;
    const perspectiveScale = Math.tan(degToRad(fov) / 2);

    const screenX = ((2 * x) / width - 1) * aspect * perspectiveScale;
    const screenY = (-(2 * y) / height + 1) * perspectiveScale;

    return normalize([screenX, screenY, -1]);
  }

  render(
    framebuffer: Framebuffer,
    objects: readonly SceneObject[],
    camera: Camera,
    lightPositions: readonly Vec3[],
    ambientIntensity: number
  ): RenderStats {
    const start = performance.now();
    const { width, height } = framebuffer;

    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        const local = this.primaryDirection(x, y, width, height, camera.fov);
        const direction = camera.baseChange(local);

        const color = this.integrator.castRay(
          camera.eye,
          direction,
          objects,
          lightPositions,
          0,
          ambientIntensity
        );

        framebuffer.point(x, y, color);
      }
    }

    return { pixels: width * height, elapsedMs: performance.now() - start };
  }
}
