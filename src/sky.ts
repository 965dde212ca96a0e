/**
 * Day/night sky gradient and the sun-driven ambient intensity.
 */

import { Color } from "./color";
import { clamp, type Vec3 } from "./math";

export interface SkyPalette {
  daySky: Color;
  dayGround: Color;
  nightSky: Color;
  nightGround: Color;
}

export const DEFAULT_SKY: SkyPalette = {
  daySky: new Color(135, 206, 235),
  dayGround: new Color(222, 184, 135),
  nightSky: new Color(25, 25, 112),
  nightGround: new Color(50, 50, 50),
};

export const MIN_AMBIENT_INTENSITY = 0.2;
export const MAX_AMBIENT_INTENSITY = 1.0;

/** Higher sun, brighter day. Saturates once the sun is 9 units up. */
export function ambientLightIntensity(lightPosition: Vec3): number {
  const heightFactor = clamp((lightPosition[1] + 1) / 10, 0, 1);
  return (
    MIN_AMBIENT_INTENSITY +
    (MAX_AMBIENT_INTENSITY - MIN_AMBIENT_INTENSITY) * heightFactor
  );
}

/**
 * Ground color looking straight down, sky color straight up, each blended
 * between its night and day tone by `ambient`.
 */
export function skyboxColor(
  direction: Vec3,
  ambient: number,
  palette: SkyPalette = DEFAULT_SKY
): Color {
  const t = 0.5 * (direction[1] + 1);
  const sky = palette.nightSky.lerp(palette.daySky, ambient);
  const ground = palette.nightGround.lerp(palette.dayGround, ambient);
  return ground.lerp(sky, t);
}
