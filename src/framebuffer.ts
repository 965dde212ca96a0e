/**
 * Row-major pixel buffer of packed 0xRRGGBB values.
 */

import type { Color } from "./color";

export class Framebuffer {
  readonly width: number;
  readonly height: number;
  readonly buffer: Uint32Array;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || width <= 0) {
      throw new Error(`Framebuffer width must be a positive integer, got ${width}`);
    }
    if (!Number.isInteger(height) || height <= 0) {
      throw new Error(`Framebuffer height must be a positive integer, got ${height}`);
    }
    this.width = width;
    this.height = height;
    this.buffer = new Uint32Array(width * height);
  }

  /** Out-of-range coordinates are ignored. */
  point(x: number, y: number, color: Color): void {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) return;
    this.buffer[y * this.width + x] = color.toHex();
  }

  get(x: number, y: number): number {
    return this.buffer[y * this.width + x] ?? 0;
  }
}
