/**
 * Packed 8-bit RGB color with saturating arithmetic.
 */

function channel(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(255, Math.trunc(value)));
}

export class Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;

  /** Channels are truncated toward zero and clamped to [0, 255]. */
  constructor(r: number, g: number, b: number) {
    this.r = channel(r);
    this.g = channel(g);
    this.b = channel(b);
  }

  static black(): Color {
    return new Color(0, 0, 0);
  }

  static white(): Color {
    return new Color(255, 255, 255);
  }

  static fromHex(hex: number): Color {
    return new Color((hex >> 16) & 0xff, (hex >> 8) & 0xff, hex & 0xff);
  }

  toHex(): number {
    return (this.r << 16) | (this.g << 8) | this.b;
  }

  add(other: Color): Color {
    return new Color(this.r + other.r, this.g + other.g, this.b + other.b);
  }

  /** Multiplicative blend: each channel is treated as a fraction of 255. */
  mul(other: Color): Color {
    return new Color(
      (this.r * other.r) / 255,
      (this.g * other.g) / 255,
      (this.b * other.b) / 255
    );
  }

  scale(factor: number): Color {
    return new Color(this.r * factor, this.g * factor, this.b * factor);
  }

  /** factor 0 gives `this`, factor 1 gives `other`. */
  lerp(other: Color, factor: number): Color {
    return new Color(
      this.r * (1 - factor) + other.r * factor,
      this.g * (1 - factor) + other.g * factor,
      this.b * (1 - factor) + other.b * factor
    );
  }

  equals(other: Color): boolean {
    return this.r === other.r && this.g === other.g && this.b === other.b;
  }

  toString(): string {
    return `#${this.toHex().toString(16).padStart(6, "0")}`;
  }
}
