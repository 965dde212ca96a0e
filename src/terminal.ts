/**
 * Truecolor terminal output. Each character cell shows two pixels with the
 * upper half block: foreground is the top pixel, background the bottom one.
 */

import type { Framebuffer } from "./framebuffer";

const ESC = "\x1b[";
const HALF_BLOCK = "▀";

export interface TextSink {
  write(chunk: string): unknown;
}

function rgb(hex: number): string {
  return `${(hex >> 16) & 0xff};${(hex >> 8) & 0xff};${hex & 0xff}`;
}

export function encodeFrame(framebuffer: Framebuffer): string {
  const { width, height } = framebuffer;
  const lines: string[] = [];

  for (let row = 0; row < height; row += 2) {
    let line = "";
    let lastFg = -1;
    let lastBg = -1;

    for (let x = 0; x < width; x++) {
      const top = framebuffer.get(x, row);
      const bottom = row + 1 < height ? framebuffer.get(x, row + 1) : 0;

      if (top !== lastFg) {
        line += `${ESC}38;2;${rgb(top)}m`;
        lastFg = top;
      }
      if (bottom !== lastBg) {
        line += `${ESC}48;2;${rgb(bottom)}m`;
        lastBg = bottom;
      }
      line += HALF_BLOCK;
    }

    lines.push(line + `${ESC}0m`);
  }

  return `${ESC}H` + lines.join("\n");
}

export class TerminalPresenter {
  private started = false;

  constructor(private readonly out: TextSink) {}

  start(): void {
    if (this.started) return;
    this.started = true;
    // Hide cursor, clear screen
    this.out.write(`${ESC}?25l${ESC}2J`);
  }

  present(framebuffer: Framebuffer): void {
    this.out.write(encodeFrame(framebuffer));
  }

  stop(): void {
    if (!this.started) return;
    this.started = false;
    this.out.write(`${ESC}0m${ESC}?25h\n`);
  }
}
