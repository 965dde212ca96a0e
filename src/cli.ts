/**
 * Command line parsing for the oasis renderer.
 */

import type { ShadowMode } from "./integrator";

export interface CliArgs {
  time: number;
  width: number | null;
  height: number | null;
  frames: number;
  once: boolean;
  delayMs: number | null;
  shadows: ShadowMode;
  verbose: boolean;
  help: boolean;
}

export const USAGE = `Usage: voxel-oasis [options]

CPU ray-traced voxel oasis rendered to a truecolor terminal

Options:
  -w, --width <int>       Framebuffer width in pixels (default: terminal columns)
  -h, --height <int>      Framebuffer height in pixels (default: 2 x terminal rows)
  -t, --time <float>      Start time in seconds (default: 0)
  -n, --frames <int>      Stop after this many frames, 0 runs until quit (default: 0)
  --once                  Render a single frame and exit
  --delay <ms>            Sleep between frames (default: scene setting, 16)
  --shadows <mode>        Shadow occluder search: first | nearest (default: first)
  -v, --verbose           Log per-frame timings
  --help                  Show this help

Keys: w/s dolly, a/d orbit, arrows up/down orbit pitch, arrows left/right strafe, q quit`;

function parseIntFlag(flag: string, value: string | undefined, min: number): number {
  const n = Number(value);
  if (value === undefined || !Number.isInteger(n) || n < min) {
    throw new Error(`${flag} expects an integer >= ${min}, got ${value ?? "nothing"}`);
  }
  return n;
}

function parseFloatFlag(flag: string, value: string | undefined): number {
  const n = Number(value);
  if (value === undefined || value.trim() === "" || !Number.isFinite(n)) {
    throw new Error(`${flag} expects a number, got ${value ?? "nothing"}`);
  }
  return n;
}

export function parseArgs(args: readonly string[]): CliArgs {
  const result: CliArgs = {
    time: 0,
    width: null,
    height: null,
    frames: 0,
    once: false,
    delayMs: null,
    shadows: "first",
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case "-t":
      case "--time":
        result.time = parseFloatFlag(arg, args[++i]);
        break;
      case "-w":
      case "--width":
        result.width = parseIntFlag(arg, args[++i], 1);
        break;
      case "-h":
      case "--height":
        result.height = parseIntFlag(arg, args[++i], 1);
        break;
      case "-n":
      case "--frames":
        result.frames = parseIntFlag(arg, args[++i], 0);
        break;
      case "--once":
        result.once = true;
        break;
      case "--delay":
        result.delayMs = parseIntFlag(arg, args[++i], 0);
        break;
      case "--shadows": {
        const mode = args[++i];
        if (mode !== "first" && mode !== "nearest") {
          throw new Error(`--shadows expects first or nearest, got ${mode ?? "nothing"}`);
        }
        result.shadows = mode;
        break;
      }
      case "-v":
      case "--verbose":
        result.verbose = true;
        break;
      case "--help":
        result.help = true;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return result;
}

export interface Size {
  width: number;
  height: number;
}

/**
 * Two pixel rows per terminal row; the last row is left for the cursor.
 * Without a terminal the fallback size is used.
 */
export function terminalSize(
  columns: number | undefined,
  rows: number | undefined,
  fallback: Size
): Size {
  if (!columns || !rows) return { width: fallback.width, height: fallback.height };
  return { width: columns, height: Math.max(2, (rows - 1) * 2) };
}
