/**
 * Keyboard to camera command mapping for raw-mode stdin.
 */

import type { Camera, MoveDirection } from "./camera";

export type CameraCommand =
  | { type: "move"; direction: MoveDirection }
  | { type: "orbit"; yaw: number; pitch: number }
  | { type: "quit" };

export const KEYS = {
  UP: "\u001b[A",
  DOWN: "\u001b[B",
  RIGHT: "\u001b[C",
  LEFT: "\u001b[D",
  ESCAPE: "\u001b",
  CTRL_C: "\u0003",
} as const;

export const DEFAULT_ORBIT_SPEED = 0.05;

// CSI sequences end on a byte in 0x40..0x7e
function isFinalByte(code: number): boolean {
  return code >= 0x40 && code <= 0x7e;
}

/** Splits one stdin chunk into single keys and CSI escape sequences. */
export function splitKeys(chunk: string): string[] {
  const keys: string[] = [];
  let i = 0;

  while (i < chunk.length) {
    if (chunk.charAt(i) === KEYS.ESCAPE && chunk.charAt(i + 1) === "[") {
      let end = i + 2;
      while (end < chunk.length && !isFinalByte(chunk.charCodeAt(end))) end++;
      keys.push(chunk.slice(i, end + 1));
      i = end + 1;
    } else {
      keys.push(chunk.charAt(i));
      i++;
    }
  }

  return keys;
}

export function keyToCommand(
  key: string,
  orbitSpeed: number = DEFAULT_ORBIT_SPEED
): CameraCommand | null {
  switch (key) {
    case "w":
      return { type: "move", direction: "forward" };
    case "s":
      return { type: "move", direction: "backward" };
    case "a":
      return { type: "orbit", yaw: orbitSpeed, pitch: 0 };
    case "d":
      return { type: "orbit", yaw: -orbitSpeed, pitch: 0 };
    case KEYS.UP:
      return { type: "orbit", yaw: 0, pitch: -orbitSpeed };
    case KEYS.DOWN:
      return { type: "orbit", yaw: 0, pitch: orbitSpeed };
    case KEYS.LEFT:
      return { type: "move", direction: "left" };
    case KEYS.RIGHT:
      return { type: "move", direction: "right" };
    case "q":
    case KEYS.ESCAPE:
    case KEYS.CTRL_C:
      return { type: "quit" };
    default:
      return null;
  }
}

/** Returns false for commands the camera does not handle (quit). */
export function applyCommand(camera: Camera, command: CameraCommand): boolean {
  switch (command.type) {
    case "move":
      camera.move(command.direction);
      return true;
    case "orbit":
      camera.orbit(command.yaw, command.pitch);
      return true;
    case "quit":
      return false;
  }
}

/**
 * Applies every key in a raw stdin chunk in order. Returns false at the
 * first quit key; later keys are not applied.
 */
export function applyKeys(
  camera: Camera,
  chunk: string,
  orbitSpeed: number = DEFAULT_ORBIT_SPEED
): boolean {
  for (const key of splitKeys(chunk)) {
    const command = keyToCommand(key, orbitSpeed);
    if (command && !applyCommand(camera, command)) return false;
  }
  return true;
}

// =============================================================================
// Interrupts
// =============================================================================

export interface SignalSource {
  once(event: "SIGINT", listener: () => void): unknown;
  off(event: "SIGINT", listener: () => void): unknown;
}

/** Runs `onStop` on the first SIGINT. The returned function detaches it. */
export function onInterrupt(source: SignalSource, onStop: () => void): () => void {
  source.once("SIGINT", onStop);
  return () => {
    source.off("SIGINT", onStop);
  };
}
