import { describe, test, expect } from "vitest";
import { Camera } from "./camera";
import { EventEmitter } from "events";
import {
  DEFAULT_ORBIT_SPEED,
  KEYS,
  applyCommand,
  applyKeys,
  keyToCommand,
  onInterrupt,
  splitKeys,
} from "./input";

describe("keyToCommand", () => {
  test("w and s dolly the camera", () => {
    expect(keyToCommand("w")).toEqual({ type: "move", direction: "forward" });
    expect(keyToCommand("s")).toEqual({ type: "move", direction: "backward" });
  });

  test("a and d orbit around the target", () => {
    expect(keyToCommand("a", 0.1)).toEqual({ type: "orbit", yaw: 0.1, pitch: 0 });
    expect(keyToCommand("d", 0.1)).toEqual({ type: "orbit", yaw: -0.1, pitch: 0 });
  });

  test("up and down arrows change pitch", () => {
    expect(keyToCommand(KEYS.UP)).toEqual({ type: "orbit", yaw: 0, pitch: -DEFAULT_ORBIT_SPEED });
    expect(keyToCommand(KEYS.DOWN)).toEqual({ type: "orbit", yaw: 0, pitch: DEFAULT_ORBIT_SPEED });
  });

  test("left and right arrows strafe", () => {
    expect(keyToCommand(KEYS.LEFT)).toEqual({ type: "move", direction: "left" });
    expect(keyToCommand(KEYS.RIGHT)).toEqual({ type: "move", direction: "right" });
  });

  test("q, escape and ctrl-c quit", () => {
    for (const key of ["q", KEYS.ESCAPE, KEYS.CTRL_C]) {
      expect(keyToCommand(key)).toEqual({ type: "quit" });
    }
  });

  test("other keys are ignored", () => {
    expect(keyToCommand("x")).toBeNull();
    expect(keyToCommand("W")).toBeNull();
  });
});

describe("applyCommand", () => {
  test("moves and orbits the camera", () => {
    const camera = new Camera({ eye: [0, 0, 5], at: [0, 0, 0], moveStep: 1 });
    expect(applyCommand(camera, { type: "move", direction: "forward" })).toBe(true);
    expect(camera.eye[2]).toBeCloseTo(4, 12);

    expect(applyCommand(camera, { type: "orbit", yaw: 0.5, pitch: 0 })).toBe(true);
    expect(camera.eye[0]).not.toBeCloseTo(0, 3);
  });

  test("quit leaves the camera alone and returns false", () => {
    const camera = new Camera({ eye: [0, 0, 5], at: [0, 0, 0] });
    expect(applyCommand(camera, { type: "quit" })).toBe(false);
    expect(camera.eye).toEqual([0, 0, 5]);
  });
});

describe("splitKeys", () => {
  test("separates repeated letters", () => {
    expect(splitKeys("ww")).toEqual(["w", "w"]);
  });

  test("keeps arrow sequences whole", () => {
    expect(splitKeys(KEYS.UP + KEYS.UP)).toEqual([KEYS.UP, KEYS.UP]);
    expect(splitKeys("a" + KEYS.LEFT + "d")).toEqual(["a", KEYS.LEFT, "d"]);
  });

  test("sequences with parameters end at their final byte", () => {
    expect(splitKeys("\u001b[1;5Aw")).toEqual(["\u001b[1;5A", "w"]);
  });

  test("a lone escape is its own key", () => {
    expect(splitKeys(KEYS.ESCAPE)).toEqual([KEYS.ESCAPE]);
    expect(splitKeys("w" + KEYS.ESCAPE)).toEqual(["w", KEYS.ESCAPE]);
  });

  test("empty chunk has no keys", () => {
    expect(splitKeys("")).toEqual([]);
  });
});

describe("applyKeys", () => {
  test("applies every key of a joined chunk", () => {
    const camera = new Camera({ eye: [0, 0, 5], at: [0, 0, 0], moveStep: 1 });
    expect(applyKeys(camera, "ww")).toBe(true);
    expect(camera.eye[2]).toBeCloseTo(3, 12);
  });

  test("repeated arrows orbit once per sequence", () => {
    const joined = new Camera({ eye: [5, 5, 10], at: [0, 2, 0] });
    const separate = new Camera({ eye: [5, 5, 10], at: [0, 2, 0] });
    applyKeys(joined, KEYS.UP + KEYS.UP);
    applyKeys(separate, KEYS.UP);
    applyKeys(separate, KEYS.UP);
    expect(joined.eye).toEqual(separate.eye);
    expect(joined.eye[1]).toBeGreaterThan(5);
  });

  test("stops at a quit key", () => {
    const camera = new Camera({ eye: [0, 0, 5], at: [0, 0, 0], moveStep: 1 });
    expect(applyKeys(camera, "wqw")).toBe(false);
    expect(camera.eye[2]).toBeCloseTo(4, 12);
  });
});

describe("onInterrupt", () => {
  test("fires once on SIGINT", () => {
    const source = new EventEmitter();
    let stops = 0;
    onInterrupt(source, () => stops++);
    source.emit("SIGINT");
    source.emit("SIGINT");
    expect(stops).toBe(1);
  });

  test("detaching removes the listener", () => {
    const source = new EventEmitter();
    let stops = 0;
    const detach = onInterrupt(source, () => stops++);
    detach();
    source.emit("SIGINT");
    expect(stops).toBe(0);
    expect(source.listenerCount("SIGINT")).toBe(0);
  });
});
