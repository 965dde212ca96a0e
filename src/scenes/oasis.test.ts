import { describe, test, expect } from "vitest";
import { ambientLightIntensity } from "../sky";
import { oasisScene, sceneParams, sunPosition } from "./oasis";

describe("oasis scene", () => {
  test("update before init throws", () => {
    expect(() => oasisScene.update(0)).toThrow("Scene not initialized");
  });

  test("sun circles in the xy plane", () => {
    expect(sunPosition(0)).toEqual([15, 0, 0]);
    const [x, y, z] = sunPosition(Math.PI);
    expect(x).toBeCloseTo(0, 9);
    expect(y).toBeCloseTo(15, 9);
    expect(z).toBe(0);
  });

  test("frame holds every layer with the two lamps and the sun", () => {
    oasisScene.init();
    const frame = oasisScene.update(0);

    // terrain 1, lamps 2, palm 10, water 36, border 20, house 94
    expect(frame.objects).toHaveLength(163);
    expect(frame.objects.filter((o) => o.isLight)).toHaveLength(2);
    expect(frame.lightPositions).toEqual([...sceneParams.lightCubes.positions, [15, 0, 0]]);
    expect(frame.ambientIntensity).toBeCloseTo(0.28, 12);
    expect(frame.ambientIntensity).toBe(ambientLightIntensity([15, 0, 0]));
  });

  test("static layers are shared between frames, water is rebuilt", () => {
    oasisScene.init();
    const a = oasisScene.update(0);
    const b = oasisScene.update(0.5);
    expect(b.objects[0]).toBe(a.objects[0]);
    expect(b.objects[162]).toBe(a.objects[162]);
    expect(b.objects[13]).not.toBe(a.objects[13]);
  });

  test("noon is brighter than midnight", () => {
    oasisScene.init();
    const noon = oasisScene.update(Math.PI);
    const midnight = oasisScene.update(3 * Math.PI);
    expect(noon.ambientIntensity).toBe(1);
    expect(midnight.ambientIntensity).toBe(0.2);
  });
});
