import { describe, test, expect } from "vitest";
import { Camera } from "./camera";
import { dot, length, sub, type Vec3 } from "./math";

function expectVecClose(actual: Vec3, expected: Vec3, digits = 9) {
  for (let i = 0; i < 3; i++) {
    expect(actual[i]).toBeCloseTo(expected[i] ?? NaN, digits);
  }
}

function expectOrthonormal(camera: Camera) {
  const { right, up, forward } = camera.basis;
  expect(length(right)).toBeCloseTo(1, 9);
  expect(length(up)).toBeCloseTo(1, 9);
  expect(length(forward)).toBeCloseTo(1, 9);
  expect(dot(right, up)).toBeCloseTo(0, 9);
  expect(dot(right, forward)).toBeCloseTo(0, 9);
  expect(dot(up, forward)).toBeCloseTo(0, 9);
}

function makeCamera() {
  return new Camera({ eye: [5, 5, 10], at: [0, 2, 0], up: [0, 1, 0] });
}

describe("Camera basis", () => {
  test("is orthonormal", () => {
    expectOrthonormal(makeCamera());
  });

  test("forward points from eye to target", () => {
    const camera = makeCamera();
    const len = Math.sqrt(25 + 9 + 100);
    expectVecClose(camera.basis.forward, [-5 / len, -3 / len, -10 / len]);
  });

  test("baseChange maps -z to forward", () => {
    const camera = makeCamera();
    expectVecClose(camera.baseChange([0, 0, -1]), camera.basis.forward);
  });

  test("baseChange maps +x to right and +y to up", () => {
    const camera = new Camera({ eye: [0, 0, 5], at: [0, 0, 0], up: [0, 1, 0] });
    expectVecClose(camera.baseChange([1, 0, 0]), [1, 0, 0]);
    expectVecClose(camera.baseChange([0, 1, 0]), [0, 1, 0]);
  });
});

describe("Camera.orbit", () => {
  test("orbit followed by its inverse restores the eye", () => {
    const camera = makeCamera();
    camera.orbit(0.3, 0.2);
    expect(camera.eye[0]).not.toBeCloseTo(5, 3);
    camera.orbit(-0.3, -0.2);
    expectVecClose(camera.eye, [5, 5, 10], 6);
    expectOrthonormal(camera);
  });

  test("keeps the distance to the target", () => {
    const camera = makeCamera();
    const before = length(sub(camera.eye, camera.center));
    camera.orbit(1.1, -0.4);
    expect(length(sub(camera.eye, camera.center))).toBeCloseTo(before, 9);
    expectOrthonormal(camera);
  });

  test("negative pitch raises the eye", () => {
    const camera = makeCamera();
    camera.orbit(0, -0.2);
    expect(camera.eye[1]).toBeGreaterThan(5);
  });

  test("clamps pitch short of the poles", () => {
    const camera = makeCamera();
    camera.orbit(0, -10);
    const radius = length(sub(camera.eye, camera.center));
    const expectedY = camera.center[1] + radius * Math.sin((89 * Math.PI) / 180);
    expect(camera.eye[1]).toBeCloseTo(expectedY, 9);
    expect(Math.abs(dot(camera.basis.forward, [0, 1, 0]))).toBeLessThan(1);
    expectOrthonormal(camera);
  });
});

describe("Camera.move", () => {
  test("forward translates eye and target together", () => {
    const camera = makeCamera();
    const forward = camera.basis.forward;
    camera.move("forward");
    expectVecClose(camera.eye, [5 + forward[0] * 0.5, 5 + forward[1] * 0.5, 10 + forward[2] * 0.5]);
    expectVecClose(camera.center, [forward[0] * 0.5, 2 + forward[1] * 0.5, forward[2] * 0.5]);
    expectVecClose(camera.basis.forward, forward);
  });

  test("left and right cancel out", () => {
    const camera = makeCamera();
    camera.move("left");
    expect(camera.eye[0]).not.toBeCloseTo(5, 3);
    camera.move("right");
    expectVecClose(camera.eye, [5, 5, 10]);
  });

  test("backward undoes forward", () => {
    const camera = new Camera({ eye: [0, 0, 5], at: [0, 0, 0], moveStep: 2 });
    camera.move("backward");
    expectVecClose(camera.eye, [0, 0, 7]);
    camera.move("forward");
    expectVecClose(camera.eye, [0, 0, 5]);
  });
});
