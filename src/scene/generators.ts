/**
 * Procedural cube layouts for the oasis: terrain, palm tree, water, sand
 * border and the sand house.
 */

import type { Material } from "../material";
import type { SceneObject, Vec3 } from "./types";
import { cube, cubesAt } from "./utils";

/** Extra height for the water cell at grid (x, z) and time t. */
export type RippleFn = (x: number, z: number, t: number) => number;

export const WATER_LEVEL = 4.9;

export function terrain(material: Material, size: number = 10): SceneObject[] {
  return [cube([0, 0, 0], size, material)];
}

export function lightCubes(
  positions: readonly Vec3[],
  size: number,
  material: Material
): SceneObject[] {
  return cubesAt(positions, size, material, true);
}

// =============================================================================
// Palm Tree
// =============================================================================

export interface PalmTreeParams {
  base: Vec3;
  trunkCount: number;
  trunkSize: number;
  leafSize: number;
  leafSpread: number;
}

export const DEFAULT_PALM: PalmTreeParams = {
  base: [0, 5, 0],
  trunkCount: 5,
  trunkSize: 0.4,
  leafSize: 0.5,
  leafSpread: 0.5,
};

/** Stacked trunk cubes, then a crown of five leaves (center + diagonals). */
export function palmTree(
  trunk: Material,
  leaf: Material,
  params: PalmTreeParams = DEFAULT_PALM
): SceneObject[] {
  const [bx, by, bz] = params.base;
  const { trunkCount, trunkSize, leafSize, leafSpread: s } = params;

  const trunkCenters: Vec3[] = [];
  for (let i = 0; i < trunkCount; i++) {
    trunkCenters.push([bx, by + i * trunkSize, bz]);
  }

  const crownY = by + trunkCount * trunkSize;
  const leafCenters: Vec3[] = [
    [bx, crownY, bz],
    [bx + s, crownY, bz + s],
    [bx - s, crownY, bz + s],
    [bx + s, crownY, bz - s],
    [bx - s, crownY, bz - s],
  ];

  return [
    ...cubesAt(trunkCenters, trunkSize, trunk),
    ...cubesAt(leafCenters, leafSize, leaf),
  ];
}

// =============================================================================
// Water
// =============================================================================

export function waveGrid(
  material: Material,
  gridSize: number,
  cubeSize: number,
  elapsed: number,
  ripple?: RippleFn
): SceneObject[] {
  const cells: SceneObject[] = [];
  for (let x = 0; x < gridSize; x++) {
    for (let z = 0; z < gridSize; z++) {
      let waveHeight = Math.sin(elapsed * 2.0 + (x + z) * 0.5) * 0.2;
      if (ripple) waveHeight += ripple(x, z, elapsed);
      cells.push(
        cube([x * cubeSize, WATER_LEVEL + waveHeight, z * cubeSize], cubeSize, material)
      );
    }
  }
  return cells;
}

/** The outer ring of the water grid. */
export function sandBorder(
  material: Material,
  gridSize: number,
  cubeSize: number
): SceneObject[] {
  const centers: Vec3[] = [];
  for (let x = 0; x < gridSize; x++) {
    for (let z = 0; z < gridSize; z++) {
      const onEdge = x === 0 || x === gridSize - 1 || z === 0 || z === gridSize - 1;
      if (onEdge) centers.push([x * cubeSize, WATER_LEVEL, z * cubeSize]);
    }
  }
  return cubesAt(centers, cubeSize, material);
}

// =============================================================================
// Sand House
// =============================================================================

const HOUSE_WIDTH = 5;
const HOUSE_HEIGHT = 3;
const HOUSE_DEPTH = 5;

function isDoor(x: number, y: number, z: number): boolean {
  return x === 2 && z === 0 && y < 2;
}

function isWindow(x: number, y: number, z: number): boolean {
  return y === 1 && (x === 1 || x === 3) && (z === 0 || z === HOUSE_DEPTH - 1);
}

/**
 * Solid 5x3x5 block with a front door and four windows, capped by a full
 * roof layer. `start` is the center of the corner cube.
 */
export function sandHouse(
  material: Material,
  start: Vec3,
  cubeSize: number
): SceneObject[] {
  const [sx, sy, sz] = start;
  const centers: Vec3[] = [];

  for (let x = 0; x < HOUSE_WIDTH; x++) {
    for (let y = 0; y < HOUSE_HEIGHT; y++) {
      for (let z = 0; z < HOUSE_DEPTH; z++) {
        if (isDoor(x, y, z) || isWindow(x, y, z)) continue;
        centers.push([sx + x * cubeSize, sy + y * cubeSize, sz + z * cubeSize]);
      }
    }
  }

  // Roof
  for (let x = 0; x < HOUSE_WIDTH; x++) {
    for (let z = 0; z < HOUSE_DEPTH; z++) {
      centers.push([sx + x * cubeSize, sy + HOUSE_HEIGHT * cubeSize, sz + z * cubeSize]);
    }
  }

  return cubesAt(centers, cubeSize, material);
}
