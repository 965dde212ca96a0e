/**
 * Oasis scene - palm tree, rippling pool, sand house and a sun that
 * circles through day and night.
 */

import { materials } from "../material";
import { ambientLightIntensity } from "../sky";
import {
  type Scene,
  type SceneConfig,
  type SceneFrame,
  type SceneObject,
  type Vec3,
  type RippleFn,
  terrain,
  lightCubes,
  palmTree,
  waveGrid,
  sandBorder,
  sandHouse,
  DEFAULT_PALM,
} from "../scene";
import { seededRandom, createNoiseGenerator } from "../scene/utils";

// =============================================================================
// Config
// =============================================================================

export const config: SceneConfig = {
  camera: {
    eye: [5.0, 5.0, 10.0],
    at: [0.0, 2.0, 0.0],
    up: [0.0, 1.0, 0.0],
    fov: 60,
  },
  render: {
    width: 800,
    height: 600,
    frameDelayMs: 16,
  },
};

const LAMP_POSITIONS: Vec3[] = [
  [1.0, 5.2, -4.0],
  [4.5, 5.2, 2.0],
];

const HOUSE_START: Vec3 = [-4.5, 5.2, -4.0];

// Scene-specific config
export const sceneParams = {
  seed: 7,

  lightCubes: {
    positions: LAMP_POSITIONS,
    size: 0.5,
  },

  sun: {
    radius: 15.0,
    angularSpeed: 0.5,   // radians per second
  },

  water: {
    gridSize: 6,
    cubeSize: 0.5,
    rippleAmount: 0.05,
    rippleScale: 0.35,
    rippleSpeed: 0.6,
  },

  house: {
    start: HOUSE_START,
    cubeSize: 0.5,
  },
};

// =============================================================================
// State
// =============================================================================

interface SceneState {
  // Layers that never change, in draw order around the water
  head: SceneObject[];
  tail: SceneObject[];
  ripple: RippleFn;
}

let state: SceneState | null = null;

function initState(): SceneState {
  const { lightCubes: lights, water, house } = sceneParams;

  const head = [
    ...terrain(materials.sand),
    ...lightCubes(lights.positions, lights.size, materials.lightCube),
    ...palmTree(materials.trunk, materials.leaf, DEFAULT_PALM),
  ];

  const tail = [
    ...sandBorder(materials.sand, water.gridSize, water.cubeSize),
    ...sandHouse(materials.sand, house.start, house.cubeSize),
  ];

  const fbm2 = createNoiseGenerator(seededRandom(sceneParams.seed));
  const ripple: RippleFn = (x, z, t) =>
    fbm2(x * water.rippleScale + t * water.rippleSpeed, z * water.rippleScale, 2) *
    water.rippleAmount;

  return { head, tail, ripple };
}

// =============================================================================
// Animation
// =============================================================================

export function sunPosition(t: number): Vec3 {
  const { radius, angularSpeed } = sceneParams.sun;
  const angle = t * angularSpeed;
  return [radius * Math.cos(angle), radius * Math.sin(angle), 0];
}

// =============================================================================
// Scene Implementation
// =============================================================================

function update(t: number): SceneFrame {
  if (!state) {
    throw new Error("Scene not initialized");
  }

  const { water, lightCubes: lights } = sceneParams;
  const pool = waveGrid(materials.water, water.gridSize, water.cubeSize, t, state.ripple);

  const sun = sunPosition(t);

  return {
    objects: [...state.head, ...pool, ...state.tail],
    lightPositions: [...lights.positions, sun],
    ambientIntensity: ambientLightIntensity(sun),
  };
}

// =============================================================================
// Export
// =============================================================================

export const oasisScene: Scene = {
  name: "oasis",
  config,
  init() {
    state = initState();
  },
  update,
};
