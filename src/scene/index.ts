/**
 * Scene utilities - types, generators and helpers.
 */

export * from "./types";
export * from "./generators";
export { seededRandom, createNoiseGenerator, cube, cubesAt } from "./utils";
