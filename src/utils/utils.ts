import type { Coord } from "../types/types";

// down, up, right, left
export const ORTHOGONAL_DELTAS: readonly (readonly [number, number])[] = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];

// Deterministic RNG, 32-bit LCG
export function* rngLCG(seed: number): Generator<number, never, void> {
  let s = seed >>> 0 || 1;
  while (true) {
    s = (1664525 * s + 1013904223) >>> 0;
    yield s / 2 ** 32;
  }
}

// Pixel position to grid coordinate; the caller drops anything out of range
export const pointerToCell = (x: number, y: number, cellSizePx: number): Coord => ({
  r: Math.floor(y / cellSizePx),
  c: Math.floor(x / cellSizePx),
});
