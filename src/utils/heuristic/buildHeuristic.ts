import type { Coord } from "../../types/types";

export const manhattan = (a: Coord, b: Coord) =>
  Math.abs(a.r - b.r) + Math.abs(a.c - b.c);

// Distance-to-goal closure, the shape the search loop consumes
export function buildHeuristic(goal: Coord): (p: Coord) => number {
  return (p: Coord) => manhattan(p, goal);
}
