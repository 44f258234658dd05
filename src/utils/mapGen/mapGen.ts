import type { Cell, Grid } from "../../grid/grid";
import type { CellState, MapPreset } from "../../types/types";
import { ORTHOGONAL_DELTAS, rngLCG } from "../utils";

// Presets never touch the endpoints; everything else is overwritten,
// which also wipes the trace of the last run.
const lay = (grid: Grid, cell: Cell, state: CellState) => {
  if (cell.state === "Start" || cell.state === "End") return;
  grid.setState(cell, state);
};

export function clearBarriers(grid: Grid) {
  for (const cell of grid.allCells()) lay(grid, cell, "Empty");
}

// One draw per cell in row-major order, so the layout does not depend on
// where the endpoints are
export function scatterBarriers(grid: Grid, density: number, seed: number) {
  const rand = rngLCG(seed);
  for (const cell of grid.allCells()) {
    lay(grid, cell, rand.next().value < density ? "Barrier" : "Empty");
  }
}

/**
 * Perfect maze: rooms sit on odd (row, col) inside the border, walls between
 * them are knocked down by a randomised depth-first walk. Grids under 3 rows
 * have no room and end up all barrier.
 */
export function carveMaze(grid: Grid, seed: number) {
  const rand = rngLCG(seed);
  const last = grid.rows - 1;
  const isRoom = (r: number, c: number) =>
    r > 0 && c > 0 && r < last && c < last && r % 2 === 1 && c % 2 === 1;

  for (const cell of grid.allCells()) lay(grid, cell, "Barrier");
  if (!isRoom(1, 1)) return;

  const first = grid.cellAt(1, 1);
  const visited = new Set<Cell>([first]);
  const trail: Cell[] = [first];
  lay(grid, first, "Empty");

  while (trail.length) {
    const here = trail[trail.length - 1];
    const exits = ORTHOGONAL_DELTAS.filter(([dr, dc]) => {
      const r = here.row + 2 * dr,
        c = here.col + 2 * dc;
      return isRoom(r, c) && !visited.has(grid.cellAt(r, c));
    });
    if (!exits.length) {
      trail.pop();
      continue;
    }
    const [dr, dc] = exits[Math.floor(rand.next().value * exits.length)];
    const next = grid.cellAt(here.row + 2 * dr, here.col + 2 * dc);
    lay(grid, grid.cellAt(here.row + dr, here.col + dc), "Empty");
    lay(grid, next, "Empty");
    visited.add(next);
    trail.push(next);
  }
}

export function applyMapPreset(grid: Grid, preset: MapPreset, seed: number, density: number) {
  if (preset === "Maze") carveMaze(grid, seed);
  else if (preset === "Random") scatterBarriers(grid, density, seed);
  else clearBarriers(grid);
}
