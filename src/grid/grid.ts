import type { CellState, Coord } from "../types/types";
import { ORTHOGONAL_DELTAS } from "../utils/utils";

export class Cell {
  readonly row: number;
  readonly col: number;
  state: CellState = "Empty";
  neighbors: Cell[] = []; // valid only after Grid.recomputeNeighbors()

  constructor(row: number, col: number) {
    this.row = row;
    this.col = col;
  }

  get pos(): Coord {
    return { r: this.row, c: this.col };
  }
}

const createCells = (rows: number): Cell[][] => {
  const cells: Cell[][] = [];
  for (let r = 0; r < rows; r++) {
    const line: Cell[] = [];
    for (let c = 0; c < rows; c++) line.push(new Cell(r, c));
    cells.push(line);
  }
  return cells;
};

/**
 * Square matrix of cells.
 *
 * Neighbour lists are a cached view of the barrier layout: any edit that
 * turns a cell into or out of a barrier marks them stale until
 * `recomputeNeighbors()` runs again.
 */
export class Grid {
  readonly rows: number;
  private cells: Cell[][];
  private neighborsStale = true;

  constructor(rows: number) {
    if (!Number.isInteger(rows) || rows < 1) {
      throw new RangeError(`grid size must be a positive integer, got ${rows}`);
    }
    this.rows = rows;
    this.cells = createCells(rows);
  }

  inBounds(r: number, c: number) {
    return r >= 0 && r < this.rows && c >= 0 && c < this.rows;
  }

  cellAt(r: number, c: number): Cell {
    if (!this.inBounds(r, c)) {
      throw new RangeError(`cell (${r},${c}) is outside a ${this.rows}x${this.rows} grid`);
    }
    return this.cells[r][c];
  }

  contains(cell: Cell) {
    return this.inBounds(cell.row, cell.col) && this.cells[cell.row][cell.col] === cell;
  }

  *allCells(): Generator<Cell, void, void> {
    for (const line of this.cells) yield* line;
  }

  setState(cell: Cell, state: CellState) {
    if ((cell.state === "Barrier") !== (state === "Barrier")) {
      this.neighborsStale = true;
    }
    cell.state = state;
  }

  get hasStaleNeighbors() {
    return this.neighborsStale;
  }

  recomputeNeighbors() {
    for (const cell of this.allCells()) {
      const out: Cell[] = [];
      for (const [dr, dc] of ORTHOGONAL_DELTAS) {
        const nr = cell.row + dr,
          nc = cell.col + dc;
        if (!this.inBounds(nr, nc)) continue;
        const nb = this.cells[nr][nc];
        if (nb.state !== "Barrier") out.push(nb);
      }
      cell.neighbors = out;
    }
    this.neighborsStale = false;
  }

  // Open/Closed/Path are a trace of the last run, not user edits
  clearSearchMarks() {
    for (const cell of this.allCells()) {
      if (cell.state === "Open" || cell.state === "Closed" || cell.state === "Path") {
        cell.state = "Empty";
      }
    }
  }

  reset() {
    this.cells = createCells(this.rows);
    this.neighborsStale = true;
  }

  count(state: CellState) {
    let n = 0;
    for (const cell of this.allCells()) if (cell.state === state) n++;
    return n;
  }
}
