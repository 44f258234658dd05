import { Grid } from "../grid/grid";
import type { Cell } from "../grid/grid";
import type { Coord } from "../types/types";

/**
 * Owns the grid plus the start/end references and enforces the editing rules:
 * at most one start and one end, and neither can be painted over by a
 * barrier until it has been cleared.
 */
export class GridEditor {
  readonly grid: Grid;
  start: Cell | null = null;
  end: Cell | null = null;

  constructor(rows: number) {
    this.grid = new Grid(rows);
  }

  private isEndpoint(cell: Cell) {
    return cell === this.start || cell === this.end;
  }

  setStart(cell: Cell) {
    if (this.start || cell === this.end) return false;
    this.grid.setState(cell, "Start");
    this.start = cell;
    return true;
  }

  setEnd(cell: Cell) {
    if (this.end || cell === this.start) return false;
    this.grid.setState(cell, "End");
    this.end = cell;
    return true;
  }

  addBarrier(cell: Cell) {
    if (this.isEndpoint(cell)) return false;
    this.grid.setState(cell, "Barrier");
    return true;
  }

  clearCell(cell: Cell) {
    this.grid.setState(cell, "Empty");
    if (cell === this.start) this.start = null;
    else if (cell === this.end) this.end = null;
  }

  // Left button: start first, then end, then barriers
  paint({ r, c }: Coord) {
    const cell = this.grid.cellAt(r, c);
    return this.setStart(cell) || this.setEnd(cell) || this.addBarrier(cell);
  }

  // Right button
  erase({ r, c }: Coord) {
    this.clearCell(this.grid.cellAt(r, c));
  }

  /**
   * Readies the grid for a run: wipes the previous trace and recomputes
   * neighbours. Returns null (and touches nothing) unless both endpoints exist.
   */
  prepareRun(): { start: Cell; end: Cell } | null {
    const { start, end } = this;
    if (!start || !end) return null;
    this.grid.clearSearchMarks();
    this.grid.recomputeNeighbors();
    return { start, end };
  }

  reset() {
    this.grid.reset();
    this.start = null;
    this.end = null;
  }
}
