import { describe, expect, it } from "vitest";
import { search } from "../../algorithms/AStar";
import { Grid } from "../../grid/grid";
import { applyMapPreset, carveMaze, clearBarriers, scatterBarriers } from "./mapGen";

const layout = (grid: Grid) => [...grid.allCells()].map((c) => c.state);

describe("scatterBarriers", () => {
  it("is reproducible per seed", () => {
    const a = new Grid(10);
    const b = new Grid(10);
    const c = new Grid(10);
    scatterBarriers(a, 0.3, 7);
    scatterBarriers(b, 0.3, 7);
    scatterBarriers(c, 0.3, 8);
    expect(layout(a)).toEqual(layout(b));
    expect(layout(a)).not.toEqual(layout(c));
  });

  it("honours the density extremes", () => {
    const grid = new Grid(6);
    scatterBarriers(grid, 0, 1);
    expect(grid.count("Barrier")).toBe(0);
    scatterBarriers(grid, 1, 1);
    expect(grid.count("Barrier")).toBe(36);
  });

  it("keeps start and end and marks neighbours stale", () => {
    const grid = new Grid(3);
    grid.setState(grid.cellAt(0, 0), "Start");
    grid.setState(grid.cellAt(2, 2), "End");
    grid.setState(grid.cellAt(1, 1), "Closed");
    grid.recomputeNeighbors();
    scatterBarriers(grid, 1, 5);
    expect(grid.cellAt(0, 0).state).toBe("Start");
    expect(grid.cellAt(2, 2).state).toBe("End");
    expect(grid.count("Barrier")).toBe(7);
    expect(grid.hasStaleNeighbors).toBe(true);
  });
});

describe("carveMaze", () => {
  it("joins the four rooms of a 5x5 grid with three openings", () => {
    const grid = new Grid(5);
    carveMaze(grid, 42);
    for (let i = 0; i < 5; i++) {
      expect(grid.cellAt(0, i).state).toBe("Barrier");
      expect(grid.cellAt(4, i).state).toBe("Barrier");
      expect(grid.cellAt(i, 0).state).toBe("Barrier");
      expect(grid.cellAt(i, 4).state).toBe("Barrier");
    }
    for (const [r, c] of [[1, 1], [1, 3], [3, 1], [3, 3]]) {
      expect(grid.cellAt(r, c).state).toBe("Empty");
    }
    expect(grid.count("Empty")).toBe(7);
    expect(grid.cellAt(2, 2).state).toBe("Barrier");
  });

  it("connects opposite corners", () => {
    for (const seed of [1, 2, 3]) {
      const grid = new Grid(9);
      carveMaze(grid, seed);
      // a spanning tree over 16 rooms opens 15 walls
      expect(grid.count("Empty")).toBe(31);
      const start = grid.cellAt(1, 1);
      const end = grid.cellAt(7, 7);
      grid.setState(start, "Start");
      grid.setState(end, "End");
      grid.recomputeNeighbors();
      expect(search(grid, start, end)).toBe(true);
    }
  });

  it("leaves a grid without rooms walled", () => {
    const grid = new Grid(2);
    carveMaze(grid, 1);
    expect(grid.count("Barrier")).toBe(4);
  });
});

describe("clearBarriers", () => {
  it("empties everything but the endpoints", () => {
    const grid = new Grid(3);
    grid.setState(grid.cellAt(0, 0), "Start");
    grid.setState(grid.cellAt(1, 1), "Barrier");
    grid.setState(grid.cellAt(2, 1), "Path");
    clearBarriers(grid);
    expect(grid.count("Empty")).toBe(8);
    expect(grid.cellAt(0, 0).state).toBe("Start");
  });
});

describe("applyMapPreset", () => {
  it("dispatches on the preset name", () => {
    const maze = new Grid(5);
    applyMapPreset(maze, "Maze", 42, 0.5);
    expect(maze.count("Empty")).toBe(7);

    const random = new Grid(5);
    applyMapPreset(random, "Random", 3, 1);
    expect(random.count("Barrier")).toBe(25);

    applyMapPreset(random, "Empty", 3, 1);
    expect(random.count("Empty")).toBe(25);
  });
});
