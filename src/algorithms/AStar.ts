import type { Cell, Grid } from "../grid/grid";
import type {
  SearchOptions,
  SearchResult,
  SearchStep,
} from "../interfaces/interfaces";
import { SearchAbortedError, SearchPreconditionError } from "../utils/errors/errors";
import { buildHeuristic } from "../utils/heuristic/buildHeuristic";
import { MinHeap } from "../utils/MinHeap/MinHeap";

const checkPreconditions = (grid: Grid, start: Cell, end: Cell) => {
  if (start === end) {
    throw new SearchPreconditionError("start and end must be different cells");
  }
  if (!grid.contains(start) || !grid.contains(end)) {
    throw new SearchPreconditionError("start and end must belong to the grid");
  }
  if (grid.hasStaleNeighbors) {
    throw new SearchPreconditionError(
      "neighbour lists are stale; call grid.recomputeNeighbors() before searching"
    );
  }
};

// Walk predecessors back from the end; returns start..end
function reconstructPath(cameFrom: Map<Cell, Cell>, end: Cell): Cell[] {
  const path: Cell[] = [end];
  let cur = cameFrom.get(end);
  while (cur) {
    path.push(cur);
    cur = cameFrom.get(cur);
  }
  return path.reverse();
}

/**
 * A* over a 4-connected unit-cost grid with the Manhattan heuristic.
 *
 * Yields one step per expanded cell (after its neighbours are processed and it
 * has been marked Closed) and one per cell marked as path. Cell states are
 * mutated as the run goes, so a renderer can draw the grid between steps.
 * The generator's return value is the final result.
 */
export function* aStarSteps(
  grid: Grid,
  start: Cell,
  end: Cell,
  { signal }: SearchOptions = {}
): Generator<SearchStep, SearchResult, void> {
  checkPreconditions(grid, start, end);

  const h = buildHeuristic(end.pos);
  const heap = new MinHeap<Cell>();
  // absent from gScore means infinity; heap keys are the fScores
  const gScore = new Map<Cell, number>([[start, 0]]);
  const cameFrom = new Map<Cell, Cell>();
  const open = new Set<Cell>();
  const begin = performance.now();
  const meta = { nodesExpanded: 0, peakFrontier: 1 };

  heap.push(h(start.pos), start);
  open.add(start);

  while (heap.size()) {
    if (signal?.aborted) throw new SearchAbortedError();

    const n = heap.pop();
    if (!n) break;
    open.delete(n);

    if (n === end) {
      const path = reconstructPath(cameFrom, end);
      // intermediate cells only; start and end keep their own states
      for (const cell of path.slice(1, -1).reverse()) {
        cell.state = "Path";
        yield {
          phase: "path",
          current: cell,
          nodesExpanded: meta.nodesExpanded,
          frontierSize: open.size,
          peakFrontier: meta.peakFrontier,
        };
      }
      end.state = "End";
      return {
        found: true,
        path,
        nodesExpanded: meta.nodesExpanded,
        peakFrontier: meta.peakFrontier,
        lastRuntimeMs: performance.now() - begin,
      };
    }

    const gn = gScore.get(n) ?? Infinity;
    for (const m of n.neighbors) {
      const ng = gn + 1;
      if (ng < (gScore.get(m) ?? Infinity)) {
        cameFrom.set(m, n);
        gScore.set(m, ng);
        const f = ng + h(m.pos);
        if (open.has(m)) {
          heap.update(f, m);
        } else {
          heap.push(f, m);
          open.add(m);
          if (m !== end && m !== start) m.state = "Open";
        }
      }
    }

    if (n !== start) n.state = "Closed";
    meta.nodesExpanded++;
    meta.peakFrontier = Math.max(meta.peakFrontier, open.size);

    yield {
      phase: "expand",
      current: n,
      nodesExpanded: meta.nodesExpanded,
      frontierSize: open.size,
      peakFrontier: meta.peakFrontier,
    };
  }

  return {
    found: false,
    nodesExpanded: meta.nodesExpanded,
    peakFrontier: meta.peakFrontier,
    lastRuntimeMs: performance.now() - begin,
  };
}

/**
 * Drives `aStarSteps` to completion, calling `onStep` synchronously for every
 * step. Returns whether a path was found. Anything thrown by `onStep`
 * propagates and ends the run.
 */
export function search(
  grid: Grid,
  start: Cell,
  end: Cell,
  onStep: (step: SearchStep) => void = () => {},
  options: SearchOptions = {}
): boolean {
  return runToCompletion(aStarSteps(grid, start, end, options), onStep).found;
}

export function runToCompletion(
  steps: Generator<SearchStep, SearchResult, void>,
  onStep: (step: SearchStep) => void = () => {}
): SearchResult {
  let res = steps.next();
  while (!res.done) {
    onStep(res.value);
    res = steps.next();
  }
  return res.value;
}
