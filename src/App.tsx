import React, { useEffect, useMemo, useRef, useState } from "react";
import { aStarSteps, runToCompletion } from "./algorithms/AStar";
import { GridEditor } from "./controller/gridEditor";
import type {
  LabConfig,
  SearchResult,
  SearchStep,
} from "./interfaces/interfaces";
import type { LabPhase, MapPreset } from "./types/types";
import { resolveConfig } from "./utils/config/config";
import { config_limits, instructions } from "./utils/constants";
import { drawPanel } from "./utils/drawpanel/drawpanel";
import { SearchAbortedError } from "./utils/errors/errors";
import { logger, setLogLevel } from "./utils/logger/logger";
import { applyMapPreset } from "./utils/mapGen/mapGen";
import { pointerToCell } from "./utils/utils";

// =====================
// A* Pathfinder Lab
// - Paint start / end / barriers on the canvas, Space to run
// - One expansion per animation step, or everything at once in instant mode
// =====================

type StepGen = Generator<SearchStep, SearchResult, void>;

interface AStarLabProps {
  config?: LabConfig;
}

export default function AStarLab({ config }: AStarLabProps) {
  const cfg = useMemo(() => config ?? resolveConfig(import.meta.env), [config]);
  const { rows, widthPx } = cfg;
  const cellPx = widthPx / rows;

  useEffect(() => setLogLevel(cfg.logLevel), [cfg.logLevel]);

  // UI State
  const [phase, setPhase] = useState<LabPhase>("intro");
  const [speed, setSpeed] = useState(cfg.stepsPerSecond); // steps per second
  const [instant, setInstant] = useState(false);
  const [preset, setPreset] = useState<MapPreset>("Random");
  const [density, setDensity] = useState(0.25);
  const [seed, setSeed] = useState(12345);

  // Grid is mutated in place; `frame` is bumped to redraw it
  const [editor] = useState(() => new GridEditor(rows));
  const [frame, setFrame] = useState(0);
  const redraw = () => setFrame((f) => f + 1);

  const [lastStep, setLastStep] = useState<SearchStep | null>(null);
  const [result, setResult] = useState<SearchResult | null>(null);

  const genRef = useRef<StepGen | null>(null);
  const abortRef = useRef<AbortController | null>(null);
  const canvasRef = useRef<HTMLCanvasElement>(null);

  const editable = phase === "editing" || phase === "finished";

  const finishRun = (res: SearchResult) => {
    genRef.current = null;
    abortRef.current = null;
    setResult(res);
    setPhase("finished");
    logger.info(
      res.found
        ? `path found: ${(res.path?.length ?? 1) - 1} moves, ${res.nodesExpanded} expanded`
        : `no path: ${res.nodesExpanded} expanded`
    );
  };

  const runSearch = () => {
    if (!editable) return;
    const ends = editor.prepareRun();
    if (!ends) return; // needs both start and end
    const abort = new AbortController();
    abortRef.current = abort;
    const gen = aStarSteps(editor.grid, ends.start, ends.end, {
      signal: abort.signal,
    });
    setResult(null);
    setLastStep(null);
    logger.info(
      `search from (${ends.start.row},${ends.start.col}) to (${ends.end.row},${ends.end.col})`
    );
    if (instant) {
      let last: SearchStep | null = null;
      finishRun(runToCompletion(gen, (s) => (last = s)));
      setLastStep(last);
    } else {
      genRef.current = gen;
      setPhase("running");
    }
    redraw();
  };

  // Drops the stats of the last run once the grid changes under them
  const backToEditing = () => {
    setResult(null);
    setLastStep(null);
    setPhase("editing");
  };

  const resetGrid = () => {
    editor.reset();
    backToEditing();
    redraw();
  };

  const quit = () => {
    const gen = genRef.current;
    genRef.current = null;
    if (gen && abortRef.current) {
      abortRef.current.abort();
      try {
        runToCompletion(gen);
      } catch (err) {
        if (!(err instanceof SearchAbortedError)) throw err;
      }
    }
    logger.info("session ended");
    setPhase("ended");
  };

  const applyPreset = () => {
    if (!editable) return;
    applyMapPreset(editor.grid, preset, seed, density);
    backToEditing();
    redraw();
  };

  // Keyboard: Space runs, R resets, Esc quits
  useEffect(() => {
    if (phase === "intro" || phase === "ended") return;
    const onKey = (e: KeyboardEvent) => {
      const typing =
        e.target instanceof HTMLInputElement || e.target instanceof HTMLSelectElement;
      if (e.key === "Escape") {
        quit();
      } else if (phase === "running" || typing) {
        return;
      } else if (e.key === " ") {
        e.preventDefault();
        runSearch();
      } else if (e.key === "r" || e.key === "R") {
        resetGrid();
      }
    };
    window.addEventListener("keydown", onKey);
    return () => window.removeEventListener("keydown", onKey);
  });

  // Animation loop
  useEffect(() => {
    if (phase !== "running") return;
    let handle: number;
    let acc = 0;
    const stepInterval = 1000 / speed;
    let last = performance.now();

    const tick = () => {
      const gen = genRef.current;
      if (!gen) return;
      const now = performance.now();
      acc += now - last;
      last = now;

      let step: SearchStep | null = null;
      while (acc >= stepInterval) {
        acc -= stepInterval;
        const res = gen.next();
        if (res.done) {
          finishRun(res.value);
          break;
        }
        step = res.value;
      }
      if (step) setLastStep(step);
      redraw();
      if (genRef.current) handle = requestAnimationFrame(tick);
    };

    handle = requestAnimationFrame(tick);
    return () => cancelAnimationFrame(handle);
  }, [phase, speed]);

  // Canvas drawing
  useEffect(() => {
    const cvs = canvasRef.current;
    if (!cvs) return;
    const ctx = cvs.getContext("2d");
    if (!ctx) return;
    drawPanel(ctx, editor.grid, widthPx);
  }, [frame, phase, editor, widthPx]);

  const cellFromEvent = (e: React.MouseEvent<HTMLCanvasElement>) => {
    // CSS may draw the canvas smaller than its backing size
    const rect = e.currentTarget.getBoundingClientRect();
    const sx = rect.width > 0 ? widthPx / rect.width : 1;
    const sy = rect.height > 0 ? widthPx / rect.height : 1;
    const p = pointerToCell((e.clientX - rect.left) * sx, (e.clientY - rect.top) * sy, cellPx);
    return editor.grid.inBounds(p.r, p.c) ? p : null;
  };

  const onPointer = (e: React.MouseEvent<HTMLCanvasElement>, buttons: number) => {
    if (!editable) return;
    const p = cellFromEvent(e);
    if (!p) return;
    if (buttons & 1) editor.paint(p);
    else if (buttons & 2) editor.erase(p);
    else return;
    if (phase === "finished") backToEditing();
    redraw();
  };

  if (phase === "intro") {
    return (
      <div className="min-h-screen">
        <div className="wrapper intro">
          <h1 className="text-3xl font-bold tracking-tight">Welcome to A* Pathfinder Algorithm</h1>
          <h2 className="font-semibold">Instructions:</h2>
          <ol className="list-decimal list-inside space-y-1">
            {instructions.map((line) => (
              <li key={line} className="text-sm">
                {line}
              </li>
            ))}
          </ol>
          <button className="btn btn-start" onClick={() => setPhase("editing")}>
            Start
          </button>
        </div>
      </div>
    );
  }

  if (phase === "ended") {
    return (
      <div className="min-h-screen">
        <div className="wrapper ended">
          <h1 className="text-3xl font-bold tracking-tight">Session ended</h1>
          <p className="text-slate-600">Reload the page to start again.</p>
        </div>
      </div>
    );
  }

  const status =
    phase === "running"
      ? "Running"
      : phase === "finished"
      ? result?.found
        ? "Path found"
        : "No path"
      : "Idle";

  const nodesExpanded = result?.nodesExpanded ?? lastStep?.nodesExpanded ?? 0;
  const peakFrontier = result?.peakFrontier ?? lastStep?.peakFrontier ?? 0;

  return (
    <div className="min-h-screen">
      <div className="wrapper">
        <header className="mb-6">
          <h1 className="text-3xl font-bold tracking-tight">A* Pathfinder Algorithm</h1>
          <p className="text-slate-600">
            Left-click: start, end, barriers · Right-click: erase · Space: run · R: reset · Esc: quit
          </p>
        </header>

        {/* Controls */}
        <div className="controls">
          <div className="control-card">
            <label className="block text-sm mb-1">Barrier preset</label>
            <select
              value={preset}
              onChange={(e) => {
                const v = e.target.value;
                if (v === "Empty" || v === "Random" || v === "Maze") setPreset(v);
              }}
              className="w-full border rounded px-3 py-2"
            >
              <option>Empty</option>
              <option>Random</option>
              <option>Maze</option>
            </select>
            {preset === "Random" && (
              <div className="mt-3">
                <label className="block text-sm">Barrier density: {(density * 100).toFixed(0)}%</label>
                <input type="range" min={0} max={0.5} step={0.01} value={density} onChange={(e) => setDensity(Number(e.target.value))} className="w-full" />
              </div>
            )}
            <label htmlFor="seed" className="block text-sm mt-3">Seed</label>
            <input id="seed" type="number" value={seed} onChange={(e) => setSeed(Number(e.target.value) || 0)} className="w-full border rounded px-3 py-2" />
            <button className="btn btn-preset" onClick={applyPreset} disabled={!editable}>
              Apply preset
            </button>
          </div>
          <div className="control-card">
            <label className="block text-sm">Speed: {speed} steps/s</label>
            <input
              type="range"
              min={config_limits.stepsPerSecond.min}
              max={config_limits.stepsPerSecond.max}
              value={speed}
              onChange={(e) => setSpeed(Number(e.target.value))}
              className="w-full"
            />
            <div className="mt-3 flex items-center gap-2">
              <input id="instant" type="checkbox" checked={instant} onChange={(e) => setInstant(e.target.checked)} />
              <label htmlFor="instant" className="text-sm">Instant (skip animation)</label>
            </div>
          </div>
          <div className="control-card flex flex-col gap-2">
            <button className="btn btn-run" onClick={runSearch} disabled={!editable}>
              Run
            </button>
            {phase === "finished" && (
              <>
                <button className="btn btn-restart" onClick={resetGrid}>
                  Restart
                </button>
                <button className="btn btn-quit" onClick={quit}>
                  Quit
                </button>
              </>
            )}
          </div>
        </div>

        {/* Grid */}
        <div className="panel">
          <div className="flex items-center justify-between mb-2">
            <h2 className="font-semibold">A*</h2>
            <div className="status text-xs text-slate-500">{status}</div>
          </div>
          <canvas
            ref={canvasRef}
            width={widthPx}
            height={widthPx}
            onMouseDown={(e) => onPointer(e, e.button === 2 ? 2 : e.button === 0 ? 1 : 0)}
            onMouseMove={(e) => onPointer(e, e.buttons)}
            onContextMenu={(e) => e.preventDefault()}
          />
          <div className="stats">
            <div className="text-slate-500">Expanded</div>
            <div className="font-mono" data-stat="expanded">{nodesExpanded}</div>
            <div className="text-slate-500">Peak frontier</div>
            <div className="font-mono" data-stat="peak-frontier">{peakFrontier}</div>
            <div className="text-slate-500">Runtime</div>
            <div className="font-mono" data-stat="runtime">{result ? result.lastRuntimeMs.toFixed(1) + " ms" : "0.0 ms"}</div>
            <div className="text-slate-500">Path length</div>
            <div className="font-mono" data-stat="path-length">{result?.path ? result.path.length - 1 : "—"}</div>
          </div>
        </div>

        <footer className="mt-8 text-xs text-slate-500">
          Colors: start pink, end navy, barrier black, frontier green, visited red, path purple.
        </footer>
      </div>
    </div>
  );
}
