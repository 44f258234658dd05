import type { Cell } from "../grid/grid";
import type { LogLevel, StepPhase } from "../types/types";

export interface SearchStep {
  phase: StepPhase;
  current: Cell; // expanded cell, or the cell just marked as path
  nodesExpanded: number;
  frontierSize: number;
  peakFrontier: number;
}

export interface SearchResult {
  found: boolean;
  path?: Cell[]; // start..end when found
  nodesExpanded: number;
  peakFrontier: number;
  lastRuntimeMs: number;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

export interface LabConfig {
  rows: number;
  widthPx: number;
  stepsPerSecond: number;
  logLevel: LogLevel;
}
