export type Coord = { r: number; c: number };

export type CellState =
  | "Empty"
  | "Start"
  | "End"
  | "Barrier"
  | "Open"
  | "Closed"
  | "Path";

export type MapPreset = "Empty" | "Random" | "Maze";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LabPhase = "intro" | "editing" | "running" | "finished" | "ended";

export type StepPhase = "expand" | "path";
