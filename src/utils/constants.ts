import type { CellState } from "../types/types";
import type { LabConfig } from "../interfaces/interfaces";

export const cell_color_constants: Record<CellState, string> = {
  Empty: "#ffffff",
  Barrier: "#000000",
  Open: "#00ff00",
  Closed: "#ff0000",
  Path: "#800080",
  Start: "#ff00ff",
  End: "#000080",
};

export const gridLineColor = "#808080";

export const default_lab_config: LabConfig = {
  rows: 50,
  widthPx: 800,
  stepsPerSecond: 60,
  logLevel: "info",
};

export const config_limits = {
  rows: { min: 5, max: 150 },
  widthPx: { min: 200, max: 1600 },
  stepsPerSecond: { min: 1, max: 240 },
} as const;

export const instructions = [
  "Left-click to add the start node (pink).",
  "Left-click again to add the end node (navy).",
  "After adding start and end nodes, left-click to add barriers (black).",
  "Right-click to remove a node.",
  "Press Space to start the algorithm, R to reset the grid, Esc to quit.",
];
