import type { Grid } from "../../grid/grid";
import { cell_color_constants, gridLineColor } from "../constants";

// The subset of CanvasRenderingContext2D the panel draws with
export type DrawSurface = Pick<
  CanvasRenderingContext2D,
  | "clearRect"
  | "fillRect"
  | "beginPath"
  | "moveTo"
  | "lineTo"
  | "stroke"
  | "fillStyle"
  | "strokeStyle"
  | "lineWidth"
>;

// ---------- Canvas Drawing ----------

export const drawPanel = (ctx: DrawSurface, grid: Grid, sizePx: number) => {
  const N = grid.rows;
  const cell = sizePx / N;
  ctx.clearRect(0, 0, sizePx, sizePx);
  for (const c of grid.allCells()) {
    ctx.fillStyle = cell_color_constants[c.state];
    ctx.fillRect(c.col * cell, c.row * cell, cell, cell);
  }
  // grid lines
  ctx.strokeStyle = gridLineColor;
  ctx.lineWidth = 1;
  for (let i = 0; i <= N; i++) {
    ctx.beginPath();
    ctx.moveTo(0, i * cell);
    ctx.lineTo(sizePx, i * cell);
    ctx.stroke();
  }
  for (let j = 0; j <= N; j++) {
    ctx.beginPath();
    ctx.moveTo(j * cell, 0);
    ctx.lineTo(j * cell, sizePx);
    ctx.stroke();
  }
};
