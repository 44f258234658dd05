import type { LogLevel } from "../../types/types";

const order: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

let threshold: LogLevel = "info";

export const isLogLevel = (v: string): v is LogLevel =>
  Object.prototype.hasOwnProperty.call(order, v);

export const setLogLevel = (level: LogLevel) => {
  threshold = level;
};

const enabled = (level: LogLevel) => order[level] >= order[threshold];

export const logger = {
  debug: (...args: unknown[]) => {
    if (enabled("debug")) console.debug("[astar]", ...args);
  },
  info: (...args: unknown[]) => {
    if (enabled("info")) console.info("[astar]", ...args);
  },
  warn: (...args: unknown[]) => {
    if (enabled("warn")) console.warn("[astar]", ...args);
  },
  error: (...args: unknown[]) => {
    if (enabled("error")) console.error("[astar]", ...args);
  },
};
