import type { LabConfig } from "../../interfaces/interfaces";
import { config_limits, default_lab_config } from "../constants";
import { isLogLevel, logger } from "../logger/logger";

type Env = Readonly<Record<string, unknown>>;

const readNumber = (
  env: Env,
  key: string,
  fallback: number,
  { min, max }: { min: number; max: number }
) => {
  const raw = env[key];
  if (raw === undefined || raw === "") return fallback;
  const n = Math.floor(Number(raw));
  if (!Number.isFinite(n)) {
    logger.warn(`${key}=${String(raw)} is not a number, using ${fallback}`);
    return fallback;
  }
  return Math.max(min, Math.min(max, n));
};

// Build-time overrides come from Vite env vars (VITE_*); everything is optional
export function resolveConfig(env: Env): LabConfig {
  const level = env.VITE_LOG_LEVEL;
  let logLevel = default_lab_config.logLevel;
  if (typeof level === "string" && level !== "") {
    if (isLogLevel(level)) logLevel = level;
    else logger.warn(`unknown VITE_LOG_LEVEL "${level}", using ${logLevel}`);
  }

  return {
    rows: readNumber(env, "VITE_GRID_ROWS", default_lab_config.rows, config_limits.rows),
    widthPx: readNumber(env, "VITE_GRID_WIDTH", default_lab_config.widthPx, config_limits.widthPx),
    stepsPerSecond: readNumber(
      env,
      "VITE_STEPS_PER_SECOND",
      default_lab_config.stepsPerSecond,
      config_limits.stepsPerSecond
    ),
    logLevel,
  };
}
