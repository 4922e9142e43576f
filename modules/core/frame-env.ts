// Environment switches for the frame scenario driver
import { FRAME_CONSTANTS } from "./frame-constants";

export type FrameEnvConfig = {
  logStdout: boolean;
  eventBufferSize: number;
  maxNestingDepth: number;
};

const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const parseBoundedInt = (
  value: string | undefined,
  fallback: number,
  min: number,
  max: number,
): number => {
  if (!value?.trim()) return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) return fallback;
  return Math.min(Math.max(parsed, min), max);
};

export const resolveFrameEnv = (env: NodeJS.ProcessEnv = process.env): FrameEnvConfig => ({
  logStdout: flagEnabled(env.FRAME_LOG_STDOUT, true),
  eventBufferSize: parseBoundedInt(env.FRAME_EVENT_BUFFER_SIZE, 512, 16, 100000),
  maxNestingDepth: parseBoundedInt(
    env.FRAME_MAX_NESTING_DEPTH,
    FRAME_CONSTANTS.DEFAULT_MAX_NESTING_DEPTH,
    1,
    100000,
  ),
});
