import { Logger } from "tslog";

/** tslog level ids: 0 silly … 3 info, 4 warn, 5 error, 6 fatal. */
export const DEFAULT_MIN_LEVEL = 4;
export const DEBUG_MIN_LEVEL = 0;

export function resolveMinLevel(env: NodeJS.ProcessEnv = process.env): number {
  return env.PYVM_DEBUG ? DEBUG_MIN_LEVEL : DEFAULT_MIN_LEVEL;
}

export function createLogger(name: string): Logger<unknown> {
  return new Logger({
    name,
    type: "pretty",
    minLevel: resolveMinLevel(),
  });
}
