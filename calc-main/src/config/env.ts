import { DEFAULT_EXIT_COMMANDS } from "../calculator/messages.js";

const DEFAULT_HISTORY_LIMIT = 200;

export interface CalcConfig {
  debug: boolean;
  historyLimit: number;
  exitCommands: string[];
}

function readPositiveIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return undefined;
  return parsed;
}

function readListEnv(name: string): string[] | undefined {
  const raw = process.env[name];
  if (!raw) return undefined;
  const items = raw
    .split(",")
    .map((item) => item.trim().toLowerCase())
    .filter((item) => item.length > 0);
  return items.length > 0 ? items : undefined;
}

export function isDebugEnabled(): boolean {
  return process.env["CALC_DEBUG"] === "1";
}

// Read on every call so a changed environment takes effect without a restart.
export function loadCalcConfig(): CalcConfig {
  return {
    debug: isDebugEnabled(),
    historyLimit: readPositiveIntEnv("CALC_HISTORY_LIMIT") ?? DEFAULT_HISTORY_LIMIT,
    exitCommands: readListEnv("CALC_EXIT_COMMANDS") ?? [...DEFAULT_EXIT_COMMANDS],
  };
}
