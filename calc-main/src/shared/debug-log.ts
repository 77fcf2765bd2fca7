/**
 * Color-coded debug logger for development.
 *
 * Output goes through console.log with a bright magenta [DEBUG] prefix and is
 * silent unless CALC_DEBUG=1 is set, so library callers see nothing by default.
 */

import { isDebugEnabled } from "../config/env.js";

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[DEBUG]${RESET}`;

export function devLog(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.log(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.log(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  if (!isDebugEnabled()) return;
  console.log(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
