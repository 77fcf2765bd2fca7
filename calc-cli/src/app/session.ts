import {
  CalculatorError,
  formatTokens,
  HELP_MESSAGE,
  prepareExpression,
  toPostfix,
  tokenize,
  tryCalculate,
} from "@calc/main";
import type { HistoryEntry, HistoryKind, LineOutcome, PendingEntry } from "./types.js";

export interface LineOptions {
  exitCommands: readonly string[];
}

let nextId = 1;

export function createEntry(kind: HistoryKind, content: string): HistoryEntry {
  return {
    id: String(nextId++),
    kind,
    content,
    timestamp: Date.now(),
  };
}

export function trimHistory(entries: HistoryEntry[], limit: number): HistoryEntry[] {
  return entries.length > limit ? entries.slice(entries.length - limit) : entries;
}

function append(...entries: PendingEntry[]): LineOutcome {
  return { type: "append", entries };
}

function describeStream(label: string, arg: string, render: (expr: string) => string[]): LineOutcome {
  if (arg.length === 0) {
    return append({ kind: "info", content: `Usage: /${label} <expression>` });
  }

  try {
    return append(
      { kind: "input", content: `/${label} ${arg}` },
      { kind: "info", content: `${label}: ${render(arg).join(" ")}` },
    );
  } catch (err) {
    if (!(err instanceof CalculatorError)) throw err;
    return append(
      { kind: "input", content: `/${label} ${arg}` },
      { kind: "error", content: `Error: ${err.message}` },
    );
  }
}

function handleCommand(command: string): LineOutcome {
  const [name, ...rest] = command.split(" ");
  const normalized = (name ?? "").toLowerCase();
  const arg = rest.join(" ").trim();

  switch (normalized) {
    case "/help":
      return append({ kind: "info", content: HELP_MESSAGE });
    case "/clear":
      return { type: "clear" };
    case "/tokens":
      return describeStream("tokens", arg, (expr) => formatTokens(tokenize(prepareExpression(expr))));
    case "/rpn":
      return describeStream("rpn", arg, (expr) => formatTokens(toPostfix(tokenize(prepareExpression(expr)))));
    default:
      return append({ kind: "info", content: "Unknown command. Use /help, /clear, /tokens <expr> or /rpn <expr>." });
  }
}

export function handleLine(line: string, options: LineOptions): LineOutcome {
  const trimmed = line.trim();
  if (!trimmed) return { type: "ignore" };

  if (options.exitCommands.includes(trimmed.toLowerCase())) {
    return { type: "exit" };
  }

  if (trimmed.startsWith("/")) {
    return handleCommand(trimmed);
  }

  const result = tryCalculate(trimmed);
  return append(
    { kind: "input", content: trimmed },
    result.ok
      ? { kind: "result", content: `= ${result.output}` }
      : { kind: "error", content: `Error: ${result.error}` },
  );
}
