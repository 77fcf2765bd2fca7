import type { HistoryEntry } from "./types.js";

export type DisplayLine = {
  readonly text: string;
  readonly color?: "green" | "cyan" | "red";
  readonly bold?: boolean;
  readonly dim?: boolean;
};

/** All display lines of one history entry; the viewport never splits an entry from the top. */
export type EntryBlock = {
  readonly lines: DisplayLine[];
};

/**
 * Hard-wraps each line of `content` at `width` columns. Expressions and
 * results have no words worth keeping together.
 */
export function splitToWidth(content: string, width: number): string[] {
  const columns = Math.max(1, width);
  const rows: string[] = [];

  for (const line of content.split(/\r?\n/)) {
    if (line.length === 0) {
      rows.push("");
      continue;
    }
    for (let start = 0; start < line.length; start += columns) {
      rows.push(line.slice(start, start + columns));
    }
  }

  return rows;
}

function styleFor(entry: HistoryEntry): Omit<DisplayLine, "text"> {
  switch (entry.kind) {
    case "input":
      return { color: "green", bold: true };
    case "result":
      return { color: "cyan" };
    case "error":
      return { color: "red" };
    case "info":
      return { dim: true };
  }
}

export function toEntryBlocks(entries: readonly HistoryEntry[], width: number): EntryBlock[] {
  const contentWidth = Math.max(1, width - 2);

  return entries.map((entry) => {
    const style = styleFor(entry);
    const prefix = entry.kind === "input" ? "> " : "  ";
    const lines: DisplayLine[] = splitToWidth(entry.content, contentWidth).map((text) => ({
      text: `${prefix}${text}`,
      ...style,
    }));

    // The blank line closes an input/answer pair.
    if (entry.kind !== "input") {
      lines.push({ text: "" });
    }

    return { lines };
  });
}

/**
 * Lines for a viewport of `height` rows, filled upwards from the newest block
 * once the last `hidden` blocks are skipped. Only whole blocks are shown, except
 * when the newest one alone is taller than the viewport: then its tail is.
 */
export function fitFromBottom(blocks: readonly EntryBlock[], height: number, hidden: number): DisplayLine[] {
  const rows = Math.max(1, height);
  const visible: DisplayLine[] = [];

  for (let index = blocks.length - 1 - Math.max(0, hidden); index >= 0; index--) {
    const block = blocks[index];
    if (block === undefined) break;

    const room = rows - visible.length;
    if (block.lines.length > room) {
      if (visible.length === 0) {
        visible.push(...block.lines.slice(-room));
      }
      break;
    }

    visible.unshift(...block.lines);
  }

  return visible;
}
