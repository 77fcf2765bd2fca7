export type HistoryKind = "input" | "result" | "error" | "info";

export type HistoryEntry = {
  id: string;
  kind: HistoryKind;
  content: string;
  timestamp: number;
};

export interface PendingEntry {
  kind: HistoryKind;
  content: string;
}

export type LineOutcome =
  | { type: "ignore" }
  | { type: "exit" }
  | { type: "clear" }
  | { type: "append"; entries: PendingEntry[] };
