import React, { useState, useCallback, useEffect } from "react";
import { Box, useApp } from "ink";
import { WELCOME_MESSAGE, type CalcConfig } from "@calc/main";
import { Header } from "./components/header.js";
import { HistoryList } from "./components/history-list.js";
import { ExpressionInput } from "./components/expression-input.js";
import { StatusBar } from "./components/status-bar.js";
import { createEntry, handleLine, trimHistory } from "./session.js";
import type { HistoryEntry } from "./types.js";

const HEADER_HEIGHT = 3;
const STATUS_HEIGHT = 1;
const INPUT_HEIGHT = 3;
const RESERVED_ROWS = HEADER_HEIGHT + STATUS_HEIGHT + INPUT_HEIGHT;
const MIN_TERMINAL_ROWS = 10;
const MIN_HISTORY_ROWS = 3;
const MIN_TERMINAL_COLUMNS = 20;

type Props = {
  readonly config: CalcConfig;
};

export function App({ config }: Props): React.JSX.Element {
  const { exit } = useApp();
  const [entries, setEntries] = useState<HistoryEntry[]>(() => [createEntry("info", WELCOME_MESSAGE)]);
  const [inputValue, setInputValue] = useState("");
  const [terminalRows, setTerminalRows] = useState(
    Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS),
  );
  const [terminalColumns, setTerminalColumns] = useState(
    Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
  );

  useEffect(() => {
    const handleResize = (): void => {
      setTerminalRows(Math.max(process.stdout.rows ?? 24, MIN_TERMINAL_ROWS));
      setTerminalColumns(
        Math.max(process.stdout.columns ?? 80, MIN_TERMINAL_COLUMNS),
      );
    };

    process.stdout.on("resize", handleResize);

    return () => {
      process.stdout.off("resize", handleResize);
    };
  }, []);

  const handleSubmit = useCallback(
    (value: string) => {
      const outcome = handleLine(value, { exitCommands: config.exitCommands });
      setInputValue("");

      switch (outcome.type) {
        case "ignore":
          return;
        case "exit":
          exit();
          return;
        case "clear":
          setEntries([]);
          return;
        case "append": {
          const added = outcome.entries.map((entry) => createEntry(entry.kind, entry.content));
          setEntries((prev) => trimHistory([...prev, ...added], config.historyLimit));
        }
      }
    },
    [config, exit],
  );

  const historyViewportHeight = Math.max(
    MIN_HISTORY_ROWS,
    terminalRows - RESERVED_ROWS,
  );

  return (
    <Box flexDirection="column" height={terminalRows}>
      <Header />
      <HistoryList
        entries={entries}
        height={historyViewportHeight}
        width={terminalColumns - 2}
      />
      <StatusBar
        entryCount={entries.length}
        historyLimit={config.historyLimit}
        debug={config.debug}
      />
      <ExpressionInput
        value={inputValue}
        onChange={setInputValue}
        onSubmit={handleSubmit}
      />
    </Box>
  );
}
