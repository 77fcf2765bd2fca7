import React, { useEffect, useMemo, useState } from "react";
import { Box, Text, useInput } from "ink";
import type { HistoryEntry } from "../types.js";
import { fitFromBottom, toEntryBlocks } from "../layout.js";

type Props = {
  readonly entries: HistoryEntry[];
  readonly height: number;
  readonly width: number;
};

export function HistoryList({ entries, height, width }: Props): React.JSX.Element {
  // Entries kept below the viewport; up/down steps one entry at a time.
  const [hidden, setHidden] = useState(0);

  const blocks = useMemo(() => toEntryBlocks(entries, width), [entries, width]);
  const maxHidden = Math.max(0, blocks.length - 1);
  const latestId = entries.at(-1)?.id;

  useEffect(() => {
    setHidden(0);
  }, [latestId]);

  useInput((_, key) => {
    if (key.upArrow) {
      setHidden((value) => Math.min(value + 1, maxHidden));
    } else if (key.downArrow) {
      setHidden((value) => Math.max(value - 1, 0));
    }
  });

  const rows = Math.max(1, height);

  if (entries.length === 0) {
    return (
      <Box justifyContent="center" alignItems="center" height={rows}>
        <Text dimColor>No calculations yet. Type an expression below.</Text>
      </Box>
    );
  }

  const skipped = Math.min(hidden, maxHidden);
  const showMarker = skipped > 0 && rows > 1;
  const lines = fitFromBottom(blocks, showMarker ? rows - 1 : rows, skipped);

  return (
    <Box flexDirection="column" justifyContent="flex-end" paddingX={1} height={rows}>
      {lines.map((line, index) => (
        <Text key={`${skipped}-${index}`} color={line.color} bold={line.bold} dimColor={line.dim}>
          {line.text.length > 0 ? line.text : " "}
        </Text>
      ))}
      {showMarker ? (
        <Text dimColor>{`  ${skipped} newer ${skipped === 1 ? "entry" : "entries"} below`}</Text>
      ) : null}
    </Box>
  );
}
