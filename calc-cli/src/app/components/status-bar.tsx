import React from "react";
import { Box, Text } from "ink";

type Props = {
  readonly entryCount: number;
  readonly historyLimit: number;
  readonly debug: boolean;
};

export function StatusBar({ entryCount, historyLimit, debug }: Props): React.JSX.Element {
  return (
    <Box paddingX={1} height={1}>
      <Text dimColor>
        {debug ? "[debug] " : ""}
        Enter: evaluate | /help /tokens /rpn /clear | Up/Down/PgUp/PgDn: scroll | exit or Ctrl+C: quit | History: {entryCount}/{historyLimit}
      </Text>
    </Box>
  );
}
