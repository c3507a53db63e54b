import React from "react";
import { Box, Text } from "ink";
import { colors } from "../theme.js";

interface StatusBarProps {
  modeLabel: string;
  /** Oracle URL, or null when playing offline */
  oracleUrl: string | null;
}

export function StatusBar({ modeLabel, oracleUrl }: StatusBarProps) {
  return (
    <Box
      borderStyle="single"
      borderColor={colors.border}
      paddingX={1}
      flexDirection="row"
      justifyContent="space-between"
    >
      <Text color={colors.primary} bold>
        YES/NO OTHELLO v0.1.0
      </Text>
      <Text color={colors.dimmed}>
        {oracleUrl ? "●" : "○"} {modeLabel} | {oracleUrl ?? "offline"}
      </Text>
    </Box>
  );
}
