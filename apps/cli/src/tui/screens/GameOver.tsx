import React from "react";
import { Box, Text, useInput } from "ink";
import { GameResult, TerminalReason, describeResult } from "@yesno/game";
import { colors } from "../theme.js";

const REASONS: Record<TerminalReason, string> = {
  board_full: "Board is full",
  double_pass: "Neither player could move",
  closed: "Game closed",
};

interface GameOverProps {
  result: GameResult;
  onQuit: () => void;
}

export function GameOver({ result, onQuit }: GameOverProps) {
  useInput((input, key) => {
    if (input === "q" || key.return || key.escape) onQuit();
  });

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1} alignItems="center">
      <Text color={colors.primary} bold>
        {"═══════════════════"}
      </Text>
      <Text color={colors.primary} bold>
        {"    GAME OVER    "}
      </Text>
      <Text color={colors.primary} bold>
        {"═══════════════════"}
      </Text>

      <Text>{""}</Text>

      <Text color={result.winner ? colors.primary : colors.secondary} bold>
        {describeResult(result)}
      </Text>
      <Text color={colors.white}>
        YES: {result.black}  NO: {result.white}
      </Text>

      <Text>{""}</Text>
      <Text color={colors.dimmed}>Reason: {REASONS[result.reason]}</Text>

      <Text>{""}</Text>
      <Text color={colors.dimmed}>[Q] Quit</Text>
    </Box>
  );
}
