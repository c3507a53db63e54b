import React from "react";
import { Box, Text, useInput } from "ink";
import Spinner from "ink-spinner";
import { Animation, Directive } from "@yesno/game";
import { colors } from "../theme.js";

interface GifOverlayProps {
  directive: Directive;
  animation: Animation | null;
  loading: boolean;
  onDismiss: () => void;
}

const ANSWER_COLORS: Record<Directive["answer"], string> = {
  yes: colors.cyan,
  no: colors.secondary,
  maybe: colors.warning,
};

export function GifOverlay({ directive, animation, loading, onDismiss }: GifOverlayProps) {
  useInput(() => {
    onDismiss();
  });

  return (
    <Box
      flexDirection="column"
      borderStyle="round"
      borderColor={ANSWER_COLORS[directive.answer]}
      paddingX={2}
      alignItems="center"
    >
      <Text color={ANSWER_COLORS[directive.answer]} bold>
        Oracle says: {directive.answer.toUpperCase()}
      </Text>
      {directive.source === "fallback" && (
        <Text color={colors.dimmed}>(oracle unreachable, answer drawn at random)</Text>
      )}
      {loading ? (
        <Box>
          <Text color={colors.secondary}>
            <Spinner type="dots" />
          </Text>
          <Text color={colors.dimmed}> Loading animation...</Text>
        </Box>
      ) : animation ? (
        <Text color={colors.dimmed}>
          {animation.url} ({animation.width}x{animation.height})
        </Text>
      ) : (
        <Text color={colors.dimmed}>No animation</Text>
      )}
      <Text color={colors.dimmed}>Press any key to continue</Text>
    </Box>
  );
}
