import React from "react";
import { Box, Text } from "ink";
import { colors, stoneColors } from "../theme.js";

/** Maps the CSS classes of renderBoard() output to terminal colors */
const CLASS_STYLES: Record<string, { color?: string; bold?: boolean }> = {
  "oth-b": { color: stoneColors.B },
  "oth-w": { color: stoneColors.W },
  "oth-last": { bold: true },
  "oth-target": { color: colors.primary },
};

interface Segment {
  text: string;
  color?: string;
  bold?: boolean;
}

export function parseSegments(line: string): Segment[] {
  const segments: Segment[] = [];
  const regex = /<span class="([^"]*)">(.*?)<\/span>/g;
  let lastIndex = 0;
  let match: RegExpExecArray | null;

  while ((match = regex.exec(line)) !== null) {
    if (match.index > lastIndex) {
      segments.push({ text: line.slice(lastIndex, match.index) });
    }

    const classes = match[1].split(/\s+/);
    const content = match[2];
    let color: string | undefined;
    let bold: boolean | undefined;

    for (const cls of classes) {
      const style = CLASS_STYLES[cls];
      if (style) {
        if (style.color) color = style.color;
        if (style.bold) bold = true;
      }
    }

    segments.push({ text: content, color, bold });
    lastIndex = match.index + match[0].length;
  }

  if (lastIndex < line.length) {
    segments.push({ text: line.slice(lastIndex) });
  }

  return segments;
}

interface ColoredBoardProps {
  html: string;
  /** Highlights the frame while the maybe effect flips neighbours */
  flash?: boolean;
}

/**
 * Renders board HTML (with <span class="..."> tags) as colored Ink text.
 * Falls back to plain text for any content without spans.
 */
export function ColoredBoard({ html, flash }: ColoredBoardProps) {
  const lines = html.split("\n");

  return (
    <Box
      flexDirection="column"
      borderStyle={flash ? "double" : "single"}
      borderColor={flash ? colors.warning : colors.border}
      paddingX={1}
    >
      {lines.map((line, i) => {
        const segments = parseSegments(line);
        return (
          <Text key={i}>
            {segments.map((seg, j) => (
              <Text key={j} color={seg.color} bold={seg.bold}>
                {seg.text}
              </Text>
            ))}
          </Text>
        );
      })}
    </Box>
  );
}
