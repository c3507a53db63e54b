export const colors = {
  primary: "#00ff41",      // Matrix green
  secondary: "#ffb000",    // Amber
  dimmed: "#666666",
  error: "#ff3333",
  warning: "#ffaa00",
  text: "#cccccc",
  border: "#333333",
  white: "#ffffff",
  cyan: "#00ffff",
};

/** Colour of each side's stones, matching the board spans */
export const stoneColors = {
  B: colors.cyan,
  W: colors.secondary,
};
