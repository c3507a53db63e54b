import { GameMode } from "@yesno/game";

export const MODE_LABELS: Record<GameMode, string> = {
  0: "Human vs Human",
  1: "Human vs Random AI",
  2: "Human vs Greedy AI",
};

export const MODE_PROMPT = "Select mode (0: Human, 1: Random AI, 2: Greedy AI) > ";
export const GIF_PROMPT = "Enable GIF popup mode? (True/False) > ";

const TRUTHY = ["true", "t", "1", "yes", "y"];

/** Anything that is not 1 or 2 means two humans */
export function parseMode(raw: string | undefined): GameMode {
  const n = Number.parseInt((raw ?? "").trim(), 10);
  if (n === 1 || n === 2) return n;
  return 0;
}

export function parseBool(raw: string | undefined): boolean {
  return TRUTHY.includes((raw ?? "").trim().toLowerCase());
}
