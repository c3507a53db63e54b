import { Stone } from "./state.js";

/** The three categories an oracle answer is bucketed into */
export type OracleAnswer = "yes" | "no" | "maybe";

/** Where the answer came from: the oracle itself, or the random yes/no fallback */
export type AnswerSource = "oracle" | "fallback";

/** The per-turn constraint on which stone may be placed */
export interface Directive {
  answer: OracleAnswer;
  /** Black for yes, White for no, the acting player's colour for maybe */
  stone: Stone;
  source: AnswerSource;
  /** Companion animation URL, when the oracle supplied one */
  imageUrl: string | null;
}

const ANSWER_BUCKETS: Record<OracleAnswer, readonly string[]> = {
  yes: ["yes", "y", "yeah", "yep", "yup", "sure", "affirmative", "true", "ok", "okay"],
  no: ["no", "n", "nope", "nah", "negative", "false"],
  maybe: ["maybe", "perhaps", "possibly", "unsure"],
};

/**
 * Map a raw oracle answer onto yes/no/maybe, ignoring case and surrounding
 * whitespace and punctuation. Returns null for anything unrecognised.
 */
export function bucketAnswer(raw: string): OracleAnswer | null {
  const word = raw.trim().toLowerCase().replace(/[.!?]+$/, "");
  for (const answer of ["yes", "no", "maybe"] as const) {
    if (ANSWER_BUCKETS[answer].includes(word)) return answer;
  }
  return null;
}

export function stoneForAnswer(answer: OracleAnswer, currentPlayer: Stone): Stone {
  if (answer === "yes") return "B";
  if (answer === "no") return "W";
  return currentPlayer;
}

export function directiveFor(
  answer: OracleAnswer,
  currentPlayer: Stone,
  source: AnswerSource = "oracle",
  imageUrl: string | null = null
): Directive {
  return { answer, stone: stoneForAnswer(answer, currentPlayer), source, imageUrl };
}
