export {
  BOARD_SIZE,
  Board,
  emptyGrid,
  initialGrid,
  getFlips,
  inBounds,
  opponentOf,
  sameCoord,
} from "./state.js";
export type { CellValue, Coord, Grid, Move, Stone } from "./state.js";

export { bucketAnswer, directiveFor, stoneForAnswer } from "./directive.js";
export type { AnswerSource, Directive, OracleAnswer } from "./directive.js";

export {
  DEFAULT_ORACLE_URL,
  OracleAdapter,
  OfflineOracle,
  ScriptedOracle,
  decodeGifHeader,
} from "./oracle.js";
export type {
  Animation,
  FetchFn,
  Oracle,
  OracleAdapterOptions,
  OracleReading,
} from "./oracle.js";

export {
  IllegalPlacementError,
  isMismatched,
  legalTargets,
  resolvePlacement,
} from "./resolver.js";
export type { Placement } from "./resolver.js";

export { GreedySelector, RandomSelector, createSelector } from "./ai.js";
export type { GameMode, MoveSelector, SelectionContext, SelectorKind } from "./ai.js";

export { GameController, GameOverError, computeResult } from "./controller.js";
export type {
  GameControllerOptions,
  GamePhase,
  GameResult,
  TerminalReason,
  TurnRecord,
  TurnStart,
} from "./controller.js";

export { MathRandom, SeededRng, createRandom } from "./rng.js";
export type { RandomSource } from "./rng.js";

export {
  INPUT_HINT,
  describeDirective,
  describePass,
  describePlacement,
  describeResult,
  describeTurnBanner,
  formatCoord,
  parseCoord,
  playerLabel,
  renderBoard,
  renderScore,
} from "./ui.js";
export type { RenderOptions } from "./ui.js";

export { default as log } from "./logger.js";
