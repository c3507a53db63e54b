import { Directive } from "./directive.js";
import { Board, Coord, Stone, sameCoord } from "./state.js";

/** What a single placement did to the board */
export interface Placement {
  row: number;
  col: number;
  stone: Stone;
  /** Stones captured along capture lines */
  flipped: Coord[];
  /** Neighbours converted by the maybe effect */
  forced: number;
  /** True when the maybe effect converted at least one neighbour */
  flash: boolean;
  mismatched: boolean;
}

export class IllegalPlacementError extends Error {
  constructor(target: Coord) {
    super(`Illegal placement at (${target.row}, ${target.col})`);
    this.name = "IllegalPlacementError";
  }
}

/** A yes/no directive whose stone is not the acting player's own colour */
export function isMismatched(directive: Directive, currentPlayer: Stone): boolean {
  return directive.answer !== "maybe" && directive.stone !== currentPlayer;
}

/**
 * Cells the acting player may choose this turn. Mismatched directives waive
 * the capture rule and open every empty cell; otherwise the usual capture
 * rule applies to the mandated stone. An empty result means an automatic pass.
 */
export function legalTargets(
  board: Board,
  directive: Directive,
  currentPlayer: Stone
): Coord[] {
  if (isMismatched(directive, currentPlayer)) {
    return board.emptyCells();
  }
  return board.legalMoves(directive.stone);
}

/**
 * Place the directed stone at `target` and apply the flip rule for the
 * directive. Throws IllegalPlacementError if `target` is not a legal target.
 */
export function resolvePlacement(
  board: Board,
  directive: Directive,
  currentPlayer: Stone,
  target: Coord
): Placement {
  const targets = legalTargets(board, directive, currentPlayer);
  if (!targets.some((t) => sameCoord(t, target))) {
    throw new IllegalPlacementError(target);
  }

  const mismatched = isMismatched(directive, currentPlayer);
  const stone = directive.answer === "maybe" ? currentPlayer : directive.stone;
  const flipped = board.place({ ...target, stone }, !mismatched);

  let forced = 0;
  if (directive.answer === "maybe") {
    forced = board.forceFlipAdjacent(target, currentPlayer);
  }

  return {
    row: target.row,
    col: target.col,
    stone,
    flipped,
    forced,
    flash: forced > 0,
    mismatched,
  };
}
