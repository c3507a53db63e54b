import { Directive } from "./directive.js";
import { RandomSource } from "./rng.js";
import { resolvePlacement } from "./resolver.js";
import { Board, Coord, Stone } from "./state.js";

/** 0 = human opponent, 1 = random AI, 2 = greedy one-ply AI */
export type GameMode = 0 | 1 | 2;

export type SelectorKind = "random" | "greedy";

export interface SelectionContext {
  board: Board;
  directive: Directive;
  /** The AI's own colour */
  player: Stone;
  /** The legal-target set a human would see for the same directive */
  targets: Coord[];
}

export interface MoveSelector {
  readonly kind: SelectorKind;
  choose(ctx: SelectionContext): Coord;
}

export class RandomSelector implements MoveSelector {
  readonly kind = "random";

  constructor(private readonly rng: RandomSource) {}

  choose({ targets }: SelectionContext): Coord {
    return this.rng.pick(targets);
  }
}

/**
 * Simulates every target on a scratch board and keeps the one leaving the
 * most stones of the AI's colour. Ties keep the earliest target.
 */
export class GreedySelector implements MoveSelector {
  readonly kind = "greedy";

  choose({ board, directive, player, targets }: SelectionContext): Coord {
    if (targets.length === 0) {
      throw new Error("No targets to choose from");
    }
    let best = targets[0];
    let bestScore = -1;
    for (const target of targets) {
      const score = this.evaluate(board, directive, player, target);
      if (score > bestScore) {
        bestScore = score;
        best = target;
      }
    }
    return best;
  }

  evaluate(board: Board, directive: Directive, player: Stone, target: Coord): number {
    const scratch = board.clone();
    resolvePlacement(scratch, directive, player, target);
    return scratch.count(player);
  }
}

/** The AI strategy for a game mode, or null when both sides are human */
export function createSelector(mode: GameMode, rng: RandomSource): MoveSelector | null {
  switch (mode) {
    case 1:
      return new RandomSelector(rng);
    case 2:
      return new GreedySelector();
    default:
      return null;
  }
}
