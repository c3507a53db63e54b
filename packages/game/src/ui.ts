import type { GameResult } from "./controller.js";
import { Directive } from "./directive.js";
import { Placement } from "./resolver.js";
import { BOARD_SIZE, Board, Coord, Stone, sameCoord } from "./state.js";

const STONE_TEXT: Record<Stone, string> = { B: "YES", W: "NO" };

export const INPUT_HINT = "Enter position (e.g. d3)";

/** "YES" for Black, "NO" for White */
export function playerLabel(stone: Stone): string {
  return STONE_TEXT[stone];
}

export interface RenderOptions {
  /** Cells to mark as legal targets */
  highlight?: Coord[];
  lastMove?: Coord | null;
}

/**
 * Render the board as text. Stones and highlights are wrapped in
 * <span class="..."> tags which the terminal UI maps to colours.
 */
export function renderBoard(board: Board, opts: RenderOptions = {}): string {
  const highlight = opts.highlight ?? [];
  const lastMove = opts.lastMove ?? null;
  const colLetters = "abcdefgh";
  const lines: string[] = [];

  // Column header
  lines.push("    " + colLetters.split("").join("   "));
  // Top border
  lines.push("  ┌" + "───┬".repeat(BOARD_SIZE - 1) + "───┐");

  for (let r = 0; r < BOARD_SIZE; r++) {
    const cells: string[] = [];
    for (let c = 0; c < BOARD_SIZE; c++) {
      const coord = { row: r, col: c };
      const v = board.get(coord);
      const last = lastMove !== null && sameCoord(lastMove, coord) ? " oth-last" : "";
      if (v === "B") {
        cells.push(` <span class="oth-b${last}">●</span> `);
      } else if (v === "W") {
        cells.push(` <span class="oth-w${last}">○</span> `);
      } else if (highlight.some((h) => sameCoord(h, coord))) {
        cells.push(` <span class="oth-target">+</span> `);
      } else {
        cells.push(" . ");
      }
    }
    lines.push(`${r + 1} │${cells.join("│")}│`);

    if (r < BOARD_SIZE - 1) {
      lines.push("  ├" + "───┼".repeat(BOARD_SIZE - 1) + "───┤");
    }
  }

  // Bottom border
  lines.push("  └" + "───┴".repeat(BOARD_SIZE - 1) + "───┘");

  return lines.join("\n");
}

export function renderScore(board: Board): string {
  const { B, W } = board.score();
  return `YES: ${B}  NO: ${W}`;
}

/** Parse a coordinate like "d3" (column letter, row number) */
export function parseCoord(raw: string): Coord | null {
  const trimmed = raw.trim().toLowerCase();
  if (trimmed.length !== 2) return null;

  const col = trimmed.charCodeAt(0) - "a".charCodeAt(0);
  const row = parseInt(trimmed[1], 10) - 1;
  if (col >= 0 && col < BOARD_SIZE && row >= 0 && row < BOARD_SIZE) {
    return { row, col };
  }
  return null;
}

export function formatCoord(coord: Coord): string {
  const colLetter = String.fromCharCode("a".charCodeAt(0) + coord.col);
  return `${colLetter}${coord.row + 1}`;
}

export function describeDirective(directive: Directive): string {
  if (directive.answer === "maybe") {
    return "MAYBE! Flipping surrounding stones";
  }
  const stone = `${playerLabel(directive.stone)} stone ready`;
  return directive.source === "fallback" ? `Oracle unreachable, random ${stone}` : stone;
}

export function describePlacement(placement: Placement, player: Stone): string {
  const base = `${playerLabel(player)} placed ${playerLabel(placement.stone)} at ${formatCoord(placement)}`;
  if (placement.mismatched) {
    return `${base}, but nothing flipped`;
  }
  if (placement.forced > 0) {
    return `${base}, flipping ${placement.flipped.length} + ${placement.forced} surrounding`;
  }
  return base;
}

export function describeTurnBanner(player: Stone): string {
  return `${playerLabel(player)} turn!! Get ready...`;
}

export function describePass(player: Stone): string {
  return `${playerLabel(player)} must pass`;
}

export function describeResult(result: GameResult): string {
  if (result.winner === "B") return "Yes player wins!";
  if (result.winner === "W") return "No player wins!";
  return "Draw!";
}
