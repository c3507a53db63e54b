/** Stone colours: "B" (Black, the YES stone) or "W" (White, the NO stone) */
export type Stone = "B" | "W";

/** Cell values: a stone or "" (empty) */
export type CellValue = Stone | "";

/** 8x8 grid represented as a 2D array */
export type Grid = CellValue[][];

/** Row/column coordinate on the board */
export interface Coord {
  row: number;
  col: number;
}

/** A stone placed at a coordinate */
export interface Move extends Coord {
  stone: Stone;
}

/** Board dimension */
export const BOARD_SIZE = 8;

/** All 8 directions for flipping */
const ALL_DIRECTIONS: [number, number][] = [
  [-1, -1], [-1, 0], [-1, 1],
  [0, -1],           [0, 1],
  [1, -1],  [1, 0],  [1, 1],
];

export function opponentOf(stone: Stone): Stone {
  return stone === "B" ? "W" : "B";
}

export function inBounds(row: number, col: number): boolean {
  return row >= 0 && row < BOARD_SIZE && col >= 0 && col < BOARD_SIZE;
}

export function sameCoord(a: Coord, b: Coord): boolean {
  return a.row === b.row && a.col === b.col;
}

/** Create an empty 8x8 grid */
export function emptyGrid(): Grid {
  const grid: Grid = [];
  for (let r = 0; r < BOARD_SIZE; r++) {
    grid.push(new Array<CellValue>(BOARD_SIZE).fill(""));
  }
  return grid;
}

/** Create the initial grid with the standard center 4 pieces */
export function initialGrid(): Grid {
  const grid = emptyGrid();
  grid[3][3] = "W";
  grid[3][4] = "B";
  grid[4][3] = "B";
  grid[4][4] = "W";
  return grid;
}

/**
 * Get all opponent pieces that would be flipped by placing `color` at (row, col).
 * Returns an empty array if the cell is occupied or no flips occur.
 */
export function getFlips(
  grid: Grid,
  row: number,
  col: number,
  color: Stone
): Coord[] {
  if (grid[row][col] !== "") return [];
  const opponent = opponentOf(color);
  const allFlips: Coord[] = [];
  for (const [dr, dc] of ALL_DIRECTIONS) {
    const lineFlips: Coord[] = [];
    let r = row + dr,
      c = col + dc;
    while (inBounds(r, c) && grid[r][c] === opponent) {
      lineFlips.push({ row: r, col: c });
      r += dr;
      c += dc;
    }
    if (lineFlips.length > 0 && inBounds(r, c) && grid[r][c] === color) {
      allFlips.push(...lineFlips);
    }
  }
  return allFlips;
}

/**
 * The single mutable board of a game. Components receive it by reference;
 * every change goes through `place` or `forceFlipAdjacent`.
 */
export class Board {
  private readonly cells: Grid;

  constructor(grid: Grid = initialGrid()) {
    if (
      grid.length !== BOARD_SIZE ||
      grid.some((row) => row.length !== BOARD_SIZE)
    ) {
      throw new Error(`Board must be ${BOARD_SIZE}x${BOARD_SIZE}`);
    }
    this.cells = grid.map((r) => [...r]);
  }

  static fromGrid(grid: Grid): Board {
    return new Board(grid);
  }

  /** Parse rows of "B", "W" and "." characters (row 0 first) */
  static fromRows(rows: string[]): Board {
    const grid = emptyGrid();
    rows.forEach((line, r) => {
      [...line].forEach((ch, c) => {
        if (ch === "B" || ch === "W") grid[r][c] = ch;
      });
    });
    return new Board(grid);
  }

  get(coord: Coord): CellValue {
    return this.cells[coord.row][coord.col];
  }

  /** Deep copy of the cells */
  toGrid(): Grid {
    return this.cells.map((r) => [...r]);
  }

  clone(): Board {
    return new Board(this.cells);
  }

  /** Empty cells that capture at least one line for `color`, in row-major order */
  legalMoves(color: Stone): Coord[] {
    const moves: Coord[] = [];
    for (let r = 0; r < BOARD_SIZE; r++) {
      for (let c = 0; c < BOARD_SIZE; c++) {
        if (getFlips(this.cells, r, c, color).length > 0) {
          moves.push({ row: r, col: c });
        }
      }
    }
    return moves;
  }

  emptyCells(): Coord[] {
    const cells: Coord[] = [];
    for (let r = 0; r < BOARD_SIZE; r++) {
      for (let c = 0; c < BOARD_SIZE; c++) {
        if (this.cells[r][c] === "") cells.push({ row: r, col: c });
      }
    }
    return cells;
  }

  /**
   * Set the cell to `move.stone`. With `flip`, every capture line from the
   * cell is converted; without it only the single cell changes.
   * Returns the flipped coordinates.
   */
  place(move: Move, flip: boolean): Coord[] {
    if (!inBounds(move.row, move.col)) {
      throw new Error(`Coordinate out of range: (${move.row}, ${move.col})`);
    }
    if (this.cells[move.row][move.col] !== "") {
      throw new Error(`Cell (${move.row}, ${move.col}) is occupied`);
    }

    const flips = flip ? getFlips(this.cells, move.row, move.col, move.stone) : [];
    this.cells[move.row][move.col] = move.stone;
    for (const f of flips) {
      this.cells[f.row][f.col] = move.stone;
    }
    return flips;
  }

  /**
   * Convert every direct neighbour of `position` holding the opposing colour.
   * Returns how many stones changed.
   */
  forceFlipAdjacent(position: Coord, color: Stone): number {
    const opponent = opponentOf(color);
    let flipped = 0;
    for (const [dr, dc] of ALL_DIRECTIONS) {
      const r = position.row + dr;
      const c = position.col + dc;
      if (inBounds(r, c) && this.cells[r][c] === opponent) {
        this.cells[r][c] = color;
        flipped++;
      }
    }
    return flipped;
  }

  count(color: Stone): number {
    let n = 0;
    for (const row of this.cells) {
      for (const cell of row) {
        if (cell === color) n++;
      }
    }
    return n;
  }

  /** Count pieces of each color on the board */
  score(): { B: number; W: number } {
    return { B: this.count("B"), W: this.count("W") };
  }

  /** Check if every cell on the board is occupied */
  isFull(): boolean {
    return this.cells.every((row) => row.every((cell) => cell !== ""));
  }
}
