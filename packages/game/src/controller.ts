import log from "./logger.js";
import { MoveSelector } from "./ai.js";
import { Directive, directiveFor } from "./directive.js";
import { Oracle, OracleReading } from "./oracle.js";
import { Placement, legalTargets, resolvePlacement } from "./resolver.js";
import { Board, Coord, Stone, opponentOf, sameCoord } from "./state.js";
import { describeDirective, describePass, describePlacement, playerLabel } from "./ui.js";

export type GamePhase =
  | "awaiting_directive"
  | "awaiting_placement"
  | "resolving"
  | "checking_terminal"
  | "terminal";

export type TerminalReason = "board_full" | "double_pass" | "closed";

export interface GameResult {
  black: number;
  white: number;
  /** The winning colour, or null for a draw */
  winner: Stone | null;
  reason: TerminalReason;
}

interface TurnBase {
  turn: number;
  player: Stone;
  directive: Directive;
}

/** In-memory log entry for one finished turn */
export type TurnRecord =
  | (TurnBase & { type: "place"; placement: Placement })
  | (TurnBase & { type: "pass" });

/** State of the turn once its directive is known */
export interface TurnStart {
  player: Stone;
  directive: Directive;
  targets: Coord[];
  passed: boolean;
}

interface ControllerEvents {
  directive: [directive: Directive, player: Stone];
  placement: [placement: Placement, player: Stone];
  flash: [placement: Placement];
  pass: [player: Stone, passStreak: number];
  terminal: [result: GameResult];
}

type Handler<K extends keyof ControllerEvents> = (...args: ControllerEvents[K]) => void;

export class GameOverError extends Error {
  constructor() {
    super("Game is already over");
    this.name = "GameOverError";
  }
}

export interface GameControllerOptions {
  oracle: Oracle;
  board?: Board;
  /** AI strategy, or null/undefined when both sides are human */
  selector?: MoveSelector | null;
  /** Colour the AI plays; defaults to White whenever a selector is given */
  aiPlayer?: Stone;
  firstPlayer?: Stone;
}

export function computeResult(board: Board, reason: TerminalReason): GameResult {
  const { B, W } = board.score();
  return {
    black: B,
    white: W,
    winner: B > W ? "B" : W > B ? "W" : null,
    reason,
  };
}

/**
 * Runs one game: fetches a directive per turn, detects automatic passes,
 * applies placements from humans or the AI, and checks terminal conditions.
 */
export class GameController {
  private readonly board: Board;
  private readonly oracle: Oracle;
  private readonly selector: MoveSelector | null;
  private readonly aiPlayer: Stone | null;
  private phase: GamePhase = "awaiting_directive";
  private currentPlayer: Stone;
  private directive: Directive | null = null;
  private targets: Coord[] = [];
  private passStreak = 0;
  private turnNumber = 0;
  private history: TurnRecord[] = [];
  private status = "Game start";
  private outcome: GameResult | null = null;
  private fetching = false;
  private handlers: { [K in keyof ControllerEvents]: Handler<K>[] } = {
    directive: [],
    placement: [],
    flash: [],
    pass: [],
    terminal: [],
  };

  constructor(opts: GameControllerOptions) {
    this.board = opts.board ?? new Board();
    this.oracle = opts.oracle;
    this.selector = opts.selector ?? null;
    this.aiPlayer = this.selector ? opts.aiPlayer ?? "W" : null;
    this.currentPlayer = opts.firstPlayer ?? "B";
  }

  on<K extends keyof ControllerEvents>(event: K, handler: Handler<K>): () => void {
    const list = this.handlers[event];
    list.push(handler);
    return () => {
      const i = list.indexOf(handler);
      if (i >= 0) list.splice(i, 1);
    };
  }

  private emit<K extends keyof ControllerEvents>(
    event: K,
    ...args: ControllerEvents[K]
  ): void {
    for (const handler of [...this.handlers[event]]) {
      try {
        handler(...args);
      } catch (err: unknown) {
        log.error({ err, event }, "Game event handler failed");
      }
    }
  }

  getBoard(): Board {
    return this.board;
  }

  getPhase(): GamePhase {
    return this.phase;
  }

  getCurrentPlayer(): Stone {
    return this.currentPlayer;
  }

  getDirective(): Directive | null {
    return this.directive;
  }

  /** Legal targets of the turn awaiting placement; empty in any other phase */
  getTargets(): Coord[] {
    return this.phase === "awaiting_placement" ? [...this.targets] : [];
  }

  getPassStreak(): number {
    return this.passStreak;
  }

  getTurnNumber(): number {
    return this.turnNumber;
  }

  getHistory(): TurnRecord[] {
    return [...this.history];
  }

  getStatus(): string {
    return this.status;
  }

  getAiPlayer(): Stone | null {
    return this.aiPlayer;
  }

  isAiTurn(): boolean {
    return this.aiPlayer !== null && this.aiPlayer === this.currentPlayer;
  }

  isTerminal(): boolean {
    return this.phase === "terminal";
  }

  /** The final result, or null while the game is running */
  result(): GameResult | null {
    return this.outcome;
  }

  /**
   * Ask the oracle for this turn's directive. When the directive leaves no
   * legal target the turn ends as an automatic pass. Resolves to null if the
   * game was closed while the oracle was being asked.
   */
  async beginTurn(): Promise<TurnStart | null> {
    if (this.phase === "terminal") {
      throw new GameOverError();
    }
    if (this.phase !== "awaiting_directive" || this.fetching) {
      throw new Error(`Cannot begin a turn while ${this.fetching ? "fetching a directive" : this.phase}`);
    }

    const player = this.currentPlayer;
    this.fetching = true;
    let reading: OracleReading;
    try {
      reading = await this.oracle.fetchAnswer();
    } finally {
      this.fetching = false;
    }
    if (this.isTerminal()) return null;

    const directive = directiveFor(reading.answer, player, reading.source, reading.imageUrl);
    this.directive = directive;
    this.targets = legalTargets(this.board, directive, player);
    this.status = describeDirective(directive);
    log.debug(
      { turn: this.turnNumber, player, answer: directive.answer, source: directive.source, targets: this.targets.length },
      "Directive received"
    );
    this.emit("directive", directive, player);

    if (this.targets.length === 0) {
      this.passStreak++;
      this.history.push({ turn: this.turnNumber, player, directive, type: "pass" });
      this.status = describePass(player);
      this.emit("pass", player, this.passStreak);
      this.checkTerminal();
      return { player, directive, targets: [], passed: true };
    }

    this.phase = "awaiting_placement";
    return { player, directive, targets: [...this.targets], passed: false };
  }

  /**
   * Place the directed stone at `coord` for the active player. Coordinates
   * outside the legal-target set, or submitted outside the placement phase,
   * are ignored and return null.
   */
  submitPlacement(coord: Coord): Placement | null {
    const directive = this.directive;
    if (this.phase !== "awaiting_placement" || !directive) return null;
    if (!this.targets.some((t) => sameCoord(t, coord))) return null;

    this.phase = "resolving";
    const player = this.currentPlayer;
    const placement = resolvePlacement(this.board, directive, player, coord);
    this.passStreak = 0;
    this.history.push({ turn: this.turnNumber, player, directive, type: "place", placement });
    this.status = describePlacement(placement, player);
    this.emit("placement", placement, player);
    if (placement.flash) {
      this.emit("flash", placement);
    }
    this.checkTerminal();
    return placement;
  }

  /** Let the AI choose from the current legal-target set and place there */
  playAiTurn(): Placement {
    if (this.phase === "terminal") {
      throw new GameOverError();
    }
    const directive = this.directive;
    if (!this.selector || !this.isAiTurn()) {
      throw new Error(`It is not the AI's turn (${playerLabel(this.currentPlayer)} to play)`);
    }
    if (this.phase !== "awaiting_placement" || !directive) {
      throw new Error(`Cannot place while ${this.phase}`);
    }

    const target = this.selector.choose({
      board: this.board,
      directive,
      player: this.currentPlayer,
      targets: [...this.targets],
    });
    const placement = this.submitPlacement(target);
    if (!placement) {
      throw new Error(`AI chose an illegal target (${target.row}, ${target.col})`);
    }
    return placement;
  }

  /** Stop the game where it stands, e.g. when the window is closed */
  close(): GameResult {
    if (this.outcome) return this.outcome;
    return this.finish("closed");
  }

  private checkTerminal(): void {
    this.phase = "checking_terminal";
    if (this.passStreak >= 2) {
      this.finish("double_pass");
      return;
    }
    if (this.board.isFull()) {
      this.finish("board_full");
      return;
    }
    this.currentPlayer = opponentOf(this.currentPlayer);
    this.turnNumber++;
    this.directive = null;
    this.targets = [];
    this.phase = "awaiting_directive";
  }

  private finish(reason: TerminalReason): GameResult {
    this.phase = "terminal";
    this.targets = [];
    const result = computeResult(this.board, reason);
    this.outcome = result;
    if (reason === "board_full") {
      this.status = "Board is full";
    }
    log.debug({ result }, "Game over");
    this.emit("terminal", result);
    return result;
  }
}
