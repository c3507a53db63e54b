import {
  GameController,
  GameMode,
  OfflineOracle,
  OracleAdapter,
  Placement,
  RandomSource,
  createRandom,
  createSelector,
  parseCoord,
} from "@yesno/game";
import { GameSettings } from "./config/index.js";

export interface SessionOptions {
  mode: GameMode;
  showGifs: boolean;
  offline: boolean;
  seed?: string;
  settings: GameSettings;
}

/** Everything one game run needs, built once at startup */
export interface Session {
  controller: GameController;
  /** Null when offline, since there is no animation to fetch */
  adapter: OracleAdapter | null;
  rng: RandomSource;
  mode: GameMode;
  showGifs: boolean;
  settings: GameSettings;
}

export function createSession(opts: SessionOptions): Session {
  const rng = createRandom(opts.seed);
  const adapter = opts.offline
    ? null
    : new OracleAdapter({
        url: opts.settings.oracleUrl,
        timeoutMs: opts.settings.oracleTimeoutMs,
        animationTimeoutMs: opts.settings.gifTimeoutMs,
        rng,
      });
  const controller = new GameController({
    oracle: adapter ?? new OfflineOracle(rng),
    selector: createSelector(opts.mode, rng),
  });

  return {
    controller,
    adapter,
    rng,
    mode: opts.mode,
    showGifs: opts.showGifs && adapter !== null,
    settings: opts.settings,
  };
}

/** Random "thinking" pause before an AI move */
export function thinkingDelay(rng: RandomSource, settings: GameSettings): number {
  const span = settings.aiDelayMaxMs - settings.aiDelayMinMs;
  return settings.aiDelayMinMs + Math.floor(rng.nextFloat() * span);
}

/**
 * Place at a typed coordinate such as "d3". Unparsable text and cells
 * outside the legal targets are ignored and give null.
 */
export function submitTypedMove(controller: GameController, raw: string): Placement | null {
  const coord = parseCoord(raw);
  return coord ? controller.submitPlacement(coord) : null;
}
