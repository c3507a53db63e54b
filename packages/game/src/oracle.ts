import log from "./logger.js";
import { RandomSource } from "./rng.js";
import { AnswerSource, OracleAnswer, bucketAnswer } from "./directive.js";

export const DEFAULT_ORACLE_URL = "https://yesno.wtf/api";

/** One resolved oracle answer */
export interface OracleReading {
  answer: OracleAnswer;
  source: AnswerSource;
  imageUrl: string | null;
}

/** Anything the controller can ask for the next answer. Must never reject. */
export interface Oracle {
  fetchAnswer(): Promise<OracleReading>;
}

/** Decoded header of the companion GIF */
export interface Animation {
  url: string;
  width: number;
  height: number;
  byteLength: number;
}

export type FetchFn = (input: string, init?: { signal?: AbortSignal }) => Promise<Response>;

export interface OracleAdapterOptions {
  url?: string;
  timeoutMs?: number;
  animationTimeoutMs?: number;
  rng: RandomSource;
  fetchImpl?: FetchFn;
}

function fallbackReading(rng: RandomSource): OracleReading {
  return { answer: rng.pick(["yes", "no"] as const), source: "fallback", imageUrl: null };
}

/**
 * Asks the yes/no/maybe oracle once per turn. Any failure fails open to a
 * uniformly random yes or no, so `fetchAnswer` never rejects.
 */
export class OracleAdapter implements Oracle {
  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly animationTimeoutMs: number;
  private readonly rng: RandomSource;
  private readonly fetchImpl: FetchFn;

  constructor(opts: OracleAdapterOptions) {
    this.url = opts.url ?? DEFAULT_ORACLE_URL;
    this.timeoutMs = opts.timeoutMs ?? 2000;
    this.animationTimeoutMs = opts.animationTimeoutMs ?? 4000;
    this.rng = opts.rng;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async fetchAnswer(): Promise<OracleReading> {
    try {
      const res = await this.fetchImpl(this.url, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!res.ok) {
        await res.body?.cancel();
        throw new Error(`HTTP ${res.status}`);
      }
      const body: unknown = await res.json();
      if (typeof body !== "object" || body === null) {
        throw new Error("Oracle response is not an object");
      }
      const raw = "answer" in body ? body.answer : undefined;
      if (typeof raw !== "string") {
        throw new Error("Oracle response has no answer");
      }
      const answer = bucketAnswer(raw);
      if (!answer) {
        throw new Error(`Unrecognised oracle answer "${raw}"`);
      }
      const image = "image" in body ? body.image : undefined;
      return {
        answer,
        source: "oracle",
        imageUrl: typeof image === "string" && image ? image : null,
      };
    } catch (err: unknown) {
      const reading = fallbackReading(this.rng);
      log.info(
        { err, url: this.url, fallback: reading.answer },
        "Oracle unavailable, using random answer"
      );
      return reading;
    }
  }

  /**
   * Download the companion GIF. Resolves to null on any failure; callers
   * never wait on this before resolving a turn.
   */
  async fetchAnimation(url: string | null): Promise<Animation | null> {
    if (!url) return null;
    try {
      const res = await this.fetchImpl(url, {
        signal: AbortSignal.timeout(this.animationTimeoutMs),
      });
      if (!res.ok) {
        await res.body?.cancel();
        throw new Error(`HTTP ${res.status}`);
      }
      const bytes = new Uint8Array(await res.arrayBuffer());
      return decodeGifHeader(url, bytes);
    } catch (err: unknown) {
      log.debug({ err, url }, "Animation fetch failed");
      return null;
    }
  }
}

/** Read the logical screen size from a GIF87a/GIF89a header */
export function decodeGifHeader(url: string, bytes: Uint8Array): Animation {
  const signature = String.fromCharCode(...bytes.subarray(0, 6));
  if (bytes.length < 10 || (signature !== "GIF87a" && signature !== "GIF89a")) {
    throw new Error("Not a GIF image");
  }
  return {
    url,
    width: bytes[6] | (bytes[7] << 8),
    height: bytes[8] | (bytes[9] << 8),
    byteLength: bytes.length,
  };
}

/** Replays a fixed list of answers, then cycles. Used offline and in tests. */
export class ScriptedOracle implements Oracle {
  private index = 0;

  constructor(private readonly answers: OracleAnswer[]) {
    if (answers.length === 0) {
      throw new Error("ScriptedOracle needs at least one answer");
    }
  }

  async fetchAnswer(): Promise<OracleReading> {
    const answer = this.answers[this.index % this.answers.length];
    this.index++;
    return { answer, source: "oracle", imageUrl: null };
  }
}

/** Never touches the network: every answer is the random yes/no fallback */
export class OfflineOracle implements Oracle {
  constructor(private readonly rng: RandomSource) {}

  async fetchAnswer(): Promise<OracleReading> {
    return fallbackReading(this.rng);
  }
}
