import { strict as assert } from "assert";
import { bucketAnswer, directiveFor } from "./directive.js";
import {
  FetchFn,
  OfflineOracle,
  OracleAdapter,
  ScriptedOracle,
  decodeGifHeader,
} from "./oracle.js";
import { RandomSource, SeededRng } from "./rng.js";

const ORACLE_URL = "http://oracle.test/api";

/** Picks the first or last option, so fallbacks are predictable */
function fixedPick(which: "first" | "last"): RandomSource {
  return {
    nextFloat: () => (which === "first" ? 0 : 0.999),
    nextInt: (max) => (which === "first" ? 0 : max - 1),
    pick: (items) => items[which === "first" ? 0 : items.length - 1],
  };
}

function jsonFetch(body: unknown, status = 200): FetchFn {
  return async () =>
    new Response(JSON.stringify(body), {
      status,
      headers: { "Content-Type": "application/json" },
    });
}

function gifBytes(width: number, height: number): Uint8Array {
  const header = [...Buffer.from("GIF89a", "ascii")];
  return new Uint8Array([
    ...header,
    width & 0xff,
    width >> 8,
    height & 0xff,
    height >> 8,
    0xf7,
    0x00,
    0x00,
  ]);
}

describe("Oracle adapter", () => {
  // -----------------------------------------------------------------------
  // answer bucketing
  // -----------------------------------------------------------------------
  describe("bucketAnswer", () => {
    it("should bucket the three canonical answers ignoring case", () => {
      assert.equal(bucketAnswer("yes"), "yes");
      assert.equal(bucketAnswer("NO"), "no");
      assert.equal(bucketAnswer("Maybe"), "maybe");
    });

    it("should bucket synonyms", () => {
      assert.equal(bucketAnswer("Yeah"), "yes");
      assert.equal(bucketAnswer(" affirmative "), "yes");
      assert.equal(bucketAnswer("nope"), "no");
      assert.equal(bucketAnswer("Perhaps?"), "maybe");
    });

    it("should return null for anything else", () => {
      assert.equal(bucketAnswer(""), null);
      assert.equal(bucketAnswer("forty-two"), null);
      assert.equal(bucketAnswer("yes and no"), null);
    });
  });

  describe("directiveFor", () => {
    it("should mandate Black for yes and White for no", () => {
      assert.equal(directiveFor("yes", "W").stone, "B");
      assert.equal(directiveFor("no", "B").stone, "W");
    });

    it("should give maybe the acting player's colour", () => {
      assert.equal(directiveFor("maybe", "B").stone, "B");
      assert.equal(directiveFor("maybe", "W").stone, "W");
    });
  });

  // -----------------------------------------------------------------------
  // fetchAnswer
  // -----------------------------------------------------------------------
  describe("fetchAnswer", () => {
    it("should read the answer and image from the oracle", async () => {
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        rng: fixedPick("first"),
        fetchImpl: jsonFetch({ answer: "maybe", forced: false, image: "http://oracle.test/maybe.gif" }),
      });

      assert.deepEqual(await oracle.fetchAnswer(), {
        answer: "maybe",
        source: "oracle",
        imageUrl: "http://oracle.test/maybe.gif",
      });
    });

    it("should request the configured URL", async () => {
      const requested: string[] = [];
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        rng: fixedPick("first"),
        fetchImpl: async (input) => {
          requested.push(input);
          return new Response(JSON.stringify({ answer: "no" }));
        },
      });

      const reading = await oracle.fetchAnswer();
      assert.deepEqual(requested, [ORACLE_URL]);
      assert.equal(reading.answer, "no");
      assert.equal(reading.imageUrl, null);
    });

    it("should fall back on an unrecognised answer", async () => {
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        rng: fixedPick("last"),
        fetchImpl: jsonFetch({ answer: "forty-two", image: "http://oracle.test/x.gif" }),
      });

      assert.deepEqual(await oracle.fetchAnswer(), {
        answer: "no",
        source: "fallback",
        imageUrl: null,
      });
    });

    it("should fall back on an HTTP error", async () => {
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        rng: fixedPick("first"),
        fetchImpl: jsonFetch({ answer: "no" }, 503),
      });

      const reading = await oracle.fetchAnswer();
      assert.equal(reading.answer, "yes");
      assert.equal(reading.source, "fallback");
    });

    it("should release the body of a failed response", async () => {
      let cancelled = false;
      const body = new ReadableStream<Uint8Array>({
        cancel() {
          cancelled = true;
        },
      });
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        rng: fixedPick("first"),
        fetchImpl: async () => new Response(body, { status: 502 }),
      });

      assert.equal((await oracle.fetchAnswer()).source, "fallback");
      assert.equal(cancelled, true);
    });

    it("should fall back on a malformed body", async () => {
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        rng: fixedPick("first"),
        fetchImpl: async () => new Response("<html>not json</html>"),
      });

      assert.equal((await oracle.fetchAnswer()).source, "fallback");
    });

    it("should fall back when the answer field is missing", async () => {
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        rng: fixedPick("first"),
        fetchImpl: jsonFetch(["yes"]),
      });

      assert.equal((await oracle.fetchAnswer()).source, "fallback");
    });

    it("should fall back on a network error without rejecting", async () => {
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        rng: fixedPick("last"),
        fetchImpl: async () => {
          throw new TypeError("fetch failed");
        },
      });

      const reading = await oracle.fetchAnswer();
      assert.equal(reading.answer, "no");
      assert.equal(reading.source, "fallback");
    });

    it("should fall back when the request times out", async () => {
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        timeoutMs: 10,
        rng: fixedPick("first"),
        fetchImpl: (_input, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          }),
      });

      const reading = await oracle.fetchAnswer();
      assert.equal(reading.source, "fallback");
      assert.equal(reading.answer, "yes");
    });

    it("should never fall back to maybe", async () => {
      const oracle = new OracleAdapter({
        url: ORACLE_URL,
        rng: new SeededRng("fallbacks"),
        fetchImpl: async () => {
          throw new Error("offline");
        },
      });

      const seen = new Set<string>();
      for (let i = 0; i < 40; i++) {
        seen.add((await oracle.fetchAnswer()).answer);
      }
      assert.equal(seen.has("maybe"), false);
      assert.equal(seen.size, 2);
    });
  });

  // -----------------------------------------------------------------------
  // fetchAnimation
  // -----------------------------------------------------------------------
  describe("fetchAnimation", () => {
    it("should decode the GIF size", async () => {
      const bytes = gifBytes(320, 240);
      const oracle = new OracleAdapter({
        rng: fixedPick("first"),
        fetchImpl: async () => new Response(bytes),
      });

      assert.deepEqual(await oracle.fetchAnimation("http://oracle.test/yes.gif"), {
        url: "http://oracle.test/yes.gif",
        width: 320,
        height: 240,
        byteLength: 13,
      });
    });

    it("should resolve to null without a URL", async () => {
      const oracle = new OracleAdapter({
        rng: fixedPick("first"),
        fetchImpl: async () => {
          throw new Error("should not be called");
        },
      });

      assert.equal(await oracle.fetchAnimation(null), null);
    });

    it("should resolve to null on failure", async () => {
      const notFound = new OracleAdapter({
        rng: fixedPick("first"),
        fetchImpl: async () => new Response("missing", { status: 404 }),
      });
      const notGif = new OracleAdapter({
        rng: fixedPick("first"),
        fetchImpl: async () => new Response("plain text body"),
      });

      assert.equal(await notFound.fetchAnimation("http://oracle.test/a.gif"), null);
      assert.equal(await notGif.fetchAnimation("http://oracle.test/b.gif"), null);
    });

    it("should release the body of a failed download", async () => {
      let cancelled = false;
      const body = new ReadableStream<Uint8Array>({
        cancel() {
          cancelled = true;
        },
      });
      const oracle = new OracleAdapter({
        rng: fixedPick("first"),
        fetchImpl: async () => new Response(body, { status: 404 }),
      });

      assert.equal(await oracle.fetchAnimation("http://oracle.test/c.gif"), null);
      assert.equal(cancelled, true);
    });

    it("should reject truncated headers when decoding directly", () => {
      assert.throws(
        () => decodeGifHeader("x.gif", new Uint8Array([0x47, 0x49, 0x46])),
        /Not a GIF/
      );
    });
  });

  // -----------------------------------------------------------------------
  // offline sources
  // -----------------------------------------------------------------------
  describe("ScriptedOracle", () => {
    it("should replay answers in order and cycle", async () => {
      const oracle = new ScriptedOracle(["yes", "maybe"]);
      const answers: string[] = [];
      for (let i = 0; i < 3; i++) {
        answers.push((await oracle.fetchAnswer()).answer);
      }
      assert.deepEqual(answers, ["yes", "maybe", "yes"]);
    });

    it("should refuse an empty script", () => {
      assert.throws(() => new ScriptedOracle([]), /at least one answer/);
    });
  });

  describe("OfflineOracle", () => {
    it("should always report a fallback answer", async () => {
      const reading = await new OfflineOracle(fixedPick("last")).fetchAnswer();
      assert.deepEqual(reading, { answer: "no", source: "fallback", imageUrl: null });
    });
  });
});
