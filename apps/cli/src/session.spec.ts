import { strict as assert } from "assert";
import { RandomSource } from "@yesno/game";
import { DEFAULTS, toSettings } from "./config/index.js";
import { createSession, submitTypedMove, thinkingDelay } from "./session.js";

const settings = toSettings(DEFAULTS);

function fixedFloat(value: number): RandomSource {
  return {
    nextFloat: () => value,
    nextInt: (max) => Math.floor(value * max),
    pick: (items) => items[Math.floor(value * items.length)],
  };
}

describe("Game session", () => {
  it("should put the AI on White for the AI modes", () => {
    const session = createSession({ mode: 2, showGifs: false, offline: true, settings });
    assert.equal(session.controller.getAiPlayer(), "W");
  });

  it("should leave both sides to humans in mode 0", () => {
    const session = createSession({ mode: 0, showGifs: false, offline: true, settings });
    assert.equal(session.controller.getAiPlayer(), null);
  });

  it("should disable animations when offline", () => {
    const session = createSession({ mode: 1, showGifs: true, offline: true, settings });
    assert.equal(session.adapter, null);
    assert.equal(session.showGifs, false);
  });

  it("should keep animations when an oracle is configured", () => {
    const session = createSession({ mode: 1, showGifs: true, offline: false, settings });
    assert.ok(session.adapter);
    assert.equal(session.showGifs, true);
  });

  it("should draw offline directives from the fallback", async () => {
    const session = createSession({ mode: 0, showGifs: false, offline: true, seed: "offline", settings });
    const turn = await session.controller.beginTurn();

    assert.equal(turn?.directive.source, "fallback");
    assert.notEqual(turn?.directive.answer, "maybe");
  });

  describe("submitTypedMove", () => {
    it("should ignore unparsable and illegal input without changing the game", async () => {
      const session = createSession({ mode: 0, showGifs: false, offline: true, seed: "typed", settings });
      const turn = await session.controller.beginTurn();
      assert.equal(turn?.passed, false);

      assert.equal(submitTypedMove(session.controller, "zz"), null);
      assert.equal(submitTypedMove(session.controller, "d4"), null);
      assert.equal(session.controller.getPhase(), "awaiting_placement");
      assert.equal(session.controller.getCurrentPlayer(), "B");
      assert.deepEqual(session.controller.getBoard().score(), { B: 2, W: 2 });
    });

    it("should place on a legal typed cell", async () => {
      const session = createSession({ mode: 0, showGifs: false, offline: true, seed: "typed", settings });
      const turn = await session.controller.beginTurn();
      const target = turn?.targets[0];
      assert.ok(target);

      const raw = `${"abcdefgh"[target.col]}${target.row + 1}`;
      const placement = submitTypedMove(session.controller, raw);
      assert.equal(placement?.row, target.row);
      assert.equal(placement?.col, target.col);
      assert.equal(session.controller.getCurrentPlayer(), "W");
    });
  });

  describe("thinkingDelay", () => {
    it("should scale between the configured bounds", () => {
      assert.equal(thinkingDelay(fixedFloat(0), settings), 500);
      assert.equal(thinkingDelay(fixedFloat(0.5), settings), 1750);
    });

    it("should return the minimum when the bounds meet", () => {
      const fixed = { ...settings, aiDelayMinMs: 800, aiDelayMaxMs: 800 };
      assert.equal(thinkingDelay(fixedFloat(0.9), fixed), 800);
    });
  });
});
