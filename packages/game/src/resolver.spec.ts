import { strict as assert } from "assert";
import { OracleAnswer, directiveFor } from "./directive.js";
import {
  IllegalPlacementError,
  isMismatched,
  legalTargets,
  resolvePlacement,
} from "./resolver.js";
import { Board, Stone } from "./state.js";

function directive(answer: OracleAnswer, player: Stone) {
  return directiveFor(answer, player);
}

describe("Turn resolver", () => {
  describe("isMismatched", () => {
    it("should flag yes for White and no for Black", () => {
      assert.equal(isMismatched(directive("yes", "W"), "W"), true);
      assert.equal(isMismatched(directive("no", "B"), "B"), true);
    });

    it("should never flag matched or maybe directives", () => {
      assert.equal(isMismatched(directive("yes", "B"), "B"), false);
      assert.equal(isMismatched(directive("no", "W"), "W"), false);
      assert.equal(isMismatched(directive("maybe", "B"), "B"), false);
      assert.equal(isMismatched(directive("maybe", "W"), "W"), false);
    });
  });

  // -----------------------------------------------------------------------
  // matched yes/no
  // -----------------------------------------------------------------------
  describe("matched placement", () => {
    it("should capture normally for yes on Black's turn", () => {
      const board = new Board();
      const d = directive("yes", "B");

      assert.equal(legalTargets(board, d, "B").length, 4);

      const placement = resolvePlacement(board, d, "B", { row: 2, col: 3 });
      assert.equal(placement.stone, "B");
      assert.deepEqual(placement.flipped, [{ row: 3, col: 3 }]);
      assert.equal(placement.forced, 0);
      assert.equal(placement.flash, false);
      assert.equal(placement.mismatched, false);
      assert.equal(board.count("B"), 4);
      assert.equal(board.count("W"), 1);
    });

    it("should reject targets outside the capture set", () => {
      const board = new Board();
      assert.throws(
        () => resolvePlacement(board, directive("yes", "B"), "B", { row: 0, col: 0 }),
        IllegalPlacementError
      );
      assert.deepEqual(board.score(), { B: 2, W: 2 });
    });

    it("should have no targets when the mandated colour cannot capture", () => {
      const board = Board.fromRows(["WW......"]);
      assert.deepEqual(legalTargets(board, directive("yes", "B"), "B"), []);
    });
  });

  // -----------------------------------------------------------------------
  // mismatched yes/no
  // -----------------------------------------------------------------------
  describe("mismatched placement", () => {
    it("should open every empty cell for yes on White's turn", () => {
      const board = new Board();
      const targets = legalTargets(board, directive("yes", "W"), "W");

      assert.equal(targets.length, 60);
      assert.deepEqual(targets[0], { row: 0, col: 0 });
    });

    it("should set a single Black stone with zero flips", () => {
      const board = new Board();
      const placement = resolvePlacement(board, directive("yes", "W"), "W", { row: 0, col: 0 });

      assert.equal(placement.stone, "B");
      assert.deepEqual(placement.flipped, []);
      assert.equal(placement.mismatched, true);
      assert.equal(board.get({ row: 0, col: 0 }), "B");
      assert.deepEqual(board.score(), { B: 3, W: 2 });
    });

    it("should not capture even where a capture line exists", () => {
      const board = new Board();
      resolvePlacement(board, directive("yes", "W"), "W", { row: 2, col: 3 });

      assert.equal(board.get({ row: 2, col: 3 }), "B");
      assert.equal(board.get({ row: 3, col: 3 }), "W");
    });

    it("should place a White stone for no on Black's turn", () => {
      const board = new Board();
      const placement = resolvePlacement(board, directive("no", "B"), "B", { row: 7, col: 7 });

      assert.equal(placement.stone, "W");
      assert.deepEqual(board.score(), { B: 2, W: 3 });
    });
  });

  // -----------------------------------------------------------------------
  // maybe
  // -----------------------------------------------------------------------
  describe("maybe placement", () => {
    it("should capture then convert adjacent opponents and flash", () => {
      const board = Board.fromRows([
        "........",
        "....W...",
        "..W.....",
        "...WB...",
        "...BW...",
      ]);
      const placement = resolvePlacement(board, directive("maybe", "B"), "B", { row: 2, col: 3 });

      assert.deepEqual(placement.flipped, [{ row: 3, col: 3 }]);
      assert.equal(placement.forced, 2);
      assert.equal(placement.flash, true);
      assert.equal(board.get({ row: 2, col: 2 }), "B");
      assert.equal(board.get({ row: 1, col: 4 }), "B");
      assert.equal(board.get({ row: 4, col: 4 }), "W");
      assert.deepEqual(board.score(), { B: 6, W: 1 });
    });

    it("should not flash when no neighbour is left to convert", () => {
      const board = new Board();
      const placement = resolvePlacement(board, directive("maybe", "B"), "B", { row: 2, col: 3 });

      assert.equal(placement.forced, 0);
      assert.equal(placement.flash, false);
      assert.deepEqual(board.score(), { B: 4, W: 1 });
    });

    it("should use the acting player's colour", () => {
      const board = new Board();
      const d = directive("maybe", "W");

      assert.equal(d.stone, "W");
      assert.deepEqual(legalTargets(board, d, "W"), board.legalMoves("W"));

      const placement = resolvePlacement(board, d, "W", { row: 2, col: 4 });
      assert.equal(placement.stone, "W");
      assert.deepEqual(placement.flipped, [{ row: 3, col: 4 }]);
    });
  });
});
