// ─── CLI tests ──────────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import { Chalk } from "chalk";
import { parseArgs } from "../src/cli/args";
import { exitCodeFor, renderBoard, renderSummary } from "../src/cli/render";
import { Board, GameStatus, SweeperException } from "../src/engine/index";

const plain = new Chalk({ level: 0 });

describe("parseArgs", () => {
  it("uses the defaults with no arguments", () => {
    const opts = parseArgs([]);
    expect(opts.config.height).toBe(8);
    expect(opts.config.width).toBe(8);
    expect(opts.config.mines).toBe(8);
    expect(opts.inference).toBe("single-pass");
    expect(opts.verbose).toBe(false);
    expect(opts.help).toBe(false);
  });

  it("reads both --name value and --name=value", () => {
    const opts = parseArgs([
      "--height", "4",
      "--width=5",
      "--mines", "3",
      "--seed", "9",
      "--fixed-point",
      "-v",
    ]);
    expect(opts.config).toEqual({ height: 4, width: 5, mines: 3, seed: 9, firstMoveSafe: false });
    expect(opts.inference).toBe("fixed-point");
    expect(opts.verbose).toBe(true);
  });

  it("reads --inference and --first-move-safe", () => {
    const opts = parseArgs(["--inference=fixed-point", "--first-move-safe"]);
    expect(opts.inference).toBe("fixed-point");
    expect(opts.config.firstMoveSafe).toBe(true);
  });

  it("reports help", () => {
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it("rejects a non-integer value", () => {
    expect(() => parseArgs(["--height", "x"])).toThrow("--height expects an integer, got x");
  });

  it("rejects a missing value", () => {
    expect(() => parseArgs(["--seed"])).toThrow("--seed expects an integer, got nothing");
  });

  it("rejects too many mines", () => {
    expect(() => parseArgs(["--height", "2", "--width", "2", "--mines", "4"])).toThrow(SweeperException);
  });

  it("rejects unknown options", () => {
    expect(() => parseArgs(["--colour", "red"])).toThrow("unknown option --colour");
    expect(() => parseArgs(["stray"])).toThrow("unexpected argument stray");
  });
});

describe("renderBoard", () => {
  it("shows revealed counts, flags and hidden cells", () => {
    const board = Board.fromMines(2, 2, [{ row: 1, col: 1 }]);
    board.reveal({ row: 0, col: 0 });
    board.flag({ row: 1, col: 1 });
    expect(renderBoard(board, { colors: plain })).toBe("1 #\n# F");
  });

  it("marks the exploded cell and uncovers the other mines", () => {
    const board = Board.fromMines(2, 3, [{ row: 0, col: 0 }, { row: 1, col: 2 }]);
    board.reveal({ row: 0, col: 0 });
    expect(
      renderBoard(board, { colors: plain, exploded: { row: 0, col: 0 }, revealMines: true }),
    ).toBe("* # #\n# # X");
  });

  it("draws a revealed zero as a dot", () => {
    const board = Board.fromMines(1, 3, [{ row: 0, col: 2 }]);
    board.reveal({ row: 0, col: 0 });
    expect(renderBoard(board, { colors: plain })).toBe(". # #");
  });
});

describe("renderSummary", () => {
  it("describes the outcome", () => {
    const text = renderSummary(
      {
        status: GameStatus.Won,
        moves: [],
        safeMoves: 3,
        randomMoves: 1,
        minesFlagged: 1,
      },
      plain,
    );
    expect(text).toBe("Won: 0 moves (3 safe, 1 random), 1 mines flagged");
  });

  it("maps outcomes to exit codes", () => {
    expect(exitCodeFor(GameStatus.Won)).toBe(0);
    expect(exitCodeFor(GameStatus.Lost)).toBe(1);
    expect(exitCodeFor(GameStatus.Stuck)).toBe(2);
  });
});
