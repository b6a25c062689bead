// ─── Board tests ────────────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  Board,
  SweeperException,
  createEmptyGrid,
  placeMines,
  computeHints,
  sequenceRng,
  parseBoardConfig,
} from "../src/engine/index";

describe("Board.fromMines", () => {
  const board = Board.fromMines(3, 3, [{ row: 2, col: 2 }]);

  it("reports mines", () => {
    expect(board.isMine({ row: 2, col: 2 })).toBe(true);
    expect(board.isMine({ row: 0, col: 0 })).toBe(false);
  });

  it("counts adjacent mines, ignoring cells off the board", () => {
    expect(board.nearbyMines({ row: 0, col: 0 })).toBe(0);
    expect(board.nearbyMines({ row: 1, col: 1 })).toBe(1);
    expect(board.nearbyMines({ row: 2, col: 1 })).toBe(1);
    expect(board.nearbyMines({ row: 1, col: 2 })).toBe(1);
    expect(board.nearbyMines({ row: 0, col: 2 })).toBe(0);
  });

  it("does not count the cell itself", () => {
    expect(board.nearbyMines({ row: 2, col: 2 })).toBe(0);
  });

  it("throws on a cell outside the board", () => {
    expect(() => board.isMine({ row: -1, col: 0 })).toThrow(SweeperException);
    expect(() => board.nearbyMines({ row: 0, col: 3 })).toThrow(
      "Cell (0, 3) is outside the 3x3 board",
    );
  });
});

describe("Board.isWon", () => {
  it("is won once the flags are exactly the mines", () => {
    const board = Board.fromMines(3, 3, [{ row: 0, col: 0 }, { row: 2, col: 2 }]);
    expect(board.isWon()).toBe(false);
    board.flag({ row: 0, col: 0 });
    expect(board.isWon()).toBe(false);
    board.flag({ row: 2, col: 2 });
    expect(board.isWon()).toBe(true);
  });

  it("an extra flag on a safe cell is not a win", () => {
    const board = Board.fromMines(2, 2, [{ row: 0, col: 0 }]);
    board.flag({ row: 0, col: 0 });
    board.flag({ row: 1, col: 1 });
    expect(board.isWon()).toBe(false);
  });
});

describe("Board generation", () => {
  it("places exactly the configured number of mines", () => {
    const board = new Board(parseBoardConfig({ height: 8, width: 8, mines: 10, seed: 42 }));
    expect(board.mines).toHaveLength(10);
    let count = 0;
    for (const p of board.cells()) if (board.isMine(p)) count++;
    expect(count).toBe(10);
  });

  it("is deterministic for the same seed", () => {
    const cfg = parseBoardConfig({ height: 8, width: 8, mines: 10, seed: 777 });
    const b1 = new Board(cfg);
    const b2 = new Board(cfg);
    expect(b1.mines).toEqual(b2.mines);
  });

  it("delays placement when the first move must be safe", () => {
    const board = new Board(
      parseBoardConfig({ height: 2, width: 2, mines: 3, seed: 5, firstMoveSafe: true }),
    );
    expect(board.minesPlaced).toBe(false);
    board.ensureMines([{ row: 0, col: 0 }]);
    expect(board.minesPlaced).toBe(true);
    expect(board.isMine({ row: 0, col: 0 })).toBe(false);
    expect(board.nearbyMines({ row: 0, col: 0 })).toBe(3);
  });

  it("ensureMines does not move mines once placed", () => {
    const board = new Board(parseBoardConfig({ height: 4, width: 4, mines: 5, seed: 9 }));
    const before = board.mines;
    board.ensureMines([before[0]]);
    expect(board.mines).toEqual(before);
  });
});

describe("placeMines / computeHints", () => {
  it("skips excluded positions", () => {
    const grid = createEmptyGrid(2, 2);
    const placed = placeMines(grid, 3, sequenceRng([0.1, 0.7, 0.4]), [{ row: 1, col: 1 }]);
    expect(placed).toHaveLength(3);
    expect(grid[1][1].mine).toBe(false);
  });

  it("counts every neighbour mine", () => {
    const grid = createEmptyGrid(3, 3);
    grid[0][0].mine = true;
    grid[0][2].mine = true;
    grid[2][1].mine = true;
    computeHints(grid, 3, 3);
    expect(grid[1][1].hint).toBe(3);
    expect(grid[0][1].hint).toBe(2);
    expect(grid[2][2].hint).toBe(1);
  });
});

describe("Board.render", () => {
  it("draws mines as X inside ruled rows", () => {
    const board = Board.fromMines(2, 2, [{ row: 0, col: 1 }]);
    expect(board.render()).toBe(["-----", "| |X|", "-----", "| | |", "-----"].join("\n"));
  });
});
