import type { BoardConfig, Pos } from "./types";
import { CellSet, inBounds, neighbours, posKey } from "./pos";
import { type RandomSource, createRng, shuffle } from "./rng";
import { createOutOfBoundsError } from "./errors";

export interface BoardCell {
  mine: boolean;
  hint: number;      // mines among the up-to-8 neighbours
  revealed: boolean;
  flagged: boolean;
}

export function createEmptyGrid(rows: number, cols: number): BoardCell[][] {
  const grid: BoardCell[][] = [];
  for (let r = 0; r < rows; r++) {
    const row: BoardCell[] = [];
    for (let c = 0; c < cols; c++) {
      row.push({ mine: false, hint: 0, revealed: false, flagged: false });
    }
    grid.push(row);
  }
  return grid;
}

// Uniform placement without repetition; returns the chosen cells
export function placeMines(
  grid: BoardCell[][],
  mines: number,
  rng: RandomSource,
  excludePositions: Pos[] = [],
): Pos[] {
  const excludeSet = new Set(excludePositions.map((p) => posKey(p)));
  const eligible: Pos[] = [];
  for (let r = 0; r < grid.length; r++) {
    for (let c = 0; c < grid[r].length; c++) {
      const p = { row: r, col: c };
      if (!excludeSet.has(posKey(p))) eligible.push(p);
    }
  }

  const chosen = shuffle(eligible, rng).slice(0, Math.min(mines, eligible.length));
  for (const p of chosen) grid[p.row][p.col].mine = true;
  return chosen;
}

export function computeHints(grid: BoardCell[][], rows: number, cols: number): void {
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      let sum = 0;
      for (const n of neighbours(r, c, rows, cols)) {
        if (grid[n.row][n.col].mine) sum++;
      }
      grid[r][c].hint = sum;
    }
  }
}

/**
 * Ground truth for one game. The agent never sees this directly; the game
 * loop asks it about a cell and passes the answer on.
 */
export class Board {
  readonly height: number;
  readonly width: number;
  readonly mineCount: number;
  private grid: BoardCell[][];
  private readonly mineSet = new CellSet();
  private readonly flags = new CellSet();
  private readonly rng: RandomSource;
  private placed = false;

  constructor(config: BoardConfig, rng: RandomSource = createRng(config.seed)) {
    this.height = config.height;
    this.width = config.width;
    this.mineCount = config.mines;
    this.rng = rng;
    this.grid = createEmptyGrid(this.height, this.width);
    if (!config.firstMoveSafe) this.layMines([]);
  }

  static fromMines(height: number, width: number, mines: Pos[]): Board {
    const unique = new CellSet(mines).toArray();
    const board = new Board(
      { height, width, mines: unique.length, seed: 0, firstMoveSafe: true },
      () => 0,
    );
    for (const m of unique) {
      if (!inBounds(m, height, width)) throw createOutOfBoundsError(m, height, width);
      board.grid[m.row][m.col].mine = true;
      board.mineSet.add(m);
    }
    computeHints(board.grid, height, width);
    board.placed = true;
    return board;
  }

  get minesPlaced(): boolean {
    return this.placed;
  }

  get flagged(): Pos[] {
    return this.flags.toArray();
  }

  get mines(): Pos[] {
    return this.mineSet.toArray();
  }

  /** Places the mines if that has not happened yet, keeping `exclude` clear. */
  ensureMines(exclude: Pos[] = []): void {
    if (!this.placed) this.layMines(exclude);
  }

  private layMines(exclude: Pos[]): void {
    this.grid = createEmptyGrid(this.height, this.width);
    this.mineSet.clear();
    for (const p of placeMines(this.grid, this.mineCount, this.rng, exclude)) {
      this.mineSet.add(p);
    }
    computeHints(this.grid, this.height, this.width);
    this.placed = true;
  }

  cell(pos: Pos): BoardCell {
    this.assertInBounds(pos);
    return this.grid[pos.row][pos.col];
  }

  isMine(pos: Pos): boolean {
    return this.cell(pos).mine;
  }

  nearbyMines(pos: Pos): number {
    return this.cell(pos).hint;
  }

  reveal(pos: Pos): BoardCell {
    const c = this.cell(pos);
    c.revealed = true;
    return c;
  }

  flag(pos: Pos): void {
    this.cell(pos).flagged = true;
    this.flags.add(pos);
  }

  // Won once the flags are exactly the mines
  isWon(): boolean {
    return this.flags.equals(this.mineSet);
  }

  allSafeRevealed(): boolean {
    for (const row of this.grid) {
      for (const c of row) {
        if (!c.mine && !c.revealed) return false;
      }
    }
    return true;
  }

  cells(): Pos[] {
    const out: Pos[] = [];
    for (let r = 0; r < this.height; r++) {
      for (let c = 0; c < this.width; c++) out.push({ row: r, col: c });
    }
    return out;
  }

  /** Text layout of the mines: `|X` marks a mine. */
  render(): string {
    const rule = "--".repeat(this.width) + "-";
    const lines: string[] = [];
    for (const row of this.grid) {
      lines.push(rule);
      lines.push(row.map((c) => (c.mine ? "|X" : "| ")).join("") + "|");
    }
    lines.push(rule);
    return lines.join("\n");
  }

  private assertInBounds(pos: Pos): void {
    if (!inBounds(pos, this.height, this.width)) {
      throw createOutOfBoundsError(pos, this.height, this.width);
    }
  }
}
