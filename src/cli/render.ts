import chalk, { type ChalkInstance } from "chalk";
import { Board } from "../engine/board";
import { type GameResult, GameStatus, type Pos } from "../engine/types";
import { samePos } from "../engine/pos";
import { type LogEntry, formatEntry } from "../engine/log";

export interface RenderOptions {
  exploded?: Pos | null;
  // Show unflagged mines (after the game ends)
  revealMines?: boolean;
  colors?: ChalkInstance;
}

// # hidden, . revealed with no neighbours, F flagged, X mine, * exploded
export function renderBoard(board: Board, opts: RenderOptions = {}): string {
  const c = opts.colors ?? chalk;
  const lines: string[] = [];
  for (let r = 0; r < board.height; r++) {
    const row: string[] = [];
    for (let col = 0; col < board.width; col++) {
      const pos = { row: r, col };
      const cell = board.cell(pos);
      if (opts.exploded && samePos(opts.exploded, pos)) row.push(c.bgRed.white("*"));
      else if (cell.flagged) row.push(c.yellow("F"));
      else if (cell.revealed) row.push(cell.hint === 0 ? c.dim(".") : c.cyan(String(cell.hint)));
      else if (opts.revealMines && cell.mine) row.push(c.magenta("X"));
      else row.push(c.gray("#"));
    }
    lines.push(row.join(" "));
  }
  return lines.join("\n");
}

export function renderEntry(entry: LogEntry, colors: ChalkInstance = chalk): string {
  const line = formatEntry(entry);
  switch (entry.kind) {
    case "mine":
      return colors.red(line);
    case "safe":
      return colors.green(line);
    case "derive":
      return colors.blue(line);
    case "move":
      return colors.bold(line);
    default:
      return colors.dim(line);
  }
}

export function renderSummary(result: GameResult, colors: ChalkInstance = chalk): string {
  const moves = `${result.moves.length} moves (${result.safeMoves} safe, ${result.randomMoves} random), ${result.minesFlagged} mines flagged`;
  switch (result.status) {
    case GameStatus.Won:
      return colors.green.bold(`Won: ${moves}`);
    case GameStatus.Lost:
      return colors.red.bold(`Lost: ${moves}`);
    case GameStatus.Stuck:
      return colors.yellow.bold(`Stuck: ${moves}`);
    default:
      return colors.bold(`Unfinished: ${moves}`);
  }
}

export function exitCodeFor(status: GameStatus): number {
  switch (status) {
    case GameStatus.Won:
      return 0;
    case GameStatus.Lost:
      return 1;
    default:
      return 2;
  }
}
