import type { Pos } from "./types";
import { formatPos } from "./pos";

export type LogKind = "observe" | "mine" | "safe" | "derive" | "move";

export interface LogEntry {
  move: number;
  kind: LogKind;
  cells: Pos[];
  count?: number;
  brief: string;
}

export type LogSink = (entry: LogEntry) => void;

export class InferenceLog {
  readonly entries: LogEntry[] = [];

  constructor(private readonly sink?: LogSink) {}

  add(e: LogEntry): void {
    this.entries.push(e);
    this.sink?.(e);
  }

  observe(move: number, from: Pos, cells: Pos[], count: number): void {
    this.add({
      move,
      kind: "observe",
      cells,
      count,
      brief: `Determined ${formatCells(cells)} = ${count} from move ${formatPos(from)}`,
    });
  }

  mine(move: number, cell: Pos): void {
    this.add({ move, kind: "mine", cells: [cell], brief: `Marked mine: ${formatPos(cell)}` });
  }

  safe(move: number, cell: Pos): void {
    this.add({ move, kind: "safe", cells: [cell], brief: `Marked safe: ${formatPos(cell)}` });
  }

  derive(move: number, cells: Pos[], count: number): void {
    this.add({ move, kind: "derive", cells, count, brief: `Inferred ${formatCells(cells)} = ${count}` });
  }

  played(move: number, cell: Pos, how: "safe" | "random"): void {
    this.add({ move, kind: "move", cells: [cell], brief: `Move ${move}: ${how} ${formatPos(cell)}` });
  }

  ofKind(kind: LogKind): LogEntry[] {
    return this.entries.filter((e) => e.kind === kind);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export function formatCells(cells: Pos[]): string {
  return `{${cells.map(formatPos).join(", ")}}`;
}

export function formatEntry(e: LogEntry): string {
  return `[${String(e.move).padStart(3, " ")}] ${e.kind.padEnd(7, " ")} ${e.brief}`;
}
