import type { Pos } from "./types";

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

export function parsePosKey(key: string): Pos {
  const [row, col] = key.split(",").map(Number);
  return { row, col };
}

export function samePos(a: Pos, b: Pos): boolean {
  return a.row === b.row && a.col === b.col;
}

export function formatPos(pos: Pos): string {
  return `(${pos.row}, ${pos.col})`;
}

export function inBounds(pos: Pos, rows: number, cols: number): boolean {
  return pos.row >= 0 && pos.row < rows && pos.col >= 0 && pos.col < cols;
}

// Chebyshev-distance-1 neighbours, clipped to the board
export function neighbours(row: number, col: number, rows: number, cols: number): Pos[] {
  const result: Pos[] = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      const r = row + dr;
      const c = col + dc;
      if (r >= 0 && r < rows && c >= 0 && c < cols) {
        result.push({ row: r, col: c });
      }
    }
  }
  return result;
}

/**
 * Set of cells compared by coordinates rather than object identity.
 * Iterates in insertion order.
 */
export class CellSet implements Iterable<Pos> {
  private readonly items = new Map<string, Pos>();

  constructor(cells: Iterable<Pos> = []) {
    for (const c of cells) this.add(c);
  }

  get size(): number {
    return this.items.size;
  }

  add(pos: Pos): this {
    const key = posKey(pos);
    if (!this.items.has(key)) this.items.set(key, { row: pos.row, col: pos.col });
    return this;
  }

  has(pos: Pos): boolean {
    return this.items.has(posKey(pos));
  }

  delete(pos: Pos): boolean {
    return this.items.delete(posKey(pos));
  }

  clear(): void {
    this.items.clear();
  }

  isSubsetOf(other: CellSet): boolean {
    if (this.size > other.size) return false;
    for (const key of this.items.keys()) {
      if (!other.items.has(key)) return false;
    }
    return true;
  }

  difference(other: CellSet): CellSet {
    const out = new CellSet();
    for (const [key, pos] of this.items) {
      if (!other.items.has(key)) out.items.set(key, pos);
    }
    return out;
  }

  equals(other: CellSet): boolean {
    return this.size === other.size && this.isSubsetOf(other);
  }

  clone(): CellSet {
    return new CellSet(this.items.values());
  }

  toArray(): Pos[] {
    return Array.from(this.items.values(), (p) => ({ row: p.row, col: p.col }));
  }

  /** Order-independent key: equal sets give equal keys. */
  key(): string {
    return this.toArray()
      .sort((a, b) => (a.row !== b.row ? a.row - b.row : a.col - b.col))
      .map(posKey)
      .join(";");
  }

  [Symbol.iterator](): Iterator<Pos> {
    return this.items.values();
  }
}
