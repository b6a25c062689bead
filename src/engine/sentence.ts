import type { Pos } from "./types";
import { CellSet } from "./pos";
import { createInvariantViolation } from "./errors";
import { formatCells } from "./log";

/**
 * Logical statement about the board: exactly `count` of `cells` are mines.
 *
 * The shape is fixed once created; only markMine / markSafe shrink it, and
 * both keep 0 <= count <= |cells| for any consistent board. The cell set is
 * never handed out: `cells` returns a copy.
 */
export class Sentence {
  private readonly members: CellSet;
  private _count: number;

  constructor(cells: Iterable<Pos>, count: number) {
    this.members = new CellSet(cells);
    if (!Number.isInteger(count) || count < 0 || count > this.members.size) {
      throw createInvariantViolation(this.members.toArray(), count);
    }
    this._count = count;
  }

  get cells(): Pos[] {
    return this.members.toArray();
  }

  get size(): number {
    return this.members.size;
  }

  get count(): number {
    return this._count;
  }

  has(cell: Pos): boolean {
    return this.members.has(cell);
  }

  clone(): Sentence {
    return new Sentence(this.members, this._count);
  }

  get isEmpty(): boolean {
    return this.members.size === 0;
  }

  get isValid(): boolean {
    return this._count >= 0 && this._count <= this.members.size;
  }

  // {a, b, c} = 3: every cell is a mine. {} = 0 says nothing.
  knownMines(): Pos[] {
    return this._count === this.members.size && this._count !== 0 ? this.members.toArray() : [];
  }

  knownSafes(): Pos[] {
    return this._count === 0 ? this.members.toArray() : [];
  }

  markMine(cell: Pos): void {
    if (this.members.delete(cell)) this._count--;
  }

  markSafe(cell: Pos): void {
    this.members.delete(cell);
  }

  isSubsetOf(other: Sentence): boolean {
    return this.members.isSubsetOf(other.members);
  }

  /** other - this, valid when this is a subset of other */
  subtractFrom(other: Sentence): Sentence {
    return new Sentence(other.members.difference(this.members), other.count - this._count);
  }

  equals(other: Sentence): boolean {
    return this._count === other._count && this.members.equals(other.members);
  }

  key(): string {
    return `${this.members.key()}=${this._count}`;
  }

  toString(): string {
    return `${formatCells(this.members.toArray())} = ${this._count}`;
  }
}
