import type { InferenceMode, Pos } from "./types";
import { CellSet, inBounds, neighbours } from "./pos";
import { Sentence } from "./sentence";
import { InferenceLog } from "./log";
import { type RandomSource, pickRandom } from "./rng";
import { createConflictError, createOutOfBoundsError } from "./errors";

export interface AgentOptions {
  // "single-pass" runs direct and subset inference once per observation;
  // "fixed-point" repeats both until nothing new is derived.
  inference?: InferenceMode;
  maxRounds?: number;
  rng?: RandomSource;
  log?: InferenceLog;
}

const DEFAULT_MAX_ROUNDS = 1_000;

interface PassResult {
  marked: number;
  derived: number;
}

/**
 * Minesweeper player that only acts on what it can prove.
 *
 * Knowledge is a list of sentences plus the cells already known to be safe
 * or mines. Every observation adds one sentence and runs inference over the
 * current list; derived facts are pushed back into every sentence.
 */
export class KnowledgeAgent {
  readonly height: number;
  readonly width: number;
  readonly inference: InferenceMode;
  readonly log: InferenceLog;
  private readonly maxRounds: number;
  private readonly rng: RandomSource;

  private readonly played = new CellSet();
  private readonly knownSafes = new CellSet();
  private readonly knownMines = new CellSet();
  private sentences: Sentence[] = [];

  constructor(height = 8, width = 8, options: AgentOptions = {}) {
    this.height = height;
    this.width = width;
    this.inference = options.inference ?? "single-pass";
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.rng = options.rng ?? Math.random;
    this.log = options.log ?? new InferenceLog();
  }

  get movesMade(): Pos[] {
    return this.played.toArray();
  }

  get safes(): Pos[] {
    return this.knownSafes.toArray();
  }

  get mines(): Pos[] {
    return this.knownMines.toArray();
  }

  // Copies: sentences only change through markMine / markSafe here
  get knowledge(): readonly Sentence[] {
    return this.sentences.map((s) => s.clone());
  }

  get moveCount(): number {
    return this.played.size;
  }

  hasPlayed(cell: Pos): boolean {
    return this.played.has(cell);
  }

  isKnownSafe(cell: Pos): boolean {
    return this.knownSafes.has(cell);
  }

  isKnownMine(cell: Pos): boolean {
    return this.knownMines.has(cell);
  }

  /** Marks a cell as a mine and removes it from every sentence. */
  markMine(cell: Pos): void {
    if (this.knownSafes.has(cell)) throw createConflictError(cell, "safe");
    if (!this.knownMines.has(cell)) {
      this.knownMines.add(cell);
      this.log.mine(this.played.size, cell);
    }
    for (const s of this.sentences) s.markMine(cell);
  }

  /** Marks a cell as safe and removes it from every sentence. */
  markSafe(cell: Pos): void {
    if (this.knownMines.has(cell)) throw createConflictError(cell, "mine");
    if (!this.knownSafes.has(cell)) {
      this.knownSafes.add(cell);
      this.log.safe(this.played.size, cell);
    }
    for (const s of this.sentences) s.markSafe(cell);
  }

  /**
   * Called once the board reveals `cell` as safe with `count` mines among
   * its neighbours.
   */
  addKnowledge(cell: Pos, count: number): void {
    this.assertInBounds(cell);
    if (this.knownMines.has(cell)) throw createConflictError(cell, "mine");

    const unknown: Pos[] = [];
    let remaining = count;
    for (const n of neighbours(cell.row, cell.col, this.height, this.width)) {
      if (this.knownSafes.has(n)) continue;
      if (this.knownMines.has(n)) {
        remaining--;
        continue;
      }
      unknown.push(n);
    }

    // Validated before any state changes: a bad report leaves the agent as it was
    const sentence = new Sentence(unknown, remaining);
    this.played.add(cell);
    this.markSafe(cell);
    this.log.observe(this.played.size, cell, unknown, remaining);
    this.sentences.push(sentence);
    this.infer();
  }

  /**
   * Adds a constraint that did not come from a single observation, reduced by
   * the facts already known, then runs inference.
   */
  addSentence(cells: Iterable<Pos>, count: number): void {
    const unknown: Pos[] = [];
    let remaining = count;
    for (const c of cells) {
      this.assertInBounds(c);
      if (this.knownSafes.has(c)) continue;
      if (this.knownMines.has(c)) {
        remaining--;
        continue;
      }
      unknown.push(c);
    }
    this.sentences.push(new Sentence(unknown, remaining));
    this.infer();
  }

  makeSafeMove(): Pos | null {
    for (const cell of this.knownSafes) {
      if (!this.played.has(cell)) return { row: cell.row, col: cell.col };
    }
    return null;
  }

  makeRandomMove(): Pos | null {
    const candidates: Pos[] = [];
    for (let r = 0; r < this.height; r++) {
      for (let c = 0; c < this.width; c++) {
        const p = { row: r, col: c };
        if (!this.played.has(p) && !this.knownMines.has(p)) candidates.push(p);
      }
    }
    return pickRandom(candidates, this.rng);
  }

  /** True when safes and mines are disjoint and every sentence is in range. */
  isConsistent(): boolean {
    for (const m of this.knownMines) {
      if (this.knownSafes.has(m)) return false;
    }
    return this.sentences.every((s) => s.isValid);
  }

  private infer(): void {
    let result = this.inferOnce();
    if (this.inference === "single-pass") return;

    let rounds = 1;
    while ((result.marked > 0 || result.derived > 0) && rounds < this.maxRounds) {
      result = this.inferOnce();
      rounds++;
    }
  }

  private inferOnce(): PassResult {
    const snapshot = this.sentences.slice();
    let marked = 0;

    for (const s of snapshot) {
      const mines = s.knownMines();
      const safes = s.knownSafes();
      for (const m of mines) {
        if (!this.knownMines.has(m)) marked++;
        this.markMine(m);
      }
      for (const c of safes) {
        if (!this.knownSafes.has(c)) marked++;
        this.markSafe(c);
      }
    }

    // Keys are taken after propagation: sentences shrink in place
    const seen = new Set(snapshot.map((s) => s.key()));
    const derived: Sentence[] = [];
    for (const s1 of snapshot) {
      for (const s2 of snapshot) {
        if (s1 === s2 || s1.equals(s2)) continue;
        if (!s1.isSubsetOf(s2)) continue;
        const next = s1.subtractFrom(s2);
        const key = next.key();
        if (seen.has(key)) continue;
        seen.add(key);
        derived.push(next);
        this.log.derive(this.played.size, next.cells, next.count);
      }
    }

    this.sentences = dedupe([...this.sentences, ...derived]).filter((s) => !s.isEmpty);
    return { marked, derived: derived.length };
  }

  private assertInBounds(cell: Pos): void {
    if (!inBounds(cell, this.height, this.width)) {
      throw createOutOfBoundsError(cell, this.height, this.width);
    }
  }
}

function dedupe(sentences: Sentence[]): Sentence[] {
  const seen = new Set<string>();
  const out: Sentence[] = [];
  for (const s of sentences) {
    const key = s.key();
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(s);
  }
  return out;
}
