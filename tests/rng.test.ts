// ─── Random source tests ────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import { createRng, sequenceRng, pickRandom, shuffle } from "../src/engine/index";

describe("createRng", () => {
  it("produces deterministic sequences", () => {
    const a = createRng(42);
    const b = createRng(42);
    for (let i = 0; i < 100; i++) {
      expect(a()).toBe(b());
    }
  });

  it("different seeds give different sequences", () => {
    const a = createRng(1);
    const b = createRng(2);
    let same = true;
    for (let i = 0; i < 20; i++) {
      if (a() !== b()) same = false;
    }
    expect(same).toBe(false);
  });

  it("stays in [0, 1)", () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("sequenceRng", () => {
  it("replays its values and cycles", () => {
    const rng = sequenceRng([0.1, 0.9]);
    expect([rng(), rng(), rng()]).toEqual([0.1, 0.9, 0.1]);
  });
});

describe("pickRandom", () => {
  it("returns null for an empty list", () => {
    expect(pickRandom([], () => 0.5)).toBeNull();
  });

  it("maps the draw onto an index", () => {
    expect(pickRandom(["a", "b", "c", "d"], () => 0.74)).toBe("c");
    expect(pickRandom(["a", "b", "c", "d"], () => 0)).toBe("a");
  });
});

describe("shuffle", () => {
  it("keeps every element", () => {
    const items = [1, 2, 3, 4, 5, 6];
    const out = shuffle(items.slice(), createRng(3));
    expect(out.slice().sort((x, y) => x - y)).toEqual(items);
  });
});
