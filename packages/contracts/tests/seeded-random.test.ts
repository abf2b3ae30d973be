import { describe, expect, it } from "vitest";
import { SeededRandom } from "../src";

function draw(rng: SeededRandom, count: number): number[] {
  return Array.from({ length: count }, () => rng.next());
}

describe("SeededRandom", () => {
  it("is deterministic per seed", () => {
    expect(draw(new SeededRandom(42), 10)).toEqual(
      draw(new SeededRandom(42), 10),
    );
  });

  it("differs between seeds", () => {
    expect(draw(new SeededRandom(1), 4)).not.toEqual(
      draw(new SeededRandom(2), 4),
    );
  });

  it("stays in [0, 1)", () => {
    const rng = new SeededRandom(7);
    for (const value of draw(rng, 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("draws inclusive integer ranges", () => {
    const rng = new SeededRandom(3);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const value = rng.range(-2, 2);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(-2);
      expect(value).toBeLessThanOrEqual(2);
      seen.add(value);
    }
    expect(seen.size).toBe(5);
  });

  it("picks from arrays", () => {
    const rng = new SeededRandom(5);
    expect(["a", "b", "c"]).toContain(rng.pick(["a", "b", "c"]));
    const empty: string[] = [];
    expect(rng.pick(empty)).toBeUndefined();
  });

  it("handles probability bounds", () => {
    const rng = new SeededRandom(9);
    expect(rng.probability(0)).toBe(false);
    expect(rng.probability(1)).toBe(true);
  });

  it("replays from a saved state", () => {
    const rng = new SeededRandom(11);
    draw(rng, 3);
    const state = rng.getState();
    const expected = draw(rng, 5);

    const replay = new SeededRandom(0);
    replay.setState(state);
    expect(draw(replay, 5)).toEqual(expected);
  });
});
