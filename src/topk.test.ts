import { describe, expect, it } from "vitest";
import { selectTopK } from "./topk";

describe("selectTopK", () => {
  const desc = (a: number, b: number) => b - a;

  it("returns the best K by comparator", () => {
    expect(selectTopK([5, 1, 3, 2, 4], 3, desc)).toEqual([5, 4, 3]);
  });

  it("returns everything, sorted, when K exceeds the input", () => {
    expect(selectTopK([2, 9, 4], 10, desc)).toEqual([9, 4, 2]);
  });

  it("returns nothing for K <= 0 or no input", () => {
    expect(selectTopK([1, 2, 3], 0, desc)).toEqual([]);
    expect(selectTopK([1, 2, 3], -2, desc)).toEqual([]);
    expect(selectTopK([], 3, desc)).toEqual([]);
  });

  it("keeps input order among equal items", () => {
    type Item = { id: number; score: number };
    const items: Item[] = [
      { id: 0, score: 1 },
      { id: 1, score: 2 },
      { id: 2, score: 1 },
      { id: 3, score: 1 },
    ];
    const byScore = (a: Item, b: Item) => b.score - a.score;
    expect(selectTopK(items, 3, byScore).map((i) => i.id)).toEqual([1, 0, 2]);
    expect(selectTopK(items, 4, byScore).map((i) => i.id)).toEqual([1, 0, 2, 3]);
  });

  it("accepts any iterable", () => {
    function* gen() {
      yield* [3, 7, 1, 7];
    }
    expect(selectTopK(gen(), 2, desc)).toEqual([7, 7]);
  });
});
