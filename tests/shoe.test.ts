import { describe, expect, it } from "vitest";
import { EmptyShoeError, Shoe, createRng, formatCard } from "../core";
import { stackedShoe } from "./helpers";

describe("shoe", () => {
  it("holds 52 distinct cards per deck", () => {
    const shoe = new Shoe(1, createRng(1));
    expect(shoe.remaining()).toBe(52);
    const seen = new Set<string>();
    for (let i = 0; i < 52; i += 1) {
      seen.add(formatCard(shoe.draw()));
      expect(shoe.remaining()).toBe(51 - i);
    }
    expect(seen.size).toBe(52);
  });

  it("throws once empty and recovers only on reshuffle", () => {
    const shoe = stackedShoe(["A", "K"]);
    shoe.draw();
    shoe.draw();
    expect(shoe.remaining()).toBe(0);
    expect(() => shoe.draw()).toThrow(EmptyShoeError);
    shoe.reshuffle(2);
    expect(shoe.remaining()).toBe(104);
    expect(shoe.deckCount).toBe(2);
  });

  it("discards leftover cards when reshuffled", () => {
    const shoe = new Shoe(1, createRng(3));
    for (let i = 0; i < 10; i += 1) shoe.draw();
    shoe.reshuffle();
    expect(shoe.remaining()).toBe(52);
  });

  it("draws the same order for the same seed", () => {
    const a = new Shoe(2, createRng(99));
    const b = new Shoe(2, createRng(99));
    const drawAll = (shoe: Shoe) => Array.from({ length: 104 }, () => formatCard(shoe.draw()));
    expect(drawAll(a)).toEqual(drawAll(b));
  });

  it("accepts text seeds", () => {
    const drawTen = (shoe: Shoe) => Array.from({ length: 10 }, () => formatCard(shoe.draw()));
    expect(drawTen(new Shoe(1, createRng("table-3")))).toEqual(drawTen(new Shoe(1, createRng("table-3"))));
    expect(drawTen(new Shoe(1, createRng("table-3")))).not.toEqual(drawTen(new Shoe(1, createRng("table-4"))));
  });

  it("deals stacked cards first to last", () => {
    const shoe = stackedShoe(["2", "3", "4"]);
    expect([shoe.draw().rank, shoe.draw().rank, shoe.draw().rank]).toEqual(["2", "3", "4"]);
  });
});
