import { describe, expect, it } from "vitest";
import { ConfigError, DEFAULT_RULES, ThresholdStrategy, createPlayer, resolveRules } from "../core";

describe("table rules", () => {
  it("fills in defaults", () => {
    expect(resolveRules()).toEqual({
      decks: 6,
      dealerHitsSoft17: false,
      reshuffleThreshold: 15,
      blackjackPayout: 1.5,
    });
    expect(resolveRules()).toEqual(DEFAULT_RULES);
  });

  it("applies overrides", () => {
    expect(resolveRules({ decks: 2, blackjackPayout: 1.2 })).toMatchObject({ decks: 2, blackjackPayout: 1.2 });
  });

  it("rejects impossible tables", () => {
    expect(() => resolveRules({ decks: 0 })).toThrow(ConfigError);
    expect(() => resolveRules({ decks: 1.5 })).toThrow(ConfigError);
    expect(() => resolveRules({ blackjackPayout: 0 })).toThrow(ConfigError);
    expect(() => resolveRules({ decks: 1, reshuffleThreshold: 52 })).toThrow(
      "Invalid table rules: reshuffleThreshold: reshuffleThreshold must be smaller than the shoe size"
    );
  });
});

describe("player config", () => {
  const strategy = new ThresholdStrategy();

  it("builds a player from valid numbers", () => {
    expect(createPlayer({ name: " Ann ", strategy, bankroll: 50, bet: 5 })).toEqual({
      name: "Ann",
      strategy,
      bankroll: 50,
      bet: 5,
    });
  });

  it("rejects empty names and non-positive amounts", () => {
    expect(() => createPlayer({ name: "  ", strategy, bankroll: 50, bet: 5 })).toThrow(ConfigError);
    expect(() => createPlayer({ name: "Ann", strategy, bankroll: 0, bet: 5 })).toThrow(ConfigError);
    expect(() => createPlayer({ name: "Ann", strategy, bankroll: 50, bet: -1 })).toThrow(ConfigError);
    expect(() => createPlayer({ name: "Ann", strategy, bankroll: Infinity, bet: 5 })).toThrow(ConfigError);
  });
});
