import { describe, expect, it, vi } from "vitest";
import {
  BasicStrategy,
  DealerMirrorStrategy,
  InteractiveStrategy,
  STRATEGIES,
  ThresholdStrategy,
  UnknownStrategyError,
  basicStrategyDecision,
  createStrategy,
} from "../core";
import { snapshotOf } from "./helpers";

describe("basic strategy edge cases", () => {
  it("plays hard 12 correctly vs dealer small cards", () => {
    expect(basicStrategyDecision(snapshotOf(["10", "2"], "2"))).toBe("hit");
    expect(basicStrategyDecision(snapshotOf(["10", "2"], "4"))).toBe("stand");
  });

  it("handles soft 18 decisions", () => {
    expect(basicStrategyDecision(snapshotOf(["A", "7"], "2"))).toBe("stand");
    expect(basicStrategyDecision(snapshotOf(["A", "7"], "9"))).toBe("hit");
  });

  it("stands on stiff hands only against weak up-cards", () => {
    expect(basicStrategyDecision(snapshotOf(["10", "6"], "6"))).toBe("stand");
    expect(basicStrategyDecision(snapshotOf(["10", "6"], "K"))).toBe("hit");
    expect(basicStrategyDecision(snapshotOf(["9", "7"], "A"))).toBe("hit");
  });

  it("falls back to totals outside the chart", () => {
    expect(basicStrategyDecision(snapshotOf(["5", "6"], "6"))).toBe("hit");
    expect(basicStrategyDecision(snapshotOf(["10", "8"], "A"))).toBe("stand");
    expect(basicStrategyDecision(snapshotOf(["A", "6"], "5"))).toBe("hit");
    expect(basicStrategyDecision(snapshotOf(["A", "8"], "10"))).toBe("stand");
  });

  it("is exposed as a strategy", () => {
    expect(new BasicStrategy().decide(snapshotOf(["10", "2"], "5"))).toBe("stand");
  });
});

describe("threshold and dealer-mirror strategies", () => {
  it("hits strictly below the threshold", () => {
    const strategy = new ThresholdStrategy(15);
    expect(strategy.decide(snapshotOf(["10", "4"], "7"))).toBe("hit");
    expect(strategy.decide(snapshotOf(["10", "5"], "7"))).toBe("stand");
    expect(strategy.name).toBe("Hit below 15");
  });

  it("mirrors the dealer's soft 17 choice", () => {
    expect(new DealerMirrorStrategy().decide(snapshotOf(["A", "6"], "7"))).toBe("stand");
    expect(new DealerMirrorStrategy({ hitSoft17: true }).decide(snapshotOf(["A", "6"], "7"))).toBe("hit");
    expect(new DealerMirrorStrategy().decide(snapshotOf(["9", "7"], "7"))).toBe("hit");
  });
});

describe("interactive strategy", () => {
  it("asks again until the answer names an allowed action", async () => {
    const ask = vi
      .fn(async (): Promise<string> => "stand")
      .mockResolvedValueOnce("double")
      .mockResolvedValueOnce("  H ");
    const notify = vi.fn();
    const strategy = new InteractiveStrategy(ask, notify);

    await expect(strategy.decide(snapshotOf(["9", "3"], "10"))).resolves.toBe("hit");
    expect(ask).toHaveBeenCalledTimes(2);
    expect(notify).toHaveBeenCalledTimes(1);
    expect(notify).toHaveBeenCalledWith("Invalid action 'double'. Please choose from: hit, stand");
  });

  it("accepts the full action name", async () => {
    const strategy = new InteractiveStrategy(async () => "Stand");
    await expect(strategy.decide(snapshotOf(["10", "9"], "6"))).resolves.toBe("stand");
  });
});

describe("strategy registry", () => {
  it("builds registered strategies by key", () => {
    expect(createStrategy("basic")).toBeInstanceOf(BasicStrategy);
    expect(createStrategy(" Dealer ")).toBeInstanceOf(DealerMirrorStrategy);
    expect(createStrategy("simple").name).toBe("Hit below 16");
    expect(Object.keys(STRATEGIES).sort()).toEqual(["basic", "dealer", "simple", "threshold"]);
  });

  it("rejects unknown keys", () => {
    expect(() => createStrategy("counting")).toThrow(UnknownStrategyError);
    expect(() => createStrategy("counting")).toThrow(
      "Unknown strategy 'counting'. Available: basic, dealer, simple, threshold"
    );
  });
});
