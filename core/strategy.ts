import { dealerShouldHit } from "./dealer";
import { UnknownStrategyError } from "./errors";
import type { Action, Card, RoundSnapshot, Strategy } from "./types";

const DEALER_ORDER: Card["rank"][] = ["2", "3", "4", "5", "6", "7", "8", "9", "10", "A"];

function dealerIndex(card: Card): number {
  const normalized = card.rank === "J" || card.rank === "Q" || card.rank === "K" ? "10" : card.rank;
  return DEALER_ORDER.indexOf(normalized);
}

const S = "stand";
const H = "hit";

const hardTable: Record<number, Action[]> = {
  16: [S, S, S, S, S, H, H, H, H, H],
  15: [S, S, S, S, S, H, H, H, H, H],
  14: [S, S, S, S, S, H, H, H, H, H],
  13: [S, S, S, S, S, H, H, H, H, H],
  12: [H, H, S, S, S, H, H, H, H, H],
};

const softTable: Record<number, Action[]> = {
  18: [S, S, S, S, S, S, S, H, H, H],
  17: [H, H, H, H, H, H, H, H, H, H],
};

function actionFromTable(table: Record<number, Action[]>, total: number, dealerIdx: number): Action {
  const row: Action[] | undefined = table[total];
  if (!row) {
    return total >= 17 ? S : H;
  }
  return row[dealerIdx] ?? (total >= 17 ? S : H);
}

/** Hit/stand subset of the standard basic-strategy chart. */
export function basicStrategyDecision(snapshot: RoundSnapshot): Action {
  const table = snapshot.soft ? softTable : hardTable;
  return actionFromTable(table, snapshot.total, dealerIndex(snapshot.dealerUpCard));
}

export class ThresholdStrategy implements Strategy {
  readonly name: string;

  constructor(private readonly threshold = 16) {
    this.name = `Hit below ${threshold}`;
  }

  decide(snapshot: RoundSnapshot): Action {
    return snapshot.total < this.threshold ? "hit" : "stand";
  }
}

export class DealerMirrorStrategy implements Strategy {
  readonly name = "Dealer Rules";
  private readonly hitSoft17: boolean;

  constructor(options: { hitSoft17?: boolean } = {}) {
    this.hitSoft17 = options.hitSoft17 ?? false;
  }

  decide(snapshot: RoundSnapshot): Action {
    return dealerShouldHit(snapshot.hand, { dealerHitsSoft17: this.hitSoft17 }) ? "hit" : "stand";
  }
}

export class BasicStrategy implements Strategy {
  readonly name = "Basic Strategy";

  decide(snapshot: RoundSnapshot): Action {
    return basicStrategyDecision(snapshot);
  }
}

export type AskForAction = (snapshot: RoundSnapshot) => Promise<string>;

/**
 * Waits on an external input source (usually a person at a prompt) for every
 * decision. Answers are matched case-insensitively, by full name or first
 * letter; anything else is reported through `notify` and asked again.
 */
export class InteractiveStrategy implements Strategy {
  readonly name = "Interactive Player";

  constructor(
    private readonly ask: AskForAction,
    private readonly notify: (message: string) => void = () => undefined
  ) {}

  async decide(snapshot: RoundSnapshot): Promise<Action> {
    for (;;) {
      const response = (await this.ask(snapshot)).trim().toLowerCase();
      const action = snapshot.allowedActions.find((allowed) => allowed === response || allowed[0] === response);
      if (action) {
        return action;
      }
      this.notify(`Invalid action '${response}'. Please choose from: ${snapshot.allowedActions.join(", ")}`);
    }
  }
}

export const STRATEGIES: Record<string, () => Strategy> = {
  threshold: () => new ThresholdStrategy(),
  simple: () => new ThresholdStrategy(16),
  dealer: () => new DealerMirrorStrategy(),
  basic: () => new BasicStrategy(),
};

export function createStrategy(key: string): Strategy {
  const normalized = key.trim().toLowerCase();
  const factory = Object.hasOwn(STRATEGIES, normalized) ? STRATEGIES[normalized] : undefined;
  if (!factory) {
    throw new UnknownStrategyError(key, Object.keys(STRATEGIES).sort());
  }
  return factory();
}
