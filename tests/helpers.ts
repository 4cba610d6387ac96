import {
  type Action,
  type Card,
  type HandView,
  type Rank,
  type RoundSnapshot,
  Shoe,
  bestTotal,
  createLogger,
  freezeHand,
  isSoft,
  makeCard,
} from "../core";

export const silentLogger = createLogger({ level: "silent" });

export const card = (rank: Rank): Card => makeCard(rank);

export const hand = (...ranks: Rank[]): HandView => ({ cards: ranks.map(card) });

export const stackedShoe = (ranks: Rank[]): Shoe => Shoe.stacked(ranks.map(card));

export function snapshotOf(ranks: Rank[], upCard: Rank, overrides: Partial<RoundSnapshot> = {}): RoundSnapshot {
  const view = freezeHand(hand(...ranks));
  const allowedActions: readonly Action[] = ["hit", "stand"];
  return {
    round: 1,
    playerName: "Tester",
    hand: view,
    total: bestTotal(view),
    soft: isSoft(view),
    dealerUpCard: card(upCard),
    allowedActions,
    cardsRemaining: 100,
    bankroll: 100,
    bet: 10,
    ...overrides,
  };
}
