import { formatCard } from "./shoe";
import type { Card, Hand, HandView } from "./types";

export function createHand(cards: readonly Card[] = []): Hand {
  return { cards: [...cards] };
}

/** Frozen copy handed to strategies. */
export function freezeHand(hand: HandView): HandView {
  return Object.freeze({ cards: Object.freeze([...hand.cards]) });
}

export function addCard(hand: Hand, card: Card): void {
  hand.cards.push(card);
}

export function cardValue(card: Card): number {
  if (card.rank === "A") return 11;
  if (card.rank === "K" || card.rank === "Q" || card.rank === "J" || card.rank === "10") {
    return 10;
  }
  return Number(card.rank);
}

interface Valuation {
  total: number;
  softAces: number;
}

// Every ace starts at 11 and is demoted one at a time while the hand is over 21.
function evaluate(hand: HandView): Valuation {
  let total = 0;
  let softAces = 0;
  for (const card of hand.cards) {
    total += cardValue(card);
    if (card.rank === "A") softAces += 1;
  }
  while (total > 21 && softAces > 0) {
    total -= 10;
    softAces -= 1;
  }
  return { total, softAces };
}

/** All distinct totals the hand can take, ascending. */
export function handTotals(hand: HandView): number[] {
  let low = 0;
  let aces = 0;
  for (const card of hand.cards) {
    low += card.rank === "A" ? 1 : cardValue(card);
    if (card.rank === "A") aces += 1;
  }
  return Array.from({ length: aces + 1 }, (_, j) => low + 10 * j);
}

export function bestTotal(hand: HandView): number {
  return evaluate(hand).total;
}

export function isSoft(hand: HandView): boolean {
  return evaluate(hand).softAces > 0;
}

export function isBlackjack(hand: HandView): boolean {
  return hand.cards.length === 2 && bestTotal(hand) === 21;
}

export function isBust(hand: HandView): boolean {
  return bestTotal(hand) > 21;
}

export function formatHand(hand: HandView): string {
  return `[${hand.cards.map(formatCard).join(" ")}]`;
}
