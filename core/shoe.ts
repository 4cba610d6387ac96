import { CARDS_PER_DECK } from "./config";
import { EmptyShoeError } from "./errors";
import { type RNG, shuffleInPlace } from "./rng";
import type { Card, CardSource, Rank, Suit } from "./types";

export const RANKS: readonly Rank[] = ["A", "2", "3", "4", "5", "6", "7", "8", "9", "10", "J", "Q", "K"];
export const SUITS: readonly Suit[] = ["♠", "♥", "♦", "♣"];

export function makeCard(rank: Rank, suit: Suit = "♠"): Card {
  return Object.freeze({ rank, suit });
}

export function formatCard(card: Card): string {
  return `${card.rank}${card.suit}`;
}

export function buildDecks(decks: number): Card[] {
  const cards: Card[] = [];
  for (let d = 0; d < decks; d += 1) {
    for (const suit of SUITS) {
      for (const rank of RANKS) {
        cards.push(makeCard(rank, suit));
      }
    }
  }
  return cards;
}

export class Shoe implements CardSource {
  private cards: Card[] = [];
  private index = 0;
  private decks: number;
  private readonly rng: RNG;

  constructor(decks: number, rng: RNG) {
    this.decks = decks;
    this.rng = rng;
    this.reshuffle();
  }

  /** Shoe with a fixed order: `cards[0]` is drawn first. Reshuffling restores a random shoe. */
  static stacked(cards: readonly Card[], rng: RNG = Math.random): Shoe {
    const shoe = new Shoe(Math.max(1, Math.ceil(cards.length / CARDS_PER_DECK)), rng);
    shoe.cards = [...cards];
    shoe.index = 0;
    return shoe;
  }

  get deckCount(): number {
    return this.decks;
  }

  reshuffle(decks: number = this.decks): void {
    this.decks = decks;
    this.cards = shuffleInPlace(buildDecks(decks), this.rng);
    this.index = 0;
  }

  draw(): Card {
    if (this.index >= this.cards.length) {
      throw new EmptyShoeError();
    }
    return this.cards[this.index++];
  }

  remaining(): number {
    return this.cards.length - this.index;
  }
}
