export type Rank =
  | "A"
  | "2"
  | "3"
  | "4"
  | "5"
  | "6"
  | "7"
  | "8"
  | "9"
  | "10"
  | "J"
  | "Q"
  | "K";

export type Suit = "♠" | "♥" | "♦" | "♣";

export interface Card {
  readonly rank: Rank;
  readonly suit: Suit;
}

export interface Hand {
  cards: Card[];
}

/** Read-only view of a hand; every valuation helper accepts this. */
export interface HandView {
  readonly cards: readonly Card[];
}

export type Action = "hit" | "stand";

export interface TableRules {
  decks: number;
  dealerHitsSoft17: boolean;
  reshuffleThreshold: number;
  blackjackPayout: number;
}

/** Anything the round engine can deal from. */
export interface CardSource {
  draw(): Card;
  remaining(): number;
}

export interface RoundSnapshot {
  readonly round: number;
  readonly playerName: string;
  readonly hand: HandView;
  readonly total: number;
  readonly soft: boolean;
  readonly dealerUpCard: Card;
  readonly allowedActions: readonly Action[];
  readonly cardsRemaining: number;
  readonly bankroll: number;
  readonly bet: number;
}

export interface Strategy {
  readonly name: string;
  decide(snapshot: RoundSnapshot): Action | Promise<Action>;
  onRoundStart?(snapshot: RoundSnapshot): void;
  onRoundEnd?(snapshot: RoundSnapshot, result: PlayerRoundResult): void;
}

export interface PlayerConfig {
  name: string;
  strategy: Strategy;
  bankroll: number;
  bet: number;
}

export interface Player {
  readonly name: string;
  readonly strategy: Strategy;
  bankroll: number;
  bet: number;
}

export type HandOutcome = "win" | "lose" | "push" | "blackjack" | "skip";

export interface PlayerRoundResult {
  playerName: string;
  outcome: HandOutcome;
  payout: number;
  bet: number;
  playerTotal: number;
  dealerTotal: number;
  isBlackjack: boolean;
  bankroll: number;
}

export type RoundEvent =
  | { type: "deal"; target: "player" | "dealer"; playerName?: string; card: Card; revealed: boolean }
  | { type: "action"; playerName: string; action: Action; total: number }
  | { type: "dealerReveal"; card: Card }
  | { type: "result"; playerName: string; outcome: HandOutcome; payout: number; bankroll: number };

export interface RoundResult {
  round: number;
  results: PlayerRoundResult[];
  dealerHand: Hand;
  dealerTotal: number;
  dealerPlayed: boolean;
  events: RoundEvent[];
}

export interface PlayerStats {
  roundsPlayed: number;
  roundsSkipped: number;
  wins: number;
  losses: number;
  pushes: number;
  blackjacks: number;
  net: number;
  meanPayout: number;
  stdevPayout: number;
  ci95: [number, number];
}

export interface SimulationReport {
  bankrolls: Record<string, number>;
  roundsPlayed: number;
  shuffles: number;
  players: Record<string, PlayerStats>;
}
