import { DEFAULT_BANKROLL, DEFAULT_BET, resolveRules } from "./config";
import { dealerShouldHit } from "./dealer";
import { InvalidActionError } from "./errors";
import { addCard, bestTotal, createHand, formatHand, freezeHand, isBlackjack, isBust, isSoft } from "./hand";
import { logger as defaultLogger, type Logger } from "./logger";
import { adjustBankroll, assertUniqueNames, assertValidBet, createPlayer, canPlaceBet, roundCurrency } from "./player";
import { Shoe, formatCard } from "./shoe";
import { createRng, type Seed } from "./rng";
import type {
  Action,
  Card,
  CardSource,
  Hand,
  HandOutcome,
  HandView,
  Player,
  PlayerRoundResult,
  RoundEvent,
  RoundResult,
  RoundSnapshot,
  Strategy,
  TableRules,
} from "./types";

const ALLOWED_ACTIONS = Object.freeze<Action[]>(["hit", "stand"]);

export const BANK_NAME = "Bank";

export interface Resolution {
  outcome: Exclude<HandOutcome, "skip">;
  payout: number;
}

export function resolveOutcome(
  playerHand: HandView,
  dealerHand: HandView,
  bet: number,
  rules: Pick<TableRules, "blackjackPayout">
): Resolution {
  const settle = (outcome: Resolution["outcome"], units: number): Resolution => ({
    outcome,
    payout: roundCurrency(bet * units),
  });
  if (isBust(playerHand)) {
    return settle("lose", -1);
  }
  const playerBlackjack = isBlackjack(playerHand);
  const dealerBlackjack = isBlackjack(dealerHand);
  if (playerBlackjack && !dealerBlackjack) {
    return settle("blackjack", rules.blackjackPayout);
  }
  if (playerBlackjack && dealerBlackjack) {
    return settle("push", 0);
  }
  if (dealerBlackjack) {
    return settle("lose", -1);
  }
  if (isBust(dealerHand)) {
    return settle("win", 1);
  }
  const playerTotal = bestTotal(playerHand);
  const dealerTotal = bestTotal(dealerHand);
  if (playerTotal > dealerTotal) {
    return settle("win", 1);
  }
  if (playerTotal < dealerTotal) {
    return settle("lose", -1);
  }
  return settle("push", 0);
}

export interface PlayRoundOptions {
  shoe: CardSource;
  rules: TableRules;
  players: readonly Player[];
  round?: number;
  logger?: Logger;
}

interface Seat {
  player: Player;
  hand: Hand;
  bet: number;
}

export async function playRound(options: PlayRoundOptions): Promise<RoundResult> {
  const { shoe, rules, players } = options;
  const round = options.round ?? 1;
  const log = (options.logger ?? defaultLogger).child({ round });

  // Bet: one bad seat aborts the whole round before a card leaves the shoe.
  assertUniqueNames(players);
  for (const player of players) {
    assertValidBet(player);
  }

  const events: RoundEvent[] = [];
  const seats: Seat[] = players.map((player) => ({ player, hand: createHand(), bet: player.bet }));
  const dealerHand = createHand();

  const dealTo = (hand: Hand, revealed: boolean, seat?: Seat): Card => {
    const card = shoe.draw();
    addCard(hand, card);
    events.push({
      type: "deal",
      target: seat ? "player" : "dealer",
      playerName: seat?.player.name,
      card,
      revealed,
    });
    return card;
  };

  for (let pass = 0; pass < 2; pass += 1) {
    for (const seat of seats) {
      dealTo(seat.hand, true, seat);
    }
    dealTo(dealerHand, pass === 0);
  }

  const dealerUpCard = dealerHand.cards[0];

  const snapshotFor = (seat: Seat, allowedActions: readonly Action[]): RoundSnapshot =>
    Object.freeze({
      round,
      playerName: seat.player.name,
      hand: freezeHand(seat.hand),
      total: bestTotal(seat.hand),
      soft: isSoft(seat.hand),
      dealerUpCard,
      allowedActions,
      cardsRemaining: shoe.remaining(),
      bankroll: seat.player.bankroll,
      bet: seat.bet,
    });

  for (const seat of seats) {
    seat.player.strategy.onRoundStart?.(snapshotFor(seat, ALLOWED_ACTIONS));
  }

  for (const seat of seats) {
    const { player, hand } = seat;
    log.debug({ player: player.name, hand: formatHand(hand), total: bestTotal(hand) }, "turn start");
    if (isBlackjack(hand)) {
      continue;
    }
    while (!isBust(hand)) {
      const snapshot = snapshotFor(seat, ALLOWED_ACTIONS);
      // The engine's only suspension point: interactive strategies resolve when input arrives.
      const action = await player.strategy.decide(snapshot);
      if (!snapshot.allowedActions.includes(action)) {
        throw new InvalidActionError(player.name, player.strategy.name, action, snapshot.allowedActions);
      }
      events.push({ type: "action", playerName: player.name, action, total: snapshot.total });
      if (action === "stand") {
        break;
      }
      const card = dealTo(hand, true, seat);
      log.debug({ player: player.name, card: formatCard(card), total: bestTotal(hand) }, "hit");
    }
  }

  events.push({ type: "dealerReveal", card: dealerHand.cards[1] });
  const dealerPlayed = seats.some((seat) => !isBust(seat.hand));
  if (dealerPlayed) {
    while (dealerShouldHit(dealerHand, rules)) {
      dealTo(dealerHand, true);
    }
  }
  const dealerTotal = bestTotal(dealerHand);
  log.debug({ hand: formatHand(dealerHand), total: dealerTotal, played: dealerPlayed }, "dealer done");

  const results: PlayerRoundResult[] = [];
  for (const seat of seats) {
    const { player, hand, bet } = seat;
    const { outcome, payout } = resolveOutcome(hand, dealerHand, bet, rules);
    adjustBankroll(player, payout);
    const result: PlayerRoundResult = {
      playerName: player.name,
      outcome,
      payout,
      bet,
      playerTotal: bestTotal(hand),
      dealerTotal,
      isBlackjack: isBlackjack(hand),
      bankroll: player.bankroll,
    };
    results.push(result);
    events.push({ type: "result", playerName: player.name, outcome, payout, bankroll: player.bankroll });
    player.strategy.onRoundEnd?.(snapshotFor(seat, []), result);
  }

  return { round, results, dealerHand, dealerTotal, dealerPlayed, events };
}

export interface SingleGameOptions {
  bet?: number;
  bankroll?: number;
  rules?: Partial<TableRules>;
  seed?: Seed;
  shoe?: CardSource;
  logger?: Logger;
}

/** One round for two players; returns final hand totals, the dealer's under "Bank". */
export async function playSingleGame(
  playerOne: [string, Strategy],
  playerTwo: [string, Strategy],
  options: SingleGameOptions = {}
): Promise<Record<string, number>> {
  const rules = resolveRules(options.rules);
  const bankroll = options.bankroll ?? DEFAULT_BANKROLL;
  const bet = options.bet ?? DEFAULT_BET;
  const players = [playerOne, playerTwo].map(([name, strategy]) => createPlayer({ name, strategy, bankroll, bet }));
  assertUniqueNames(players);

  const totals: Record<string, number> = {};
  for (const player of players) {
    totals[player.name] = 0;
  }
  const seated = players.filter(canPlaceBet);
  if (seated.length === 0) {
    totals[BANK_NAME] = 0;
    return totals;
  }

  const shoe = options.shoe ?? new Shoe(rules.decks, createRng(options.seed));
  const result = await playRound({ shoe, rules, players: seated, logger: options.logger });
  for (const entry of result.results) {
    totals[entry.playerName] = entry.playerTotal;
  }
  totals[BANK_NAME] = result.dealerTotal;
  return totals;
}
