import { z } from "zod";
import { CARDS_PER_DECK, resolveRules } from "./config";
import { ConfigError } from "./errors";
import { playRound } from "./game";
import { cardValue } from "./hand";
import { logger as defaultLogger, type Logger } from "./logger";
import { assertUniqueNames, canPlaceBet, createPlayer, roundCurrency } from "./player";
import { createRng, type Seed } from "./rng";
import { Shoe, buildDecks } from "./shoe";
import { RunningStats } from "./stats";
import type {
  Player,
  PlayerConfig,
  PlayerRoundResult,
  PlayerStats,
  RoundResult,
  SimulationReport,
  TableRules,
} from "./types";

export interface SimulationOptions {
  players: readonly PlayerConfig[];
  rounds: number;
  rules?: Partial<TableRules>;
  seed?: Seed;
  /** Injected shoe; otherwise one is built from the rules and seed. */
  shoe?: Shoe;
  logger?: Logger;
  onRound?: (result: RoundResult) => void;
}

const roundsSchema = z.number().int().nonnegative();

/**
 * Most cards one round can take from a fresh shoe of `decks` decks.
 *
 * All cards of a hand but its last keep an aces-as-one total of at most 21 for
 * a player and 16 for the dealer, so the cheapest cards in the shoe bound how
 * many can come out before each hand's last card.
 */
export function maxCardsPerRound(players: number, decks: number): number {
  const budget = 21 * players + 16;
  const lowValues = buildDecks(decks)
    .map((card) => (card.rank === "A" ? 1 : cardValue(card)))
    .sort((a, b) => a - b);
  let sum = 0;
  let count = 0;
  for (const value of lowValues) {
    if (sum + value > budget) break;
    sum += value;
    count += 1;
  }
  return count + players + 1;
}

interface Tally {
  startingBankroll: number;
  payouts: RunningStats;
  roundsSkipped: number;
  wins: number;
  losses: number;
  pushes: number;
  blackjacks: number;
}

function createTally(player: Player): Tally {
  return {
    startingBankroll: player.bankroll,
    payouts: new RunningStats(),
    roundsSkipped: 0,
    wins: 0,
    losses: 0,
    pushes: 0,
    blackjacks: 0,
  };
}

function record(tally: Tally, result: PlayerRoundResult): void {
  switch (result.outcome) {
    case "skip":
      tally.roundsSkipped += 1;
      return;
    case "win":
      tally.wins += 1;
      break;
    case "blackjack":
      tally.wins += 1;
      tally.blackjacks += 1;
      break;
    case "lose":
      tally.losses += 1;
      break;
    case "push":
      tally.pushes += 1;
      break;
  }
  tally.payouts.add(result.payout);
}

function skipResult(player: Player): PlayerRoundResult {
  return {
    playerName: player.name,
    outcome: "skip",
    payout: 0,
    bet: player.bet,
    playerTotal: 0,
    dealerTotal: 0,
    isBlackjack: false,
    bankroll: player.bankroll,
  };
}

function summarize(player: Player, tally: Tally): PlayerStats {
  return {
    roundsPlayed: tally.payouts.count,
    roundsSkipped: tally.roundsSkipped,
    wins: tally.wins,
    losses: tally.losses,
    pushes: tally.pushes,
    blackjacks: tally.blackjacks,
    net: roundCurrency(player.bankroll - tally.startingBankroll),
    meanPayout: tally.payouts.mean,
    stdevPayout: tally.payouts.stdev,
    ci95: tally.payouts.interval(),
  };
}

/**
 * Plays up to `rounds` rounds at one table and reports final bankrolls.
 *
 * Before every round the shoe is rebuilt if fewer cards remain than
 * `reshuffleThreshold` or than the seated players could possibly draw, so a
 * round never runs the shoe dry. Players who cannot cover their bet sit the round out with a
 * `skip` result; the run ends early once nobody can bet. Errors from the round
 * engine are logged and rethrown.
 */
export async function simulate(options: SimulationOptions): Promise<SimulationReport> {
  const log = options.logger ?? defaultLogger;
  const rules = resolveRules(options.rules);
  const rounds = roundsSchema.safeParse(options.rounds);
  if (!rounds.success) {
    throw new ConfigError(`Invalid round count ${options.rounds}`, { rounds: options.rounds });
  }
  const players = options.players.map(createPlayer);
  assertUniqueNames(players);

  const worstCase = maxCardsPerRound(players.length, rules.decks);
  if (worstCase > rules.decks * CARDS_PER_DECK) {
    throw new ConfigError(
      `A ${rules.decks}-deck shoe cannot cover a round for ${players.length} players (up to ${worstCase} cards)`,
      { decks: rules.decks, players: players.length, worstCase }
    );
  }

  const shoe = options.shoe ?? new Shoe(rules.decks, createRng(options.seed));
  const tallies = new Map<string, Tally>(players.map((player) => [player.name, createTally(player)]));
  const tallyFor = (player: Player): Tally => {
    const tally = tallies.get(player.name);
    if (!tally) {
      throw new ConfigError(`Unknown player '${player.name}'`);
    }
    return tally;
  };

  log.info(
    { players: players.map((p) => p.name), rounds: rounds.data, rules, seed: options.seed },
    "simulation start"
  );

  let roundsPlayed = 0;
  let shuffles = 0;
  while (roundsPlayed < rounds.data) {
    const seated = players.filter(canPlaceBet);
    if (seated.length === 0) {
      log.info({ roundsPlayed }, "all players eliminated");
      break;
    }
    const needed = Math.max(rules.reshuffleThreshold, maxCardsPerRound(seated.length, rules.decks));
    if (shoe.remaining() < needed) {
      shoe.reshuffle(rules.decks);
      shuffles += 1;
      log.debug({ remaining: shoe.remaining(), needed }, "shoe reshuffled");
    }

    const round = roundsPlayed + 1;
    let result: RoundResult;
    try {
      result = await playRound({ shoe, rules, players: seated, round, logger: log });
    } catch (err) {
      log.error({ err, round }, "round failed");
      throw err;
    }
    roundsPlayed = round;

    for (const player of players) {
      if (seated.includes(player)) continue;
      log.debug({ round, player: player.name, bankroll: player.bankroll, bet: player.bet }, "player skipped");
      result.results.push(skipResult(player));
    }
    for (const entry of result.results) {
      const tally = tallies.get(entry.playerName);
      if (tally) record(tally, entry);
    }
    options.onRound?.(result);
  }

  const bankrolls: Record<string, number> = {};
  const stats: Record<string, PlayerStats> = {};
  for (const player of players) {
    bankrolls[player.name] = player.bankroll;
    stats[player.name] = summarize(player, tallyFor(player));
  }

  log.info({ roundsPlayed, shuffles, bankrolls }, "simulation complete");
  return { bankrolls, roundsPlayed, shuffles, players: stats };
}
