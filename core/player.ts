import { parsePlayerConfig } from "./config";
import { ConfigError, InvalidBetError } from "./errors";
import type { Player, PlayerConfig } from "./types";

export function createPlayer(config: PlayerConfig): Player {
  const { name, strategy, bankroll, bet } = parsePlayerConfig(config);
  return { name, strategy, bankroll, bet };
}

export function canPlaceBet(player: Player): boolean {
  return player.bankroll >= player.bet;
}

export function assertValidBet(player: Player): void {
  const { bet, bankroll } = player;
  if (!Number.isFinite(bet) || bet <= 0 || bet > bankroll) {
    throw new InvalidBetError(player.name, bet, bankroll);
  }
}

export function assertUniqueNames(players: readonly Pick<Player, "name">[]): void {
  const seen = new Set<string>();
  for (const { name } of players) {
    if (seen.has(name)) {
      throw new ConfigError(`Duplicate player name '${name}'`, { name });
    }
    seen.add(name);
  }
}

export function adjustBankroll(player: Player, amount: number): void {
  player.bankroll = roundCurrency(player.bankroll + amount);
}

/** Rounds to cents, halves away from zero. */
export function roundCurrency(amount: number): number {
  const cents = Math.round(Math.abs(amount) * 100 + Number.EPSILON) / 100;
  return amount < 0 ? -cents : cents;
}
