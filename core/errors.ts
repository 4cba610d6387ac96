export type BlackjackErrorCode =
  | "EMPTY_SHOE"
  | "INVALID_BET"
  | "INVALID_ACTION"
  | "UNKNOWN_STRATEGY"
  | "INVALID_CONFIG";

export class BlackjackError extends Error {
  readonly code: BlackjackErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: BlackjackErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

/** A draw was attempted on a shoe with no cards left. */
export class EmptyShoeError extends BlackjackError {
  constructor() {
    super("EMPTY_SHOE", "Cannot draw from an empty shoe; reshuffle threshold is too low for this table");
  }
}

export class InvalidBetError extends BlackjackError {
  constructor(playerName: string, bet: number, bankroll: number) {
    super("INVALID_BET", `Invalid bet ${bet} for ${playerName} (bankroll ${bankroll})`, {
      playerName,
      bet,
      bankroll,
    });
  }
}

export class InvalidActionError extends BlackjackError {
  constructor(playerName: string, strategyName: string, action: unknown, allowed: readonly string[]) {
    super(
      "INVALID_ACTION",
      `Strategy ${strategyName} returned invalid action '${String(action)}' for ${playerName}; allowed: ${allowed.join(", ")}`,
      { playerName, strategyName, action, allowed: [...allowed] }
    );
  }
}

export class UnknownStrategyError extends BlackjackError {
  constructor(key: string, known: readonly string[]) {
    super("UNKNOWN_STRATEGY", `Unknown strategy '${key}'. Available: ${known.join(", ")}`, {
      key,
      known: [...known],
    });
  }
}

export class ConfigError extends BlackjackError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_CONFIG", message, details);
  }
}
