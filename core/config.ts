import { z } from "zod";
import { ConfigError } from "./errors";
import type { PlayerConfig, Strategy, TableRules } from "./types";

export const CARDS_PER_DECK = 52;

export const DEFAULT_RULES: TableRules = {
  decks: 6,
  dealerHitsSoft17: false,
  reshuffleThreshold: 15,
  blackjackPayout: 1.5,
};

export const DEFAULT_BANKROLL = 100;
export const DEFAULT_BET = 10;

export const tableRulesSchema = z
  .object({
    decks: z.number().int().min(1),
    dealerHitsSoft17: z.boolean(),
    reshuffleThreshold: z.number().int().min(0),
    blackjackPayout: z.number().positive().finite(),
  })
  .strict()
  .refine((rules) => rules.reshuffleThreshold < rules.decks * CARDS_PER_DECK, {
    message: "reshuffleThreshold must be smaller than the shoe size",
    path: ["reshuffleThreshold"],
  });

const strategySchema = z.custom<Strategy>(
  (value) =>
    typeof value === "object" &&
    value !== null &&
    "decide" in value &&
    typeof value.decide === "function" &&
    "name" in value &&
    typeof value.name === "string",
  { message: "strategy must provide a name and a decide(snapshot) function" }
);

export const playerConfigSchema = z.object({
  name: z.string().trim().min(1),
  strategy: strategySchema,
  bankroll: z.number().positive().finite(),
  bet: z.number().positive().finite(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function resolveRules(overrides: Partial<TableRules> = {}): TableRules {
  const parsed = tableRulesSchema.safeParse({ ...DEFAULT_RULES, ...overrides });
  if (!parsed.success) {
    throw new ConfigError(`Invalid table rules: ${describeIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}

export function parsePlayerConfig(input: PlayerConfig): PlayerConfig {
  const parsed = playerConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid player '${String(input.name)}': ${describeIssues(parsed.error)}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
