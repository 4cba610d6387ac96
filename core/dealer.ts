import { bestTotal, isSoft } from "./hand";
import type { HandView, TableRules } from "./types";

export function dealerShouldHit(hand: HandView, rules: Pick<TableRules, "dealerHitsSoft17">): boolean {
  const total = bestTotal(hand);
  if (total < 17) return true;
  if (total === 17 && rules.dealerHitsSoft17 && isSoft(hand)) {
    return true;
  }
  return false;
}
