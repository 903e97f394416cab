import type { CompletionPaidIn, PointType } from "@streakmarket/shared";
import { LedgerError } from "./errors.js";

export const MEDAL_COIN_PAYOUT = 0.5;
export const IMPROVED_RATE_MEDALS = 3;

export type Payout = { kind: "point"; type: PointType; amount: 1 } | { kind: "coin"; amount: number };

/** Holding the habit's medal switches its payout from one typed point to half a coin. */
export function completionPayout(type: PointType, hasMedal: boolean): Payout {
  return hasMedal ? { kind: "coin", amount: MEDAL_COIN_PAYOUT } : { kind: "point", type, amount: 1 };
}

export function paidIn(payout: Payout): CompletionPaidIn {
  return payout.kind === "coin" ? "coin" : payout.type;
}

/** The payout a stored completion was granted, rebuilt from its `paid_in` column. */
export function payoutOf(paid: CompletionPaidIn): Payout {
  return paid === "coin" ? { kind: "coin", amount: MEDAL_COIN_PAYOUT } : { kind: "point", type: paid, amount: 1 };
}

export function conversionRate(medalCount: number): number {
  return medalCount >= IMPROVED_RATE_MEDALS ? 1.5 : 2;
}

// Smallest source amount that converts to a whole number of target points.
function granularity(rate: number): number {
  return rate === 1.5 ? 3 : 2;
}

export type ConversionQuote = { from: PointType; to: PointType; amount: number; received: number; rate: number };

export function quoteConversion(params: {
  from: PointType;
  to: PointType;
  amount: number;
  available: number;
  medalCount: number;
}): ConversionQuote {
  const { from, to, amount, available, medalCount } = params;
  const rate = conversionRate(medalCount);
  if (from === to) {
    throw new LedgerError("InvalidConversion", "cannot convert a point type into itself");
  }
  if (!Number.isInteger(amount) || amount <= 0) {
    throw new LedgerError("InvalidConversion", "amount must be a positive integer");
  }
  const step = granularity(rate);
  if (amount % step !== 0) {
    throw new LedgerError("InvalidConversion", `amount must be a multiple of ${step} at ${rate}:1`);
  }
  if (amount > available) {
    throw new LedgerError("InvalidConversion", `only ${available} ${from} points available`);
  }
  return { from, to, amount, rate, received: Math.floor(amount / rate) };
}
