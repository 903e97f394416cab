import {
  ANY_POINT_TYPE,
  POINT_TYPES,
  type Allocation,
  type PointBalances,
  type RewardPointType
} from "@streakmarket/shared";
import { LedgerError } from "./errors.js";

export function allocationTotal(allocation: Allocation): number {
  let total = 0;
  for (const t of POINT_TYPES) total += allocation[t] ?? 0;
  return total;
}

/** Greedy walk in POINT_TYPES order, taking as much of each type as still needed. */
export function autoAllocate(balances: PointBalances, price: number): Allocation {
  const total = POINT_TYPES.reduce((sum, t) => sum + balances[t], 0);
  if (total < price) {
    throw new LedgerError("InsufficientFunds", `needs ${price} points, has ${total} in total`);
  }
  const allocation: Allocation = {};
  let remaining = price;
  for (const t of POINT_TYPES) {
    if (remaining === 0) break;
    const take = Math.min(balances[t], remaining);
    if (take > 0) {
      allocation[t] = take;
      remaining -= take;
    }
  }
  return allocation;
}

export function validateAllocation(allocation: Allocation, balances: PointBalances, price: number): void {
  for (const t of POINT_TYPES) {
    const amount = allocation[t];
    if (amount === undefined) continue;
    if (!Number.isInteger(amount) || amount < 0) {
      throw new LedgerError("InvalidAllocation", `${t}: amount must be a non-negative integer`);
    }
    if (amount > balances[t]) {
      throw new LedgerError("InvalidAllocation", `${t}: allocated ${amount}, available ${balances[t]}`);
    }
  }
  const total = allocationTotal(allocation);
  if (total !== price) {
    throw new LedgerError("InvalidAllocation", `allocation sums to ${total}, price is ${price}`);
  }
}

/**
 * Decides how a buyer pays for a reward. Returns the per-type debit; throws without
 * touching anything when the payment cannot be made.
 */
export function resolvePayment(params: {
  point_type: RewardPointType;
  price: number;
  balances: PointBalances;
  allocation?: Allocation | undefined;
}): Allocation {
  const { point_type, price, balances, allocation } = params;
  if (point_type !== ANY_POINT_TYPE) {
    if (allocation !== undefined) {
      throw new LedgerError("InvalidAllocation", `reward is priced in ${point_type} points only`);
    }
    if (balances[point_type] < price) {
      throw new LedgerError("InsufficientFunds", `needs ${price} ${point_type} points, has ${balances[point_type]}`);
    }
    const fixed: Allocation = {};
    fixed[point_type] = price;
    return fixed;
  }
  if (allocation === undefined) return autoAllocate(balances, price);
  validateAllocation(allocation, balances, price);
  return compact(allocation);
}

function compact(allocation: Allocation): Allocation {
  const out: Allocation = {};
  for (const t of POINT_TYPES) {
    const amount = allocation[t];
    if (amount) out[t] = amount;
  }
  return out;
}
