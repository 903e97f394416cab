import { describe, expect, it } from "vitest";
import type { PointBalances } from "@streakmarket/shared";
import { LedgerError } from "../src/errors.js";
import { autoAllocate, resolvePayment, validateAllocation } from "../src/settlement.js";

function balances(partial: Partial<PointBalances>): PointBalances {
  return { physical: 0, arts: 0, food_related: 0, educational: 0, other: 0, ...partial };
}

function kindOf(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof LedgerError ? err.kind : "unexpected";
  }
}

describe("autoAllocate", () => {
  it("drains types in their fixed order", () => {
    expect(autoAllocate(balances({ physical: 5, food_related: 10, educational: 3 }), 12)).toEqual({
      physical: 5,
      food_related: 7
    });
  });

  it("rejects a price above the combined balance", () => {
    expect(() => autoAllocate(balances({ physical: 2, arts: 3 }), 6)).toThrow("needs 6 points, has 5 in total");
  });
});

describe("validateAllocation", () => {
  const held = balances({ physical: 20, arts: 10 });

  it("accepts an allocation summing to the price", () => {
    expect(() => validateAllocation({ physical: 20, arts: 10 }, held, 30)).not.toThrow();
  });

  it("rejects sums one below or above the price", () => {
    expect(kindOf(() => validateAllocation({ physical: 20, arts: 9 }, held, 30))).toBe("InvalidAllocation");
    expect(kindOf(() => validateAllocation({ physical: 19, arts: 10, other: 0 }, held, 30))).toBe("InvalidAllocation");
    expect(kindOf(() => validateAllocation({ physical: 20, arts: 10 }, held, 29))).toBe("InvalidAllocation");
  });

  it("rejects amounts above the held balance of a type", () => {
    expect(() => validateAllocation({ physical: 21, arts: 9 }, held, 30)).toThrow("physical: allocated 21, available 20");
  });

  it("rejects negative and fractional amounts", () => {
    expect(kindOf(() => validateAllocation({ physical: 31, arts: -1 }, held, 30))).toBe("InvalidAllocation");
    expect(kindOf(() => validateAllocation({ physical: 19.5, arts: 10.5 }, held, 30))).toBe("InvalidAllocation");
  });
});

describe("resolvePayment", () => {
  it("charges a fixed-type reward in its own type", () => {
    expect(resolvePayment({ point_type: "arts", price: 5, balances: balances({ arts: 6 }) })).toEqual({ arts: 5 });
  });

  it("refuses a fixed-type reward the buyer cannot afford", () => {
    expect(kindOf(() => resolvePayment({ point_type: "arts", price: 5, balances: balances({ arts: 4, physical: 50 }) }))).toBe(
      "InsufficientFunds"
    );
  });

  it("refuses an allocation for a fixed-type reward", () => {
    expect(
      kindOf(() => resolvePayment({ point_type: "arts", price: 5, balances: balances({ arts: 5 }), allocation: { arts: 5 } }))
    ).toBe("InvalidAllocation");
  });

  it("drops zero entries from an explicit allocation", () => {
    const debit = resolvePayment({
      point_type: "any",
      price: 4,
      balances: balances({ physical: 3, other: 1 }),
      allocation: { physical: 3, arts: 0, other: 1 }
    });
    expect(debit).toEqual({ physical: 3, other: 1 });
  });

  it("auto-allocates an any-type reward without an allocation", () => {
    expect(resolvePayment({ point_type: "any", price: 4, balances: balances({ arts: 1, other: 9 }) })).toEqual({
      arts: 1,
      other: 3
    });
  });
});
