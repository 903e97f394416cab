import { describe, expect, it } from "vitest";
import { completionPayout, conversionRate, quoteConversion } from "../src/payout.js";

describe("completionPayout", () => {
  it("pays one typed point until the habit's medal is held", () => {
    expect(completionPayout("food_related", false)).toEqual({ kind: "point", type: "food_related", amount: 1 });
    expect(completionPayout("food_related", true)).toEqual({ kind: "coin", amount: 0.5 });
  });
});

describe("conversion", () => {
  it("improves the rate at three medals", () => {
    expect(conversionRate(0)).toBe(2);
    expect(conversionRate(2)).toBe(2);
    expect(conversionRate(3)).toBe(1.5);
    expect(conversionRate(7)).toBe(1.5);
  });

  it("quotes 3 points into 2 at the improved rate", () => {
    expect(quoteConversion({ from: "arts", to: "other", amount: 3, available: 3, medalCount: 3 })).toEqual({
      from: "arts",
      to: "other",
      amount: 3,
      received: 2,
      rate: 1.5
    });
  });

  it("quotes 4 points into 2 at the base rate", () => {
    expect(quoteConversion({ from: "arts", to: "other", amount: 4, available: 10, medalCount: 2 }).received).toBe(2);
  });

  it("rejects amounts off the rate's step", () => {
    expect(() => quoteConversion({ from: "arts", to: "other", amount: 3, available: 10, medalCount: 2 })).toThrow(
      "amount must be a multiple of 2 at 2:1"
    );
    expect(() => quoteConversion({ from: "arts", to: "other", amount: 4, available: 10, medalCount: 3 })).toThrow(
      "amount must be a multiple of 3 at 1.5:1"
    );
  });

  it("rejects converting a type into itself, non-positive amounts and overdrafts", () => {
    expect(() => quoteConversion({ from: "arts", to: "arts", amount: 2, available: 10, medalCount: 0 })).toThrow(
      "cannot convert a point type into itself"
    );
    expect(() => quoteConversion({ from: "arts", to: "other", amount: 0, available: 10, medalCount: 0 })).toThrow(
      "amount must be a positive integer"
    );
    expect(() => quoteConversion({ from: "arts", to: "other", amount: 12, available: 10, medalCount: 0 })).toThrow(
      "only 10 arts points available"
    );
  });
});
