/**
 * Tokenizer rule tests
 *
 * Each rule is exercised on its own against a fresh scan context.
 * `TODAY` pins month tokens without a year.
 */

import { describe, it, expect } from "vitest";
import {
  createScanContext,
  monthRule,
  slashStrikeRule,
  strikeWithTypeWordRule,
  tokenizeOrder,
  typeWordRule,
  typedStrikeRule,
} from "../../src/parser/tokenizer.js";
import { InvalidOrderError } from "../../src/utils/errors.js";

const TODAY = new Date(2025, 9, 15);
const utc = (y: number, m: number, d: number) => new Date(Date.UTC(y, m - 1, d));

describe("monthRule", () => {
  it("should enter expiry context and take the strike after the month", () => {
    const ctx = createScanContext("AAPL jun26 300 calls", null, TODAY);
    expect(monthRule(ctx, 1)).toBe(2);
    expect(ctx.state).toEqual({ kind: "IN_EXPIRY_CONTEXT", expiry: utc(2026, 6, 16) });
    expect(ctx.legSpecs).toEqual([{ expiry: utc(2026, 6, 16), strike: 300, optionType: null }]);
  });

  it("should take a slash pair after the month", () => {
    const ctx = createScanContext("AAPL Jun26 240/220 PS", "put_spread", TODAY);
    expect(monthRule(ctx, 1)).toBe(2);
    expect(ctx.legSpecs.map((s) => s.strike)).toEqual([240, 220]);
  });

  it("should take extra bare strikes for multi-leg structures", () => {
    const ctx = createScanContext("SPY Dec25 580 600 620 fly", "butterfly", TODAY);
    expect(monthRule(ctx, 1)).toBe(4);
    expect(ctx.legSpecs.map((s) => s.strike)).toEqual([580, 600, 620]);
  });

  it("should take an extra strike right before a structure alias", () => {
    const ctx = createScanContext("AAPL Jun26 230 270 collar", "collar", TODAY);
    expect(monthRule(ctx, 1)).toBe(3);
    expect(ctx.legSpecs.map((s) => s.strike)).toEqual([230, 270]);
  });

  it("should stop after one strike for single options", () => {
    const ctx = createScanContext("AAPL Jun26 300 500x", null, TODAY);
    expect(monthRule(ctx, 1)).toBe(2);
    expect(ctx.legSpecs).toHaveLength(1);
  });

  it("should consume only the month when nothing follows", () => {
    const ctx = createScanContext("AAPL Jun26", null, TODAY);
    expect(monthRule(ctx, 1)).toBe(1);
    expect(ctx.state.kind).toBe("IN_EXPIRY_CONTEXT");
    expect(ctx.legSpecs).toEqual([]);
  });

  it("should not apply to other tokens", () => {
    const ctx = createScanContext("AAPL 300 calls", null, TODAY);
    expect(monthRule(ctx, 1)).toBe(0);
    expect(ctx.state).toEqual({ kind: "EXPECT_ANYTHING" });
  });
});

describe("typedStrikeRule", () => {
  it("should attach a month that follows the strike", () => {
    const ctx = createScanContext("QCOM 85P Jan27 tt141.17", null, TODAY);
    expect(typedStrikeRule(ctx, 1)).toBe(2);
    expect(ctx.legSpecs).toEqual([{ expiry: utc(2027, 1, 16), strike: 85, optionType: "put" }]);
  });

  it("should use the current expiry context otherwise", () => {
    const ctx = createScanContext("IWM Jun26 250P 280C", null, TODAY);
    monthRule(ctx, 1);
    expect(typedStrikeRule(ctx, 3)).toBe(1);
    expect(ctx.legSpecs[1]).toEqual({ expiry: utc(2026, 6, 16), strike: 280, optionType: "call" });
  });

  it("should leave the expiry empty outside a month context", () => {
    const ctx = createScanContext("QCOM 85p", null, TODAY);
    expect(typedStrikeRule(ctx, 1)).toBe(1);
    expect(ctx.legSpecs).toEqual([{ expiry: null, strike: 85, optionType: "put" }]);
  });
});

describe("slashStrikeRule", () => {
  it("should split a typed pair", () => {
    const ctx = createScanContext("AAPL 240P/220P", null, TODAY);
    expect(slashStrikeRule(ctx, 1)).toBe(1);
    expect(ctx.legSpecs).toEqual([
      { expiry: null, strike: 240, optionType: "put" },
      { expiry: null, strike: 220, optionType: "put" },
    ]);
  });
});

describe("typeWordRule", () => {
  it("should set the default option type", () => {
    const ctx = createScanContext("AAPL jun26 300 puts", null, TODAY);
    expect(typeWordRule(ctx, 3)).toBe(1);
    expect(ctx.defaultOptionType).toBe("put");
  });

  it("should skip delta phrases and 'over' modifiers", () => {
    const toCall = createScanContext("AAPL delta to call", null, TODAY);
    expect(typeWordRule(toCall, 3)).toBe(0);

    const callOver = createScanContext("AAPL 300 call over", null, TODAY);
    expect(typeWordRule(callOver, 2)).toBe(0);
    expect(callOver.defaultOptionType).toBeNull();
  });
});

describe("strikeWithTypeWordRule", () => {
  it("should read '300 calls' as a typed strike", () => {
    const ctx = createScanContext("AAPL 300 calls", null, TODAY);
    expect(strikeWithTypeWordRule(ctx, 1)).toBe(2);
    expect(ctx.defaultOptionType).toBe("call");
    expect(ctx.legSpecs).toEqual([{ expiry: null, strike: 300, optionType: "call" }]);
  });

  it("should not apply before 'over'", () => {
    const ctx = createScanContext("AAPL 300 call over", null, TODAY);
    expect(strikeWithTypeWordRule(ctx, 1)).toBe(0);
  });
});

describe("tokenizeOrder", () => {
  it("should uppercase the ticker and collect specs", () => {
    const result = tokenizeOrder("aapl jun26 300c 10x", null, TODAY);
    expect(result.ticker).toBe("AAPL");
    expect(result.legSpecs).toEqual([{ expiry: utc(2026, 6, 16), strike: 300, optionType: "call" }]);
    expect(result.defaultOptionType).toBeNull();
  });

  it("should roll a month without year into the next occurrence", () => {
    const result = tokenizeOrder("IWM feb 257 apr 280 Risky", "risk_reversal", TODAY);
    expect(result.legSpecs).toEqual([
      { expiry: utc(2026, 2, 16), strike: 257, optionType: null },
      { expiry: utc(2026, 4, 16), strike: 280, optionType: null },
    ]);
  });

  it("should reject text without strikes", () => {
    expect(() => tokenizeOrder("AAPL 500x", null, TODAY)).toThrow(InvalidOrderError);
    expect(() => tokenizeOrder("AAPL 500x", null, TODAY)).toThrow(
      "No strikes/expiries found in order"
    );
  });

  it("should reject blank text", () => {
    expect(() => tokenizeOrder("   ", null, TODAY)).toThrow("Cannot identify ticker in: ");
  });
});
