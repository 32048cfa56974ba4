/**
 * Core tokenizer / leg extractor
 *
 * Walks the whitespace-separated tokens once, left to right. The first token
 * is the ticker. Every later position is offered to an ordered list of token
 * rules; the first rule that applies reports how many tokens it consumed.
 * Tokens no rule claims belong to the field extractors and are skipped.
 *
 * The scan is a two-state machine:
 *   EXPECT_ANYTHING    no month seen yet, strikes carry no expiry
 *   IN_EXPIRY_CONTEXT  a month token set the current expiry
 */

import type { OptionType, StructureType } from "../types/options.js";
import { InvalidOrderError } from "../utils/errors.js";
import { parseExpiry } from "./expiry.js";
import { MULTI_LEG_STRUCTURES, STRUCTURE_ALIASES } from "./tables.js";

/** Strike found in the text, before side and quantity are known */
export interface LegSpec {
  readonly expiry: Date | null;
  readonly strike: number;
  readonly optionType: OptionType | null;
}

export type ScanState =
  | { readonly kind: "EXPECT_ANYTHING" }
  | { readonly kind: "IN_EXPIRY_CONTEXT"; readonly expiry: Date };

export interface ScanContext {
  readonly tokens: readonly string[];
  readonly structureType: StructureType | null;
  readonly today: Date;
  state: ScanState;
  defaultOptionType: OptionType | null;
  readonly legSpecs: LegSpec[];
}

/** Tokens consumed at `index`, or 0 when the rule does not apply */
export type TokenRule = (ctx: ScanContext, index: number) => number;

export interface TokenizeResult {
  ticker: string;
  legSpecs: LegSpec[];
  defaultOptionType: OptionType | null;
}

const MONTH_TOKEN = /^(jan|feb|mar|apr|may|jun|jul|aug|sep|oct|nov|dec)(\d{2})?$/;
const STRIKE_TOKEN = /^(\d+\.?\d*)([PCpc])?$/;
const TYPED_STRIKE_TOKEN = /^(\d+\.?\d*)([PCpc])$/;
const SLASH_TOKEN = /^(\d+\.?\d*)([PCpc])?\/(\d+\.?\d*)([PCpc])?$/;
const BARE_NUMBER_TOKEN = /^(\d+\.?\d*)$/;

const CALL_WORDS = new Set(["call", "calls"]);
const PUT_WORDS = new Set(["put", "puts"]);

function normalize(token: string | undefined): string {
  return (token ?? "").toLowerCase().replace(/[.,;]+$/, "");
}

function typeFromChar(ch: string | undefined): OptionType | null {
  if (!ch) return null;
  return ch.toUpperCase() === "C" ? "call" : "put";
}

function typeFromWord(word: string): OptionType | null {
  if (CALL_WORDS.has(word)) return "call";
  if (PUT_WORDS.has(word)) return "put";
  return null;
}

function currentExpiry(ctx: ScanContext): Date | null {
  return ctx.state.kind === "IN_EXPIRY_CONTEXT" ? ctx.state.expiry : null;
}

function matchMonth(token: string | undefined, today: Date): Date | null {
  const m = MONTH_TOKEN.exec(normalize(token));
  // A year is only ever attached ("jun26"); a separate number is a strike
  return m ? parseExpiry(m[1], m[2], today) : null;
}

function pushSpec(
  ctx: ScanContext,
  expiry: Date | null,
  strike: string,
  optionType: OptionType | null
): void {
  ctx.legSpecs.push({ expiry, strike: parseFloat(strike), optionType });
}

function pushSlashPair(ctx: ScanContext, m: RegExpExecArray, expiry: Date | null): void {
  pushSpec(ctx, expiry, m[1], typeFromChar(m[2]));
  pushSpec(ctx, expiry, m[3], typeFromChar(m[4]));
}

// ── Rules ───────────────────────────────────────────────────

/**
 * Month token: enter expiry context, then take the strike (or slash pair)
 * right after it. Multi-leg structures may list further bare strikes.
 */
export const monthRule: TokenRule = (ctx, index) => {
  const expiry = matchMonth(ctx.tokens[index], ctx.today);
  if (!expiry) return 0;
  ctx.state = { kind: "IN_EXPIRY_CONTEXT", expiry };

  const next = ctx.tokens[index + 1];
  if (next === undefined) return 1;

  const strike = STRIKE_TOKEN.exec(next);
  if (strike) {
    pushSpec(ctx, expiry, strike[1], typeFromChar(strike[2]));
    let consumed = 2;
    const isMultiLeg =
      ctx.structureType !== null && MULTI_LEG_STRUCTURES.has(ctx.structureType);

    while (index + consumed < ctx.tokens.length) {
      const extra = STRIKE_TOKEN.exec(ctx.tokens[index + consumed]);
      if (!extra) break;
      const following = ctx.tokens[index + consumed + 1];
      const nextIsAlias =
        following !== undefined && STRUCTURE_ALIASES.has(following.toLowerCase());
      if (!isMultiLeg && !nextIsAlias) break;
      pushSpec(ctx, expiry, extra[1], typeFromChar(extra[2]));
      consumed++;
    }
    return consumed;
  }

  const pair = SLASH_TOKEN.exec(next);
  if (pair) {
    pushSlashPair(ctx, pair, expiry);
    return 2;
  }

  return 1;
};

/** "85P", optionally followed by its month ("85P Jan27") */
export const typedStrikeRule: TokenRule = (ctx, index) => {
  const m = TYPED_STRIKE_TOKEN.exec(ctx.tokens[index]);
  if (!m) return 0;

  const aheadExpiry = matchMonth(ctx.tokens[index + 1], ctx.today);
  if (aheadExpiry) {
    pushSpec(ctx, aheadExpiry, m[1], typeFromChar(m[2]));
    return 2;
  }

  pushSpec(ctx, currentExpiry(ctx), m[1], typeFromChar(m[2]));
  return 1;
};

/** "240/220" with no month in front */
export const slashStrikeRule: TokenRule = (ctx, index) => {
  const m = SLASH_TOKEN.exec(ctx.tokens[index]);
  if (!m) return 0;
  pushSlashPair(ctx, m, currentExpiry(ctx));
  return 1;
};

/**
 * "calls" / "puts" set the default type. Skipped inside "put over" and
 * "delta to call" phrases, which belong to other extractors.
 */
export const typeWordRule: TokenRule = (ctx, index) => {
  const type = typeFromWord(normalize(ctx.tokens[index]));
  if (!type) return 0;

  const prev = normalize(ctx.tokens[index - 1]);
  const next = normalize(ctx.tokens[index + 1]);
  if (prev === "to" || prev === "like" || next === "over") return 0;

  ctx.defaultOptionType = type;
  return 1;
};

/** "300 calls" with no month in front */
export const strikeWithTypeWordRule: TokenRule = (ctx, index) => {
  const m = BARE_NUMBER_TOKEN.exec(ctx.tokens[index]);
  if (!m) return 0;

  const type = typeFromWord(normalize(ctx.tokens[index + 1]));
  if (!type || normalize(ctx.tokens[index + 2]) === "over") return 0;

  ctx.defaultOptionType = type;
  pushSpec(ctx, currentExpiry(ctx), m[1], type);
  return 2;
};

export const TOKEN_RULES: readonly TokenRule[] = [
  monthRule,
  typedStrikeRule,
  slashStrikeRule,
  typeWordRule,
  strikeWithTypeWordRule,
];

export function createScanContext(
  text: string,
  structureType: StructureType | null,
  today: Date = new Date()
): ScanContext {
  return {
    tokens: text.trim().split(/\s+/).filter((t) => t.length > 0),
    structureType,
    today,
    state: { kind: "EXPECT_ANYTHING" },
    defaultOptionType: null,
    legSpecs: [],
  };
}

/**
 * Extract ticker, leg specs and default option type from an order string.
 */
export function tokenizeOrder(
  text: string,
  structureType: StructureType | null,
  today: Date = new Date()
): TokenizeResult {
  const ctx = createScanContext(text, structureType, today);
  const ticker = (ctx.tokens[0] ?? "").toUpperCase();
  if (!ticker) {
    throw new InvalidOrderError(`Cannot identify ticker in: ${text.trim()}`);
  }

  let index = 1;
  while (index < ctx.tokens.length) {
    let consumed = 0;
    for (const rule of TOKEN_RULES) {
      consumed = rule(ctx, index);
      if (consumed > 0) break;
    }
    index += Math.max(consumed, 1);
  }

  if (ctx.legSpecs.length === 0) {
    throw new InvalidOrderError("No strikes/expiries found in order");
  }

  return {
    ticker,
    legSpecs: ctx.legSpecs,
    defaultOptionType: ctx.defaultOptionType,
  };
}
