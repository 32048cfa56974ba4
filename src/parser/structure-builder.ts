/**
 * Structure Builder
 *
 * Turns leg specs into typed, sided legs following broker conventions:
 *   - Put spread 1xN:  sell the higher strike (1x), buy the lower (Nx)
 *   - Call spread 1xN: buy the lower strike (1x), sell the higher (Nx)
 *   - Risk reversal:   sell put / buy call, flipped by "putover"
 *   - Straddle:        buy call + buy put, same strike
 *   - Strangle:        buy lower put + buy higher call
 *   - Butterfly:       buy wings, sell 2x body
 *   - Collar:          buy lower put, sell higher call
 */

import type { OptionLeg, OptionType, Side, StructureType } from "../types/options.js";
import { InvalidOrderError } from "../utils/errors.js";
import type { Ratio } from "./extractors.js";
import { isStructureType } from "./tables.js";
import type { LegSpec } from "./tokenizer.js";

export interface BuildLegsInput {
  ticker: string;
  legSpecs: readonly LegSpec[];
  defaultOptionType: OptionType | null;
  structureType: string;
  ratio: Ratio | null;
  modifier: string | null;
  /** Order quantity; every leg quantity is a multiple of it */
  quantity: number;
}

/**
 * Pick a structure type when the text names none.
 * Two strikes of opposite explicit type read as a risk reversal.
 */
export function inferStructureType(
  legSpecs: readonly LegSpec[],
  defaultOptionType: OptionType | null
): StructureType {
  if (legSpecs.length !== 2) return "single";

  const [s1, s2] = legSpecs;
  if (s1.optionType && s2.optionType && s1.optionType !== s2.optionType) {
    return "risk_reversal";
  }
  if (defaultOptionType) {
    return defaultOptionType === "put" ? "put_spread" : "call_spread";
  }
  return "spread";
}

export function buildLegs(input: BuildLegsInput): OptionLeg[] {
  const { ticker, defaultOptionType, structureType, ratio, modifier, quantity } = input;

  if (input.legSpecs.length === 0) {
    throw new InvalidOrderError("No strikes/expiries found in order");
  }
  if (!isStructureType(structureType)) {
    throw new InvalidOrderError(`Unknown structure type: ${structureType}`);
  }

  const specs = input.legSpecs.map((spec) => ({
    ...spec,
    optionType: spec.optionType ?? defaultOptionType,
  }));
  const [r1, r2] = ratio ?? [1, 1];
  const leg = legFactory(ticker, quantity);

  switch (structureType) {
    case "single": {
      const spec = specs[0];
      return [leg(spec, resolveType(spec), "buy", 1)];
    }

    case "put_spread":
    case "call_spread":
    case "spread": {
      requireStrikes(specs, 2, "Spread");
      const [s1, s2] = specs;
      const optType: OptionType =
        structureType === "put_spread"
          ? "put"
          : structureType === "call_spread"
            ? "call"
            : resolveType(s1, s2.optionType);

      const [high, low] = s1.strike >= s2.strike ? [s1, s2] : [s2, s1];
      if (optType === "put") {
        return [leg(high, "put", "sell", r1), leg(low, "put", "buy", r2)];
      }
      return [leg(low, "call", "buy", r1), leg(high, "call", "sell", r2)];
    }

    case "risk_reversal": {
      requireStrikes(specs, 2, "Risk reversal");
      const [s1, s2] = specs;
      let putSpec: LegSpec;
      let callSpec: LegSpec;
      if (s1.optionType && s2.optionType) {
        [putSpec, callSpec] = s1.optionType === "put" ? [s1, s2] : [s2, s1];
      } else {
        // Lower strike is the put
        [putSpec, callSpec] = s1.strike <= s2.strike ? [s1, s2] : [s2, s1];
      }

      if (modifier === "putover") {
        return [leg(putSpec, "put", "buy", 1), leg(callSpec, "call", "sell", 1)];
      }
      return [leg(putSpec, "put", "sell", 1), leg(callSpec, "call", "buy", 1)];
    }

    case "straddle": {
      const spec = specs[0];
      return [leg(spec, "call", "buy", 1), leg(spec, "put", "buy", 1)];
    }

    case "strangle": {
      requireStrikes(specs, 2, "Strangle");
      const [low, high] = sortByStrike(specs);
      return [leg(low, "put", "buy", 1), leg(high, "call", "buy", 1)];
    }

    case "butterfly": {
      requireStrikes(specs, 3, "Butterfly");
      const [low, body, high] = sortByStrike(specs);
      const optType = low.optionType ?? defaultOptionType ?? "call";
      return [
        leg(low, optType, "buy", 1),
        leg(body, optType, "sell", 2),
        leg(high, optType, "buy", 1),
      ];
    }

    case "collar": {
      requireStrikes(specs, 2, "Collar");
      const [low, high] = sortByStrike(specs);
      return [leg(low, "put", "buy", 1), leg(high, "call", "sell", 1)];
    }
  }
}

/** Display label: "put_spread" → "put spread" */
export function structureDisplayName(structureType: StructureType): string {
  return structureType.replace(/_/g, " ");
}

// ── Helpers ─────────────────────────────────────────────────

function legFactory(ticker: string, quantity: number) {
  return (spec: LegSpec, optionType: OptionType, side: Side, ratio: number): OptionLeg => {
    if (!spec.expiry) {
      throw new InvalidOrderError(`No expiry found for strike ${spec.strike}`);
    }
    return Object.freeze({
      underlying: ticker,
      expiry: spec.expiry,
      strike: spec.strike,
      optionType,
      side,
      quantity: quantity * ratio,
      ratio,
    });
  };
}

function resolveType(spec: LegSpec, fallback: OptionType | null = null): OptionType {
  const type = spec.optionType ?? fallback;
  if (!type) {
    throw new InvalidOrderError(`Cannot determine option type for strike ${spec.strike}`);
  }
  return type;
}

function requireStrikes(specs: readonly LegSpec[], count: number, label: string): void {
  if (specs.length < count) {
    throw new InvalidOrderError(`${label} requires ${count} strikes`);
  }
}

function sortByStrike(specs: readonly LegSpec[]): LegSpec[] {
  return [...specs].sort((a, b) => a.strike - b.strike);
}
