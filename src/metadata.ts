import { InvalidConfigurationError } from "./errors";
import type { Metadata, MetadataValue } from "./types";

const NUMBER = /^-?\d+(\.\d+)?$/;

/** Type a raw `key=value` value: `true`/`false`, decimal numbers, otherwise the string. */
export function parseMetadataValue(raw: string): MetadataValue {
  if (raw === "true") return true;
  if (raw === "false") return false;
  if (NUMBER.test(raw)) return Number(raw);
  return raw;
}

/**
 * Score bonus for retrieval candidates whose chunk metadata matches, either
 * by equality or by a numeric lower bound (numeric strings count as numbers).
 */
export type MetadataBoost =
  | { key: string; equals: MetadataValue; bonus: number }
  | { key: string; atLeast: number; bonus: number };

function numericValue(value: MetadataValue): number | undefined {
  if (typeof value === "number") return value;
  if (typeof value === "string" && NUMBER.test(value)) return Number(value);
  return undefined;
}

/** Sum of the bonuses of every boost matching `metadata`. */
export function metadataBonus(metadata: Metadata, boosts: readonly MetadataBoost[]): number {
  let bonus = 0;
  for (const boost of boosts) {
    const value = metadata[boost.key];
    if (value === undefined) continue;
    if ("equals" in boost) {
      if (value === boost.equals) bonus += boost.bonus;
      continue;
    }
    const n = numericValue(value);
    if (n !== undefined && n >= boost.atLeast) bonus += boost.bonus;
  }
  return bonus;
}

/**
 * Parse comma-separated boost rules, `key=value:bonus` or `key>=number:bonus`,
 * e.g. `importance=high:0.2,year>=2019:0.1`. Values are typed like `--meta`.
 *
 * @throws {InvalidConfigurationError} a rule does not have one of those shapes
 */
export function parseMetadataBoosts(rules: string): MetadataBoost[] {
  const boosts: MetadataBoost[] = [];
  for (const rule of rules.split(",").map((r) => r.trim())) {
    if (!rule) continue;
    const match = /^([^=<>:\s]+)\s*(>=|=)(.+):\s*(-?\d+(?:\.\d+)?)$/.exec(rule);
    if (!match) {
      throw new InvalidConfigurationError(
        `metadata boost "${rule}" must look like key=value:bonus or key>=number:bonus`,
      );
    }
    const [, key, op, rawValue, rawBonus] = match;
    const value = rawValue.trim();
    const bonus = Number(rawBonus);
    if (op === "=") {
      boosts.push({ key, equals: parseMetadataValue(value), bonus });
    } else if (NUMBER.test(value)) {
      boosts.push({ key, atLeast: Number(value), bonus });
    } else {
      throw new InvalidConfigurationError(`metadata boost "${rule}" needs a number after >=`);
    }
  }
  return boosts;
}
