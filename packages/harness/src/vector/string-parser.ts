/**
 * Tolerant parsing of vector strings from environment variables.
 *
 * Three tiers, strictest first; the first one to produce a pair wins:
 * 1. "123 456", "123 ", " 456", "123"    - single-space delimited
 * 2. "123x456", "123x", "x456", "x"      - any single non-digit separator
 * 3. "<123> by [456] or so..."          - first one or two digit runs
 */

import type { VectorComponent } from "./vector.js";

export type VectorPair = readonly [VectorComponent, VectorComponent];

/** A single parsing tier: a pair on success, null to let the next tier try */
export type PairParser = (raw: string) => VectorPair | null;

const DIGITS_ONLY = /^[0-9]+$/;
// `u` so that a separator outside the BMP counts as one character
const SINGLE_SEPARATOR = /^([0-9]+)?[^0-9]([0-9]+)?$/u;
const DIGIT_RUNS = /([0-9]+)(?:[^0-9]+([0-9]+))?/;

/** A digit run as a component; undefined when it is too long to be exact */
function toComponent(digits: string | undefined): VectorComponent | undefined {
  if (!digits) {
    return null;
  }
  const parsed = Number.parseInt(digits, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

function toPair(
  x: VectorComponent | undefined,
  y: VectorComponent | undefined,
): VectorPair | null {
  return x === undefined || y === undefined ? null : [x, y];
}

/** Tier 1: the raw string split on exactly one space character */
export function parseSpaceDelimited(raw: string): VectorPair | null {
  const tokens = raw.split(" ");
  if (tokens.length > 2) {
    return null;
  }
  if (!tokens.every((token) => token === "" || DIGITS_ONLY.test(token))) {
    return null;
  }
  if (tokens.every((token) => token === "")) {
    return null;
  }

  const [first, second] = tokens;
  if (tokens.length === 1) {
    const component = toComponent(first);
    return toPair(component, component);
  }
  return toPair(toComponent(first), toComponent(second));
}

/** Tier 2: whole (trimmed) string is `[digits]<one non-digit>[digits]` */
export function parseSingleSeparator(raw: string): VectorPair | null {
  const match = SINGLE_SEPARATOR.exec(raw.trim().toLowerCase());
  if (!match) {
    return null;
  }
  return toPair(toComponent(match[1]), toComponent(match[2]));
}

/** Tier 3: pick the first one or two digit runs out of arbitrary text */
export function scanDigitRuns(raw: string): VectorPair | null {
  const match = DIGIT_RUNS.exec(raw);
  if (!match) {
    return null;
  }
  const x = toComponent(match[1]);
  const y = match[2] === undefined ? x : toComponent(match[2]);
  return toPair(x, y);
}

/** Combine parsers so that the first non-null result wins */
export function firstMatch(...parsers: PairParser[]): PairParser {
  return (raw) => {
    for (const parse of parsers) {
      const pair = parse(raw);
      if (pair) {
        return pair;
      }
    }
    return null;
  };
}

const parseTiers = firstMatch(parseSpaceDelimited, parseSingleSeparator, scanDigitRuns);

/**
 * Parse a vector string into an (x, y) pair.
 * Returns null for an empty string or one without any usable digits.
 */
export function parseVectorString(raw: string): VectorPair | null {
  if (!raw) {
    return null;
  }
  return parseTiers(raw);
}
