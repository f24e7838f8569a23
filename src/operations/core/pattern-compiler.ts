/**
 * Compilation of co-transduction patterns
 *
 * Separator characters (space, underscore, hyphen) are only significant
 * when the pattern itself contains them. Any separator the pattern lacks is
 * stripped from both the pattern and every candidate value, so `HLAA2`
 * matches `HLA-A2` and `HLA A2`. Matching is case-insensitive and always
 * covers the whole value.
 *
 * @module operations/core/pattern-compiler
 */

import { PatternCompilationError } from "../../errors";
import type { CoTransductionPattern, SeparatorChar } from "../../types";
import { SEPARATOR_CHARS } from "../../types";

/** Pattern list value meaning "no patterns" */
export const NO_PATTERNS = "none";

export interface PatternCompilation {
  readonly patterns: CoTransductionPattern[];
  readonly errors: PatternCompilationError[];
}

/**
 * Split a comma-separated pattern list
 *
 * @example
 * ```typescript
 * parsePatternList(".*HEL.*, GFP");  // [".*HEL.*", "GFP"]
 * parsePatternList("none");          // []
 * ```
 */
export function parsePatternList(text: string | undefined): string[] {
  if (text === undefined) return [];
  const patterns = text
    .split(",")
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern !== "");
  return patterns.length === 1 && patterns[0]?.toLowerCase() === NO_PATTERNS ? [] : patterns;
}

/**
 * Remove every occurrence of the given characters
 */
export function stripChars(text: string, chars: ReadonlySet<SeparatorChar>): string {
  let result = text;
  for (const char of chars) {
    result = result.split(char).join("");
  }
  return result;
}

function buildPattern(
  raw: string,
  regexSource: (normalized: string) => string,
  source: CoTransductionPattern["source"]
): CoTransductionPattern {
  const rawExpression = raw.trim();
  if (rawExpression === "") {
    throw new PatternCompilationError(raw, "pattern is empty");
  }

  const significantChars = new Set<SeparatorChar>();
  const ignoredChars = new Set<SeparatorChar>();
  for (const char of SEPARATOR_CHARS) {
    (rawExpression.includes(char) ? significantChars : ignoredChars).add(char);
  }

  const body = regexSource(stripChars(rawExpression, ignoredChars));

  let compiledMatcher: RegExp;
  try {
    // Compiled bare first: an unbalanced body such as `a)|(b` would
    // otherwise escape the anchoring group
    new RegExp(body);
    compiledMatcher = new RegExp(`^(?:${body})$`, "i");
  } catch (error) {
    throw new PatternCompilationError(
      rawExpression,
      error instanceof Error ? error.message : String(error)
    );
  }

  return { rawExpression, significantChars, ignoredChars, compiledMatcher, source };
}

/**
 * Compile one regular-expression pattern
 *
 * @throws {PatternCompilationError} When the pattern is empty or not a valid regular expression
 */
export function compilePattern(raw: string): CoTransductionPattern {
  return buildPattern(raw, (normalized) => normalized, "explicit");
}

/**
 * Escape regular-expression metacharacters
 */
export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\\/]/g, "\\$&");
}

/**
 * Compile literal text, e.g. a protein name taken from a file name
 *
 * @throws {PatternCompilationError} When the text is empty
 */
export function compileLiteralPattern(text: string): CoTransductionPattern {
  return buildPattern(text, escapeRegExp, "inferred");
}

/**
 * Compile every pattern, collecting failures instead of stopping at the first
 */
export function compilePatterns(raws: readonly string[]): PatternCompilation {
  const patterns: CoTransductionPattern[] = [];
  const errors: PatternCompilationError[] = [];

  for (const raw of raws) {
    try {
      patterns.push(compilePattern(raw));
    } catch (error) {
      if (!(error instanceof PatternCompilationError)) throw error;
      errors.push(error);
    }
  }

  return { patterns, errors };
}

/**
 * Whether a single accession or description value fully matches
 */
export function matchesValue(pattern: CoTransductionPattern, value: string): boolean {
  const candidate = stripChars(value.trim(), pattern.ignoredChars).trim();
  return pattern.compiledMatcher.test(candidate);
}
