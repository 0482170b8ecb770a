/**
 * InvoiceParser – Line tokenizer and pattern primitives
 *
 * Every predicate here looks at a single trimmed line and is total:
 * malformed input is simply a non-match.
 * No external dependencies – pure TypeScript.
 */

import type { RawPage } from "../schema/InvoiceRecord";
import type { LineMatcher, PrimitiveSpec } from "../schema/RuleSet";

// ─── Text normalisation ───────────────────────────────────────────────────────

/**
 * Clean extraction artefacts out of page text without changing its meaning.
 */
export function normalisePageText(raw: string): string {
  let t = raw;

  // NUL bytes leak out of some PDF producers
  t = t.replace(/\u0000/g, "");
  t = t.replace(/[\u200B-\u200D\uFEFF]/g, "");
  t = t.replace(/\u00A0/g, " ");
  t = t.replace(/[\u2013\u2014]/g, "-");
  t = t.replace(/\r\n?/g, "\n");

  return t;
}

// ─── Tokenizer ────────────────────────────────────────────────────────────────

/** Build a RawPage from lines that may still contain blanks or padding. */
export function createRawPage(
  lines: readonly string[],
  pageIndex: number,
  documentId: string,
): RawPage {
  const cleaned = lines
    .map((l) => normalisePageText(l).trim())
    .filter((l) => l.length > 0);
  return Object.freeze({
    documentId,
    pageIndex,
    lines: Object.freeze(cleaned),
  });
}

/** Split the text of one page into a RawPage. */
export function tokenizePage(
  text: string,
  pageIndex: number,
  documentId: string,
): RawPage {
  return createRawPage(normalisePageText(text).split("\n"), pageIndex, documentId);
}

/** Page lines joined back into one searchable string. */
export function pageText(page: RawPage): string {
  return page.lines.join("\n");
}

// ─── Regex pattern library ────────────────────────────────────────────────────

export const PATTERNS = {
  DECIMAL: /^(?:\d+(?:\.(\d+))?|\.(\d+))$/,

  // M/D/YYYY or M/D/YY
  DATE_FULL: /^\d{1,2}\/\d{1,2}\/(?:\d{4}|\d{2})$/,
  DATE_FULL_YY: /^\d{1,2}\/\d{1,2}\/\d{2}$/,
  DATE_FULL_YYYY: /^\d{1,2}\/\d{1,2}\/\d{4}$/,
  DATE_SEARCH: /\b\d{1,2}\/\d{1,2}\/(?:\d{4}|\d{2})\b/,
  DATE_SEARCH_YY: /\b\d{1,2}\/\d{1,2}\/\d{2}\b/,
  DATE_SEARCH_YYYY: /\b\d{1,2}\/\d{1,2}\/\d{4}\b/,

  // 1,234.56 / 1234.56 / $1,234.56 – always two decimals
  MONEY: /^\$?(?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2}$/,

  // Monetary substrings anywhere on a page
  MONEY_BARE: /\b\d{1,3}(?:,\d{3})*\.\d{2}\b/g,
  MONEY_DOLLAR: /\$(\d{1,3}(?:,\d{3})*\.\d{2})/g,

  DIGITS: /^\d+$/,
};

// ─── Safe regex compilation ───────────────────────────────────────────────────

const _patternCache = new Map<string, RegExp | null>();

/**
 * Compile a rule pattern, returning null when the source is not a valid
 * regular expression. `extraFlags` are merged into the rule's own flags.
 */
export function compilePattern(
  source: string,
  flags: string = "",
  extraFlags: string = "",
): RegExp | null {
  const merged = Array.from(new Set((flags + extraFlags).split(""))).join("");
  const cacheKey = `${merged}/${source}`;
  if (_patternCache.has(cacheKey)) {
    const cached = _patternCache.get(cacheKey) ?? null;
    if (cached) cached.lastIndex = 0;
    return cached;
  }
  let compiled: RegExp | null;
  try {
    compiled = new RegExp(source, merged);
  } catch {
    compiled = null;
  }
  _patternCache.set(cacheKey, compiled);
  return compiled;
}

// ─── Predicates ───────────────────────────────────────────────────────────────

export interface DecimalOptions {
  maxFractionDigits?: number;
  exactFractionDigits?: number;
}

/** Optional integer part, optional fractional part, nothing else. */
export function isDecimalNumber(line: string, options: DecimalOptions = {}): boolean {
  const m = line.match(PATTERNS.DECIMAL);
  if (!m) return false;
  const fraction = m[1] ?? m[2] ?? "";
  if (
    options.exactFractionDigits !== undefined &&
    fraction.length !== options.exactFractionDigits
  ) {
    return false;
  }
  if (
    options.maxFractionDigits !== undefined &&
    fraction.length > options.maxFractionDigits
  ) {
    return false;
  }
  return true;
}

export interface DateOptions {
  /** "full" – the whole line is the date; "search" – a date appears somewhere */
  mode?: "full" | "search";
  yearDigits?: 2 | 4;
}

export function isDate(line: string, options: DateOptions = {}): boolean {
  const search = options.mode === "search";
  let rx: RegExp;
  if (options.yearDigits === 2) {
    rx = search ? PATTERNS.DATE_SEARCH_YY : PATTERNS.DATE_FULL_YY;
  } else if (options.yearDigits === 4) {
    rx = search ? PATTERNS.DATE_SEARCH_YYYY : PATTERNS.DATE_FULL_YYYY;
  } else {
    rx = search ? PATTERNS.DATE_SEARCH : PATTERNS.DATE_FULL;
  }
  return rx.test(line);
}

export function isMoney(line: string): boolean {
  return PATTERNS.MONEY.test(line);
}

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const _shapeCache = new Map<string, RegExp>();

/**
 * Full-line match against a shape mask: `A` is an upper-case letter,
 * `9` a digit, every other character stands for itself.
 * "AAA9" accepts "ABC1" but not "AB1".
 */
export function isCode(line: string, shape: string): boolean {
  let rx = _shapeCache.get(shape);
  if (!rx) {
    const body = shape
      .split("")
      .map((ch) => (ch === "A" ? "[A-Z]" : ch === "9" ? "\\d" : escapeRegex(ch)))
      .join("");
    rx = new RegExp(`^${body}$`);
    _shapeCache.set(shape, rx);
  }
  return rx.test(line);
}

/** A bare integer of `min`..`max` digits (no upper bound when max is omitted). */
export function isDigits(line: string, min: number, max?: number): boolean {
  if (!PATTERNS.DIGITS.test(line)) return false;
  if (line.length < min) return false;
  return max === undefined || line.length <= max;
}

/** A decimal followed by a unit suffix, e.g. "12.50 TN". */
export function isMeasuredQuantity(line: string, unit: string): boolean {
  const rx = new RegExp(`^\\d+(?:\\.\\d+)?\\s*${escapeRegex(unit)}$`, "i");
  return rx.test(line);
}

/** Evaluate a primitive described as data. */
export function matchesPrimitive(spec: PrimitiveSpec, line: string): boolean {
  switch (spec.kind) {
    case "decimal":
      return isDecimalNumber(line, spec);
    case "date":
      return isDate(line, spec);
    case "money":
      return isMoney(line);
    case "code":
      return isCode(line, spec.shape);
    case "digits":
      return isDigits(line, spec.min, spec.max);
    case "measuredQuantity":
      return isMeasuredQuantity(line, spec.unit);
    case "text":
      return line.length > 0;
  }
}

/** Describe a primitive for log output, e.g. `code(AAA9)`. */
export function describePrimitive(spec: PrimitiveSpec): string {
  switch (spec.kind) {
    case "code":
      return `code(${spec.shape})`;
    case "digits":
      return `digits(${spec.min}-${spec.max ?? "∞"})`;
    case "measuredQuantity":
      return `measuredQuantity(${spec.unit})`;
    default:
      return spec.kind;
  }
}

// ─── Line matchers ────────────────────────────────────────────────────────────

export function matchesLine(matcher: LineMatcher, line: string): boolean {
  switch (matcher.kind) {
    case "equals":
      return matcher.caseInsensitive
        ? line.toLowerCase() === matcher.text.toLowerCase()
        : line === matcher.text;
    case "contains": {
      const haystack = matcher.caseInsensitive ? line.toLowerCase() : line;
      return matcher.all.every((fragment) =>
        haystack.includes(matcher.caseInsensitive ? fragment.toLowerCase() : fragment),
      );
    }
    case "pattern": {
      const rx = compilePattern(matcher.pattern, matcher.flags);
      return rx !== null && rx.test(line);
    }
  }
}

// ─── Number parsing ───────────────────────────────────────────────────────────

/**
 * Parse a slot or total value such as "$1,234.56" or "12.50 TN".
 * Returns 0 when no number can be read.
 */
export function parseDecimal(raw: string | undefined | null): number {
  if (raw == null) return 0;
  const m = String(raw)
    .replace(/[$,\s]/g, "")
    .match(/^\d*\.?\d+/);
  if (!m) return 0;
  const n = parseFloat(m[0]);
  return isNaN(n) ? 0 : n;
}

/** Strip currency symbol, thousands separators and spaces from an amount. */
export function toPlainAmount(raw: string): string {
  return raw.replace(/[$,\s]/g, "");
}
