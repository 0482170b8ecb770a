/**
 * InvoiceParser – Field extractors
 *
 * Each FieldRule variant is a pure function RawPage → string | undefined.
 * `undefined` means the rule found nothing; an empty string is an explicit
 * "looked, nothing qualified" (job names, totals). No rule ever throws.
 */

import type { RawPage } from "../schema/InvoiceRecord";
import type {
  AnchoredRegexRule,
  FieldRule,
  FirstLineAfterLabelRule,
  FirstMatchingLineRule,
  LastLineBeforeLabelRule,
  LineMatcher,
  PrimitiveSpec,
} from "../schema/RuleSet";
import {
  compilePattern,
  matchesLine,
  matchesPrimitive,
  pageText,
  parseDecimal,
  toPlainAmount,
} from "./primitives";

const DEFAULT_DATE_DETECTOR: PrimitiveSpec = { kind: "date", mode: "full" };
const DEFAULT_CODE_DETECTOR: LineMatcher = { kind: "pattern", pattern: "^\\d{6,}$" };

// ─── Anchored regex ───────────────────────────────────────────────────────────

/**
 * Search the whole page text, so an anchor and its value may sit on
 * different lines ("Invoice #\n12345").
 */
export function extractAnchoredRegex(
  page: RawPage,
  rule: AnchoredRegexRule,
): string | undefined {
  const rx = compilePattern(rule.pattern, rule.flags?.replace("g", ""));
  if (!rx) return undefined;
  const m = rx.exec(pageText(page));
  if (!m) return undefined;
  const value = m[rule.group ?? 1];
  return value === undefined ? undefined : value.trim();
}

// ─── Label-relative rules ─────────────────────────────────────────────────────

export function extractFirstLineAfterLabel(
  page: RawPage,
  rule: FirstLineAfterLabelRule,
): string | undefined {
  const label = rule.caseInsensitive ? rule.label.trim().toLowerCase() : rule.label.trim();
  const idx = page.lines.findIndex(
    (l) => (rule.caseInsensitive ? l.toLowerCase() : l) === label,
  );
  if (idx < 0 || idx + 1 >= page.lines.length) return undefined;
  return page.lines[idx + 1];
}

function findLabelIndices(lines: readonly string[], label: LineMatcher): number[] {
  const indices: number[] = [];
  lines.forEach((line, i) => {
    if (matchesLine(label, line)) indices.push(i);
  });
  return indices;
}

function isRejectedCandidate(line: string, rule: LastLineBeforeLabelRule): boolean {
  const lower = line.toLowerCase();
  if (rule.skipWords?.some((w) => w.toLowerCase() === lower)) return true;
  if (rule.skipPrefixes?.some((p) => lower.startsWith(p.toLowerCase()))) return true;
  if (rule.skipContaining?.some((w) => lower.includes(w.toLowerCase()))) return true;
  if (rule.skipNumeric && /^\d+$/.test(line)) return true;
  if (rule.accept && !matchesLine(rule.accept, line)) return true;

  const dateDetector =
    rule.dateDetector === undefined ? DEFAULT_DATE_DETECTOR : rule.dateDetector;
  if (dateDetector && matchesPrimitive(dateDetector, line)) return true;

  const codeDetector =
    rule.codeDetector === undefined ? DEFAULT_CODE_DETECTOR : rule.codeDetector;
  if (codeDetector && matchesLine(codeDetector, line)) return true;

  return false;
}

function scanFromLabel(
  lines: readonly string[],
  labelIdx: number,
  rule: LastLineBeforeLabelRule,
): string | undefined {
  const step = rule.direction === "before" ? -1 : 1;
  const limit = rule.maxDistance ?? lines.length;

  for (let d = 1; d <= limit; d++) {
    const i = labelIdx + step * d;
    if (i < 0 || i >= lines.length) break;
    if (!isRejectedCandidate(lines[i], rule)) return lines[i];
  }
  return undefined;
}

/**
 * Walk away from a label line and return the first line that is not a
 * skip word, a date or a bare code. Always a string: "" when the label is
 * missing or no nearby line qualifies.
 */
export function extractLastLineBeforeLabel(
  page: RawPage,
  rule: LastLineBeforeLabelRule,
): string {
  const { lines } = page;
  const labels = findLabelIndices(lines, rule.label);
  const occurrence = rule.occurrence ?? 1;
  const anchors = occurrence === "each" ? labels : labels.slice(occurrence - 1, occurrence);

  for (const labelIdx of anchors) {
    const found = scanFromLabel(lines, labelIdx, rule);
    if (found !== undefined) return found;
  }
  return "";
}

export function extractFirstMatchingLine(
  page: RawPage,
  rule: FirstMatchingLineRule,
): string | undefined {
  const excluded = (rule.excludeContaining ?? []).map((w) => w.toLowerCase());
  return page.lines.find((line) => {
    if (!matchesLine(rule.line, line)) return false;
    const lower = line.toLowerCase();
    return !excluded.some((w) => lower.includes(w));
  });
}

// ─── Numeric matches ──────────────────────────────────────────────────────────

function collectAmounts(page: RawPage, pattern: string, flags?: string): string[] {
  const rx = compilePattern(pattern, flags, "g");
  if (!rx) return [];
  const amounts: string[] = [];
  for (const m of pageText(page).matchAll(rx)) {
    const raw = m[1] ?? m[0];
    if (raw) amounts.push(toPlainAmount(raw));
  }
  return amounts;
}

/**
 * Greatest monetary value on the page, comma-free. Ties go to the first
 * occurrence in reading order; "" when the page has no amounts.
 */
export function extractMaxNumericMatch(
  page: RawPage,
  pattern: string,
  flags?: string,
): string {
  let best = "";
  let bestValue = -Infinity;
  for (const amount of collectAmounts(page, pattern, flags)) {
    const value = parseDecimal(amount);
    if (value > bestValue) {
      best = amount;
      bestValue = value;
    }
  }
  return best;
}

/** Last monetary value on the page, regardless of size. */
export function extractLastNumericMatch(
  page: RawPage,
  pattern: string,
  flags?: string,
): string {
  const amounts = collectAmounts(page, pattern, flags);
  return amounts.length > 0 ? amounts[amounts.length - 1] : "";
}

// ─── Dispatcher over variants ─────────────────────────────────────────────────

export function evaluateFieldRule(rule: FieldRule, page: RawPage): string | undefined {
  switch (rule.kind) {
    case "anchoredRegex":
      return extractAnchoredRegex(page, rule);
    case "firstLineAfterLabel":
      return extractFirstLineAfterLabel(page, rule);
    case "lastLineBeforeLabel":
      return extractLastLineBeforeLabel(page, rule);
    case "maxNumericMatch":
      return extractMaxNumericMatch(page, rule.pattern, rule.flags);
    case "lastNumericMatch":
      return extractLastNumericMatch(page, rule.pattern, rule.flags);
    case "constant":
      return rule.value;
    case "firstMatchingLine":
      return extractFirstMatchingLine(page, rule);
    case "firstOf": {
      let sawEmpty = false;
      for (const inner of rule.rules) {
        const value = evaluateFieldRule(inner, page);
        if (value) return value;
        if (value === "") sawEmpty = true;
      }
      return sawEmpty ? "" : undefined;
    }
  }
}
