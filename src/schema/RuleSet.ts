/**
 * InvoiceParser – Vendor rule-set schema
 *
 * Rules are plain, JSON-serialisable data. Regular expressions are kept as
 * source strings plus flags so an external authoring tool can generate,
 * store and preview rule sets without executing code.
 */

import type { HeaderField, LineItemField } from "./InvoiceRecord";

// ─── Pattern primitives ─────────────────────────────────────────────────────

export type PrimitiveSpec =
  | {
      kind: "decimal";
      /** Reject values with more fractional digits than this */
      maxFractionDigits?: number;
      /** Require exactly this many fractional digits */
      exactFractionDigits?: number;
    }
  | { kind: "date"; mode?: "full" | "search"; yearDigits?: 2 | 4 }
  | { kind: "money" }
  /** Shape mask: `A` = letter, `9` = digit, anything else is literal */
  | { kind: "code"; shape: string }
  | { kind: "digits"; min: number; max?: number }
  /** Decimal followed by a unit suffix, e.g. "12.50 TN" */
  | { kind: "measuredQuantity"; unit: string }
  /** Any line; used for free-text slots such as descriptions */
  | { kind: "text" };

export type PrimitiveKind = PrimitiveSpec["kind"];

// ─── Line matchers ──────────────────────────────────────────────────────────

export type LineMatcher =
  | { kind: "equals"; text: string; caseInsensitive?: boolean }
  /** Every fragment must appear somewhere in the line */
  | { kind: "contains"; all: string[]; caseInsensitive?: boolean }
  | { kind: "pattern"; pattern: string; flags?: string };

// ─── Field rules ────────────────────────────────────────────────────────────

export interface AnchoredRegexRule {
  kind: "anchoredRegex";
  /** Searched against the page lines joined with "\n" */
  pattern: string;
  flags?: string;
  /** Capture group to return (default 1) */
  group?: number;
}

export interface FirstLineAfterLabelRule {
  kind: "firstLineAfterLabel";
  label: string;
  caseInsensitive?: boolean;
}

export interface LastLineBeforeLabelRule {
  kind: "lastLineBeforeLabel";
  label: LineMatcher;
  /**
   * Which label occurrence anchors the scan (1-based, default 1). `"each"`
   * scans from every label line in turn; the first line that qualifies wins.
   */
  occurrence?: number | "each";
  direction: "before" | "after";
  /** How many lines to look at from the label (default: to the page edge) */
  maxDistance?: number;
  /** Whole-line, case-insensitive rejects */
  skipWords?: string[];
  skipPrefixes?: string[];
  skipContaining?: string[];
  /** Reject lines made of digits only */
  skipNumeric?: boolean;
  /** When set, only lines matching this qualify */
  accept?: LineMatcher;
  /** Lines matching this are never the answer; null disables (default: full-line date) */
  dateDetector?: PrimitiveSpec | null;
  /** Lines matching this are never the answer; null disables (default: 6+ digit code) */
  codeDetector?: LineMatcher | null;
}

export interface MaxNumericMatchRule {
  kind: "maxNumericMatch";
  /** Capture group 1, if present, holds the number; otherwise the whole match */
  pattern: string;
  flags?: string;
}

export interface LastNumericMatchRule {
  kind: "lastNumericMatch";
  pattern: string;
  flags?: string;
}

export interface ConstantRule {
  kind: "constant";
  value: string;
}

export interface FirstMatchingLineRule {
  kind: "firstMatchingLine";
  line: LineMatcher;
  /** Case-insensitive fragments that disqualify a line */
  excludeContaining?: string[];
}

/** Tries each rule in order; the first non-empty result wins */
export interface FirstOfRule {
  kind: "firstOf";
  rules: FieldRule[];
}

export type FieldRule =
  | AnchoredRegexRule
  | FirstLineAfterLabelRule
  | LastLineBeforeLabelRule
  | MaxNumericMatchRule
  | LastNumericMatchRule
  | ConstantRule
  | FirstMatchingLineRule
  | FirstOfRule;

export type FieldRuleKind = FieldRule["kind"];

// ─── Line-item windows ──────────────────────────────────────────────────────

/**
 * always – a start line met while accumulating opens a fresh window
 * unlessSlotMatches – it fills the next slot instead when that slot accepts it
 */
export type WindowRestartPolicy = "always" | "unlessSlotMatches";

export interface ItemWindowSpec {
  /** Number of consecutive (non-noise) lines making up one item */
  length: number;
  /** Predicate that opens a window */
  start: PrimitiveSpec;
  /** One validator per slot; `slots.length === length` */
  slots: PrimitiveSpec[];
  /** Slot index feeding each item field */
  fields: Partial<Record<LineItemField, number>>;
  /** Lines containing any of these (case-insensitive) are skipped */
  noise: string[];
  /** What a window-start line does mid-window (default "always") */
  restart?: WindowRestartPolicy;
}

// ─── Vendor rule set ────────────────────────────────────────────────────────

/**
 * perPage – every page is a complete invoice
 * perDocument – one invoice spans all pages
 */
export type InvoiceTopology = "perPage" | "perDocument";

export interface VendorRuleSet {
  /** Canonical dispatch key, lowercase snake_case */
  key: string;
  displayName: string;
  /** Extra lookup keys, e.g. the vendor's folder name */
  aliases: string[];
  topology: InvoiceTopology;
  fields: Record<HeaderField, FieldRule>;
  items?: ItemWindowSpec;
}
