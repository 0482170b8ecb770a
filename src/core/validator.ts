/**
 * InvoiceParser – Input & output validation layer
 *
 * Validates pages and rule sets before parsing and sanitises every record
 * before it is returned to the caller.
 */

import type { InvoiceRecord, RawPage } from "../schema/InvoiceRecord";
import { HEADER_FIELDS } from "../schema/InvoiceRecord";
import type {
  FieldRule,
  ItemWindowSpec,
  LineMatcher,
  PrimitiveSpec,
  VendorRuleSet,
} from "../schema/RuleSet";
import { compilePattern, isDecimalNumber, toPlainAmount } from "../parser/primitives";

// ─── Input validation ─────────────────────────────────────────────────────────

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

export function validatePages(pages: readonly RawPage[]): ValidationResult {
  const errors: string[] = [];

  if (!Array.isArray(pages)) {
    return { valid: false, errors: ["`pages` must be an array of RawPage."] };
  }

  const seen = new Set<number>();
  pages.forEach((page: RawPage, i: number) => {
    if (!Number.isInteger(page.pageIndex) || page.pageIndex < 1) {
      errors.push(`pages[${i}].pageIndex must be a positive integer.`);
    } else if (seen.has(page.pageIndex)) {
      errors.push(`pages[${i}].pageIndex ${page.pageIndex} is duplicated.`);
    } else {
      seen.add(page.pageIndex);
    }
    if (!Array.isArray(page.lines)) {
      errors.push(`pages[${i}].lines must be an array of strings.`);
    } else if (page.lines.some((l: unknown) => typeof l !== "string" || l.trim().length === 0)) {
      errors.push(`pages[${i}].lines must contain only non-blank strings.`);
    }
  });

  return { valid: errors.length === 0, errors };
}

// ─── Rule-set validation ──────────────────────────────────────────────────────

function checkPattern(
  errors: string[],
  where: string,
  pattern: string,
  flags?: string,
): void {
  if (compilePattern(pattern, flags) === null) {
    errors.push(`${where}: pattern /${pattern}/${flags ?? ""} does not compile.`);
  }
}

function checkMatcher(errors: string[], where: string, matcher: LineMatcher): void {
  if (matcher.kind === "pattern") {
    checkPattern(errors, where, matcher.pattern, matcher.flags);
  } else if (matcher.kind === "contains" && matcher.all.length === 0) {
    errors.push(`${where}: \`contains\` needs at least one fragment.`);
  }
}

function checkPrimitive(errors: string[], where: string, spec: PrimitiveSpec): void {
  switch (spec.kind) {
    case "code":
      if (spec.shape.length === 0) errors.push(`${where}: code shape is empty.`);
      break;
    case "digits":
      if (spec.min < 1 || (spec.max !== undefined && spec.max < spec.min)) {
        errors.push(`${where}: digits range ${spec.min}-${spec.max ?? ""} is invalid.`);
      }
      break;
    case "measuredQuantity":
      if (spec.unit.trim().length === 0) errors.push(`${where}: unit is empty.`);
      break;
    default:
      break;
  }
}

function checkFieldRule(errors: string[], where: string, rule: FieldRule): void {
  switch (rule.kind) {
    case "anchoredRegex":
      checkPattern(errors, where, rule.pattern, rule.flags);
      if (rule.group !== undefined && rule.group < 0) {
        errors.push(`${where}: capture group must not be negative.`);
      }
      break;
    case "maxNumericMatch":
    case "lastNumericMatch":
      checkPattern(errors, where, rule.pattern, rule.flags);
      break;
    case "firstLineAfterLabel":
      if (rule.label.trim().length === 0) errors.push(`${where}: label is empty.`);
      break;
    case "lastLineBeforeLabel":
      checkMatcher(errors, where, rule.label);
      if (rule.accept) checkMatcher(errors, `${where}.accept`, rule.accept);
      if (rule.codeDetector) checkMatcher(errors, `${where}.codeDetector`, rule.codeDetector);
      if (rule.dateDetector) checkPrimitive(errors, `${where}.dateDetector`, rule.dateDetector);
      if (typeof rule.occurrence === "number" && rule.occurrence < 1) {
        errors.push(`${where}: occurrence is 1-based.`);
      }
      if (rule.maxDistance !== undefined && rule.maxDistance < 1) {
        errors.push(`${where}: maxDistance must be at least 1.`);
      }
      break;
    case "firstMatchingLine":
      checkMatcher(errors, where, rule.line);
      break;
    case "firstOf":
      if (rule.rules.length === 0) errors.push(`${where}: firstOf needs at least one rule.`);
      rule.rules.forEach((inner, i) => checkFieldRule(errors, `${where}[${i}]`, inner));
      break;
    case "constant":
      break;
  }
}

function checkItemWindow(errors: string[], spec: ItemWindowSpec): void {
  if (!Number.isInteger(spec.length) || spec.length < 1) {
    errors.push("items.length must be a positive integer.");
    return;
  }
  if (spec.slots.length !== spec.length) {
    errors.push(`items.slots has ${spec.slots.length} validators for a window of ${spec.length}.`);
  }
  checkPrimitive(errors, "items.start", spec.start);
  spec.slots.forEach((slot, i) => checkPrimitive(errors, `items.slots[${i}]`, slot));
  for (const [field, index] of Object.entries(spec.fields)) {
    if (index === undefined) continue;
    if (!Number.isInteger(index) || index < 0 || index >= spec.length) {
      errors.push(`items.fields.${field} points at slot ${index}, outside the window.`);
    }
  }
}

export function validateRuleSet(ruleSet: VendorRuleSet): ValidationResult {
  const errors: string[] = [];

  if (!/^[a-z0-9_]+$/.test(ruleSet.key)) {
    errors.push(`key "${ruleSet.key}" must be lowercase snake_case.`);
  }
  for (const field of HEADER_FIELDS) {
    const rule = ruleSet.fields[field];
    if (!rule) {
      errors.push(`fields.${field} has no rule.`);
      continue;
    }
    checkFieldRule(errors, `fields.${field}`, rule);
  }
  if (ruleSet.items) checkItemWindow(errors, ruleSet.items);

  return { valid: errors.length === 0, errors };
}

// ─── Response sanitisation ────────────────────────────────────────────────────

/** Comma-free decimal string, or "" when the raw value is not an amount. */
export function sanitiseTotal(raw: string): string {
  const plain = toPlainAmount(raw);
  return isDecimalNumber(plain) ? plain : "";
}

/** Clean the total, then freeze the record and its items. */
export function sanitiseRecord(record: InvoiceRecord): InvoiceRecord {
  const items = record.items.map((item) => Object.freeze({ ...item }));
  return Object.freeze({
    vendor: record.vendor,
    invoiceNumber: record.invoiceNumber,
    jobName: record.jobName,
    date: record.date,
    total: sanitiseTotal(record.total),
    page: record.page,
    items: Object.freeze(items),
  });
}

// ─── Typed InvoiceParser error ────────────────────────────────────────────────

export type InvoiceParserErrorCode =
  | "DOCUMENT_UNREADABLE"
  | "UNKNOWN_VENDOR"
  | "INVALID_INPUT"
  | "INVALID_RULE_SET";

export class InvoiceParserError extends Error {
  constructor(
    message: string,
    public readonly code: InvoiceParserErrorCode,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "InvoiceParserError";
  }
}
