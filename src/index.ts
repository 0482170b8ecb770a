/**
 * Vendor invoice parser
 *
 * Rule-based extraction of header fields and line items from the text of
 * vendor invoices. Each vendor is a declarative rule set; adding a vendor
 * means adding data, not code.
 *
 * @packageDocumentation
 */

// ─── Primary API ──────────────────────────────────────────────────────────────
export { InvoiceParser, parseDocument } from "./core";
export type {
  InvoiceParserConfigureOptions,
  ParseOptions,
  ParseFileOptions,
} from "./core";

// Schema / types
export type {
  RawPage,
  LineItem,
  LineItemField,
  NumericItemField,
  HeaderField,
  HeaderFields,
  InvoiceRecord,
} from "./schema/InvoiceRecord";
export { HEADER_FIELDS, NUMERIC_ITEM_FIELDS } from "./schema/InvoiceRecord";
export type {
  PrimitiveSpec,
  PrimitiveKind,
  LineMatcher,
  FieldRule,
  FieldRuleKind,
  AnchoredRegexRule,
  FirstLineAfterLabelRule,
  LastLineBeforeLabelRule,
  MaxNumericMatchRule,
  LastNumericMatchRule,
  ConstantRule,
  FirstMatchingLineRule,
  FirstOfRule,
  ItemWindowSpec,
  WindowRestartPolicy,
  InvoiceTopology,
  VendorRuleSet,
} from "./schema/RuleSet";

// Parser layer
export {
  createRawPage,
  tokenizePage,
  matchesPrimitive,
  evaluateFieldRule,
  BlockExtractor,
} from "./parser";
export type { ItemMatch } from "./parser";

// Vendors
export {
  VendorDispatcher,
  RuleSetVendor,
  normalizeVendorKey,
  defaultDispatcher,
  BUILTIN_RULE_SETS,
  KNIFE_RIVER,
  CORE_MAIN,
  FARWEST,
  MISSOULA_LANDFILL,
} from "./vendors";
export type { VendorParser } from "./vendors";

// Text layer
export {
  TextEngine,
  registerTextProvider,
  unregisterTextProvider,
  getTextProvider,
  PdfTextProvider,
  PlainTextProvider,
  TextExtractionError,
} from "./text";
export type { DocumentSource, TextProvider } from "./text";

// Batch
export { parseBatch, vendorKeyForFolder } from "./batch";
export type {
  BatchDocument,
  BatchFailureCode,
  BatchOptions,
  BatchResult,
  PageReader,
} from "./batch";

// Validation & errors
export {
  validatePages,
  validateRuleSet,
  sanitiseRecord,
  InvoiceParserError,
} from "./core";
export type { ValidationResult, InvoiceParserErrorCode } from "./core";

// Output helpers
export { buildOutputFilename, cleanFilenamePart } from "./utils/filename";
export { formatRecordPreview } from "./utils/preview";

// Logger
export { createLogger, silentLogger } from "./utils/logger";
export type { InvoiceParserLogger, LogLevel } from "./utils/logger";
