export { InvoiceParser, parseDocument } from "./InvoiceParser";
export type {
  InvoiceParserConfigureOptions,
  ParseOptions,
  ParseFileOptions,
} from "./InvoiceParser";
export {
  validatePages,
  validateRuleSet,
  sanitiseRecord,
  sanitiseTotal,
  InvoiceParserError,
} from "./validator";
export type { ValidationResult, InvoiceParserErrorCode } from "./validator";
