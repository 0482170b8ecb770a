/**
 * InvoiceParser – Canonical record schema
 *
 * Input and output contract of parseDocument(). Every vendor rule set,
 * whatever its page layout, produces these shapes.
 */

// ─── Input ──────────────────────────────────────────────────────────────────

/**
 * Text of one document page, already split into lines.
 * Lines are trimmed and never blank; instances are frozen.
 */
export interface RawPage {
  readonly documentId: string;
  /** 1-based */
  readonly pageIndex: number;
  readonly lines: readonly string[];
}

// ─── Line item ──────────────────────────────────────────────────────────────

export interface LineItem {
  /** Delivery/ticket date in the vendor's own format */
  date?: string;
  description: string;
  quantity: number;
  unitPrice: number;
  extendedPrice: number;
  ticketNumber?: string;
  truckCode?: string;
}

export type LineItemField = keyof LineItem;

export type NumericItemField = "quantity" | "unitPrice" | "extendedPrice";

/** Line item fields holding numbers; their slot values go through parseDecimal */
export const NUMERIC_ITEM_FIELDS: readonly NumericItemField[] = [
  "quantity",
  "unitPrice",
  "extendedPrice",
];

// ─── Invoice record ─────────────────────────────────────────────────────────

export type HeaderField = "vendor" | "invoiceNumber" | "jobName" | "date" | "total";

export const HEADER_FIELDS: readonly HeaderField[] = [
  "vendor",
  "invoiceNumber",
  "jobName",
  "date",
  "total",
];

export type HeaderFields = Record<HeaderField, string>;

/** Returned frozen; nothing downstream of the assembler mutates it */
export interface InvoiceRecord extends HeaderFields {
  /** 1-based index of the page the record starts on */
  page: number;
  items: readonly LineItem[];
}
