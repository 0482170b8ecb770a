/**
 * InvoiceParser – Output filename builder
 *
 * One PDF per invoice record, named Vendor_Job_Date_Invoice_Total.pdf.
 */

import type { InvoiceRecord } from "../schema/InvoiceRecord";

const ILLEGAL_FILENAME_CHARS = /[\\/:*?"<>|]/g;

/** Placeholder for records whose invoice number could not be found */
export const MISSING_INVOICE_NUMBER = "NOINV";

/** "09/08/25" → "09-08-25", "Main St Job" → "MainStJob" */
export function cleanFilenamePart(value: string): string {
  return value
    .trim()
    .replace(/\//g, "-")
    .replace(/\s+/g, "")
    .replace(ILLEGAL_FILENAME_CHARS, "");
}

export function buildOutputFilename(
  record: Pick<InvoiceRecord, "vendor" | "jobName" | "date" | "invoiceNumber" | "total">,
): string {
  const invoice = cleanFilenamePart(record.invoiceNumber) || MISSING_INVOICE_NUMBER;
  const parts = [
    cleanFilenamePart(record.vendor),
    cleanFilenamePart(record.jobName),
    cleanFilenamePart(record.date),
    invoice,
    cleanFilenamePart(record.total),
  ].filter((part) => part.length > 0);

  return `${parts.join("_")}.pdf`;
}
