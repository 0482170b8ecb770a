/**
 * InvoiceParser – Console preview of parsed records
 */

import type { InvoiceRecord, LineItem } from "../schema/InvoiceRecord";

function formatItem(item: LineItem): string {
  const parts = [
    item.ticketNumber ?? item.date ?? "",
    item.description,
    `${item.quantity} x ${item.unitPrice} = ${item.extendedPrice}`,
  ].filter((p) => p.length > 0);
  return `  - ${parts.join("  ")}`;
}

/** One block per record, separated by a blank line. */
export function formatRecordPreview(records: readonly InvoiceRecord[]): string {
  const blocks = records.map((r) =>
    [
      `===== INVOICE PAGE ${r.page} =====`,
      `Vendor:         ${r.vendor}`,
      `Invoice Number: ${r.invoiceNumber}`,
      `Jobname:        ${r.jobName}`,
      `Date:           ${r.date}`,
      `Total:          ${r.total}`,
      `Items:          ${r.items.length}`,
      ...r.items.map(formatItem),
      "",
    ].join("\n"),
  );
  return blocks.join("\n").trimEnd();
}
