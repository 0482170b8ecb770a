/**
 * InvoiceParser – Knife River rule set
 *
 * One invoice per page. Tickets are printed as six-line blocks:
 *
 *   123456        ticket number
 *   Base Rock     material
 *   ABC1          truck code
 *   12.50 TN      tons delivered
 *   9.82          price per ton
 *   122.75        extended price
 */

import type { VendorRuleSet } from "../schema/RuleSet";

export const KNIFE_RIVER: VendorRuleSet = {
  key: "knife_river",
  displayName: "Knife River",
  aliases: ["knife river materials", "kr"],
  topology: "perPage",
  fields: {
    vendor: { kind: "constant", value: "Knife River" },
    invoiceNumber: {
      kind: "firstMatchingLine",
      line: { kind: "pattern", pattern: "^\\d{6,}$" },
    },
    date: { kind: "anchoredRegex", pattern: "\\b(\\d{2}/\\d{2}/\\d{2})\\b" },
    // The grand total is always the last amount printed
    total: { kind: "lastNumericMatch", pattern: "\\b\\d{1,3}(?:,\\d{3})*\\.\\d{2}\\b" },
    jobName: {
      kind: "lastLineBeforeLabel",
      label: { kind: "equals", text: "ORIGINAL", caseInsensitive: true },
      direction: "before",
      maxDistance: 2,
      skipWords: ["INVOICE", "TICKET", "PAYABLE COPY", "SUBTOTAL", "TOTAL"],
    },
  },
  items: {
    length: 6,
    start: { kind: "digits", min: 5, max: 7 },
    slots: [
      { kind: "digits", min: 5, max: 7 },
      { kind: "text" },
      { kind: "code", shape: "AAA9" },
      { kind: "measuredQuantity", unit: "TN" },
      { kind: "decimal", maxFractionDigits: 4 },
      { kind: "decimal", exactFractionDigits: 2 },
    ],
    fields: {
      ticketNumber: 0,
      description: 1,
      truckCode: 2,
      quantity: 3,
      unitPrice: 4,
      extendedPrice: 5,
    },
    noise: [
      "item",
      "description",
      "special",
      "instructions",
      "subtotal",
      "total",
      "sales",
      "discount",
      "taxable",
      "nontaxable",
      "kr-mtn",
      "quantity",
    ],
  },
};
