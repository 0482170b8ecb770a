/**
 * InvoiceParser – Farwest rule set
 *
 * A single invoice may run over several pages. Each load is printed as
 * tons, amount, date, material and price per ton on five lines.
 */

import type { VendorRuleSet } from "../schema/RuleSet";

export const FARWEST: VendorRuleSet = {
  key: "farwest",
  displayName: "Farwest",
  aliases: ["far west", "farwest rock"],
  topology: "perDocument",
  fields: {
    vendor: { kind: "constant", value: "Farwest" },
    invoiceNumber: {
      kind: "anchoredRegex",
      pattern: "^invoice #\\n[#\\s]*(.+)$",
      flags: "im",
    },
    jobName: { kind: "firstLineAfterLabel", label: "JOB", caseInsensitive: true },
    date: { kind: "anchoredRegex", pattern: "\\b(\\d{1,2}/\\d{1,2}/\\d{4})\\b" },
    total: { kind: "maxNumericMatch", pattern: "\\b\\d{1,3}(?:,\\d{3})*\\.\\d{2}\\b" },
  },
  items: {
    length: 5,
    start: { kind: "decimal" },
    slots: [
      { kind: "decimal" },
      { kind: "decimal" },
      { kind: "date", mode: "full", yearDigits: 4 },
      { kind: "text" },
      { kind: "decimal" },
    ],
    fields: {
      quantity: 0,
      extendedPrice: 1,
      date: 2,
      description: 3,
      unitPrice: 4,
    },
    noise: ["tons", "amount", "$/ton"],
    restart: "unlessSlotMatches",
  },
};
