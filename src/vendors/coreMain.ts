/**
 * InvoiceParser – Core & Main rule set
 *
 * One invoice per page, header fields only. Labels and values are printed
 * on consecutive lines ("Invoice Date\n09/30/2025").
 */

import type { LastLineBeforeLabelRule, VendorRuleSet } from "../schema/RuleSet";

const JOB_NAME_SKIP_PREFIXES = [
  "job #",
  "bill of lading",
  "shipped via",
  "invoice#",
  "invoice #",
  "invoice",
  "date ordered",
  "date shipped",
];

const JOB_NAME_SCAN: Omit<LastLineBeforeLabelRule, "label"> = {
  kind: "lastLineBeforeLabel",
  direction: "after",
  skipPrefixes: JOB_NAME_SKIP_PREFIXES,
  dateDetector: { kind: "date", mode: "full" },
  // PO and order numbers
  codeDetector: { kind: "pattern", pattern: "^[A-Z0-9]{6,}$" },
};

export const CORE_MAIN: VendorRuleSet = {
  key: "core_main",
  displayName: "Core & Main",
  aliases: ["core and main", "coremain"],
  topology: "perPage",
  fields: {
    vendor: { kind: "constant", value: "Core & Main" },
    invoiceNumber: {
      kind: "anchoredRegex",
      pattern: "Invoice\\s*#\\s*\\n\\s*([A-Z0-9]+)",
      flags: "i",
    },
    date: { kind: "anchoredRegex", pattern: "Invoice Date\\s*\\n\\s*([0-9/]+)" },
    total: {
      kind: "anchoredRegex",
      pattern: "Total Amount Due\\s*\\n\\s*\\$?([0-9,]+\\.[0-9]+)",
    },
    jobName: {
      kind: "firstOf",
      rules: [
        {
          ...JOB_NAME_SCAN,
          label: { kind: "contains", all: ["customer po #", "job name"], caseInsensitive: true },
        },
        {
          ...JOB_NAME_SCAN,
          label: { kind: "equals", text: "job name", caseInsensitive: true },
          skipWords: ["job #", "job#", "job no", "job number"],
        },
      ],
    },
  },
};
