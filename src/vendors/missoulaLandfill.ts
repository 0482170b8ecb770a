/**
 * InvoiceParser – Missoula Landfill rule set
 *
 * Scale tickets, one per page, header fields only.
 */

import type { VendorRuleSet } from "../schema/RuleSet";

const SHORT_DATE = "\\b\\d{1,2}/\\d{1,2}/\\d{2}\\b";
const INVOICE_NUMBER_LINE = "^\\d{6,7}$";

export const MISSOULA_LANDFILL: VendorRuleSet = {
  key: "missoula_landfill",
  displayName: "Missoula Landfill",
  aliases: ["missoula", "missoula landfill inc"],
  topology: "perPage",
  fields: {
    vendor: { kind: "constant", value: "Missoula Landfill" },
    invoiceNumber: {
      kind: "firstOf",
      rules: [
        {
          kind: "lastLineBeforeLabel",
          label: { kind: "contains", all: ["SIGNATURE"], caseInsensitive: true },
          occurrence: "each",
          direction: "after",
          maxDistance: 4,
          accept: { kind: "pattern", pattern: INVOICE_NUMBER_LINE },
          codeDetector: null,
        },
        { kind: "firstMatchingLine", line: { kind: "pattern", pattern: INVOICE_NUMBER_LINE } },
        { kind: "anchoredRegex", pattern: "\\b(\\d{6,7})\\b" },
      ],
    },
    date: { kind: "anchoredRegex", pattern: `(${SHORT_DATE})` },
    total: { kind: "maxNumericMatch", pattern: "\\$(\\d{1,3}(?:,\\d{3})*\\.\\d{2})" },
    jobName: {
      kind: "firstOf",
      rules: [
        {
          // The job sits a few lines below the second (weigh-out) date
          kind: "lastLineBeforeLabel",
          label: { kind: "pattern", pattern: SHORT_DATE },
          occurrence: 2,
          direction: "after",
          maxDistance: 6,
          skipNumeric: true,
          skipContaining: ["GROSS", "TARE", "NET", "WEIGHT", "SCALE", "INBOUND"],
        },
        {
          kind: "firstMatchingLine",
          line: { kind: "pattern", pattern: "^[A-Z0-9 ]{3,30}$" },
          excludeContaining: [
            "PAYMENT",
            "GRANT",
            "CREEK",
            "EXCAVATING",
            "MISSOULA",
            "LANDFILL",
            "GROSS",
            "TARE",
            "NET",
            "WEIGHT",
            "INVOICE",
            "INBOUND",
            "SCALE",
            "SIGNATURE",
          ],
        },
      ],
    },
  },
};
