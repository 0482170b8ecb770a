/**
 * InvoiceParser – Output filename & preview unit tests
 */

import { buildOutputFilename, cleanFilenamePart } from "../utils/filename";
import { formatRecordPreview } from "../utils/preview";
import type { InvoiceRecord } from "../schema/InvoiceRecord";

const KNIFE_RIVER_RECORD: InvoiceRecord = {
  vendor: "Knife River",
  invoiceNumber: "968457",
  jobName: "Riverside Park",
  date: "09/08/25",
  total: "122.75",
  page: 1,
  items: [
    {
      ticketNumber: "123456",
      description: "Base Rock",
      truckCode: "ABC1",
      quantity: 12.5,
      unitPrice: 9.82,
      extendedPrice: 122.75,
    },
  ],
};

const FARWEST_RECORD: InvoiceRecord = {
  vendor: "Farwest",
  invoiceNumber: "20931",
  jobName: "",
  date: "10/1/2025",
  total: "641.34",
  page: 2,
  items: [
    { date: "10/1/2025", description: "3/4 Base", quantity: 65.31, unitPrice: 9.82, extendedPrice: 641.34 },
  ],
};

// ─── Filenames ────────────────────────────────────────────────────────────────

describe("cleanFilenamePart", () => {
  it("turns slashes into dashes and drops spaces and reserved characters", () => {
    expect(cleanFilenamePart(" 09/08/25 ")).toBe("09-08-25");
    expect(cleanFilenamePart('Job: "A/B" <x>')).toBe("JobA-Bx");
  });
});

describe("buildOutputFilename", () => {
  it("joins vendor, job, date, invoice and total", () => {
    expect(buildOutputFilename(KNIFE_RIVER_RECORD)).toBe(
      "KnifeRiver_RiversidePark_09-08-25_968457_122.75.pdf",
    );
  });

  it("uses a placeholder for a missing invoice number", () => {
    expect(
      buildOutputFilename({
        vendor: "Knife River",
        jobName: "Riverside Park",
        date: "09/08/25",
        invoiceNumber: "",
        total: "319.15",
      }),
    ).toBe("KnifeRiver_RiversidePark_09-08-25_NOINV_319.15.pdf");
  });

  it("leaves out other empty parts", () => {
    expect(buildOutputFilename(FARWEST_RECORD)).toBe("Farwest_10-1-2025_20931_641.34.pdf");
  });
});

// ─── Preview ──────────────────────────────────────────────────────────────────

describe("formatRecordPreview", () => {
  it("prints one block per record", () => {
    expect(formatRecordPreview([KNIFE_RIVER_RECORD, FARWEST_RECORD])).toBe(
      [
        "===== INVOICE PAGE 1 =====",
        "Vendor:         Knife River",
        "Invoice Number: 968457",
        "Jobname:        Riverside Park",
        "Date:           09/08/25",
        "Total:          122.75",
        "Items:          1",
        "  - 123456  Base Rock  12.5 x 9.82 = 122.75",
        "",
        "===== INVOICE PAGE 2 =====",
        "Vendor:         Farwest",
        "Invoice Number: 20931",
        "Jobname:        ",
        "Date:           10/1/2025",
        "Total:          641.34",
        "Items:          1",
        "  - 10/1/2025  3/4 Base  65.31 x 9.82 = 641.34",
      ].join("\n"),
    );
  });

  it("omits empty item parts", () => {
    const preview = formatRecordPreview([
      { ...FARWEST_RECORD, items: [{ description: "", quantity: 1, unitPrice: 2, extendedPrice: 2 }] },
    ]);
    expect(preview.split("\n").pop()).toBe("  - 1 x 2 = 2");
  });

  it("returns an empty string for no records", () => {
    expect(formatRecordPreview([])).toBe("");
  });
});
