/**
 * InvoiceParser – Built-in vendor rule sets
 *
 * Page fixtures are made up but follow each vendor's printed layout.
 */

import { createRawPage } from "../parser/primitives";
import { RuleSetVendor } from "../vendors/RuleSetVendor";
import { CORE_MAIN } from "../vendors/coreMain";
import { FARWEST } from "../vendors/farwest";
import { KNIFE_RIVER } from "../vendors/knifeRiver";
import { MISSOULA_LANDFILL } from "../vendors/missoulaLandfill";

function page(...lines: string[]) {
  return createRawPage(lines, 1, "test.pdf");
}

// ─── Knife River ──────────────────────────────────────────────────────────────

describe("Knife River", () => {
  const vendor = new RuleSetVendor(KNIFE_RIVER);
  const invoice = page(
    "KNIFE RIVER",
    "INVOICE",
    "968457",
    "09/08/25",
    "Riverside Park",
    "ORIGINAL",
    "123456",
    "Base Rock",
    "ABC1",
    "12.50 TN",
    "9.82",
    "122.75",
    "234567",
    "Base Rock",
    "XYZ2",
    "20.00 TN",
    "9.82",
    "196.40",
    "Subtotal",
    "319.15",
    "Total",
    "319.15",
  );

  it("extracts the header fields", () => {
    expect(vendor.extractFields(invoice)).toEqual({
      vendor: "Knife River",
      invoiceNumber: "968457",
      jobName: "Riverside Park",
      date: "09/08/25",
      total: "319.15",
    });
  });

  it("extracts every ticket", () => {
    const items = vendor.extractItems(invoice);
    expect(items.map((i) => i.ticketNumber)).toEqual(["123456", "234567"]);
    expect(items[1]).toEqual({
      ticketNumber: "234567",
      description: "Base Rock",
      truckCode: "XYZ2",
      quantity: 20,
      unitPrice: 9.82,
      extendedPrice: 196.4,
    });
  });

  it("leaves the job name empty when only labels precede ORIGINAL", () => {
    const fields = vendor.extractFields(page("968457", "TICKET", "INVOICE", "ORIGINAL"));
    expect(fields.jobName).toBe("");
  });
});

// ─── Core & Main ──────────────────────────────────────────────────────────────

describe("Core & Main", () => {
  const vendor = new RuleSetVendor(CORE_MAIN);

  it("extracts the header fields", () => {
    const invoice = page(
      "Core & Main LP",
      "Invoice #",
      "S123456",
      "Invoice Date",
      "09/30/2025",
      "Customer PO # Job Name",
      "Job #",
      "PO778812",
      "10/01/2025",
      "Hillview Subdivision",
      "Total Amount Due",
      "$1,234.56",
    );
    expect(vendor.extractFields(invoice)).toEqual({
      vendor: "Core & Main",
      invoiceNumber: "S123456",
      jobName: "Hillview Subdivision",
      date: "09/30/2025",
      total: "1,234.56",
    });
  });

  it("falls back to a standalone Job Name label", () => {
    const invoice = page("Invoice #", "S123456", "Job Name", "Job #", "job no", "Maple Court");
    expect(vendor.extractFields(invoice).jobName).toBe("Maple Court");
  });

  it("has no line items", () => {
    expect(vendor.extractItems(page("12.00", "3.00"))).toEqual([]);
  });
});

// ─── Farwest ──────────────────────────────────────────────────────────────────

describe("Farwest", () => {
  const vendor = new RuleSetVendor(FARWEST);

  it("spans whole documents", () => {
    expect(vendor.topology).toBe("perDocument");
  });

  it("extracts the header fields", () => {
    const invoice = page(
      "FARWEST ROCK",
      "Invoice #",
      "#20931",
      "JOB",
      "Hillview Subdivision",
      "65.31",
      "641.34",
      "10/1/2025",
      "3/4 Base",
      "9.82",
    );
    expect(vendor.extractFields(invoice)).toEqual({
      vendor: "Farwest",
      invoiceNumber: "20931",
      jobName: "Hillview Subdivision",
      date: "10/1/2025",
      total: "641.34",
    });
  });

  it("reads loads below the column headings", () => {
    const items = vendor.extractItems(
      page("Tons", "Amount", "Date", "Description", "$/Ton", "65.31", "641.34", "10/1/2025", "3/4 Base", "9.82"),
    );
    expect(items).toEqual([
      { quantity: 65.31, extendedPrice: 641.34, date: "10/1/2025", description: "3/4 Base", unitPrice: 9.82 },
    ]);
  });
});

// ─── Missoula Landfill ────────────────────────────────────────────────────────

describe("Missoula Landfill", () => {
  const vendor = new RuleSetVendor(MISSOULA_LANDFILL);

  it("extracts the header fields of a scale ticket", () => {
    const ticket = page(
      "MISSOULA LANDFILL",
      "INBOUND 09/15/25 07:42",
      "GROSS 32000",
      "OUTBOUND 09/15/25 08:05",
      "01",
      "TARE 14000",
      "NET 18000",
      "OAK STREET",
      "Disposal $120.50",
      "Fuel $4.25",
      "Total $124.75",
      "SIGNATURE",
      "01",
      "1234567",
    );
    expect(vendor.extractFields(ticket)).toEqual({
      vendor: "Missoula Landfill",
      invoiceNumber: "1234567",
      jobName: "OAK STREET",
      date: "09/15/25",
      total: "124.75",
    });
  });

  it("reads the invoice number below a later signature line", () => {
    const ticket = page(
      "MISSOULA LANDFILL",
      "5550123",
      "SIGNATURE ON FILE",
      "Driver copy",
      "Thank you",
      "Drive safely",
      "Come again",
      "CUSTOMER SIGNATURE",
      "7654321",
    );
    expect(vendor.extractFields(ticket).invoiceNumber).toBe("7654321");
  });

  it("falls back to the first plain upper-case line for the job", () => {
    const ticket = page("MISSOULA LANDFILL", "09/15/25", "SCALE 1", "ELM STREET");
    expect(vendor.extractFields(ticket).jobName).toBe("ELM STREET");
  });

  it("falls back to any 6-7 digit number for the invoice", () => {
    const ticket = page("MISSOULA LANDFILL", "Ticket 7654321 printed", "NET 18000");
    expect(vendor.extractFields(ticket).invoiceNumber).toBe("7654321");
  });
});
