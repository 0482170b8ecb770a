/**
 * InvoiceParser – parseDocument & SDK namespace tests
 *
 * parseFile() runs against a mock text provider, so no PDF is read.
 */

import type { RawPage } from "../schema/InvoiceRecord";
import type { VendorRuleSet } from "../schema/RuleSet";
import { InvoiceParser, parseDocument } from "../core/InvoiceParser";
import { InvoiceParserError } from "../core/validator";
import { createRawPage } from "../parser/primitives";
import { VendorDispatcher } from "../vendors/VendorDispatcher";
import { unregisterTextProvider } from "../text/TextEngine";
import type { DocumentSource, TextProvider } from "../text/TextProvider";
import type { InvoiceParserLogger } from "../utils/logger";

// ─── Fixtures ─────────────────────────────────────────────────────────────────

const KNIFE_RIVER_PAGE_1 = createRawPage(
  [
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
    "Total",
    "122.75",
  ],
  1,
  "kr.pdf",
);

const KNIFE_RIVER_PAGE_2 = createRawPage(
  ["968458", "09/09/25", "Elm Court", "ORIGINAL", "Total", "0.00"],
  2,
  "kr.pdf",
);

const FARWEST_PAGE_1 = createRawPage(
  [
    "FARWEST ROCK",
    "Invoice #",
    "#20931",
    "JOB",
    "Hillview Subdivision",
    "Tons",
    "Amount",
    "65.31",
    "641.34",
    "10/1/2025",
    "3/4 Base",
    "9.82",
  ],
  1,
  "fw.pdf",
);

const FARWEST_PAGE_2 = createRawPage(
  ["14.67", "144.06", "10/22/2025", "3/4 Base", "9.82", "Total", "785.40"],
  2,
  "fw.pdf",
);

const QUARRY: VendorRuleSet = {
  key: "quarry_co",
  displayName: "Quarry Co",
  aliases: [],
  topology: "perPage",
  fields: {
    vendor: { kind: "constant", value: "Quarry Co" },
    invoiceNumber: { kind: "anchoredRegex", pattern: "Invoice (\\d+)" },
    jobName: { kind: "firstLineAfterLabel", label: "Job" },
    date: { kind: "anchoredRegex", pattern: "(\\d{2}/\\d{2}/\\d{4})" },
    total: { kind: "anchoredRegex", pattern: "Total: (.+)" },
  },
};

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

function spyLogger(): InvoiceParserLogger & { calls: Record<string, string[]> } {
  const calls: Record<string, string[]> = { debug: [], info: [], warn: [], error: [] };
  return {
    calls,
    debug(msg: string) {
      calls.debug.push(msg);
    },
    info(msg: string) {
      calls.info.push(msg);
    },
    warn(msg: string) {
      calls.warn.push(msg);
    },
    error(msg: string) {
      calls.error.push(msg);
    },
  };
}

// ─── Mock text provider ───────────────────────────────────────────────────────

class MockTextProvider implements TextProvider {
  readonly name = "mock-text";
  readonly extractPages = jest.fn(async (_source: DocumentSource) => this.pages);

  constructor(private readonly pages: string[]) {}

  async isAvailable(): Promise<boolean> {
    return true;
  }

  supports(): boolean {
    return true;
  }
}

const SOURCE: DocumentSource = { documentId: "fw.pdf", data: new Uint8Array([1, 2, 3]) };

afterEach(() => {
  InvoiceParser.reset();
  unregisterTextProvider("mock-text");
});

// ─── Dispatch & errors ────────────────────────────────────────────────────────

describe("parseDocument – errors", () => {
  it("fails with UNKNOWN_VENDOR and no records for an unregistered key", () => {
    const err = captureError(() => parseDocument("Acme Aggregates", [KNIFE_RIVER_PAGE_1]));
    expect(err).toBeInstanceOf(InvoiceParserError);
    expect(err).toMatchObject({ code: "UNKNOWN_VENDOR" });
  });

  it("checks the vendor before the pages", () => {
    expect(captureError(() => parseDocument("Acme Aggregates", []))).toMatchObject({
      code: "UNKNOWN_VENDOR",
    });
  });

  it("reports a document without pages as unreadable", () => {
    expect(captureError(() => parseDocument("knife_river", []))).toMatchObject({
      code: "DOCUMENT_UNREADABLE",
    });
  });

  it("rejects duplicated page indices", () => {
    const err = captureError(() =>
      parseDocument("knife_river", [KNIFE_RIVER_PAGE_1, KNIFE_RIVER_PAGE_1]),
    );
    expect(err).toMatchObject({ code: "INVALID_INPUT" });
  });
});

// ─── Topologies ───────────────────────────────────────────────────────────────

describe("parseDocument – one invoice per page", () => {
  it("returns one record per page in page order", () => {
    const records = parseDocument("Knife River", [KNIFE_RIVER_PAGE_2, KNIFE_RIVER_PAGE_1]);
    expect(records.map((r) => r.page)).toEqual([1, 2]);
    expect(records[0]).toMatchObject({
      vendor: "Knife River",
      invoiceNumber: "968457",
      jobName: "Riverside Park",
      date: "09/08/25",
      total: "122.75",
    });
    expect(records[0].items).toHaveLength(1);
    expect(records[1]).toEqual({
      vendor: "Knife River",
      invoiceNumber: "968458",
      jobName: "Elm Court",
      date: "09/09/25",
      total: "0.00",
      page: 2,
      items: [],
    });
  });

  it("still returns an array for a single page", () => {
    expect(parseDocument("knife_river", [KNIFE_RIVER_PAGE_2])).toHaveLength(1);
  });
});

describe("parseDocument – one invoice per document", () => {
  it("merges header fields and items across pages", () => {
    const records = parseDocument("farwest", [FARWEST_PAGE_2, FARWEST_PAGE_1]);
    expect(records).toHaveLength(1);
    const [record] = records;
    expect(record).toMatchObject({
      vendor: "Farwest",
      invoiceNumber: "20931",
      jobName: "Hillview Subdivision",
      date: "10/1/2025",
      total: "785.40",
      page: 1,
    });
    expect(record.items.map((i) => i.quantity)).toEqual([65.31, 14.67]);
    expect(record.items.map((i) => i.extendedPrice)).toEqual([641.34, 144.06]);
  });

  it("reads a load that runs across a page break", () => {
    const records = parseDocument("farwest", [
      createRawPage(["Invoice #", "#20932", "JOB", "Elm Court", "65.31", "641.34"], 1, "fw2.pdf"),
      createRawPage(["10/1/2025", "3/4 Base", "9.82"], 2, "fw2.pdf"),
    ]);
    expect(records).toHaveLength(1);
    expect(records[0].items).toEqual([
      { quantity: 65.31, extendedPrice: 641.34, date: "10/1/2025", description: "3/4 Base", unitPrice: 9.82 },
    ]);
  });
});

// ─── Record sanitising ────────────────────────────────────────────────────────

describe("parseDocument – records", () => {
  const dispatcher = new VendorDispatcher([QUARRY]);

  function quarryPage(...lines: string[]): RawPage {
    return createRawPage(lines, 1, "q.pdf");
  }

  it("strips currency symbols and separators from the total", () => {
    const [record] = parseDocument("quarry_co", [quarryPage("Invoice 77", "Total: $1,234.56")], {
      dispatcher,
    });
    expect(record.total).toBe("1234.56");
  });

  it("empties a total that is not a number", () => {
    const [record] = parseDocument("quarry_co", [quarryPage("Invoice 77", "Total: TBD")], {
      dispatcher,
    });
    expect(record.total).toBe("");
  });

  it("uses empty strings for fields no rule could fill", () => {
    const [record] = parseDocument("quarry_co", [quarryPage("Statement")], { dispatcher });
    expect(record).toEqual({
      vendor: "Quarry Co",
      invoiceNumber: "",
      jobName: "",
      date: "",
      total: "",
      page: 1,
      items: [],
    });
  });

  it("freezes records and their items", () => {
    const [record] = parseDocument("knife_river", [KNIFE_RIVER_PAGE_1]);
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.items)).toBe(true);
    expect(Object.isFrozen(record.items[0])).toBe(true);
  });

  it("logs the dispatch decision", () => {
    const logger = spyLogger();
    parseDocument("farwest", [FARWEST_PAGE_1], { logger });
    expect(logger.calls.info).toEqual(["Dispatched 'farwest' to Farwest (perDocument)"]);
  });
});

// ─── SDK namespace ────────────────────────────────────────────────────────────

describe("InvoiceParser.configure", () => {
  it("registers extra vendors next to the built-in ones", () => {
    InvoiceParser.configure({ vendors: [QUARRY] });
    expect(InvoiceParser.vendors()).toEqual([
      "knife_river",
      "core_main",
      "farwest",
      "missoula_landfill",
      "quarry_co",
    ]);
    const [record] = InvoiceParser.parseDocument("Quarry Co", [
      createRawPage(["Invoice 77"], 1, "q.pdf"),
    ]);
    expect(record.invoiceNumber).toBe("77");
  });

  it("reset() restores the built-in table", () => {
    InvoiceParser.configure({ vendors: [QUARRY] });
    InvoiceParser.reset();
    expect(InvoiceParser.vendors()).not.toContain("quarry_co");
  });
});

describe("InvoiceParser.parseFile", () => {
  it("reads pages through the configured text provider", async () => {
    const provider = new MockTextProvider([
      FARWEST_PAGE_1.lines.join("\n"),
      FARWEST_PAGE_2.lines.join("\n"),
    ]);
    InvoiceParser.configure({ textProvider: provider });

    const records = await InvoiceParser.parseFile("farwest", SOURCE);

    expect(provider.extractPages).toHaveBeenCalledWith(SOURCE);
    expect(records).toHaveLength(1);
    expect(records[0].total).toBe("785.40");
    expect(records[0].items).toHaveLength(2);
  });

  it("rejects an unknown vendor before reading the document", async () => {
    const provider = new MockTextProvider(["anything"]);
    InvoiceParser.configure({ textProvider: provider });

    await expect(InvoiceParser.parseFile("Acme Aggregates", SOURCE)).rejects.toMatchObject({
      code: "UNKNOWN_VENDOR",
    });
    expect(provider.extractPages).not.toHaveBeenCalled();
  });

  it("reports a document with no text as unreadable", async () => {
    InvoiceParser.configure({ textProvider: new MockTextProvider(["", "  "]) });

    await expect(InvoiceParser.parseFile("farwest", SOURCE)).rejects.toMatchObject({
      code: "DOCUMENT_UNREADABLE",
    });
  });
});
