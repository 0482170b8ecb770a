/**
 * InvoiceParser – Line-item block extractor
 *
 * A two-state machine over a page's lines:
 *   SEEKING       no open window; a line matching `spec.start` opens one
 *   ACCUMULATING  buffering lines until the window holds `spec.length`
 *
 * A full window is accepted only when every slot passes its primitive.
 * Rejected windows are dropped and scanning resumes at the next line. Under
 * the "unlessSlotMatches" policy an abandoned window (rejected, or cut
 * short by a start line that fits no slot) is retried from the line after
 * its first line instead, so a stray number ahead of a block costs nothing.
 */

import type { LineItem, LineItemField, RawPage } from "../schema/InvoiceRecord";
import { NUMERIC_ITEM_FIELDS } from "../schema/InvoiceRecord";
import type { ItemWindowSpec } from "../schema/RuleSet";
import type { InvoiceParserLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";
import { describePrimitive, matchesPrimitive, parseDecimal } from "./primitives";

type ExtractorState = "SEEKING" | "ACCUMULATING";

/** An accepted window together with the lines it was built from */
export interface ItemMatch {
  item: LineItem;
  slots: readonly string[];
}

// ─── Window helpers ───────────────────────────────────────────────────────────

/** Index of the first slot that rejects its line, or -1 when all pass. */
export function findRejectedSlot(spec: ItemWindowSpec, window: readonly string[]): number {
  if (window.length !== spec.length) return 0;
  return spec.slots.findIndex((slot, i) => !matchesPrimitive(slot, window[i]));
}

/** Map a validated window onto LineItem fields. */
export function windowToLineItem(spec: ItemWindowSpec, window: readonly string[]): LineItem {
  const slot = (field: LineItemField): string | undefined => {
    const index = spec.fields[field];
    return index === undefined ? undefined : window[index];
  };

  const item: LineItem = {
    description: slot("description") ?? "",
    quantity: 0,
    unitPrice: 0,
    extendedPrice: 0,
  };
  for (const field of NUMERIC_ITEM_FIELDS) {
    item[field] = parseDecimal(slot(field));
  }

  const date = slot("date");
  if (date !== undefined) item.date = date;
  const ticketNumber = slot("ticketNumber");
  if (ticketNumber !== undefined) item.ticketNumber = ticketNumber;
  const truckCode = slot("truckCode");
  if (truckCode !== undefined) item.truckCode = truckCode;

  return item;
}

// ─── Extractor ────────────────────────────────────────────────────────────────

export class BlockExtractor {
  private readonly spec: ItemWindowSpec;
  private readonly logger: InvoiceParserLogger;
  private readonly noise: readonly string[];

  constructor(spec: ItemWindowSpec, logger: InvoiceParserLogger = silentLogger) {
    this.spec = spec;
    this.logger = logger;
    this.noise = spec.noise.map((token) => token.toLowerCase());
  }

  /** Line items found on the page, in source order. */
  extract(page: RawPage): LineItem[] {
    return this.extractMatches(page).map((m) => m.item);
  }

  /** Like extract(), keeping the source lines of every accepted window. */
  extractMatches(page: RawPage): ItemMatch[] {
    const { lines } = page;
    const rescan = this.spec.restart === "unlessSlotMatches";
    const matches: ItemMatch[] = [];
    let state: ExtractorState = "SEEKING";
    let buffer: string[] = [];
    let windowStart = -1;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      if (this.isNoise(line)) continue;

      if (state === "SEEKING") {
        if (matchesPrimitive(this.spec.start, line)) {
          buffer = [line];
          windowStart = i;
          state = "ACCUMULATING";
        }
      } else if (this.restartsWindow(line, buffer.length)) {
        this.logger.debug(
          `Window restarted on page ${page.pageIndex} after ${buffer.length} line(s)`,
        );
        if (rescan) {
          // the loop increment lands on the line after the window's first line
          i = windowStart;
          buffer = [];
          state = "SEEKING";
          continue;
        }
        buffer = [line];
        windowStart = i;
      } else {
        buffer.push(line);
      }

      if (state === "ACCUMULATING" && buffer.length === this.spec.length) {
        const match = this.closeWindow(buffer, page.pageIndex);
        if (match) {
          matches.push(match);
        } else if (rescan) {
          i = windowStart;
        }
        buffer = [];
        state = "SEEKING";
      }
    }

    return matches;
  }

  // ─── Private helpers ──────────────────────────────────────────────────────

  private isNoise(line: string): boolean {
    const lower = line.toLowerCase();
    return this.noise.some((token) => lower.includes(token));
  }

  private restartsWindow(line: string, nextSlot: number): boolean {
    if (!matchesPrimitive(this.spec.start, line)) return false;
    if (this.spec.restart !== "unlessSlotMatches") return true;
    const slot = this.spec.slots[nextSlot];
    return slot === undefined || !matchesPrimitive(slot, line);
  }

  private closeWindow(window: readonly string[], pageIndex: number): ItemMatch | null {
    const rejected = findRejectedSlot(this.spec, window);
    if (rejected >= 0) {
      const slot = this.spec.slots[rejected];
      this.logger.debug(
        `Window rejected on page ${pageIndex}: slot ${rejected} ` +
          `"${window[rejected] ?? ""}" is not ${slot ? describePrimitive(slot) : "defined"}`,
      );
      return null;
    }
    return { item: windowToLineItem(this.spec, window), slots: Object.freeze([...window]) };
  }
}
