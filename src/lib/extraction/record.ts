import type { MergedConfig } from "../configs/schema";
import { describeError } from "../errors";
import { extractDomain, registrableDomain } from "../site-key";
import type { PageElement } from "./dom";
import { extractField } from "./fields";
import {
  DEFAULT_PHONE_PATTERNS,
  DEFAULT_SKIP_NAMES,
  cleanName,
  detectCategory,
  extractDistance,
  extractPhone,
  findAddressLines,
  isSkippedWebsite,
  matchFirst,
  parseAddress,
} from "./text";

export interface ListingRecord {
  name: string;
  address: string;
  city: string;
  state: string;
  postalCode: string;
  phone: string;
  website: string;
  category: string;
  distanceMiles: string;
  searchKey: string;
  sourceUrl: string;
  scrapedAt: string;
}

export interface ExtractionContext {
  config: MergedConfig;
  searchKey: string;
  sourceUrl: string;
  scrapedAt: string;
  debug?: boolean;
}

const PHONE_LINE_RE = /\(?\d{3}\)?[-.\s]\d{3}[-.\s]\d{4}/;

function firstPlausibleName(lines: readonly string[], skipNames: readonly string[]): string | null {
  for (const line of lines) {
    if (/^\d/.test(line) || PHONE_LINE_RE.test(line)) continue;
    const name = cleanName(line, skipNames);
    if (name) return name;
  }
  return null;
}

function ownSiteDomain(sourceUrl: string): string {
  const host = extractDomain(sourceUrl);
  return host ? registrableDomain(host) : "";
}

function acceptableWebsite(url: string, ownDomain: string): boolean {
  if (!/^https?:\/\//i.test(url) || isSkippedWebsite(url)) return false;
  return !ownDomain || registrableDomain(extractDomain(url)) !== ownDomain;
}

function findWebsite(card: PageElement, fieldValue: string, ownDomain: string): string {
  if (acceptableWebsite(fieldValue, ownDomain)) return fieldValue;

  let links: PageElement[];
  try {
    links = card.findAll("a[href^='http']");
  } catch (error) {
    console.warn(`[extract] Link lookup failed: ${describeError(error)}`);
    return "";
  }
  for (const link of links) {
    const href = link.attr("href")?.trim() ?? "";
    if (acceptableWebsite(href, ownDomain)) return href;
  }
  return "";
}

/**
 * One listing out of one card, or `null` when the card is hidden or no
 * usable name survives cleaning. Every other field is best-effort.
 */
export function extractRecord(card: PageElement, context: ExtractionContext): ListingRecord | null {
  if (!card.isVisible()) return null;

  const fields = context.config.data_fields ?? {};
  const extraction = context.config.extraction ?? {};
  const skipNames = extraction.skip_names ?? DEFAULT_SKIP_NAMES;

  const cardText = card.text();
  const lines = cardText.split("\n").map((l) => l.trim()).filter(Boolean);

  const name =
    cleanName(extractField(card, fields.name), skipNames) ?? firstPlausibleName(lines, skipNames);
  if (!name) {
    if (context.debug) console.log(`[extract] Skipping card without a name: ${lines.slice(0, 2).join(" | ")}`);
    return null;
  }

  const addressField = extractField(card, fields.address);
  const addressText = addressField
    ? addressField.split("\n").map((l) => l.trim()).filter(Boolean).join(", ")
    : matchFirst(lines.join(", "), extraction.address_patterns ?? []) || findAddressLines(lines);
  const address = addressText
    ? parseAddress(addressText)
    : { street: "", city: "", state: "", postalCode: "" };

  const phonePatterns = extraction.phone_patterns ?? DEFAULT_PHONE_PATTERNS;
  const phoneField = extractField(card, fields.phone);
  const phone =
    (phoneField && extractPhone(phoneField, phonePatterns)) || extractPhone(cardText, phonePatterns);

  const website = findWebsite(card, extractField(card, fields.website), ownSiteDomain(context.sourceUrl));

  const distanceField = extractField(card, fields.distance);
  const categoryField = extractField(card, fields.dealer_type ?? fields.category);

  const record: ListingRecord = {
    name,
    address: address.street,
    city: address.city,
    state: address.state,
    postalCode: address.postalCode,
    phone,
    website,
    category: categoryField || detectCategory(cardText),
    distanceMiles: extractDistance(distanceField || cardText),
    searchKey: context.searchKey,
    sourceUrl: context.sourceUrl,
    scrapedAt: context.scrapedAt,
  };

  if (context.debug) console.log(`[extract] ${record.name} | ${record.address} | ${record.phone}`);
  return record;
}

/** Records of one session, de-duplicated on lowercased name and address. */
export class RecordCollector {
  private readonly seen = new Set<string>();
  private readonly collected: ListingRecord[] = [];

  static keyOf(record: ListingRecord): string {
    return `${record.name.toLowerCase()}|${record.address.toLowerCase()}`;
  }

  /** False when an equivalent record was already collected. */
  add(record: ListingRecord): boolean {
    const key = RecordCollector.keyOf(record);
    if (this.seen.has(key)) return false;
    this.seen.add(key);
    this.collected.push(record);
    return true;
  }

  get size(): number {
    return this.collected.length;
  }

  records(): ListingRecord[] {
    return [...this.collected];
  }
}

function findCards(root: PageElement, selectors: readonly string[]): PageElement[] {
  for (const selector of selectors) {
    try {
      const cards = root.findAll(selector);
      if (cards.length > 0) return cards;
    } catch (error) {
      console.warn(`[extract] Selector error (${selector}): ${describeError(error)}`);
    }
  }
  return [];
}

/**
 * Extract every card the config's first matching card selector finds and add
 * the results to `collector`. A card that throws is skipped. Returns how
 * many new records were added.
 */
export function extractRecords(
  root: PageElement,
  context: ExtractionContext,
  collector: RecordCollector
): number {
  const cards = findCards(root, context.config.selectors?.dealer_cards ?? []);
  let added = 0;
  let skipped = 0;

  for (const card of cards) {
    try {
      const record = extractRecord(card, context);
      if (record && collector.add(record)) added++;
    } catch (error) {
      skipped++;
      console.warn(`[extract] Skipping card: ${describeError(error)}`);
    }
  }

  console.log(
    `[extract] ${context.searchKey}: ${cards.length} cards, ${added} new records` +
      (skipped ? `, ${skipped} failed` : "")
  );
  return added;
}
