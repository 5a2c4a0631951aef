import type { FieldConfig } from "../configs/schema";
import { describeError } from "../errors";
import type { PageElement } from "./dom";

function readValue(el: PageElement, field: FieldConfig): string {
  if (field.type === "href") {
    const value = el.attr(field.attribute ?? "href");
    if (value && value.trim()) return value.trim();
  }
  return el.text().trim();
}

/**
 * Value of one field within a card: the primary selector first, then each
 * fallback pattern in order. The first non-empty value wins; "" when none
 * yields anything. A selector the engine rejects counts as a miss.
 */
export function extractField(card: PageElement, field: FieldConfig | undefined): string {
  if (!field) return "";

  const selectors = [field.selector, ...(field.fallback_patterns ?? [])].filter(
    (s): s is string => typeof s === "string" && s.trim().length > 0
  );

  for (const selector of selectors) {
    let el: PageElement | null;
    try {
      el = card.find(selector);
    } catch (error) {
      console.warn(`[extract] Selector error (${selector}): ${describeError(error)}`);
      continue;
    }
    if (!el) continue;
    const value = readValue(el, field);
    if (value) return value;
  }
  return "";
}
