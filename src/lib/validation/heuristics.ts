import type { ConfidenceTuning } from "../config";
import { describeError } from "../errors";
import states from "../data/us-states.json";
import type { PageElement } from "../extraction/dom";

/** Generic result-card patterns, tried in order. */
export const GENERIC_CARD_PATTERNS = [
  '[class*="dealer"]',
  '[class*="location"]',
  '[class*="store"]',
  '[class*="result"]',
  '[class*="card"]',
  '[class*="listing"]',
  'li[class*="item"]',
  'div[class*="item"]',
];

/** Text longer than this is a card rather than navigation or UI chrome. */
export const SUBSTANTIAL_TEXT_LENGTH = 50;
const MIN_SUBSTANTIAL_ELEMENTS = 3;

const STATE_RE = new RegExp(`\\b(?:${states.join("|")})\\b`);

export interface CardGuess {
  selector: string;
  elements: PageElement[];
  dealerLike: number;
  confidence: number;
}

/** A state abbreviation or any digit (street number, zip, phone). */
export function looksLikeListing(text: string): boolean {
  return STATE_RE.test(text) || /\d/.test(text);
}

export function safeFindAll(root: PageElement, selector: string): PageElement[] {
  try {
    return root.findAll(selector);
  } catch (error) {
    console.warn(`[validator] Selector error (${selector}): ${describeError(error)}`);
    return [];
  }
}

/**
 * Pick the generic pattern with the most substantial elements (more than two
 * needed; a later pattern must beat the count strictly) and rate it by how
 * many of the first few look like listings.
 */
export function guessCards(root: PageElement, tuning: ConfidenceTuning): CardGuess | null {
  let best: { selector: string; elements: PageElement[] } | null = null;

  for (const selector of GENERIC_CARD_PATTERNS) {
    const substantial = safeFindAll(root, selector).filter(
      (el) => el.text().length > SUBSTANTIAL_TEXT_LENGTH
    );
    if (substantial.length < MIN_SUBSTANTIAL_ELEMENTS) continue;
    if (!best || substantial.length > best.elements.length) best = { selector, elements: substantial };
  }
  if (!best) return null;

  const dealerLike = best.elements
    .slice(0, tuning.heuristicSampleSize)
    .filter((el) => looksLikeListing(el.text())).length;
  const confidence = Math.min(tuning.heuristicCap, tuning.heuristicBase + dealerLike / tuning.heuristicSampleSize);

  return { ...best, dealerLike, confidence };
}

/** First configured selector that matches at least one element. */
export function matchConfiguredCards(
  root: PageElement,
  selectors: readonly string[]
): { selector: string; count: number } | null {
  for (const selector of selectors) {
    const count = safeFindAll(root, selector).length;
    if (count > 0) return { selector, count };
  }
  return null;
}
