export interface ExcerptBudget {
  /** Total content characters allowed, head included. */
  budget: number;
  /** Characters always kept from the start of the content. */
  head: number;
  /** Characters kept on each side of a keyword hit. */
  window: number;
}

export const FULL_EXCERPT: ExcerptBudget = { budget: 6000, head: 3000, window: 300 };
export const CONCISE_EXCERPT: ExcerptBudget = { budget: 2500, head: 1500, window: 150 };

export const EXCERPT_KEYWORDS = [
  "dealer",
  "locator",
  "locate",
  "zip",
  "postal",
  "search",
  "find",
  "address",
  "phone",
  "store",
  "result",
];

const GAP = "\n[...]\n";
const TRUNCATED = "\n\n[... content truncated ...]";

interface Span {
  start: number;
  end: number;
}

/**
 * Bounded excerpt of page content biased toward locator-relevant text: the
 * head, then windows around keyword hits (overlapping windows merged), in
 * page order, until the budget is spent.
 */
export function buildExcerpt(
  content: string,
  { budget, head, window }: ExcerptBudget,
  keywords: readonly string[] = EXCERPT_KEYWORDS
): string {
  if (content.length <= budget) return content;

  const headEnd = Math.min(head, budget);
  const lower = content.toLowerCase();
  const hits: Span[] = [];

  for (const keyword of keywords) {
    let from = headEnd;
    for (;;) {
      const at = lower.indexOf(keyword, from);
      if (at === -1) break;
      hits.push({
        start: Math.max(headEnd, at - window),
        end: Math.min(content.length, at + keyword.length + window),
      });
      from = at + keyword.length;
    }
  }

  hits.sort((a, b) => a.start - b.start);
  const merged: Span[] = [];
  for (const span of hits) {
    const last = merged[merged.length - 1];
    if (last && span.start <= last.end) last.end = Math.max(last.end, span.end);
    else merged.push({ ...span });
  }

  let remaining = budget - headEnd;
  let excerpt = content.slice(0, headEnd);
  for (const span of merged) {
    if (remaining <= 0) break;
    const piece = content.slice(span.start, Math.min(span.end, span.start + remaining));
    excerpt += span.start === headEnd ? piece : GAP + piece;
    remaining -= piece.length;
  }

  return excerpt + TRUNCATED;
}
