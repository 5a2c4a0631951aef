// Regex helpers for the fields a card's selectors did not yield.

export const DEFAULT_SKIP_NAMES = [
  "search by", "clear", "advanced search", "view map", "make my dealer",
  "chat with dealer", "dealer website", "find more", "view more", "load more",
  "show more", "see more", "locate dealer", "find a dealer", "dealer locator",
  "search dealers", "zip code", "use current location", "update matches",
  "filter by services", "dealerships found", "dealers found",
  "available vehicles", "available dealer services", "today's sales hours",
  "sales & services hours", "view dealer inventory", "get directions", "miles away",
];

// Country-code form first so "+1" is not read as the start of the area code.
export const DEFAULT_PHONE_PATTERNS = [
  String.raw`\+?1[-.\s]?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}`,
  String.raw`\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}`,
];

export const DEFAULT_WEBSITE_SKIP = ["maps.google.com", "google.com", "tel:", "mailto:"];

/** Names this long are real names even when they contain a skip phrase. */
const SKIP_CHECK_MAX_LENGTH = 50;

/**
 * Strip a `1.` list prefix and collapse whitespace. Returns `null` for names
 * shorter than three characters or short names containing a UI phrase.
 */
export function cleanName(raw: string, skipNames: readonly string[] = DEFAULT_SKIP_NAMES): string | null {
  const name = raw.replace(/^\s*\d+\.\s*/, "").replace(/\s+/g, " ").trim();
  if (name.length < 3) return null;

  if (name.length < SKIP_CHECK_MAX_LENGTH) {
    const lower = name.toLowerCase();
    if (skipNames.some((phrase) => lower.includes(phrase.toLowerCase()))) return null;
  }
  return name;
}

function compile(pattern: string): RegExp | null {
  try {
    return new RegExp(pattern);
  } catch {
    console.warn(`[extract] Ignoring invalid pattern ${pattern}`);
    return null;
  }
}

/** `(XXX) XXX-XXXX` for ten-digit numbers (a leading US `1` dropped), else the match as found. */
export function formatPhone(raw: string): string {
  let digits = raw.replace(/\D/g, "");
  if (digits.length === 11 && digits.startsWith("1")) digits = digits.slice(1);
  if (digits.length === 10) return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
  return raw.trim();
}

export function extractPhone(text: string, patterns: readonly string[] = DEFAULT_PHONE_PATTERNS): string {
  const source = text.replace(/^tel:/i, "");
  for (const pattern of patterns) {
    const match = compile(pattern)?.exec(source);
    if (match) return formatPhone(match[0]);
  }
  return "";
}

/** First match of any pattern, or "". */
export function matchFirst(text: string, patterns: readonly string[]): string {
  for (const pattern of patterns) {
    const match = compile(pattern)?.exec(text);
    if (match) return match[0].trim();
  }
  return "";
}

export interface AddressParts {
  street: string;
  city: string;
  state: string;
  postalCode: string;
}

const ADDRESS_PATTERNS: { re: RegExp; hasCity: boolean }[] = [
  { re: /(.+?),\s*([A-Za-z\s.'-]+),\s*([A-Z]{2})\s+(\d{5}(?:-\d{4})?)/, hasCity: true },
  { re: /(.+?)\s+([A-Za-z\s.'-]+),\s*([A-Z]{2})\s+(\d{5}(?:-\d{4})?)/, hasCity: true },
  { re: /(.+?)\s+([A-Z]{2})\s+(\d{5}(?:-\d{4})?)/, hasCity: false },
];

/** Split "street, city, ST 12345" into parts; unparsed text stays in `street`. */
export function parseAddress(text: string): AddressParts {
  const flat = text.replace(/\s*\n\s*/g, ", ").trim();

  for (const { re, hasCity } of ADDRESS_PATTERNS) {
    const m = re.exec(flat);
    if (!m) continue;
    const street = m[1].trim().replace(/,$/, "");
    return hasCity
      ? { street, city: m[2].trim(), state: m[3], postalCode: m[4] }
      : { street, city: "", state: m[2], postalCode: m[3] };
  }

  return {
    street: flat,
    city: "",
    state: /\b([A-Z]{2})\b/.exec(flat)?.[1] ?? "",
    postalCode: /\b(\d{5}(?:-\d{4})?)\b/.exec(flat)?.[1] ?? "",
  };
}

/** Line holding a postal code, joined with a street line just above it. */
export function findAddressLines(lines: readonly string[]): string {
  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (!/\b\d{5}(?:-\d{4})?\b/.test(line) || /\(?\d{3}\)?[-.\s]\d{3}[-.\s]\d{4}/.test(line)) continue;
    const previous = i > 0 ? lines[i - 1] : "";
    return /^\d+\s+\S/.test(previous) ? `${previous}, ${line}` : line;
  }
  return "";
}

export function isSkippedWebsite(url: string, skip: readonly string[] = DEFAULT_WEBSITE_SKIP): boolean {
  const lower = url.toLowerCase();
  return skip.some((s) => lower.includes(s));
}

/** Distance in miles as written ("5.2"), or "". */
export function extractDistance(text: string): string {
  const m = /(\d+(?:\.\d+)?)\s*(?:mi\b|mi\.|miles?\b)/i.exec(text);
  return m ? m[1] : "";
}

export function detectCategory(text: string): string {
  if (/\bEV[\s-]+Certified\b/i.test(text)) return "EV Certified";
  if (/\bElite\b/i.test(text)) return "Elite";
  if (/\bCertified\b/i.test(text)) return "Certified";
  return "Standard";
}
