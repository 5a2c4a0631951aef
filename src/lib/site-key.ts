/**
 * Canonical identity of a target site, used as the only cache key across the
 * config layers and the discovery cache: lowercase, no leading `www.`, no
 * trailing slash.
 */
export type SiteKey = string;

const SCHEME_RE = /^[a-z][a-z0-9+.-]*:\/\//i;

export function normalizeSiteKey(key: string): SiteKey {
  let current = key.toLowerCase();
  // Each pass only shortens the key, so this reaches a fixed point.
  for (;;) {
    const next = current.trim().replace(/\/+$/, "").replace(/^(?:www\.)+/, "");
    if (next === current) return next;
    current = next;
  }
}

/**
 * SiteKey of a URL's host. Input without a scheme is read as a bare domain
 * ("ford.com", "www.ford.com/dealers"); only its host part is kept.
 */
export function extractDomain(url: string): SiteKey {
  if (!url) return "";
  const trimmed = url.trim();

  if (SCHEME_RE.test(trimmed)) {
    try {
      return normalizeSiteKey(new URL(trimmed).hostname);
    } catch {
      // Unparseable URL: fall through and treat it as a bare domain.
    }
  }

  const bare = trimmed.replace(SCHEME_RE, "").split(/[/?#]/)[0] ?? "";
  return normalizeSiteKey(bare.replace(/:\d+$/, ""));
}

/** Filesystem-safe name for a SiteKey ("ford.com" → "ford.com", "a/b:c" → "a_b_c"). */
export function siteKeyFileName(siteKey: SiteKey): string {
  return siteKey.replace(/[^a-z0-9._-]/g, "_");
}

/**
 * Registrable part of a host: the last two labels, or three when the second
 * level is a generic public suffix such as `co.uk` or `com.au`.
 */
export function registrableDomain(host: string): string {
  const labels = normalizeSiteKey(host).split(".").filter(Boolean);
  if (labels.length <= 2) return labels.join(".");
  const secondLevel = labels[labels.length - 2];
  const topLevel = labels[labels.length - 1];
  const take =
    topLevel.length === 2 && ["co", "com", "org", "net", "gov", "ac", "edu"].includes(secondLevel)
      ? 3
      : 2;
  return labels.slice(-take).join(".");
}

/** Absolute URL to open for a site given as a key, bare domain or URL. */
export function siteUrl(site: string): string {
  const trimmed = site.trim();
  if (SCHEME_RE.test(trimmed)) return trimmed;
  return `https://${trimmed.replace(/^\/+/, "")}`;
}
