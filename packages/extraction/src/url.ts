export const DEFAULT_BASE_URL = "https://www.dd373.com";

const SEARCH_PATH_MARKER = "/s-";
const DETAIL_ID_PATTERN = /\/detail-([^/?#]+?)\.html/;
const ABSOLUTE_URL_PATTERN = /^https?:\/\//i;

/** Returns an absolute http(s) URL, or `""` for anything else (`javascript:;`, `#`, bare paths). */
export function resolveHref(href: string, baseUrl: string): string {
  const trimmed = href.trim();
  if (trimmed.startsWith("//")) {
    return `https:${trimmed}`;
  }
  if (trimmed.startsWith("/")) {
    return `${baseUrl.replace(/\/+$/, "")}${trimmed}`;
  }
  return ABSOLUTE_URL_PATTERN.test(trimmed) ? trimmed : "";
}

export function extractProductId(url: string): string {
  return url.match(DETAIL_ID_PATTERN)?.[1] ?? "";
}

/**
 * Search pages look like `https://www.dd373.com/s-<filters>.html`; listing links on them
 * are site-relative, so everything before the `/s-` segment is the base to resolve against.
 */
export function deriveBaseUrl(listingUrl: string): string {
  const markerIndex = listingUrl.indexOf(SEARCH_PATH_MARKER);
  return markerIndex === -1 ? DEFAULT_BASE_URL : listingUrl.slice(0, markerIndex);
}
