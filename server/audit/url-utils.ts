const CRAWLABLE_PROTOCOLS = ["http:", "https:"];

/**
 * Canonical form used for dedup and display: lowercased scheme and host,
 * default port dropped, fragment and trailing slashes removed, query kept
 * verbatim. Returns null for unparsable or non-http(s) URLs.
 */
export function normalizeUrl(urlString: string, baseUrl?: string): string | null {
  let url: URL;
  try {
    url = baseUrl ? new URL(urlString.trim(), baseUrl) : new URL(urlString.trim());
  } catch {
    return null;
  }

  if (!CRAWLABLE_PROTOCOLS.includes(url.protocol)) {
    return null;
  }

  // URL already lowercases scheme and host and drops default ports.
  const pathname = url.pathname.replace(/\/+$/, "");
  return `${url.protocol}//${url.host}${pathname}${url.search}`;
}

export function getHost(urlString: string): string | null {
  try {
    return new URL(urlString).host.toLowerCase();
  } catch {
    return null;
  }
}

/** Host made safe for use in a file name, e.g. `localhost:8080` -> `localhost_8080`. */
export function hostForFilename(urlString: string): string {
  const host = getHost(urlString) ?? urlString;
  return host.replace(/:/g, "_").replace(/[^a-zA-Z0-9._-]/g, "-");
}
