/**
 * URL parsing utility.
 */

export interface ParsedUrl {
  protocol: "https" | "http";
  hostname: string;
  port: number;
  path: string; // includes query string, e.g. "/cs?id=1"
}

/**
 * Parse a URL string into its components.
 * Throws TypeError on malformed input or a scheme other than http/https.
 */
export function parseUrl(url: string): ParsedUrl {
  const parsed = new URL(url);

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new TypeError(`Unsupported URL scheme: ${parsed.protocol}`);
  }
  if (!parsed.hostname) {
    throw new TypeError(`URL has no host: ${url}`);
  }

  const protocol = parsed.protocol === "https:" ? "https" : "http";
  // node:http wants a bare IPv6 literal
  const hostname = parsed.hostname.replace(/^\[(.*)\]$/, "$1");
  const defaultPort = protocol === "https" ? 443 : 80;
  const port = parsed.port ? parseInt(parsed.port, 10) : defaultPort;
  const path = parsed.pathname + parsed.search;

  return { protocol, hostname, port, path: path || "/" };
}
