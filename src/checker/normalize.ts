const SCHEMES = ["http://", "https://"] as const;

/**
 * Prefix bare domains with https://. Anything already carrying an
 * http(s) scheme is returned as is; host validation is left to the client.
 */
export function normalizeUrl(domain: string): string {
  if (SCHEMES.some((scheme) => domain.startsWith(scheme))) {
    return domain;
  }
  return `https://${domain}`;
}
