export interface CandidateDomains {
  /** Kept candidates, capped */
  domains: string[];
  /** Number of candidates kept before the cap */
  totalFound: number;
}

/**
 * Keep plausible domains from a raw list: trimmed, containing a dot,
 * not a `#` comment. Only the first `limit` are returned.
 */
export function cleanCandidateDomains(raw: readonly string[], limit: number): CandidateDomains {
  const cleaned = raw
    .map((value) => value.trim())
    .filter((value) => value.length > 0 && value.includes(".") && !value.startsWith("#"));

  return {
    domains: cleaned.slice(0, limit),
    totalFound: cleaned.length,
  };
}
