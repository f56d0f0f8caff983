const RUGCHECK_API = "https://api.rugcheck.xyz/v1";

interface ReportSummary {
  score?: number;
  score_normalised?: number;
}

/**
 * External reputation check. RugCheck reports a normalised risk (0 = clean,
 * 100 = worst); it is inverted here so that higher means safer.
 */
export class RugCheckClient {
  private readonly baseUrl: string;

  constructor(baseUrl = RUGCHECK_API) {
    this.baseUrl = baseUrl;
  }

  /** Safety score 0-100, or null when the provider has no usable answer. */
  async getSafetyScore(mint: string, signal?: AbortSignal): Promise<number | null> {
    const response = await fetch(`${this.baseUrl}/tokens/${mint}/report/summary`, { signal });
    if (!response.ok) {
      return null;
    }
    const body = (await response.json()) as ReportSummary;
    const risk = body.score_normalised;
    if (typeof risk !== "number" || !Number.isFinite(risk)) {
      return null;
    }
    return Math.min(100, Math.max(0, 100 - risk));
  }
}
