export function cleanText(value: string | null | undefined): string {
  return (value || "").replace(/\s+/g, " ").trim();
}

export function normalizeContent(content: string): string {
  return content
    .trim()
    .replace(/\s+/g, " ")
    .normalize("NFKC")
    .toLowerCase()
    .replace(/[\u200B-\u200D\uFEFF]/g, "");
}

const TRACKING_PARAMS = ["trk", "trackingId", "lipi", "utm_source", "utm_medium", "utm_campaign", "ref"];

export function normalizeUrl(url: string): string {
  try {
    const u = new URL(url);
    for (const param of TRACKING_PARAMS) {
      u.searchParams.delete(param);
    }
    return u.toString();
  } catch {
    return url;
  }
}

export function extractMediaFingerprint(mediaUrls: string[]): string {
  return mediaUrls
    .map((u) => normalizeUrl(u))
    .sort()
    .join("|");
}

/**
 * Pulls the count out of a social-count label, as displayed:
 * "1,204 comments" -> "1,204", "1.2K reposts" -> "1.2K".
 */
export function extractCountToken(label: string): string | null {
  const match = label.match(/\d[\d.,]*\s?[KMB]?\b/i);
  return match ? match[0].replace(/\s+/g, "") : null;
}

export function countOrZero(text: string | null | undefined): string {
  const cleaned = cleanText(text);
  return cleaned.length > 0 ? cleaned : "0";
}

export function companySlugFromUrl(companyUrl: string): string | null {
  const match = companyUrl.match(/\/company\/([^/?#]+)/);
  if (!match?.[1]) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return match[1];
  }
}
