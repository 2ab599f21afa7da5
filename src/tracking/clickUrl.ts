export type ParsedUrl = {
  baseUrl: string;
  params: Map<string, string>;
  fragment: string;
};

export const TRACKING_PARAM_NAMES = [
  "utm_source",
  "utm_medium",
  "utm_campaign",
  "tf_source",
  "tf_medium",
  "tf_campaign",
] as const;

export type TrackingParamName = (typeof TRACKING_PARAM_NAMES)[number];

const SCHEME_PREFIX = /^[A-Za-z][A-Za-z0-9+.-]*:/;

export function defaultTrackingParams(campaignName: string): Record<TrackingParamName, string> {
  return {
    utm_source: "tiktok",
    utm_medium: "paid",
    utm_campaign: campaignName,
    tf_source: "tiktok",
    tf_medium: "paid_social",
    tf_campaign: campaignName,
  };
}

function authorityOf(base: string): string {
  const rest = base.replace(SCHEME_PREFIX, "");
  if (!rest.startsWith("//")) return "";
  const slash = rest.indexOf("/", 2);
  return slash === -1 ? rest.slice(2) : rest.slice(2, slash);
}

function hasUnbalancedBrackets(authority: string): boolean {
  return authority.includes("[") !== authority.includes("]");
}

/**
 * Splits a URL into everything before the query, the decoded query parameters
 * and the fragment. The scheme is lowercased and repeated names keep their
 * first value. A URL with an unbalanced IPv6 authority is returned whole as
 * the base with no parameters.
 */
export function parseUrlComponents(url: string | null | undefined): ParsedUrl {
  const params = new Map<string, string>();
  if (!url) return { baseUrl: "", params, fragment: "" };

  const hashIdx = url.indexOf("#");
  const beforeFragment = hashIdx === -1 ? url : url.slice(0, hashIdx);
  const fragment = hashIdx === -1 ? "" : url.slice(hashIdx + 1);

  const queryIdx = beforeFragment.indexOf("?");
  const rawBase = queryIdx === -1 ? beforeFragment : beforeFragment.slice(0, queryIdx);
  const query = queryIdx === -1 ? "" : beforeFragment.slice(queryIdx + 1);

  if (hasUnbalancedBrackets(authorityOf(rawBase))) {
    return { baseUrl: url, params, fragment: "" };
  }

  const baseUrl = rawBase.replace(SCHEME_PREFIX, (scheme) => scheme.toLowerCase());

  new URLSearchParams(query).forEach((value, name) => {
    if (!params.has(name)) params.set(name, value);
  });

  return { baseUrl, params, fragment };
}

export function buildUrlWithParams(parsed: ParsedUrl): string {
  const { baseUrl, params, fragment } = parsed;
  // A fragment alone still counts as a URL.
  if (!baseUrl && !fragment) return "";
  const suffix = fragment ? `#${fragment}` : "";
  if (params.size === 0) return `${baseUrl}${suffix}`;
  const query = new URLSearchParams([...params]).toString();
  return `${baseUrl}?${query}${suffix}`;
}

export function updateClickURL(
  originalURL: string | null | undefined,
  clickTracker: string | null | undefined,
  campaignName: string | null | undefined
): string {
  if (!originalURL) return "";

  let currentUrl = originalURL.trim();
  const tracker = (clickTracker ?? "").trim();
  if (tracker) {
    currentUrl = tracker + currentUrl;
  }

  const parsed = parseUrlComponents(currentUrl);
  const defaults = defaultTrackingParams(campaignName ?? "");
  for (const name of TRACKING_PARAM_NAMES) {
    if (!parsed.params.has(name)) {
      parsed.params.set(name, defaults[name]);
    }
  }

  return buildUrlWithParams(parsed);
}
