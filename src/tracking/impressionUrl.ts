const QUOTED = /"([^"]*)"/;

/**
 * Pulls the pixel URL out of an ad-server impression tag. Tags usually wrap it
 * in an `<IMG SRC="...">` snippet; plain URLs are returned trimmed.
 */
export function extractImpressionURL(trackerText: string | null | undefined): string {
  if (typeof trackerText !== "string") return "";
  const match = QUOTED.exec(trackerText);
  if (match) return match[1];
  return trackerText.trim();
}
