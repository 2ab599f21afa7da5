import { updateClickURL } from "./clickUrl";
import { extractImpressionURL } from "./impressionUrl";
import { buildTagIndex, lookupMatch } from "./matchTagRow";
import type {
  Dataset,
  PrimaryRecord,
  ProcessingCounts,
  ProcessingResult,
  RowOutcome,
} from "./types";

export const NO_MATCH_PREFIX = "No match found for:";

export function formatNoMatchLine(record: PrimaryRecord): string {
  return `${NO_MATCH_PREFIX} Campaign='${record.campaignName}', Ad Group='${record.adGroupName}', Ad='${record.adName}'`;
}

export function formatSummaryLines(counts: ProcessingCounts): string[] {
  return [
    "Processing complete:",
    `  • Total rows processed: ${counts.totalRows}`,
    `  • Matches found: ${counts.matchesFound}`,
    `  • Click URL updates: ${counts.clickUrlUpdates}`,
    `  • Impression URL updates: ${counts.impressionUrlUpdates}`,
    "",
  ];
}

export function unmatchedLines(log: readonly string[]): string[] {
  return log.filter((line) => line.startsWith(NO_MATCH_PREFIX));
}

export function processAll(
  primaryRecords: readonly PrimaryRecord[],
  datasets: readonly Dataset[]
): ProcessingResult {
  const index = buildTagIndex(datasets);
  const counts: ProcessingCounts = {
    totalRows: primaryRecords.length,
    matchesFound: 0,
    clickUrlUpdates: 0,
    impressionUrlUpdates: 0,
  };
  const records: PrimaryRecord[] = [];
  const outcomes: RowOutcome[] = [];
  const noMatch: string[] = [];

  primaryRecords.forEach((original, rowIndex) => {
    const record: PrimaryRecord = { ...original };
    records.push(record);

    const match = lookupMatch(index, record);
    if (!match) {
      noMatch.push(formatNoMatchLine(record));
      outcomes.push({
        rowIndex,
        matched: false,
        sourceIndex: null,
        clickUrlUpdated: false,
        impressionUrlUpdated: false,
      });
      return;
    }

    counts.matchesFound += 1;

    const updatedClickUrl = updateClickURL(
      record.clickUrl,
      match.record.clickTracker,
      record.campaignName
    );
    const clickUrlUpdated = updatedClickUrl !== record.clickUrl;
    if (clickUrlUpdated) {
      record.clickUrl = updatedClickUrl;
      counts.clickUrlUpdates += 1;
    }

    // Replaced whenever a value was extracted, even if it equals the old one.
    let impressionUrlUpdated = false;
    if (match.record.impressionTracker) {
      const extracted = extractImpressionURL(match.record.impressionTracker);
      if (extracted) {
        record.impressionTrackingUrl = extracted;
        counts.impressionUrlUpdates += 1;
        impressionUrlUpdated = true;
      }
    }

    outcomes.push({
      rowIndex,
      matched: true,
      sourceIndex: match.sourceIndex,
      clickUrlUpdated,
      impressionUrlUpdated,
    });
  });

  return {
    records,
    log: [...formatSummaryLines(counts), ...noMatch],
    counts,
    outcomes,
  };
}
