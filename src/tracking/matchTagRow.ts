import type { Dataset, PrimaryRecord, TagMatch, TagRecord } from "./types";

export type TagIndex = Map<string, TagMatch>;

export function keyText(value: unknown): string {
  return String(value ?? "").trim();
}

function compositeKey(campaignName: unknown, placementName: unknown, adName: unknown): string {
  return JSON.stringify([keyText(campaignName), keyText(placementName), keyText(adName)]);
}

function tagKey(record: TagRecord): string {
  return compositeKey(record.campaignName, record.placementName, record.adName);
}

function primaryKey(record: PrimaryRecord): string {
  return compositeKey(record.campaignName, record.adGroupName, record.adName);
}

export function findMatch(
  primary: PrimaryRecord,
  datasets: readonly Dataset[]
): TagRecord | undefined {
  const key = primaryKey(primary);
  for (const dataset of datasets) {
    const found = dataset.find((record) => tagKey(record) === key);
    if (found) return found;
  }
  return undefined;
}

// First insert wins, so dataset order then row order decides duplicates.
export function buildTagIndex(datasets: readonly Dataset[]): TagIndex {
  const index: TagIndex = new Map();
  datasets.forEach((dataset, sourceIndex) => {
    for (const record of dataset) {
      const key = tagKey(record);
      if (index.has(key)) continue;
      index.set(key, { record, sourceIndex });
    }
  });
  return index;
}

export function lookupMatch(index: TagIndex, primary: PrimaryRecord): TagMatch | undefined {
  return index.get(primaryKey(primary));
}
