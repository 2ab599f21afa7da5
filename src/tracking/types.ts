export const EXPORT_COLUMNS = {
  campaignName: "Campaign Name",
  adGroupName: "Ad Group Name",
  adName: "Ad Name",
  clickUrl: "Click URL",
  impressionTrackingUrl: "Impression tracking URL",
} as const;

export const TAG_COLUMNS = {
  campaignName: "Campaign Name",
  placementName: "Placement Name",
  adName: "Ad Name",
  clickTracker: "Click Tracker",
  impressionTracker: "Impression Tracker",
} as const;

export type PrimaryRecord = {
  campaignName: string;
  adGroupName: string;
  adName: string;
  clickUrl: string;
  impressionTrackingUrl: string;
};

export type TagRecord = {
  readonly campaignName: string;
  readonly placementName: string;
  readonly adName: string;
  readonly clickTracker: string;
  readonly impressionTracker: string;
};

export type Dataset = readonly TagRecord[];

export type TagMatch = {
  record: TagRecord;
  sourceIndex: number;
};

export type ProcessingCounts = {
  totalRows: number;
  matchesFound: number;
  clickUrlUpdates: number;
  impressionUrlUpdates: number;
};

export type RowOutcome = {
  rowIndex: number;
  matched: boolean;
  sourceIndex: number | null;
  clickUrlUpdated: boolean;
  impressionUrlUpdated: boolean;
};

export type ProcessingResult = {
  records: PrimaryRecord[];
  log: string[];
  counts: ProcessingCounts;
  outcomes: RowOutcome[];
};
