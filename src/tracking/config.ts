import { config as loadEnv } from "dotenv";

loadEnv({ path: ".env.local" });

export const DEFAULT_EXPORT_SHEET = "Ads";
export const DEFAULT_TAG_HEADER_ROW = 11;
export const DEFAULT_OUT_DIR = "out";
export const DEFAULT_OUTPUT_FILE = "updated_tiktok_export.xlsx";

export type TrackingConfig = {
  exportSheet: string;
  tagHeaderRow: number;
  outDir: string;
};

export function parsePositiveInt(value: string, source: string): number {
  const raw = value.trim();
  const num = Number(raw);
  if (!raw || !Number.isInteger(num) || num < 1) {
    throw new Error(`Invalid ${source}: ${value}`);
  }
  return num;
}

export function loadTrackingConfig(env: NodeJS.ProcessEnv = process.env): TrackingConfig {
  const exportSheet = env.TRACKING_EXPORT_SHEET?.trim() || DEFAULT_EXPORT_SHEET;
  const headerRowRaw = env.TRACKING_TAG_HEADER_ROW;
  const tagHeaderRow =
    headerRowRaw === undefined || headerRowRaw.trim() === ""
      ? DEFAULT_TAG_HEADER_ROW
      : parsePositiveInt(headerRowRaw, "TRACKING_TAG_HEADER_ROW");
  const outDir = env.TRACKING_OUT_DIR?.trim() || DEFAULT_OUT_DIR;
  return { exportSheet, tagHeaderRow, outDir };
}
