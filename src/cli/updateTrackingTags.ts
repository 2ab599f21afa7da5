import fs from "node:fs";
import path from "node:path";
import { DEFAULT_OUTPUT_FILE, loadTrackingConfig, parsePositiveInt } from "../tracking/config";
import { formatSummaryLines, processAll, unmatchedLines } from "../tracking/processAll";
import type { PrimaryRecord } from "../tracking/types";
import {
  applyRecords,
  datasetsOf,
  exportRecords,
  readExportSheet,
  readTagDatasets,
} from "../tracking/workbook";
import { writeUpdatedExport } from "../tracking/writeXlsx";

function usage() {
  console.log(
    "Usage: npm run tags:update -- --export <xlsx> --tags <xlsx> [--tags <xlsx> ...] [--out <xlsx>] [--sheet Ads] [--tag-header-row 11] [--preview 10] [--log-file <txt>]"
  );
}

function getArg(flag: string): string | undefined {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return undefined;
  return process.argv[idx + 1];
}

function getArgs(flag: string): string[] {
  const values: string[] = [];
  process.argv.forEach((arg, idx) => {
    const next = process.argv[idx + 1];
    if (arg === flag && next !== undefined && !next.startsWith("--")) {
      values.push(next);
    }
  });
  return values;
}

function previewRows(records: PrimaryRecord[], limit: number) {
  return records.slice(0, limit).map((record) => ({
    campaign: record.campaignName,
    adGroup: record.adGroupName,
    ad: record.adName,
    clickUrl: record.clickUrl,
    impressionUrl: record.impressionTrackingUrl,
  }));
}

async function main() {
  const exportPath = getArg("--export");
  const tagPaths = getArgs("--tags");
  if (!exportPath || exportPath.startsWith("--") || tagPaths.length === 0) {
    usage();
    process.exit(1);
  }

  const config = loadTrackingConfig();
  const sheetName = getArg("--sheet") ?? config.exportSheet;
  const headerRowArg = getArg("--tag-header-row");
  const tagHeaderRow =
    headerRowArg === undefined ? config.tagHeaderRow : parsePositiveInt(headerRowArg, "--tag-header-row");
  const previewArg = getArg("--preview");
  const previewLimit = previewArg === undefined ? 10 : parsePositiveInt(previewArg, "--preview");
  const outPath = getArg("--out") ?? path.join(config.outDir, DEFAULT_OUTPUT_FILE);
  const logFile = getArg("--log-file");

  const exportSheet = readExportSheet(exportPath, sheetName);
  console.log(`OK export file loaded: ${exportSheet.rows.length} rows`);

  const tagSheets = readTagDatasets(tagPaths, tagHeaderRow);
  tagSheets.forEach((sheet, idx) => {
    console.log(`OK tag file ${idx + 1} loaded: ${sheet.records.length} rows (${sheet.filePath})`);
  });

  const result = processAll(exportRecords(exportSheet), datasetsOf(tagSheets));

  applyRecords(exportSheet, result.records);
  const written = writeUpdatedExport({ outPath, sheet: exportSheet });

  for (const line of formatSummaryLines(result.counts)) {
    console.log(line);
  }

  console.log("Preview:");
  console.table(previewRows(result.records, previewLimit));

  const unmatched = unmatchedLines(result.log);
  if (unmatched.length) {
    console.warn(`Unmatched rows (${unmatched.length}):`);
    for (const line of unmatched) console.warn(line);
  }

  if (logFile) {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    fs.writeFileSync(logFile, `${result.log.join("\n")}\n`, "utf-8");
    console.log(`Log written: ${logFile}`);
  }

  console.log(`OK updated export written: ${written}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
