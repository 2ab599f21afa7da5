import fs from "node:fs";
import * as XLSX from "xlsx";
import { keyText } from "./matchTagRow";
import { EXPORT_COLUMNS, TAG_COLUMNS } from "./types";
import type { Dataset, PrimaryRecord, TagRecord } from "./types";

export type ExportColumnIndex = Record<keyof typeof EXPORT_COLUMNS, number>;

/**
 * The loaded export sheet. `rows[i]` holds the text of sheet row `i + 1`
 * (row 0 is the header), indexed by sheet column. The worksheet itself is
 * kept so that writing touches nothing but the URL cells.
 */
export type ExportSheet = {
  sheetName: string;
  worksheet: XLSX.WorkSheet;
  headers: string[];
  rows: string[][];
  columns: ExportColumnIndex;
};

export type TagSheet = {
  filePath: string;
  headers: string[];
  records: TagRecord[];
};

type Cell = string | number | boolean | null;

export const REQUIRED_EXPORT_COLUMNS: string[] = Object.values(EXPORT_COLUMNS);
export const REQUIRED_TAG_COLUMNS: string[] = Object.values(TAG_COLUMNS);

function readWorkbook(filePath: string): XLSX.WorkBook {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }
  return XLSX.readFile(filePath);
}

function cellText(value: Cell | undefined): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

function isBlankRow(cells: readonly string[]): boolean {
  return cells.every((cell) => cell === "");
}

// Rows from `firstRow` (0-based) to the end of the sheet, columns from A.
// Blank rows inside the data are kept so positions line up with the sheet.
function readGrid(sheet: XLSX.WorkSheet, firstRow: number): string[][] {
  const ref = sheet["!ref"];
  if (!ref) return [];
  const range = XLSX.utils.decode_range(ref);
  range.s.r = firstRow;
  range.s.c = 0;
  if (range.s.r > range.e.r) return [];

  const grid = XLSX.utils.sheet_to_json<Cell[]>(sheet, {
    header: 1,
    raw: false,
    rawNumbers: true,
    defval: "",
    blankrows: true,
    range,
  });
  const rows = grid.map((cells) => Array.from(cells, (cell) => cellText(cell)));
  while (rows.length > 1 && isBlankRow(rows[rows.length - 1])) {
    rows.pop();
  }
  return rows;
}

export function missingColumns(headers: readonly string[], required: readonly string[]): string[] {
  return required.filter((col) => !headers.includes(col));
}

export function readExportSheet(filePath: string, sheetName: string): ExportSheet {
  const workbook = readWorkbook(filePath);
  const worksheet = workbook.Sheets[sheetName];
  if (!worksheet) {
    throw new Error(`Sheet "${sheetName}" not found in ${filePath}`);
  }
  const grid = readGrid(worksheet, 0);
  const headers = (grid[0] ?? []).map((cell) => keyText(cell));
  const missing = missingColumns(headers, REQUIRED_EXPORT_COLUMNS);
  if (missing.length) {
    throw new Error(`Missing columns in export file: ${missing.join(", ")}`);
  }
  // The first column carrying a duplicated header name wins.
  const columns: ExportColumnIndex = {
    campaignName: headers.indexOf(EXPORT_COLUMNS.campaignName),
    adGroupName: headers.indexOf(EXPORT_COLUMNS.adGroupName),
    adName: headers.indexOf(EXPORT_COLUMNS.adName),
    clickUrl: headers.indexOf(EXPORT_COLUMNS.clickUrl),
    impressionTrackingUrl: headers.indexOf(EXPORT_COLUMNS.impressionTrackingUrl),
  };
  return { sheetName, worksheet, headers, rows: grid.slice(1), columns };
}

export function exportRecords(sheet: ExportSheet): PrimaryRecord[] {
  const { columns } = sheet;
  return sheet.rows.map((cells) => ({
    campaignName: cells[columns.campaignName] ?? "",
    adGroupName: cells[columns.adGroupName] ?? "",
    adName: cells[columns.adName] ?? "",
    clickUrl: cells[columns.clickUrl] ?? "",
    impressionTrackingUrl: cells[columns.impressionTrackingUrl] ?? "",
  }));
}

/** Tag exports carry a report preamble; the header sits on `headerRow` (1-based). */
export function readTagSheet(filePath: string, headerRow: number, fileNumber: number): TagSheet {
  const workbook = readWorkbook(filePath);
  const firstSheetName = workbook.SheetNames[0];
  const sheet = firstSheetName === undefined ? undefined : workbook.Sheets[firstSheetName];
  if (!sheet) {
    throw new Error(`Tag file ${fileNumber} has no sheets: ${filePath}`);
  }
  const grid = readGrid(sheet, headerRow - 1);
  const headers = (grid[0] ?? []).map((cell) => keyText(cell));
  const missing = missingColumns(headers, REQUIRED_TAG_COLUMNS);
  if (missing.length) {
    throw new Error(`Missing columns in tag file ${fileNumber}: ${missing.join(", ")}`);
  }
  const at = (cells: string[], column: string) => cells[headers.indexOf(column)] ?? "";
  const records = grid
    .slice(1)
    .filter((cells) => !isBlankRow(cells))
    .map(
      (cells): TagRecord => ({
        campaignName: at(cells, TAG_COLUMNS.campaignName),
        placementName: at(cells, TAG_COLUMNS.placementName),
        adName: at(cells, TAG_COLUMNS.adName),
        clickTracker: at(cells, TAG_COLUMNS.clickTracker),
        impressionTracker: at(cells, TAG_COLUMNS.impressionTracker),
      })
    );
  return { filePath, headers, records };
}

export function readTagDatasets(filePaths: readonly string[], headerRow: number): TagSheet[] {
  return filePaths.map((filePath, idx) => readTagSheet(filePath, headerRow, idx + 1));
}

export function datasetsOf(sheets: readonly TagSheet[]): Dataset[] {
  return sheets.map((sheet) => sheet.records);
}

/**
 * Writes changed URL values into the export worksheet in place. Every other
 * cell keeps its original type, value and number format.
 */
export function applyRecords(sheet: ExportSheet, records: readonly PrimaryRecord[]): void {
  if (sheet.rows.length !== records.length) {
    throw new Error(
      `Row count mismatch: ${sheet.rows.length} sheet rows, ${records.length} records`
    );
  }
  const targets: [keyof PrimaryRecord, number][] = [
    ["clickUrl", sheet.columns.clickUrl],
    ["impressionTrackingUrl", sheet.columns.impressionTrackingUrl],
  ];
  records.forEach((record, idx) => {
    const cells = sheet.rows[idx];
    for (const [field, column] of targets) {
      const value = record[field];
      if (value === (cells[column] ?? "")) continue;
      XLSX.utils.sheet_add_aoa(sheet.worksheet, [[value]], { origin: { r: idx + 1, c: column } });
    }
  });
}
