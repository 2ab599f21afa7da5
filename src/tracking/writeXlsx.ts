import fs from "node:fs";
import path from "node:path";
import * as XLSX from "xlsx";
import type { ExportSheet } from "./workbook";

export function writeUpdatedExport(params: { outPath: string; sheet: ExportSheet }): string {
  const { outPath, sheet } = params;

  const dir = path.dirname(outPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }

  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet.worksheet, sheet.sheetName);
  XLSX.writeFile(workbook, outPath);

  return outPath;
}
