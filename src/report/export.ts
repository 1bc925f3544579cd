import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import ExcelJS from 'exceljs';

import type { ReconciledRow } from './reconcile.js';

export const SHEET_NAME = 'Sheet1';

export const REPORT_COLUMNS = [
  { header: 'User ID', key: 'userId', width: 24 },
  { header: 'First Name', key: 'firstName', width: 18 },
  { header: 'Last Name', key: 'lastName', width: 18 },
  { header: 'Email', key: 'email', width: 36 },
  { header: 'Origin', key: 'origin', width: 18 },
  { header: 'Okta Configuration Status', key: 'configurationStatus', width: 30 },
] as const satisfies ReadonlyArray<{ header: string; key: keyof ReconciledRow; width: number }>;

export type ReportFormat = 'xlsx' | 'csv';

export const formatFor = (outputPath: string): ReportFormat =>
  path.extname(outputPath).toLowerCase() === '.csv' ? 'csv' : 'xlsx';

export const buildWorkbook = (rows: readonly ReconciledRow[]): ExcelJS.Workbook => {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(SHEET_NAME);
  sheet.columns = REPORT_COLUMNS.map((column) => ({ ...column }));
  rows.forEach((row) => {
    sheet.addRow(REPORT_COLUMNS.map((column) => row[column.key]));
  });
  return workbook;
};

/** Write the rows to `outputPath`, replacing any previous report. */
export const writeReport = async (
  rows: readonly ReconciledRow[],
  outputPath: string,
): Promise<string> => {
  const target = path.resolve(outputPath);
  await mkdir(path.dirname(target), { recursive: true });
  const workbook = buildWorkbook(rows);
  if (formatFor(target) === 'csv') {
    await workbook.csv.writeFile(target);
  } else {
    await workbook.xlsx.writeFile(target);
  }
  return target;
};
