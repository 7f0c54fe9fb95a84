import fs from 'fs/promises';
import path from 'path';
import ExcelJS from 'exceljs';
import { formatDateKey } from './dates.js';
import { toCellNumber } from './money.js';
import type { ProductRecord } from './types.js';

export interface WorkbookOptions {
  outputDir: string;
  label: string;
  runDate?: Date;
  sheetName?: string;
}

type CellValue = string | number | null;

const PRICE_FORMAT = '0.00';

export const COLUMNS: ReadonlyArray<{ header: string; width: number; value: (record: ProductRecord) => CellValue; numFmt?: string }> = [
  { header: 'ID', width: 14, value: record => record.itemId },
  { header: 'Name', width: 48, value: record => record.name },
  { header: 'Brand', width: 20, value: record => record.brand || null },
  { header: 'Brand ID', width: 12, value: record => record.brandId },
  { header: 'URL', width: 52, value: record => record.url },
  { header: 'Price', width: 12, value: record => toCellNumber(record.regularPrice), numFmt: PRICE_FORMAT },
  { header: 'Discounted Price', width: 16, value: record => toCellNumber(record.discountedPrice), numFmt: PRICE_FORMAT },
  { header: 'Rating', width: 8, value: record => record.rating },
  { header: 'Reviews', width: 10, value: record => record.reviewCount },
  { header: 'Sold', width: 10, value: record => record.salesCount }
];

/** Replaces characters that are not allowed in file names on common filesystems. */
export function sanitizeFileLabel(label: string): string {
  const cleaned = label
    .trim()
    .replace(/[\\/:*?"<>|\u0000-\u001f]+/g, '_')
    .replace(/\s+/g, ' ');
  return cleaned || 'results';
}

export function buildOutputPath(outputDir: string, label: string, runDate: Date): string {
  return path.join(outputDir, `${sanitizeFileLabel(label)}_${formatDateKey(runDate)}.xlsx`);
}

export async function writeWorkbook(records: ProductRecord[], options: WorkbookOptions): Promise<string> {
  const resultPath = buildOutputPath(options.outputDir, options.label, options.runDate ?? new Date());

  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(options.sheetName ?? 'data');
  sheet.columns = COLUMNS.map(column => ({ header: column.header, width: column.width }));
  sheet.getRow(1).font = { bold: true };
  sheet.views = [{ state: 'frozen', ySplit: 1 }];

  for (const record of records) {
    const row = sheet.addRow(COLUMNS.map(column => column.value(record)));
    COLUMNS.forEach((column, index) => {
      if (column.numFmt) {
        row.getCell(index + 1).numFmt = column.numFmt;
      }
    });
  }

  await fs.mkdir(options.outputDir, { recursive: true });
  await workbook.xlsx.writeFile(resultPath);
  return resultPath;
}
