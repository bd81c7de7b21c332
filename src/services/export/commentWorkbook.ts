/**
 * Comment workbook export
 * One worksheet, fixed header row, one row per extracted comment.
 */

import * as ExcelJS from "exceljs";
import {
  COLUMN_ORDER,
  EXPORT_LABELS,
  ExtractedRow,
  Locale,
  localizeRow,
} from "../../lib/drawingComments";

export const XLSX_MIME_TYPE =
  "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";

const COLUMN_WIDTHS: Record<(typeof COLUMN_ORDER)[number], number> = {
  page: 8,
  drawingNumber: 16,
  comment: 60,
  author: 18,
  modified: 26,
  colorName: 10,
  colorHex: 14,
};

export interface WorkbookOptions {
  locale?: Locale;
}

export function createCommentWorkbook(rows: readonly ExtractedRow[], options: WorkbookOptions = {}): ExcelJS.Workbook {
  const labels = EXPORT_LABELS[options.locale ?? "en"];
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(labels.sheetName);

  worksheet.columns = COLUMN_ORDER.map((key) => ({
    header: labels.headers[key],
    key,
    width: COLUMN_WIDTHS[key],
  }));
  worksheet.getRow(1).font = { bold: true };

  for (const row of rows) {
    worksheet.addRow(localizeRow(row, options.locale ?? "en"));
  }

  return workbook;
}

export async function buildCommentWorkbook(
  rows: readonly ExtractedRow[],
  options: WorkbookOptions = {},
): Promise<Buffer> {
  const workbook = createCommentWorkbook(rows, options);
  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}

/**
 * Download name for a source PDF, e.g. "A-sheets.pdf" -> "comment_list_A-sheets.pdf.xlsx"
 */
export function commentWorkbookFileName(sourceName: string): string {
  return `comment_list_${sourceName}.xlsx`;
}
