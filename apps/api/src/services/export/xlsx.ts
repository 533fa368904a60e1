import ExcelJS from 'exceljs';
import type { Lead } from '@leadscout/shared';
import { EXPORT_COLUMNS } from './columns.js';

export const XLSX_SHEET_NAME = 'Business Leads';

const HEADER_FILL = 'FF366092';
const MIN_COLUMN_WIDTH = 10;
const MAX_COLUMN_WIDTH = 60;

const THIN_BORDER: Partial<ExcelJS.Borders> = {
  top: { style: 'thin' },
  left: { style: 'thin' },
  bottom: { style: 'thin' },
  right: { style: 'thin' },
};

/** Longest line of a cell, in characters */
function displayLength(value: ExcelJS.CellValue): number {
  if (value === null || value === undefined) {
    return 0;
  }
  return Math.max(...String(value).split('\n').map((line) => line.length));
}

function fittedWidth(header: string, values: ExcelJS.CellValue[]): number {
  const longest = Math.max(header.length, ...values.map(displayLength));
  return Math.min(Math.max(longest + 2, MIN_COLUMN_WIDTH), MAX_COLUMN_WIDTH);
}

/**
 * Build an .xlsx workbook with one sheet of leads: a bold white-on-blue
 * header row that stays frozen, bordered wrapped data cells, and widths
 * fitted to the content unless the column fixes one.
 */
export async function leadsToXlsx(leads: readonly Lead[]): Promise<ExcelJS.Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(XLSX_SHEET_NAME, {
    views: [{ state: 'frozen', ySplit: 1 }],
  });

  sheet.addRow(EXPORT_COLUMNS.map((column) => column.header));
  for (const lead of leads) {
    sheet.addRow(EXPORT_COLUMNS.map((column) => column.value(lead)));
  }

  sheet.getRow(1).eachCell((cell) => {
    cell.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: HEADER_FILL } };
    cell.alignment = { horizontal: 'center', vertical: 'middle', wrapText: true };
  });

  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) {
      return;
    }
    row.eachCell({ includeEmpty: true }, (cell) => {
      cell.alignment = { vertical: 'middle', wrapText: true };
      cell.border = THIN_BORDER;
    });
  });

  EXPORT_COLUMNS.forEach((column, index) => {
    const sheetColumn = sheet.getColumn(index + 1);
    const values: ExcelJS.CellValue[] = [];
    sheetColumn.eachCell({ includeEmpty: false }, (cell, rowNumber) => {
      if (rowNumber > 1) {
        values.push(cell.value);
      }
    });
    sheetColumn.width = column.width ?? fittedWidth(column.header, values);
  });

  return workbook.xlsx.writeBuffer();
}
