export { EXPORT_COLUMNS, EXPORT_HEADERS, type CellValue, type ExportColumn } from './columns.js';
export { escapeCsvField, leadsToCsv } from './csv.js';
export { leadsToXlsx, XLSX_SHEET_NAME } from './xlsx.js';
export { EXPORT_CONTENT_TYPES, exportFilename } from './filename.js';
