import { formatCompactTimestamp, type ExportFormat } from '@leadscout/shared';

export const EXPORT_CONTENT_TYPES: Record<ExportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
};

export function exportFilename(format: ExportFormat, now: Date = new Date()): string {
  return `business_leads_${formatCompactTimestamp(now)}.${format}`;
}
