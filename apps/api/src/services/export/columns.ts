import type { Lead } from '@leadscout/shared';

export type CellValue = string | number | null;

export interface ExportColumn {
  header: string;
  value: (lead: Lead) => CellValue;
  /** Fixed spreadsheet width; columns without one are fitted to their content */
  width?: number;
}

export const EXPORT_COLUMNS: readonly ExportColumn[] = [
  { header: 'Business Name', value: (lead) => lead.name },
  { header: 'Address', value: (lead) => lead.address },
  { header: 'Phone Number', value: (lead) => lead.phone },
  { header: 'Website', value: (lead) => lead.website },
  { header: 'Rating', value: (lead) => lead.rating },
  { header: 'Number of Reviews', value: (lead) => lead.reviewCount },
  { header: 'Business Status', value: (lead) => lead.businessStatus },
  { header: 'Business Types', value: (lead) => lead.types.join(', ') },
  { header: 'Opening Hours', value: (lead) => lead.openingHours.join('\n'), width: 40 },
  { header: 'Google Maps URL', value: (lead) => lead.googleMapsUrl },
  { header: 'Latitude', value: (lead) => lead.lat },
  { header: 'Longitude', value: (lead) => lead.lng },
];

export const EXPORT_HEADERS: readonly string[] = EXPORT_COLUMNS.map((column) => column.header);
