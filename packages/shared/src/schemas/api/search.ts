import { z } from 'zod';
import {
  DEFAULT_SEARCH_RADIUS_MILES,
  MAX_EXPORT_LEADS,
  MAX_SEARCH_RADIUS_MILES,
} from '../../constants.js';

export const searchRequestSchema = z.object({
  city: z.string().trim().min(1).max(200),
  businessType: z.string().trim().toLowerCase().min(1).max(100),
  radiusMiles: z.number().positive().max(MAX_SEARCH_RADIUS_MILES).default(DEFAULT_SEARCH_RADIUS_MILES),
  /** Keep only businesses with fewer reviews than this */
  maxReviews: z.number().int().min(0).max(10_000).optional(),
  /** Drop businesses that already list a website */
  excludeWithWebsite: z.boolean().default(false),
});

export type SearchRequest = z.infer<typeof searchRequestSchema>;
export type SearchRequestInput = z.input<typeof searchRequestSchema>;

export const coordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

export type Coordinates = z.infer<typeof coordinatesSchema>;

export const leadSchema = z.object({
  placeId: z.string(),
  name: z.string(),
  address: z.string().nullable(),
  phone: z.string().nullable(),
  website: z.string().nullable(),
  rating: z.number().nullable(),
  reviewCount: z.number().int().nullable(),
  businessStatus: z.string().nullable(),
  types: z.array(z.string()),
  openingHours: z.array(z.string()),
  googleMapsUrl: z.string().nullable(),
  lat: z.number(),
  lng: z.number(),
});

export type Lead = z.infer<typeof leadSchema>;

export const searchResponseSchema = z.object({
  center: coordinatesSchema,
  leads: z.array(leadSchema),
  remainingFreeSearches: z.number().int().min(0).optional(),
});

export type SearchResponse = z.infer<typeof searchResponseSchema>;

export const exportFormatSchema = z.enum(['csv', 'xlsx']);

export type ExportFormat = z.infer<typeof exportFormatSchema>;

export const exportRequestSchema = z.object({
  leads: z.array(leadSchema).min(1).max(MAX_EXPORT_LEADS),
  format: exportFormatSchema.default('csv'),
});

export type ExportRequest = z.infer<typeof exportRequestSchema>;
