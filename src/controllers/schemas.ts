import { z } from 'zod';
import { AnalysisResultSchema } from '../services/analysis/analysis.types.js';

const optionalInt = z.number().int().optional();

export const SearchRequestSchema = z.object({
  latitude: z.number().optional(),
  longitude: z.number().optional(),
  address: z.string().trim().min(1).optional(),
  radius: optionalInt,
  minReviews: optionalInt,
  maxResults: optionalInt,
}).refine(
  v => v.address !== undefined || (v.latitude !== undefined && v.longitude !== undefined),
  { message: 'address or latitude/longitude required' }
);

export type SearchRequest = z.infer<typeof SearchRequestSchema>;

export const StartAnalysisSchema = z.object({
  placeId: z.string().trim().min(1),
  restaurantName: z.string().trim().optional(),
  maxReviews: z.number().int().positive().optional(),
});

export const CombinedResultSchema = z.object({
  placeId: z.string(),
  restaurantName: z.string(),
  reviewMetadata: z.object({
    totalReviews: z.number(),
    overallRating: z.number(),
    totalRatings: z.number(),
    fromCache: z.boolean(),
  }),
  analysis: AnalysisResultSchema,
  analysisFromCache: z.boolean(),
  timestamps: z.object({
    startedAt: z.string(),
    completedAt: z.string(),
  }),
});

export const ExportRequestSchema = z.object({
  analysisResult: CombinedResultSchema,
  format: z.enum(['json', 'text']).default('json'),
});

/** "path: message" lines for a validation error response */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`);
}
