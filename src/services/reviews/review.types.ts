import { z } from 'zod';

export const ReviewSchema = z.object({
  text: z.string(),
  rating: z.number(),
  author: z.string(),
  /** Unix seconds */
  submittedAt: z.number(),
  relativeTimeDescription: z.string(),
  language: z.string(),
});

export type Review = z.infer<typeof ReviewSchema>;

/** What the review cache stores per place (all filtered reviews, untruncated). */
export const CachedReviewsSchema = z.object({
  placeName: z.string(),
  aggregateRating: z.number(),
  totalRatingCount: z.number(),
  reviews: z.array(ReviewSchema),
});

export type CachedReviews = z.infer<typeof CachedReviewsSchema>;

export interface ReviewBundle {
  placeId: string;
  placeName: string;
  aggregateRating: number;
  totalRatingCount: number;
  /** Newest first */
  reviews: Review[];
  /** Epoch ms of the provider fetch that produced these reviews */
  fetchedAt: number;
  fromCache: boolean;
}

export interface ReviewCacheDiagnostics {
  cachedPlaces: number;
  cachedReviews: number;
  expiredEntries: number;
  cacheFileExists: boolean;
  cacheFile: string;
}
