/**
 * Response schemas for the mapping provider (Places, Distance Matrix, Geocoding).
 * Only the fields the app reads are declared; everything else is ignored.
 */

import { z } from 'zod';

export const LatLngSchema = z.object({
  lat: z.number(),
  lng: z.number(),
});

export const RawReviewSchema = z.object({
  author_name: z.string().optional(),
  rating: z.number().optional(),
  text: z.string().optional(),
  time: z.number().optional(),
  relative_time_description: z.string().optional(),
  language: z.string().optional(),
});

export const PlaceDetailsResultSchema = z.object({
  name: z.string().optional(),
  rating: z.number().optional(),
  user_ratings_total: z.number().optional(),
  reviews: z.array(RawReviewSchema).optional(),
});

export const PlaceDetailsResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  result: PlaceDetailsResultSchema.optional(),
});

export const NearbyPlaceSchema = z.object({
  place_id: z.string(),
  name: z.string().optional(),
  rating: z.number().optional(),
  user_ratings_total: z.number().optional(),
  price_level: z.number().optional(),
  vicinity: z.string().optional(),
  business_status: z.string().optional(),
  types: z.array(z.string()).optional(),
  geometry: z.object({ location: LatLngSchema }).optional(),
  opening_hours: z.object({ open_now: z.boolean().optional() }).optional(),
});

export const NearbySearchResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(NearbyPlaceSchema).default([]),
});

const TextValueSchema = z.object({
  text: z.string(),
  value: z.number(),
});

export const DistanceElementSchema = z.object({
  status: z.string(),
  distance: TextValueSchema.optional(),
  duration: TextValueSchema.optional(),
});

export const DistanceMatrixResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  rows: z.array(z.object({ elements: z.array(DistanceElementSchema) })).default([]),
});

export const GeocodeResponseSchema = z.object({
  status: z.string(),
  error_message: z.string().optional(),
  results: z.array(z.object({
    formatted_address: z.string().optional(),
    geometry: z.object({ location: LatLngSchema }),
  })).default([]),
});

export type LatLng = z.infer<typeof LatLngSchema>;
export type RawReview = z.infer<typeof RawReviewSchema>;
export type PlaceDetailsResult = z.infer<typeof PlaceDetailsResultSchema>;
export type NearbyPlace = z.infer<typeof NearbyPlaceSchema>;
export type DistanceElement = z.infer<typeof DistanceElementSchema>;
