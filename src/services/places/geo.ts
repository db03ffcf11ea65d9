/**
 * Geo helpers
 * Straight-line distance and walking estimates used when the
 * distance-matrix endpoint gives no answer for a destination.
 */

import { WALKING_SPEED_KMH } from '../../config/index.js';
import type { LatLng } from './places.schemas.js';

const EARTH_RADIUS_M = 6_371_000;

function toRadians(degrees: number): number {
  return degrees * (Math.PI / 180);
}

/**
 * Great-circle distance in meters (Haversine).
 */
export function haversineMeters(from: LatLng, to: LatLng): number {
  const dLat = toRadians(to.lat - from.lat);
  const dLng = toRadians(to.lng - from.lng);

  const a =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(toRadians(from.lat)) *
    Math.cos(toRadians(to.lat)) *
    Math.sin(dLng / 2) *
    Math.sin(dLng / 2);

  return EARTH_RADIUS_M * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

export function isValidCoordinates(lat: number, lng: number): boolean {
  return Number.isFinite(lat) && Number.isFinite(lng) &&
    lat >= -90 && lat <= 90 && lng >= -180 && lng <= 180;
}

/** "850 m" below one kilometer, "1.2 km" from there on. */
export function formatDistance(meters: number): string {
  return meters < 1000 ? `${meters.toFixed(0)} m` : `${(meters / 1000).toFixed(1)} km`;
}

export interface WalkingEstimate {
  distanceMeters: number;
  distanceText: string;
  walkingTimeText: string;
  walkingTimeSeconds: number;
}

/**
 * Walking estimate over the straight line at a constant pace.
 * Minutes are truncated; anything under a minute reads "< 1 min".
 */
export function estimateWalking(from: LatLng, to: LatLng, speedKmh = WALKING_SPEED_KMH): WalkingEstimate {
  const meters = haversineMeters(from, to);
  const minutes = Math.trunc((meters / 1000 / speedKmh) * 60);

  return {
    distanceMeters: Math.trunc(meters),
    distanceText: formatDistance(meters),
    walkingTimeText: minutes > 0 ? `${minutes} min` : '< 1 min',
    walkingTimeSeconds: minutes * 60,
  };
}
