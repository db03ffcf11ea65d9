/**
 * Restaurant Search Service
 * Location resolution, nearby search, filtering/ranking and walking distances.
 */

import {
  DEFAULT_MAX_RESULTS,
  DEFAULT_MIN_REVIEWS,
  DEFAULT_SEARCH_RADIUS,
  MAX_MIN_REVIEWS,
  MAX_RESULTS,
  MAX_SEARCH_RADIUS,
  MIN_RESULTS,
  MIN_SEARCH_RADIUS,
} from '../../config/index.js';
import { AnalysisError, describeError } from '../../lib/errors/analysis-error.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import { err, ok, type Result } from '../../lib/result.js';
import type { MapsProvider } from './google-maps.client.js';
import { estimateWalking, isValidCoordinates } from './geo.js';
import type { DistanceElement, LatLng, NearbyPlace } from './places.schemas.js';

export type LocationQuery =
  | { latitude: number; longitude: number }
  | { address: string };

export interface SearchOptions {
  location: LatLng;
  radius?: number | undefined;
  minReviews?: number | undefined;
  maxResults?: number | undefined;
}

export interface Restaurant {
  placeId: string;
  name: string;
  rating: number;
  userRatingsTotal: number;
  priceLevel: number | null;
  priceText: string;
  vicinity: string;
  location: LatLng;
  isOpenNow: boolean | null;
  businessStatus: string;
  types: string[];
  distanceMeters: number;
  distanceText: string;
  walkingTimeText: string;
  walkingTimeSeconds: number;
}

export interface ResolvedLocation {
  location: LatLng;
  formattedAddress: string | null;
}

const PRICE_LABELS: Record<number, string> = {
  0: 'Free',
  1: 'Inexpensive ($)',
  2: 'Moderate ($$)',
  3: 'Expensive ($$$)',
  4: 'Very Expensive ($$$$)',
};

export function formatPriceLevel(level: number | null | undefined): string {
  if (level === null || level === undefined) return 'Price not available';
  return PRICE_LABELS[level] ?? 'Price not available';
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export class RestaurantSearchService {
  private readonly logger: Logger;

  constructor(private readonly maps: MapsProvider, logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  async resolveLocation(query: LocationQuery): Promise<Result<ResolvedLocation, AnalysisError>> {
    if ('address' in query) {
      const address = query.address.trim();
      if (!address) {
        return err(new AnalysisError('INVALID_INPUT', 'Address must not be empty'));
      }

      try {
        const location = await this.maps.geocode(address);
        if (!location) {
          return err(new AnalysisError('INVALID_INPUT', `Could not find location: ${address}`));
        }
        return ok({ location, formattedAddress: address });
      } catch (error) {
        this.logger.error({ error: describeError(error) }, '[Search] Geocoding failed');
        return err(new AnalysisError('FETCH_FAILED', 'Geocoding failed', { cause: error }));
      }
    }

    if (!isValidCoordinates(query.latitude, query.longitude)) {
      return err(new AnalysisError('INVALID_INPUT', 'Invalid coordinates', {
        details: { latitude: query.latitude, longitude: query.longitude },
      }));
    }

    const location = { lat: query.latitude, lng: query.longitude };
    let formattedAddress: string | null = null;
    try {
      formattedAddress = await this.maps.reverseGeocode(location);
    } catch (error) {
      // Address is display-only; coordinates are enough to search
      this.logger.warn({ error: describeError(error) }, '[Search] Reverse geocoding failed');
    }
    return ok({ location, formattedAddress });
  }

  async searchRestaurants(options: SearchOptions): Promise<Result<Restaurant[], AnalysisError>> {
    const radius = clamp(options.radius ?? DEFAULT_SEARCH_RADIUS, MIN_SEARCH_RADIUS, MAX_SEARCH_RADIUS);
    const minReviews = clamp(options.minReviews ?? DEFAULT_MIN_REVIEWS, 0, MAX_MIN_REVIEWS);
    const maxResults = clamp(options.maxResults ?? DEFAULT_MAX_RESULTS, MIN_RESULTS, MAX_RESULTS);

    let places: NearbyPlace[];
    try {
      places = await this.maps.nearbySearch({ location: options.location, radius, type: 'restaurant' });
    } catch (error) {
      this.logger.error({ error: describeError(error) }, '[Search] Nearby search failed');
      return err(new AnalysisError('FETCH_FAILED', 'Restaurant search failed', { cause: error }));
    }

    const ranked = places
      .filter(p => (p.rating ?? 0) > 0 && (p.user_ratings_total ?? 0) >= minReviews)
      .sort((a, b) =>
        (b.rating ?? 0) - (a.rating ?? 0) ||
        (b.user_ratings_total ?? 0) - (a.user_ratings_total ?? 0))
      .slice(0, maxResults);

    this.logger.info({ found: places.length, kept: ranked.length, radius, minReviews }, '[Search] Restaurants filtered');

    return ok(await this.addWalkingDistances(options.location, ranked));
  }

  /**
   * One distance-matrix call for all places; any destination without an OK
   * element gets a straight-line estimate instead.
   */
  async addWalkingDistances(origin: LatLng, places: NearbyPlace[]): Promise<Restaurant[]> {
    const destinations = places.map(p => p.geometry?.location ?? origin);

    let elements: DistanceElement[] = [];
    try {
      elements = await this.maps.distanceMatrix(origin, destinations, 'walking');
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, '[Search] Distance matrix failed, using straight-line estimates');
    }

    return places.map((place, index) => {
      const destination = destinations[index] ?? origin;
      const element = elements[index];
      const walking = element && element.status === 'OK' && element.distance && element.duration
        ? {
            distanceMeters: element.distance.value,
            distanceText: element.distance.text,
            walkingTimeText: element.duration.text,
            walkingTimeSeconds: element.duration.value,
          }
        : estimateWalking(origin, destination);

      return {
        placeId: place.place_id,
        name: place.name ?? 'Unknown Restaurant',
        rating: place.rating ?? 0,
        userRatingsTotal: place.user_ratings_total ?? 0,
        priceLevel: place.price_level ?? null,
        priceText: formatPriceLevel(place.price_level),
        vicinity: place.vicinity ?? '',
        location: destination,
        isOpenNow: place.opening_hours?.open_now ?? null,
        businessStatus: place.business_status ?? 'UNKNOWN',
        types: place.types ?? [],
        ...walking,
      };
    });
  }
}
