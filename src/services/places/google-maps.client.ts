/**
 * Google Maps Client
 * Thin pass-through to the Places, Distance Matrix and Geocoding endpoints.
 *
 * Every call:
 * - goes through fetchJsonWithTimeout (body read inside the timeout, host/path logging only)
 * - validates the body with zod
 * - accepts OK and ZERO_RESULTS, raises PlacesApiError for any other provider status
 *
 * Retries belong to the callers (ReviewStore retries review fetches).
 */

import type { z } from 'zod';
import { GOOGLE_MAPS_BASE_URL, GOOGLE_MAPS_TIMEOUT_MS } from '../../config/index.js';
import { fetchJsonWithTimeout } from '../../utils/fetch-with-timeout.js';
import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import {
  DistanceMatrixResponseSchema,
  GeocodeResponseSchema,
  NearbySearchResponseSchema,
  PlaceDetailsResponseSchema,
  type DistanceElement,
  type LatLng,
  type NearbyPlace,
  type PlaceDetailsResult,
} from './places.schemas.js';

/**
 * Raised for a non-2xx HTTP status or a provider status other than OK / ZERO_RESULTS.
 * `httpStatus` is set only for HTTP-level failures, which are worth retrying.
 */
export class PlacesApiError extends Error {
  constructor(
    message: string,
    public readonly status: string,
    public readonly httpStatus?: number
  ) {
    super(message);
    this.name = 'PlacesApiError';
  }

  get retryable(): boolean {
    return this.httpStatus !== undefined && (this.httpStatus >= 500 || this.httpStatus === 429);
  }
}

export interface PlaceDetailsProvider {
  placeDetails(placeId: string, fields: readonly string[]): Promise<PlaceDetailsResult>;
}

export interface NearbySearchParams {
  location: LatLng;
  radius: number;
  type?: string;
}

export type TravelMode = 'walking' | 'driving' | 'bicycling' | 'transit';

export interface MapsProvider extends PlaceDetailsProvider {
  nearbySearch(params: NearbySearchParams): Promise<NearbyPlace[]>;
  distanceMatrix(origin: LatLng, destinations: readonly LatLng[], mode?: TravelMode): Promise<DistanceElement[]>;
  geocode(address: string): Promise<LatLng | null>;
  reverseGeocode(location: LatLng): Promise<string | null>;
}

export interface GoogleMapsClientOptions {
  apiKey: string | undefined;
  baseUrl?: string;
  timeoutMs?: number;
  logger?: Logger;
}

const ACCEPTED_STATUSES = new Set(['OK', 'ZERO_RESULTS']);

function formatLatLng(location: LatLng): string {
  return `${location.lat},${location.lng}`;
}

export class GoogleMapsClient implements MapsProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: GoogleMapsClientOptions) {
    this.baseUrl = options.baseUrl ?? GOOGLE_MAPS_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? GOOGLE_MAPS_TIMEOUT_MS;
    this.logger = options.logger ?? defaultLogger;
  }

  async placeDetails(placeId: string, fields: readonly string[]): Promise<PlaceDetailsResult> {
    const json = await this.get('place/details/json', {
      place_id: placeId,
      fields: fields.join(','),
      reviews_sort: 'newest',
    }, PlaceDetailsResponseSchema, 'place_details');

    return json.result ?? {};
  }

  async nearbySearch(params: NearbySearchParams): Promise<NearbyPlace[]> {
    const json = await this.get('place/nearbysearch/json', {
      location: formatLatLng(params.location),
      radius: String(params.radius),
      type: params.type ?? 'restaurant',
    }, NearbySearchResponseSchema, 'nearby_search');

    return json.results;
  }

  /**
   * One element per destination, in destination order.
   */
  async distanceMatrix(
    origin: LatLng,
    destinations: readonly LatLng[],
    mode: TravelMode = 'walking'
  ): Promise<DistanceElement[]> {
    if (destinations.length === 0) return [];

    const json = await this.get('distancematrix/json', {
      origins: formatLatLng(origin),
      destinations: destinations.map(formatLatLng).join('|'),
      mode,
      units: 'metric',
    }, DistanceMatrixResponseSchema, 'distance_matrix');

    return json.rows[0]?.elements ?? [];
  }

  async geocode(address: string): Promise<LatLng | null> {
    const trimmed = address.trim();
    if (!trimmed) return null;

    const json = await this.get('geocode/json', { address: trimmed }, GeocodeResponseSchema, 'geocode');
    const first = json.results[0];
    return first ? first.geometry.location : null;
  }

  async reverseGeocode(location: LatLng): Promise<string | null> {
    const json = await this.get('geocode/json', { latlng: formatLatLng(location) }, GeocodeResponseSchema, 'reverse_geocode');
    return json.results[0]?.formatted_address ?? null;
  }

  private async get<S extends z.ZodType<{ status: string; error_message?: string | undefined }, z.ZodTypeDef, unknown>>(
    endpoint: string,
    params: Record<string, string>,
    schema: S,
    stage: string
  ): Promise<z.infer<S>> {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new PlacesApiError('GOOGLE_MAPS_API_KEY is not set', 'MISSING_API_KEY');
    }

    const url = new URL(`${this.baseUrl}/${endpoint}`);
    for (const [name, value] of Object.entries(params)) {
      url.searchParams.set(name, value);
    }
    url.searchParams.set('key', apiKey);

    const res = await fetchJsonWithTimeout(url, { method: 'GET' }, {
      timeoutMs: this.timeoutMs,
      stage,
      provider: 'google_maps',
      logger: this.logger,
    });

    if (!res.ok) {
      throw new PlacesApiError(`Google Maps ${stage} failed: HTTP ${res.status}`, 'HTTP_ERROR', res.status);
    }

    const parsed = schema.safeParse(res.body);
    if (!parsed.success) {
      throw new PlacesApiError(`Google Maps ${stage} returned an unexpected body`, 'INVALID_RESPONSE');
    }

    const body = parsed.data;
    if (!ACCEPTED_STATUSES.has(body.status)) {
      const detail = body.error_message ? `: ${body.error_message}` : '';
      this.logger.error({ stage, status: body.status }, '[GoogleMaps] Provider error');
      throw new PlacesApiError(`Google Maps ${stage} error ${body.status}${detail}`, body.status);
    }

    return body;
  }
}
