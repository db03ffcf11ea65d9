/**
 * Restaurants Controller
 * POST /api/v1/restaurants/search
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { LocationQuery, RestaurantSearchService } from '../services/places/restaurant-search.service.js';
import { createValidationError } from '../middleware/error.middleware.js';
import { SearchRequestSchema, formatIssues, type SearchRequest } from './schemas.js';

function toLocationQuery(body: SearchRequest): LocationQuery | null {
  if (body.latitude !== undefined && body.longitude !== undefined) {
    return { latitude: body.latitude, longitude: body.longitude };
  }
  return body.address !== undefined ? { address: body.address } : null;
}

export function createRestaurantsRouter(search: RestaurantSearchService): Router {
  const router = Router();

  router.post('/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const validation = SearchRequestSchema.safeParse(req.body);
      if (!validation.success) {
        next(createValidationError('Invalid search request', formatIssues(validation.error)));
        return;
      }

      const query = toLocationQuery(validation.data);
      if (!query) {
        next(createValidationError('address or latitude/longitude required'));
        return;
      }

      const resolved = await search.resolveLocation(query);
      if (!resolved.ok) {
        next(resolved.error);
        return;
      }

      const found = await search.searchRestaurants({
        location: resolved.value.location,
        radius: validation.data.radius,
        minReviews: validation.data.minReviews,
        maxResults: validation.data.maxResults,
      });
      if (!found.ok) {
        next(found.error);
        return;
      }

      req.log.info({ count: found.value.length }, '[Restaurants] Search completed');
      res.json({
        success: true,
        location: resolved.value,
        count: found.value.length,
        restaurants: found.value,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
