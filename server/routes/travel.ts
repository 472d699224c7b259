/**
 * Travel Routes
 * Plans, trip facts, itinerary generation (SSE and one-shot) and place lookups
 */

import { Router, type NextFunction, type Response } from 'express';
import { z } from 'zod';
import {
  attractionSearchQuerySchema,
  createTravelPlanRequestSchema,
  geocodeQuerySchema,
  insertAccommodationSchema,
  insertFlightSchema,
  recommendationsQuerySchema,
  restaurantSearchQuerySchema,
} from '@shared/schema';
import type { IStorage } from '../storage';
import type { ItineraryLLM, LocationClient, NoteContentClient } from '../services/itinerary';
import {
  cleanupSSEContext,
  collectItineraryResult,
  createSSEContext,
  createStreamAbortController,
  createStreamMetrics,
  generateItineraryStream,
  pipeEventsToResponse,
  setupSSEHeaders,
  type ItineraryStreamDeps,
} from '../services/streamingItinerary';
import {
  createPlanWithFacts,
  getRecommendations,
  searchPlaces,
  toTripRequest,
  withLodgingCoordinates,
} from '../services/travelService';
import { planCreationRateLimiter, sseProtection } from '../middleware/rateLimiter';

export interface TravelRouteDeps {
  storage: IStorage;
  locations: LocationClient;
  notes: NoteContentClient;
  /** null when no AI provider is configured */
  llm: ItineraryLLM | null;
}

const planIdSchema = z.coerce.number().int().positive();

function splitList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/[,，、]/).map((part) => part.trim()).filter(Boolean);
}

/** ZodError → 400 `{message, field}`; everything else goes to the error middleware. */
function handleRouteError(err: unknown, res: Response, next: NextFunction): void {
  if (err instanceof z.ZodError) {
    const [first] = err.errors;
    res.status(400).json({
      message: first?.message ?? 'Invalid request',
      field: first?.path.join('.') ?? '',
    });
    return;
  }
  next(err);
}

export function createTravelRouter(deps: TravelRouteDeps): Router {
  const router = Router();
  const { storage } = deps;

  function streamDeps(llm: ItineraryLLM): ItineraryStreamDeps {
    return {
      llm,
      locations: deps.locations,
      tripFacts: storage,
      writer: storage,
      notes: deps.notes,
    };
  }

  // ---------------------------------------------------------------------------
  // Plans
  // ---------------------------------------------------------------------------

  router.post('/plans', planCreationRateLimiter, async (req, res, next) => {
    try {
      const input = createTravelPlanRequestSchema.parse(req.body);
      const plan = await createPlanWithFacts(storage, deps.locations, input);

      console.log(`[Travel] Created plan ${plan.id} for ${plan.destination}`);
      res.status(201).json(plan);
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  router.get('/plans', async (_req, res, next) => {
    try {
      res.json(await storage.listTravelPlans());
    } catch (err) {
      next(err);
    }
  });

  router.get('/plans/:id', async (req, res, next) => {
    try {
      const id = planIdSchema.parse(req.params.id);
      const plan = await storage.getTravelPlan(id);
      if (!plan) {
        res.status(404).json({ message: 'Travel plan not found' });
        return;
      }

      const [flights, accommodations] = await Promise.all([
        storage.getFlightsByPlan(id),
        storage.getAccommodationsByPlan(id),
      ]);
      res.json({ ...plan, flights, accommodations });
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  router.post('/plans/:id/flights', async (req, res, next) => {
    try {
      const id = planIdSchema.parse(req.params.id);
      const flight = insertFlightSchema.parse(req.body);
      if (!(await storage.getTravelPlan(id))) {
        res.status(404).json({ message: 'Travel plan not found' });
        return;
      }
      res.status(201).json(await storage.createFlight(id, flight));
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  router.post('/plans/:id/accommodations', async (req, res, next) => {
    try {
      const id = planIdSchema.parse(req.params.id);
      const accommodation = insertAccommodationSchema.parse(req.body);
      if (!(await storage.getTravelPlan(id))) {
        res.status(404).json({ message: 'Travel plan not found' });
        return;
      }
      res.status(201).json(await storage.createAccommodation(id, await withLodgingCoordinates(deps.locations, accommodation)));
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  // ---------------------------------------------------------------------------
  // Itinerary generation
  // ---------------------------------------------------------------------------

  router.post('/plans/:id/generate-itinerary/stream', ...sseProtection, async (req, res, next) => {
    let planId: number;
    try {
      planId = planIdSchema.parse(req.params.id);
    } catch (err) {
      handleRouteError(err, res, next);
      return;
    }

    const plan = await storage.getTravelPlan(planId).catch((err: unknown) => {
      next(err);
      return null;
    });
    if (plan === null) return;
    if (!plan) {
      res.status(404).json({ message: 'Travel plan not found' });
      return;
    }
    if (!deps.llm) {
      res.status(503).json({ message: 'AI provider not configured' });
      return;
    }

    setupSSEHeaders(res);
    const sse = createSSEContext(res);
    const abort = createStreamAbortController(res);
    const metrics = createStreamMetrics(plan.id, plan.destination);

    try {
      await pipeEventsToResponse(generateItineraryStream(streamDeps(deps.llm), toTripRequest(plan), metrics), res, abort);
    } catch (err) {
      console.error(`[Travel] Stream transport failed for plan ${plan.id}:`, err);
    } finally {
      cleanupSSEContext(sse);
      if (!res.writableEnded) res.end();
    }
  });

  router.post('/plans/:id/generate-itinerary', async (req, res, next) => {
    try {
      const id = planIdSchema.parse(req.params.id);
      const plan = await storage.getTravelPlan(id);
      if (!plan) {
        res.status(404).json({ message: 'Travel plan not found' });
        return;
      }
      if (!deps.llm) {
        res.status(503).json({ message: 'AI provider not configured' });
        return;
      }

      const outcome = await collectItineraryResult(generateItineraryStream(streamDeps(deps.llm), toTripRequest(plan)));
      if (!outcome.ok) {
        res.status(500).json({ message: outcome.message });
        return;
      }
      res.json(outcome.result);
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  router.get('/plans/:id/itinerary', async (req, res, next) => {
    try {
      const id = planIdSchema.parse(req.params.id);
      if (!(await storage.getTravelPlan(id))) {
        res.status(404).json({ message: 'Travel plan not found' });
        return;
      }
      res.json(await storage.getItineraryDetails(id));
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  // ---------------------------------------------------------------------------
  // Place lookups
  // ---------------------------------------------------------------------------

  router.get('/geocode', async (req, res, next) => {
    try {
      const query = geocodeQuerySchema.parse(req.query);
      const result = await deps.locations.geocode(query.address, query.location || undefined);
      if (!result) {
        res.status(404).json({ message: `No coordinates found for "${query.address}"` });
        return;
      }
      res.json({ latitude: result.lat, longitude: result.lng, formatted_address: result.formattedAddress });
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  router.get('/attractions', async (req, res, next) => {
    try {
      const query = attractionSearchQuerySchema.parse(req.query);
      res.json(searchPlaces(await deps.locations.searchAttractions(query.city), query.keyword));
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  router.get('/restaurants', async (req, res, next) => {
    try {
      const query = restaurantSearchQuerySchema.parse(req.query);
      res.json(searchPlaces(await deps.locations.searchRestaurants(query.city), query.keyword, query.cuisine_type));
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  router.get('/recommendations', async (req, res, next) => {
    try {
      const query = recommendationsQuerySchema.parse(req.query);
      const recommendations = await getRecommendations(
        deps.locations,
        query.destination,
        splitList(query.interests),
        splitList(query.food_preferences)
      );
      res.json(recommendations);
    } catch (err) {
      handleRouteError(err, res, next);
    }
  });

  return router;
}
