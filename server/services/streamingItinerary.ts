/**
 * Streaming Itinerary Service
 *
 * Generates a whole-trip itinerary with one model call and streams progress to
 * the client as server-sent events:
 *
 *   comment → started → heartbeat → (token* | token) → parse_json
 *     → fetch_recommendations → persist → day × N → result
 *
 * `error` is terminal from any point. The generator never throws; the
 * transport pulls the next event only after the previous frame was flushed.
 */

import type { Response } from "express";
import { randomUUID } from "node:crypto";
import {
  PERSISTED_RESTAURANT_LIMIT,
  PERSISTED_SPOT_LIMIT,
  buildItineraryPrompt,
  countTripDays,
  dayKey,
  ensureRecommendationCoordinates,
  parseItineraryResponseDetailed,
  reconcileDay,
  type AccommodationFact,
  type AnchorPoint,
  type DayStats,
  type FlightFact,
  type ItineraryDetailWriter,
  type ItineraryItem,
  type ItineraryLLM,
  type JsonObject,
  type JsonValue,
  type LocationClient,
  type NoteContentClient,
  type PlaceRecommendation,
  type ReferenceNote,
  type TimeSegment,
  type TripFactsReader,
  type TripRequest,
} from "./itinerary";

// ============================================================================
// TYPES
// ============================================================================

export type ProgressStage =
  | "llm_stream_start"
  | "llm_stream_end"
  | "llm_invoke"
  | "parse_json"
  | "fetch_recommendations"
  | "persist";

export interface DayEventPayload {
  day_number: number;
  date: string;
  theme: string;
  tips: string;
  items: ItineraryItem[];
  grouped: Record<TimeSegment, ItineraryItem[]>;
  stats: DayStats;
  start_point: AnchorPoint | null;
  end_point: AnchorPoint | null;
}

export interface ItineraryDetailSummary {
  day_number: number;
  itinerary: JsonObject;
  spots: JsonObject[];
  restaurants: JsonObject[];
}

export interface ItineraryResult {
  success: true;
  travel_plan_id: number;
  days: number;
  itinerary_details: ItineraryDetailSummary[];
  attractions: PlaceRecommendation[];
  restaurants: PlaceRecommendation[];
  flights: FlightFact[];
  accommodations: AccommodationFact[];
}

/** `comment` is the opening no-op frame; every other member is a named SSE event. */
export type StreamEvent =
  | { event: "comment"; data: null }
  | { event: "started"; data: { travel_plan_id: number; destination: string } }
  | { event: "heartbeat"; data: { ts: Date } }
  | { event: "progress"; data: { stage: ProgressStage } }
  | { event: "token"; data: { delta: string } }
  | { event: "day"; data: DayEventPayload }
  | { event: "result"; data: ItineraryResult }
  | { event: "error"; data: { message: string } };

export type StreamEventName = StreamEvent["event"];

export interface ItineraryStreamDeps {
  llm: ItineraryLLM;
  locations: LocationClient;
  tripFacts: TripFactsReader;
  writer: ItineraryDetailWriter;
  notes?: NoteContentClient;
}

/**
 * Abort flag for stream cancellation
 */
export interface StreamAbortController {
  aborted: boolean;
  abort: () => void;
}

export const RESULT_RECOMMENDATION_LIMIT = 20;

// ============================================================================
// STREAM METRICS
// ============================================================================

export interface StreamMetrics {
  requestId: string;
  planId: number;
  destination: string;
  status: "complete" | "error" | "abort";
  totalDays: number;
  persistedDays: number;
  tokenEvents: number;
  recoverableErrors: number;
  timeToFirstDayMs: number | null;
  totalMs: number;
}

export function createStreamMetrics(planId: number, destination: string): StreamMetrics {
  return {
    requestId: `stream_${randomUUID().slice(0, 8)}`,
    planId,
    destination,
    // stays "abort" unless the run reaches result or error
    status: "abort",
    totalDays: 0,
    persistedDays: 0,
    tokenEvents: 0,
    recoverableErrors: 0,
    timeToFirstDayMs: null,
    totalMs: 0,
  };
}

/**
 * One structured line per stream.
 */
export function logStreamSummary(metrics: StreamMetrics): void {
  const summary = {
    type: "stream_summary",
    ...metrics,
    timestamp: new Date().toISOString(),
  };
  console.log(`[StreamSummary] ${JSON.stringify(summary)}`);
}

// ============================================================================
// GENERATION
// ============================================================================

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}

async function collectReferenceNotes(
  notes: NoteContentClient | undefined,
  urls: string[],
  metrics: StreamMetrics
): Promise<ReferenceNote[]> {
  if (!notes || urls.length === 0) return [];

  const collected: ReferenceNote[] = [];
  for (const url of urls) {
    try {
      const note = await notes.getNoteContent(url);
      if (note) collected.push(note);
    } catch (error) {
      metrics.recoverableErrors++;
      console.warn(`[StreamItinerary] Reference note unavailable (${url}):`, errorMessage(error));
    }
  }
  return collected;
}

async function searchSafely(
  label: string,
  search: () => Promise<PlaceRecommendation[]>,
  metrics: StreamMetrics
): Promise<PlaceRecommendation[]> {
  try {
    return await search();
  } catch (error) {
    metrics.recoverableErrors++;
    console.warn(`[StreamItinerary] ${label} search failed:`, errorMessage(error));
    return [];
  }
}

/**
 * Produce the ordered event sequence for one generation request.
 */
export async function* generateItineraryStream(
  deps: ItineraryStreamDeps,
  request: TripRequest,
  metrics: StreamMetrics = createStreamMetrics(request.travelPlanId, request.destination)
): AsyncGenerator<StreamEvent, void, undefined> {
  const startTime = Date.now();
  const { travelPlanId, destination } = request;

  try {
    yield { event: "comment", data: null };
    yield { event: "started", data: { travel_plan_id: travelPlanId, destination } };
    yield { event: "heartbeat", data: { ts: new Date() } };

    const days = countTripDays(request.startDate, request.endDate);
    if (!(days >= 1)) {
      throw new Error(`Trip must span at least one day (got ${request.startDate} → ${request.endDate})`);
    }
    metrics.totalDays = days;
    console.log(`[StreamItinerary] Starting ${days}-day generation for ${destination} (plan ${travelPlanId})`);

    const referenceNotes = await collectReferenceNotes(deps.notes, request.referenceNoteUrls ?? [], metrics);
    const prompt = buildItineraryPrompt({
      destination,
      days,
      startDate: request.startDate,
      interests: request.interests,
      foodPreferences: request.foodPreferences,
      travelers: request.travelers,
      budgetMin: request.budgetMin,
      budgetMax: request.budgetMax,
      referenceNotes,
    });

    // --- LLM -----------------------------------------------------------------
    let responseText = "";
    const stream = deps.llm.stream?.bind(deps.llm);

    if (stream) {
      yield { event: "progress", data: { stage: "llm_stream_start" } };
      for await (const chunk of stream(prompt)) {
        const delta = chunk.content ?? "";
        if (!delta) continue;
        responseText += delta;
        metrics.tokenEvents++;
        yield { event: "token", data: { delta } };
      }
      yield { event: "progress", data: { stage: "llm_stream_end" } };
    } else {
      yield { event: "progress", data: { stage: "llm_invoke" } };
      responseText = await deps.llm.invoke(prompt);
      if (responseText) {
        metrics.tokenEvents++;
        yield { event: "token", data: { delta: responseText } };
      }
    }

    // --- Parse ---------------------------------------------------------------
    yield { event: "progress", data: { stage: "parse_json" } };
    const parsed = parseItineraryResponseDetailed(responseText, days);
    if (parsed.strategy === null) {
      metrics.recoverableErrors++;
    }

    // --- Recommendations -------------------------------------------------------
    yield { event: "progress", data: { stage: "fetch_recommendations" } };
    const attractions = await ensureRecommendationCoordinates(
      await searchSafely("Attraction", () => deps.locations.searchAttractions(destination), metrics),
      destination,
      deps.locations
    );
    const restaurants = await ensureRecommendationCoordinates(
      await searchSafely("Restaurant", () => deps.locations.searchRestaurants(destination), metrics),
      destination,
      deps.locations
    );

    const flights = await deps.tripFacts.getFlightsByPlan(travelPlanId);
    const accommodations = await deps.tripFacts.getAccommodationsByPlan(travelPlanId);

    // --- Persist day by day ----------------------------------------------------
    yield { event: "progress", data: { stage: "persist" } };
    const context = {
      travelPlanId,
      destination,
      startDate: request.startDate,
      totalDays: days,
      recommendations: { attractions, restaurants },
      facts: { flights, accommodations },
      geocoder: deps.locations,
      writer: deps.writer,
    };

    const itineraryDetails: ItineraryDetailSummary[] = [];
    for (let dayNumber = 1; dayNumber <= days; dayNumber++) {
      const day = await reconcileDay(context, dayNumber, parsed.itinerary[dayKey(dayNumber)]);
      metrics.persistedDays++;
      metrics.timeToFirstDayMs ??= Date.now() - startTime;

      itineraryDetails.push({
        day_number: dayNumber,
        itinerary: day.itinerary,
        spots: day.spots.slice(0, PERSISTED_SPOT_LIMIT),
        restaurants: day.restaurants.slice(0, PERSISTED_RESTAURANT_LIMIT),
      });

      yield {
        event: "day",
        data: {
          day_number: dayNumber,
          date: day.date,
          theme: day.theme,
          tips: day.tips,
          items: day.items,
          grouped: day.grouped,
          stats: day.stats,
          start_point: day.startPoint,
          end_point: day.endPoint,
        },
      };
    }

    metrics.status = "complete";
    yield {
      event: "result",
      data: {
        success: true,
        travel_plan_id: travelPlanId,
        days,
        itinerary_details: itineraryDetails,
        attractions: attractions.slice(0, RESULT_RECOMMENDATION_LIMIT),
        restaurants: restaurants.slice(0, RESULT_RECOMMENDATION_LIMIT),
        flights,
        accommodations,
      },
    };
  } catch (error) {
    metrics.status = "error";
    const message = errorMessage(error);
    console.error(`[StreamItinerary] Generation failed for plan ${travelPlanId}:`, message);
    yield { event: "error", data: { message } };
  } finally {
    metrics.totalMs = Date.now() - startTime;
    logStreamSummary(metrics);
  }
}

export type CollectedItinerary =
  | { ok: true; result: ItineraryResult }
  | { ok: false; message: string };

/**
 * Drain a generation stream and keep only its terminal outcome.
 */
export async function collectItineraryResult(events: AsyncIterable<StreamEvent>): Promise<CollectedItinerary> {
  for await (const event of events) {
    if (event.event === "result") return { ok: true, result: event.data };
    if (event.event === "error") return { ok: false, message: event.data.message };
  }
  return { ok: false, message: "Stream ended without a result" };
}

// ============================================================================
// SERIALIZATION
// ============================================================================

/**
 * Reduce any value to plain JSON: Dates → ISO strings, bigint → number (or
 * string when unsafe), non-finite numbers → null, cycles → null.
 */
export function toJsonSafe(value: unknown, seen: WeakSet<object> = new WeakSet()): JsonValue {
  if (value === null || value === undefined) return null;

  switch (typeof value) {
    case "string":
    case "boolean":
      return value;
    case "number":
      return Number.isFinite(value) ? value : null;
    case "bigint":
      return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
    case "symbol":
      return value.toString();
    case "function":
      return null;
  }

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value !== "object") return null;
  if (seen.has(value)) return null;
  seen.add(value);

  try {
    if (Array.isArray(value)) {
      return value.map((entry) => toJsonSafe(entry, seen));
    }
    if (value instanceof Map) {
      const out: JsonObject = {};
      for (const [key, entry] of value) out[String(key)] = toJsonSafe(entry, seen);
      return out;
    }
    if (value instanceof Set) {
      return Array.from(value, (entry) => toJsonSafe(entry, seen));
    }

    const out: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry === undefined) continue;
      out[key] = toJsonSafe(entry, seen);
    }
    return out;
  } finally {
    seen.delete(value);
  }
}

/** Wire frame for one event. */
export function formatSSE(event: StreamEvent): string {
  if (event.event === "comment") return ":\n\n";
  return `event: ${event.event}\ndata: ${JSON.stringify(toJsonSafe(event.data))}\n\n`;
}

// ============================================================================
// SSE TRANSPORT
// ============================================================================

/** Heartbeat interval in milliseconds (15 seconds) */
const HEARTBEAT_INTERVAL_MS = 15000;

/** The slice of a writable HTTP response the transport needs. */
export interface SSEWritable {
  write(chunk: string): boolean;
  once(event: "drain" | "close", listener: () => void): unknown;
  removeListener(event: "drain" | "close", listener: () => void): unknown;
  readonly writableEnded: boolean;
  readonly destroyed: boolean;
}

/**
 * SSE context with heartbeat management
 */
export interface SSEContext {
  res: SSEWritable;
  heartbeatInterval: NodeJS.Timeout | null;
}

function isClosed(res: SSEWritable): boolean {
  return res.writableEnded || res.destroyed;
}

/**
 * Setup SSE headers for streaming response
 */
export function setupSSEHeaders(res: Response): void {
  res.setHeader("Content-Type", "text/event-stream");
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering
  res.flushHeaders();
}

/**
 * Start the keep-alive ping. Comment lines are ignored by EventSource clients
 * but count as activity for proxies. Call cleanupSSEContext when done.
 */
export function createSSEContext(res: SSEWritable, intervalMs: number = HEARTBEAT_INTERVAL_MS): SSEContext {
  const ctx: SSEContext = { res, heartbeatInterval: null };

  ctx.heartbeatInterval = setInterval(() => {
    if (!isClosed(res)) {
      res.write(`: ping ${Date.now()}\n\n`);
    }
  }, intervalMs);

  return ctx;
}

export function cleanupSSEContext(ctx: SSEContext): void {
  if (ctx.heartbeatInterval) {
    clearInterval(ctx.heartbeatInterval);
    ctx.heartbeatInterval = null;
  }
}

/**
 * Flags the stream as aborted once the response closes before it was ended.
 */
export function createStreamAbortController(res: Response): StreamAbortController {
  const controller: StreamAbortController = {
    aborted: false,
    abort: () => {
      controller.aborted = true;
    },
  };

  res.on("close", () => {
    if (!res.writableEnded && !controller.aborted) {
      console.log(`[StreamItinerary] Client disconnected, aborting generation`);
      controller.aborted = true;
    }
  });

  return controller;
}

function waitForDrain(res: SSEWritable): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      res.removeListener("drain", done);
      res.removeListener("close", done);
      resolve();
    };
    res.once("drain", done);
    res.once("close", done);
  });
}

/**
 * Write events to the response one frame at a time. When `write` reports a
 * full buffer the next event is not pulled until `drain` (or `close`).
 * On abort or a closed response the generator is returned, which runs its
 * cleanup.
 */
export async function pipeEventsToResponse(
  events: AsyncGenerator<StreamEvent, void, undefined>,
  res: SSEWritable,
  abort?: StreamAbortController
): Promise<void> {
  for (;;) {
    if (abort?.aborted || isClosed(res)) {
      await events.return(undefined);
      return;
    }

    const next = await events.next();
    if (next.done) return;

    if (isClosed(res)) {
      await events.return(undefined);
      return;
    }

    if (!res.write(formatSSE(next.value))) {
      await waitForDrain(res);
    }
  }
}
