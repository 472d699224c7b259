/**
 * Day Reconciler
 *
 * Turns one day of the model's itinerary into the persisted day plus the
 * client-ready item list:
 *   1. timeslot normalization (tagged-union segment decoding)
 *   2. coordinate backfill (recommendation name match, then geocode)
 *   3. fallback synthesis from city recommendations when the day is empty
 *   4. start/end anchors from lodging and flights
 *   5. upsert of the day detail
 *
 * Geocoding failures degrade to null coordinates. Persistence failures
 * propagate to the caller.
 */

import { deriveDayAnchors } from "./anchorPoints";
import { readCoordinates, resolveCoordinates } from "./coordinates";
import { estimateCost } from "./costEstimate";
import { addDays } from "./dates";
import { normalizeDaySchedule, type ScheduledActivity } from "./timeslots";
import {
  TIME_SEGMENTS,
  isJsonObject,
  type ActivityType,
  type DayStats,
  type Geocoder,
  type ItineraryDetailWriter,
  type ItineraryItem,
  type JsonObject,
  type JsonValue,
  type PlaceRecommendation,
  type ReconciledDay,
  type Recommendations,
  type TimeSegment,
  type TripFacts,
} from "./types";

export const PERSISTED_SPOT_LIMIT = 5;
export const PERSISTED_RESTAURANT_LIMIT = 3;

const DEFAULT_DURATION_MINUTES = 60;
const SYNTHESIZED_SPOT_MINUTES = 120;

export interface ReconcileContext {
  travelPlanId: number;
  destination: string;
  /** YYYY-MM-DD of day 1 */
  startDate: string;
  totalDays: number;
  recommendations: Recommendations;
  facts: TripFacts;
  geocoder: Geocoder;
  writer: ItineraryDetailWriter;
}

// ============================================================================
// FIELD COERCION
// ============================================================================

// First number, an optional range end ("2-3"), then the unit that follows it.
const DURATION_TEXT = /(\d+(?:\.\d+)?)\s*(?:[-~～至到]\s*\d+(?:\.\d+)?\s*)?(小时|钟头|hours?|hrs?|h(?![a-z])|分钟|minutes?|mins?)?/i;
const HOUR_UNIT = /^(小时|钟头|hours?|hrs?|h)$/i;

/**
 * Minutes from a duration field. Numbers are minutes; "1-2小时" → 60;
 * "45分钟" → 45; "30分钟-1小时" → 30. Only the unit after the first number
 * counts. Unreadable values yield null.
 */
export function parseDurationMinutes(value: JsonValue | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value > 0 ? Math.round(value) : null;
  }
  if (typeof value !== "string") return null;

  const match = DURATION_TEXT.exec(value);
  if (!match) return null;
  const amount = Number.parseFloat(match[1]);
  if (!(amount > 0)) return null;
  const unit = match[2] ?? "";
  return Math.round(HOUR_UNIT.test(unit) ? amount * 60 : amount);
}

function activityDuration(activity: JsonObject, fallback: number): number {
  return parseDurationMinutes(activity.play_time_minutes)
    ?? parseDurationMinutes(activity.recommended_time)
    ?? fallback;
}

export function normalizeNotes(value: JsonValue | undefined): string[] {
  if (typeof value === "string") {
    return value.trim() ? [value.trim()] : [];
  }
  if (!Array.isArray(value)) return [];

  const notes: string[] = [];
  for (const entry of value) {
    if (typeof entry === "string" && entry.trim()) {
      notes.push(entry.trim());
    } else if (typeof entry === "number") {
      notes.push(String(entry));
    }
  }
  return notes;
}

function optionalText(value: JsonValue | undefined): string | null {
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed ? trimmed : null;
  }
  if (typeof value === "number") return String(value);
  return null;
}

function declaredName(activity: JsonObject, type: ActivityType): string | null {
  return optionalText(activity.name) ?? (type === "spot" ? optionalText(activity.location) : null);
}

function placeholderName(type: ActivityType, ordinal: number): string {
  return type === "spot" ? `景点${ordinal}` : `餐厅${ordinal}`;
}

// ============================================================================
// FALLBACK SYNTHESIS
// ============================================================================

function pickWrapped<T>(list: T[], index: number): T | null {
  if (list.length === 0) return null;
  return list[index % list.length];
}

function attractionActivity(place: PlaceRecommendation): JsonObject {
  return {
    type: "spot",
    name: place.name,
    description: place.description ?? place.address ?? null,
    play_time_minutes: SYNTHESIZED_SPOT_MINUTES,
    latitude: place.lat,
    longitude: place.lng,
    notes: [],
  };
}

function restaurantActivity(place: PlaceRecommendation): JsonObject {
  return {
    type: "restaurant",
    name: place.name,
    description: place.description ?? place.address ?? null,
    cuisine: place.cuisine ?? place.type ?? null,
    price_range: place.price_range ?? null,
    play_time_minutes: DEFAULT_DURATION_MINUTES,
    latitude: place.lat,
    longitude: place.lng,
    notes: [],
  };
}

/**
 * Minimal day from the city-level lists: morning attraction, afternoon
 * restaurant, evening attraction. Offsets advance per day and wrap.
 */
export function synthesizeDayActivities(dayNumber: number, recommendations: Recommendations): ScheduledActivity[] {
  const offset = dayNumber - 1;
  const plan: Array<{ segment: TimeSegment; type: ActivityType; place: PlaceRecommendation | null }> = [
    { segment: "morning", type: "spot", place: pickWrapped(recommendations.attractions, offset * 2) },
    { segment: "afternoon", type: "restaurant", place: pickWrapped(recommendations.restaurants, offset) },
    { segment: "evening", type: "spot", place: pickWrapped(recommendations.attractions, offset * 2 + 1) },
  ];

  const activities: ScheduledActivity[] = [];
  for (const { segment, type, place } of plan) {
    if (!place) continue;
    const raw = type === "spot" ? attractionActivity(place) : restaurantActivity(place);
    activities.push({ segment, type, raw });
  }
  return activities;
}

// ============================================================================
// ITEMS
// ============================================================================

/** Placeholder-named activities are never looked up. */
async function backfillActivity(activity: ScheduledActivity, name: string | null, ctx: ReconcileContext): Promise<JsonObject> {
  if (!name || readCoordinates(activity.raw)) return activity.raw;

  const candidates = activity.type === "spot" ? ctx.recommendations.attractions : ctx.recommendations.restaurants;
  const coords = await resolveCoordinates(name, candidates, ctx.destination, ctx.geocoder);
  if (!coords) return activity.raw;

  return { ...activity.raw, latitude: coords.lat, longitude: coords.lng };
}

function buildItem(
  activity: ScheduledActivity,
  raw: JsonObject,
  name: string,
  uniqueId: string,
  synthesized: boolean
): ItineraryItem {
  const coords = readCoordinates(raw);
  const cost = estimateCost(raw, activity.type);
  const defaultDuration = synthesized && activity.type === "spot" ? SYNTHESIZED_SPOT_MINUTES : DEFAULT_DURATION_MINUTES;
  const restaurant = activity.type === "restaurant";

  return {
    uniqueId,
    type: activity.type,
    category: restaurant ? "美食" : "景点",
    segment: activity.segment,
    name,
    description: optionalText(raw.description),
    duration: activityDuration(raw, defaultDuration),
    lat: coords?.lat ?? null,
    lng: coords?.lng ?? null,
    notes: normalizeNotes(raw.notes),
    commute_from_prev: raw.commute_from_prev ?? null,
    cuisine: restaurant ? optionalText(raw.cuisine) ?? optionalText(raw.cuisine_type) : null,
    price_range: restaurant ? optionalText(raw.price_range) : null,
    cost_label: cost.label,
    cost_yuan: cost.amount,
  };
}

function emptyGroups<T>(): Record<TimeSegment, T[]> {
  return { morning: [], afternoon: [], evening: [] };
}

// ============================================================================
// PUBLIC API
// ============================================================================

export async function reconcileDay(
  ctx: ReconcileContext,
  dayNumber: number,
  rawDayPlan: JsonValue | undefined
): Promise<ReconciledDay> {
  const date = addDays(ctx.startDate, dayNumber - 1);
  const dayPlan: JsonObject = isJsonObject(rawDayPlan) ? rawDayPlan : {};
  const normalized = normalizeDaySchedule(dayPlan);

  const synthesized = normalized.activities.length === 0;
  const activities = synthesized
    ? synthesizeDayActivities(dayNumber, ctx.recommendations)
    : normalized.activities;

  if (synthesized) {
    console.log(
      `[DayReconciler] Day ${dayNumber} of plan ${ctx.travelPlanId} had no activities; synthesized ${activities.length} from recommendations`
    );
  }

  const schedule = emptyGroups<JsonObject>();
  const grouped = emptyGroups<ItineraryItem>();
  const spots: JsonObject[] = [];
  const restaurants: JsonObject[] = [];
  const items: ItineraryItem[] = [];

  for (const activity of activities) {
    const isSpot = activity.type === "spot";
    const index = isSpot ? spots.length : restaurants.length;
    const named = declaredName(activity.raw, activity.type);
    const name = named ?? placeholderName(activity.type, index + 1);
    const raw = await backfillActivity(activity, named, ctx);

    const item = buildItem(
      activity,
      raw,
      name,
      isSpot ? `spot_${dayNumber}_${index}` : `rest_${dayNumber}_${index}`,
      synthesized
    );

    (isSpot ? spots : restaurants).push(raw);
    schedule[activity.segment].push(raw);
    grouped[activity.segment].push(item);
    items.push(item);
  }

  const theme = optionalText(dayPlan.theme) ?? `第${dayNumber}天行程`;
  const tips = optionalText(dayPlan.tips) ?? normalizeNotes(dayPlan.tips).join("\n");

  const itinerary: JsonObject = {
    ...dayPlan,
    date: optionalText(dayPlan.date) ?? date,
    theme,
    tips,
    schedule,
    spots,
    restaurants,
  };

  await ctx.writer.upsertItineraryDetail({
    travelPlanId: ctx.travelPlanId,
    dayNumber,
    itinerary,
    recommendedSpots: spots.slice(0, PERSISTED_SPOT_LIMIT),
    recommendedRestaurants: restaurants.slice(0, PERSISTED_RESTAURANT_LIMIT),
  });

  const { startPoint, endPoint } = deriveDayAnchors(date, dayNumber, ctx.totalDays, ctx.facts);

  const groupedCounts = { morning: 0, afternoon: 0, evening: 0 };
  for (const segment of TIME_SEGMENTS) {
    groupedCounts[segment] = grouped[segment].length;
  }

  const stats: DayStats = {
    spots: spots.length,
    restaurants: restaurants.length,
    schedule: normalized.rawCounts,
    grouped: groupedCounts,
    total: items.length,
    synthesized,
  };

  return {
    dayNumber,
    date,
    theme,
    tips,
    itinerary,
    spots,
    restaurants,
    items,
    grouped,
    stats,
    startPoint,
    endPoint,
  };
}
