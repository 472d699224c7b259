import {
  TIME_SEGMENTS,
  isJsonObject,
  type ActivityType,
  type JsonObject,
  type JsonValue,
  type TimeSegment,
} from "./types";

// ============================================================================
// SEGMENT SHAPES
// ============================================================================

/**
 * The shapes a schedule segment arrives in:
 *   [ {...}, {...} ]        → list
 *   { "items": [ ... ] }    → items
 *   { "name": "..." }       → single
 *   missing / null / other  → absent
 */
export type SegmentShape =
  | { kind: "list"; items: JsonValue[] }
  | { kind: "items"; items: JsonValue[] }
  | { kind: "single"; item: JsonObject }
  | { kind: "absent" };

export function decodeSegment(value: JsonValue | undefined): SegmentShape {
  if (Array.isArray(value)) {
    return { kind: "list", items: value };
  }
  if (isJsonObject(value)) {
    const items = value.items;
    if (Array.isArray(items)) {
      return { kind: "items", items };
    }
    if (Object.keys(value).length > 0) {
      return { kind: "single", item: value };
    }
  }
  return { kind: "absent" };
}

/** Ordered activity objects of a segment; non-object entries are dropped. */
export function segmentActivities(shape: SegmentShape): JsonObject[] {
  switch (shape.kind) {
    case "list":
    case "items":
      return shape.items.filter(isJsonObject);
    case "single":
      return [shape.item];
    case "absent":
      return [];
  }
}

export function segmentRawCount(shape: SegmentShape): number {
  switch (shape.kind) {
    case "list":
    case "items":
      return shape.items.length;
    case "single":
      return 1;
    case "absent":
      return 0;
  }
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

const RESTAURANT_TYPES = new Set(["restaurant", "food", "meal", "dining", "餐厅", "美食", "餐饮"]);
const RESTAURANT_HINT_FIELDS = ["cuisine", "cuisine_type", "price_range"] as const;

function hasValue(value: JsonValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === "string") return value.trim().length > 0;
  return true;
}

export function classifyActivity(activity: JsonObject): ActivityType {
  const declared = activity.type;
  if (typeof declared === "string" && declared.trim()) {
    return RESTAURANT_TYPES.has(declared.trim().toLowerCase()) ? "restaurant" : "spot";
  }
  return RESTAURANT_HINT_FIELDS.some((field) => hasValue(activity[field])) ? "restaurant" : "spot";
}

// ============================================================================
// DAY SCHEDULE
// ============================================================================

export interface ScheduledActivity {
  segment: TimeSegment;
  type: ActivityType;
  raw: JsonObject;
}

export interface NormalizedSchedule {
  /** canonical lists, type tags filled in */
  schedule: Record<TimeSegment, JsonObject[]>;
  activities: ScheduledActivity[];
  rawCounts: Record<TimeSegment, number>;
}

function isTimeSegment(value: JsonValue | undefined): value is TimeSegment {
  return typeof value === "string" && (TIME_SEGMENTS as readonly string[]).includes(value);
}

function legacyActivities(dayPlan: JsonObject): ScheduledActivity[] {
  const result: ScheduledActivity[] = [];
  for (const [field, fallbackType] of [["spots", "spot"], ["restaurants", "restaurant"]] as const) {
    for (const raw of segmentActivities(decodeSegment(dayPlan[field]))) {
      const type = typeof raw.type === "string" ? classifyActivity(raw) : fallbackType;
      const declaredSlot = raw.time_slot ?? raw.segment;
      const segment: TimeSegment = isTimeSegment(declaredSlot)
        ? declaredSlot
        : type === "restaurant" ? "afternoon" : "morning";
      result.push({ segment, type, raw: { ...raw, type } });
    }
  }
  return result;
}

/**
 * Decode `schedule.{morning,afternoon,evening}` of one day.
 * Days that only carry the older top-level `spots` / `restaurants` lists are
 * mapped onto segments via their `time_slot`, else spots → morning and
 * restaurants → afternoon.
 */
export function normalizeDaySchedule(dayPlan: JsonObject): NormalizedSchedule {
  const scheduleValue = isJsonObject(dayPlan.schedule) ? dayPlan.schedule : {};
  const schedule: Record<TimeSegment, JsonObject[]> = { morning: [], afternoon: [], evening: [] };
  const rawCounts: Record<TimeSegment, number> = { morning: 0, afternoon: 0, evening: 0 };
  let activities: ScheduledActivity[] = [];

  for (const segment of TIME_SEGMENTS) {
    const shape = decodeSegment(scheduleValue[segment]);
    rawCounts[segment] = segmentRawCount(shape);
    for (const raw of segmentActivities(shape)) {
      const type = classifyActivity(raw);
      activities.push({ segment, type, raw: { ...raw, type } });
    }
  }

  if (activities.length === 0) {
    activities = legacyActivities(dayPlan);
  }

  for (const activity of activities) {
    schedule[activity.segment].push(activity.raw);
  }

  return { schedule, activities, rawCounts };
}
