import type { Geocoder, JsonObject, JsonValue, PlaceRecommendation } from "./types";

export interface Coordinates {
  lat: number;
  lng: number;
}

export function toFiniteNumber(value: JsonValue | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** `latitude`/`longitude` first, then `lat`/`lng`. */
export function readCoordinates(activity: JsonObject): Coordinates | null {
  const lat = toFiniteNumber(activity.latitude) ?? toFiniteNumber(activity.lat);
  const lng = toFiniteNumber(activity.longitude) ?? toFiniteNumber(activity.lng);
  if (lat === null || lng === null) return null;
  return { lat, lng };
}

/**
 * Case-insensitive name match against a recommendation list.
 * Exact match or substring in either direction; first hit wins.
 */
export function findRecommendationByName(
  name: string,
  candidates: PlaceRecommendation[]
): PlaceRecommendation | null {
  const needle = name.trim().toLowerCase();
  if (!needle) return null;

  for (const candidate of candidates) {
    const hay = candidate.name.trim().toLowerCase();
    if (!hay) continue;
    if (hay === needle || hay.includes(needle) || needle.includes(hay)) {
      return candidate;
    }
  }
  return null;
}

/** Geocode `"{destination} {name}"`; lookup failures read as "no result". */
export async function geocodeByName(
  geocoder: Geocoder,
  destination: string,
  name: string
): Promise<Coordinates | null> {
  try {
    const result = await geocoder.geocode(`${destination} ${name}`, destination);
    if (!result) return null;
    if (!Number.isFinite(result.lat) || !Number.isFinite(result.lng)) return null;
    return { lat: result.lat, lng: result.lng };
  } catch (error) {
    console.warn(`[DayReconciler] Geocode failed for "${name}":`, error instanceof Error ? error.message : error);
    return null;
  }
}

/**
 * Coordinates for an activity missing them: recommendation match, then geocode.
 */
export async function resolveCoordinates(
  name: string,
  candidates: PlaceRecommendation[],
  destination: string,
  geocoder: Geocoder
): Promise<Coordinates | null> {
  const match = findRecommendationByName(name, candidates);
  if (match && match.lat !== null && match.lng !== null) {
    return { lat: match.lat, lng: match.lng };
  }
  return geocodeByName(geocoder, destination, name);
}

/** Fill missing coordinates on city-level recommendations by geocoding their names. */
export async function ensureRecommendationCoordinates(
  places: PlaceRecommendation[],
  destination: string,
  geocoder: Geocoder
): Promise<PlaceRecommendation[]> {
  const enriched: PlaceRecommendation[] = [];

  for (const place of places) {
    if ((place.lat === null || place.lng === null) && place.name) {
      const coords = await geocodeByName(geocoder, destination, place.name);
      enriched.push(coords ? { ...place, lat: coords.lat, lng: coords.lng } : place);
    } else {
      enriched.push(place);
    }
  }

  return enriched;
}
