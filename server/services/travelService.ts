import type { Accommodation, CreateTravelPlanRequest, Flight, InsertAccommodation, TravelPlan } from "@shared/schema";
import type { IStorage } from "../storage";
import type { Geocoder, LocationClient, PlaceRecommendation, Recommendations, TripRequest } from "./itinerary";

export const RECOMMENDATION_LIMIT = 20;

function matchesAny(fields: Array<string | null | undefined>, terms: string[]): boolean {
  const haystacks = fields.filter((f): f is string => Boolean(f)).map((f) => f.toLowerCase());
  return terms.some((term) => {
    const needle = term.trim().toLowerCase();
    return needle.length > 0 && haystacks.some((h) => h.includes(needle));
  });
}

/** Keeps attractions mentioning an interest; falls back to the full list when none do. */
export function filterByInterests(attractions: PlaceRecommendation[], interests: string[]): PlaceRecommendation[] {
  if (interests.length === 0) return attractions;
  const filtered = attractions.filter((a) => matchesAny([a.name, a.description], interests));
  return filtered.length > 0 ? filtered : attractions;
}

/** Same rule for restaurants, against name and cuisine (or the POI type label). */
export function filterByFoodPreferences(
  restaurants: PlaceRecommendation[],
  foodPreferences: string[]
): PlaceRecommendation[] {
  if (foodPreferences.length === 0) return restaurants;
  const filtered = restaurants.filter((r) => matchesAny([r.name, r.cuisine ?? r.type], foodPreferences));
  return filtered.length > 0 ? filtered : restaurants;
}

export async function getRecommendations(
  locations: LocationClient,
  destination: string,
  interests: string[],
  foodPreferences: string[]
): Promise<Recommendations> {
  const attractions = await locations.searchAttractions(destination);
  const restaurants = await locations.searchRestaurants(destination);

  return {
    attractions: filterByInterests(attractions, interests).slice(0, RECOMMENDATION_LIMIT),
    restaurants: filterByFoodPreferences(restaurants, foodPreferences).slice(0, RECOMMENDATION_LIMIT),
  };
}

/** Keyword search over a city's places, as the attraction and restaurant lookups expose it. */
export function searchPlaces(
  places: PlaceRecommendation[],
  keyword: string | undefined,
  cuisine?: string
): PlaceRecommendation[] {
  let matched = places;
  if (cuisine?.trim()) {
    matched = matched.filter((p) => matchesAny([p.cuisine ?? p.type], [cuisine]));
  }
  if (keyword?.trim()) {
    matched = matched.filter((p) => matchesAny([p.name, p.description, p.address], [keyword]));
  }
  return matched.slice(0, RECOMMENDATION_LIMIT);
}

// ============================================================================
// PLAN CREATION
// ============================================================================

/**
 * Fills a stay's coordinates from "{city} {address}" when the request left
 * them out. A failed or empty lookup stores the stay without coordinates.
 */
export async function withLodgingCoordinates(
  geocoder: Geocoder,
  accommodation: InsertAccommodation
): Promise<InsertAccommodation> {
  if (typeof accommodation.latitude === "number" && typeof accommodation.longitude === "number") {
    return accommodation;
  }

  try {
    const geo = await geocoder.geocode(`${accommodation.city} ${accommodation.address}`, accommodation.city);
    if (geo) {
      return { ...accommodation, latitude: geo.lat, longitude: geo.lng };
    }
    console.warn(`[Travel] No coordinates for lodging "${accommodation.city} ${accommodation.address}"`);
  } catch (err) {
    console.warn(`[Travel] Lodging geocode failed for "${accommodation.city} ${accommodation.address}":`, err);
  }
  return { ...accommodation, latitude: null, longitude: null };
}

export interface CreatedTravelPlan extends TravelPlan {
  flights: Flight[];
  accommodations: Accommodation[];
}

/** Stores a plan with its flights and stays, geocoding stays that lack coordinates. */
export async function createPlanWithFacts(
  storage: IStorage,
  geocoder: Geocoder,
  input: CreateTravelPlanRequest
): Promise<CreatedTravelPlan> {
  const plan = await storage.createTravelPlan({
    destination: input.destination,
    startDate: input.startDate,
    endDate: input.endDate,
    budgetMin: String(input.budgetMin),
    budgetMax: String(input.budgetMax),
    interests: input.interests,
    foodPreferences: input.foodPreferences,
    travelers: input.travelers,
    referenceNotes: input.referenceNotes,
  });

  const flights: Flight[] = [];
  for (const flight of input.flights) {
    flights.push(await storage.createFlight(plan.id, flight));
  }
  const accommodations: Accommodation[] = [];
  for (const accommodation of input.accommodations) {
    accommodations.push(await storage.createAccommodation(plan.id, await withLodgingCoordinates(geocoder, accommodation)));
  }

  return { ...plan, flights, accommodations };
}

function toAmount(value: string | number | null): number {
  const amount = typeof value === "number" ? value : Number.parseFloat(value ?? "");
  return Number.isFinite(amount) ? amount : 0;
}

/** Generation input for a stored plan (decimal budget columns arrive as strings). */
export function toTripRequest(plan: TravelPlan): TripRequest {
  return {
    travelPlanId: plan.id,
    destination: plan.destination,
    startDate: plan.startDate,
    endDate: plan.endDate,
    interests: plan.interests,
    foodPreferences: plan.foodPreferences,
    travelers: plan.travelers,
    budgetMin: toAmount(plan.budgetMin),
    budgetMax: toAmount(plan.budgetMax),
    referenceNoteUrls: plan.referenceNotes,
  };
}
