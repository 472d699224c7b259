import type { JsonObject, JsonValue } from "@shared/schema";

export type { JsonObject, JsonValue };

// ============================================================================
// TRIP REQUEST
// ============================================================================

export interface TripRequest {
  travelPlanId: number;
  destination: string;
  /** YYYY-MM-DD */
  startDate: string;
  /** YYYY-MM-DD, inclusive */
  endDate: string;
  interests: string[];
  foodPreferences: string[];
  travelers: string;
  budgetMin: number;
  budgetMax: number;
  referenceNoteUrls?: string[];
}

// ============================================================================
// LLM OUTPUT
// ============================================================================

export const TIME_SEGMENTS = ["morning", "afternoon", "evening"] as const;
export type TimeSegment = (typeof TIME_SEGMENTS)[number];

/** Object keyed `day_1..day_N` as returned by the model (or the default shape). */
export type ParsedItinerary = JsonObject;

export type ActivityType = "spot" | "restaurant";

// ============================================================================
// RECONCILED OUTPUT
// ============================================================================

export interface CostEstimate {
  label: string;
  amount: number | null;
}

export interface ItineraryItem {
  uniqueId: string;
  type: ActivityType;
  category: "景点" | "美食";
  segment: TimeSegment;
  name: string;
  description: string | null;
  /** minutes */
  duration: number;
  lat: number | null;
  lng: number | null;
  notes: string[];
  commute_from_prev: JsonValue | null;
  cuisine: string | null;
  price_range: string | null;
  cost_label: string;
  cost_yuan: number | null;
}

export interface AnchorPoint {
  lat: number;
  lng: number;
  name: string;
  category: "住宿" | "机场";
  type: "accommodation" | "airport_arrival" | "airport_departure";
}

export interface DayStats {
  spots: number;
  restaurants: number;
  /** item counts of the raw schedule segments as the model returned them */
  schedule: Record<TimeSegment, number>;
  grouped: Record<TimeSegment, number>;
  total: number;
  synthesized: boolean;
}

export interface ReconciledDay {
  dayNumber: number;
  date: string;
  theme: string;
  tips: string;
  /** day plan as persisted: canonical schedule plus derived spots/restaurants */
  itinerary: JsonObject;
  spots: JsonObject[];
  restaurants: JsonObject[];
  items: ItineraryItem[];
  grouped: Record<TimeSegment, ItineraryItem[]>;
  stats: DayStats;
  startPoint: AnchorPoint | null;
  endPoint: AnchorPoint | null;
}

// ============================================================================
// TRIP FACTS & RECOMMENDATIONS
// ============================================================================

export interface AccommodationFact {
  city: string;
  address: string;
  checkInDate: string | Date | null;
  checkOutDate: string | Date | null;
  latitude: number | null;
  longitude: number | null;
}

export interface FlightFact {
  departureAirport: string;
  arrivalAirport: string;
  departureTime: string | Date;
  arrivalTime: string | Date | null;
  departureLatitude: number | null;
  departureLongitude: number | null;
  arrivalLatitude: number | null;
  arrivalLongitude: number | null;
}

export interface TripFacts {
  accommodations: AccommodationFact[];
  flights: FlightFact[];
}

export interface PlaceRecommendation {
  name: string;
  address: string | null;
  lat: number | null;
  lng: number | null;
  type: string | null;
  tel?: string | null;
  description?: string | null;
  cuisine?: string | null;
  price_range?: string | null;
}

export interface Recommendations {
  attractions: PlaceRecommendation[];
  restaurants: PlaceRecommendation[];
}

// ============================================================================
// COLLABORATORS
// ============================================================================

export interface GeocodeResult {
  lat: number;
  lng: number;
  formattedAddress: string | null;
}

export interface Geocoder {
  geocode(address: string, hintCity?: string): Promise<GeocodeResult | null>;
}

export interface LocationClient extends Geocoder {
  searchAttractions(city: string): Promise<PlaceRecommendation[]>;
  searchRestaurants(city: string): Promise<PlaceRecommendation[]>;
}

export interface TripFactsReader {
  getFlightsByPlan(travelPlanId: number): Promise<FlightFact[]>;
  getAccommodationsByPlan(travelPlanId: number): Promise<AccommodationFact[]>;
}

export interface ItineraryDetailUpsert {
  travelPlanId: number;
  dayNumber: number;
  itinerary: JsonObject;
  recommendedSpots: JsonObject[];
  recommendedRestaurants: JsonObject[];
}

export interface ItineraryDetailWriter {
  upsertItineraryDetail(detail: ItineraryDetailUpsert): Promise<number>;
}

export interface ReferenceNote {
  noteId: string;
  title: string;
  content: string;
  tags: string[];
}

export interface NoteContentClient {
  getNoteContent(url: string): Promise<ReferenceNote | null>;
}

export interface LLMChunk {
  content?: string | null;
}

/** `stream` is present only when the provider can deliver tokens incrementally. */
export interface ItineraryLLM {
  invoke(prompt: string): Promise<string>;
  stream?: (prompt: string) => AsyncIterable<LLMChunk>;
}

// ============================================================================
// HELPERS
// ============================================================================

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function dayKey(dayNumber: number): string {
  return `day_${dayNumber}`;
}
