import {
  accommodations,
  flights,
  itineraryDetails,
  travelPlans,
  type Accommodation,
  type Flight,
  type InsertAccommodation,
  type InsertFlight,
  type InsertTravelPlan,
  type ItineraryDetail,
  type TravelPlan,
} from "@shared/schema";
import { asc, desc, eq } from "drizzle-orm";
import type { AppConfig } from "./config";
import { createDatabase, type Database } from "./db";
import type { ItineraryDetailUpsert, ItineraryDetailWriter, TripFactsReader } from "./services/itinerary";

export interface IStorage extends TripFactsReader, ItineraryDetailWriter {
  // Travel plans
  createTravelPlan(plan: InsertTravelPlan): Promise<TravelPlan>;
  getTravelPlan(id: number): Promise<TravelPlan | undefined>;
  listTravelPlans(): Promise<TravelPlan[]>; // newest first

  // Trip facts (insertion order is preserved on read)
  createFlight(travelPlanId: number, flight: InsertFlight): Promise<Flight>;
  createAccommodation(travelPlanId: number, accommodation: InsertAccommodation): Promise<Accommodation>;
  getFlightsByPlan(travelPlanId: number): Promise<Flight[]>;
  getAccommodationsByPlan(travelPlanId: number): Promise<Accommodation[]>;

  // Itinerary details, one row per (plan, day); last write wins
  upsertItineraryDetail(detail: ItineraryDetailUpsert): Promise<number>;
  getItineraryDetails(travelPlanId: number): Promise<ItineraryDetail[]>;
}

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Database) {}

  async createTravelPlan(plan: InsertTravelPlan): Promise<TravelPlan> {
    const [created] = await this.db.insert(travelPlans).values(plan).returning();
    return created;
  }

  async getTravelPlan(id: number): Promise<TravelPlan | undefined> {
    const [plan] = await this.db.select().from(travelPlans).where(eq(travelPlans.id, id));
    return plan;
  }

  async listTravelPlans(): Promise<TravelPlan[]> {
    return this.db.select().from(travelPlans).orderBy(desc(travelPlans.id));
  }

  async createFlight(travelPlanId: number, flight: InsertFlight): Promise<Flight> {
    const [created] = await this.db.insert(flights).values({ ...flight, travelPlanId }).returning();
    return created;
  }

  async createAccommodation(travelPlanId: number, accommodation: InsertAccommodation): Promise<Accommodation> {
    const [created] = await this.db
      .insert(accommodations)
      .values({ ...accommodation, travelPlanId })
      .returning();
    return created;
  }

  async getFlightsByPlan(travelPlanId: number): Promise<Flight[]> {
    return this.db.select().from(flights).where(eq(flights.travelPlanId, travelPlanId)).orderBy(asc(flights.id));
  }

  async getAccommodationsByPlan(travelPlanId: number): Promise<Accommodation[]> {
    return this.db
      .select()
      .from(accommodations)
      .where(eq(accommodations.travelPlanId, travelPlanId))
      .orderBy(asc(accommodations.id));
  }

  async upsertItineraryDetail(detail: ItineraryDetailUpsert): Promise<number> {
    try {
      const [row] = await this.db
        .insert(itineraryDetails)
        .values(detail)
        .onConflictDoUpdate({
          target: [itineraryDetails.travelPlanId, itineraryDetails.dayNumber],
          set: {
            itinerary: detail.itinerary,
            recommendedSpots: detail.recommendedSpots,
            recommendedRestaurants: detail.recommendedRestaurants,
            updatedAt: new Date(),
          },
        })
        .returning({ id: itineraryDetails.id });
      return row.id;
    } catch (err) {
      console.error(
        `[Storage] upsertItineraryDetail FAILED: plan=${detail.travelPlanId}, day=${detail.dayNumber}`,
        err
      );
      throw err;
    }
  }

  async getItineraryDetails(travelPlanId: number): Promise<ItineraryDetail[]> {
    return this.db
      .select()
      .from(itineraryDetails)
      .where(eq(itineraryDetails.travelPlanId, travelPlanId))
      .orderBy(asc(itineraryDetails.dayNumber));
  }
}

// In-memory storage for local runs without Postgres and for tests.
export class InMemoryStorage implements IStorage {
  private plans: TravelPlan[] = [];
  private flights: Flight[] = [];
  private accommodations: Accommodation[] = [];
  private details: ItineraryDetail[] = [];
  private nextId = 1;

  async createTravelPlan(plan: InsertTravelPlan): Promise<TravelPlan> {
    const now = new Date();
    const created: TravelPlan = {
      id: this.nextId++,
      destination: plan.destination,
      startDate: plan.startDate,
      endDate: plan.endDate,
      budgetMin: plan.budgetMin ?? "0",
      budgetMax: plan.budgetMax ?? "0",
      interests: plan.interests ?? [],
      foodPreferences: plan.foodPreferences ?? [],
      travelers: plan.travelers ?? "",
      referenceNotes: plan.referenceNotes ?? [],
      createdAt: now,
      updatedAt: now,
    };
    this.plans.push(created);
    return created;
  }

  async getTravelPlan(id: number): Promise<TravelPlan | undefined> {
    return this.plans.find((p) => p.id === id);
  }

  async listTravelPlans(): Promise<TravelPlan[]> {
    return [...this.plans].reverse();
  }

  async createFlight(travelPlanId: number, flight: InsertFlight): Promise<Flight> {
    const created: Flight = {
      id: this.nextId++,
      travelPlanId,
      departureAirport: flight.departureAirport,
      arrivalAirport: flight.arrivalAirport,
      departureTime: flight.departureTime,
      arrivalTime: flight.arrivalTime ?? null,
      departureLatitude: flight.departureLatitude ?? null,
      departureLongitude: flight.departureLongitude ?? null,
      arrivalLatitude: flight.arrivalLatitude ?? null,
      arrivalLongitude: flight.arrivalLongitude ?? null,
      createdAt: new Date(),
    };
    this.flights.push(created);
    return created;
  }

  async createAccommodation(travelPlanId: number, accommodation: InsertAccommodation): Promise<Accommodation> {
    const created: Accommodation = {
      id: this.nextId++,
      travelPlanId,
      city: accommodation.city,
      address: accommodation.address,
      checkInDate: accommodation.checkInDate ?? null,
      checkOutDate: accommodation.checkOutDate ?? null,
      latitude: accommodation.latitude ?? null,
      longitude: accommodation.longitude ?? null,
      createdAt: new Date(),
    };
    this.accommodations.push(created);
    return created;
  }

  async getFlightsByPlan(travelPlanId: number): Promise<Flight[]> {
    return this.flights.filter((f) => f.travelPlanId === travelPlanId);
  }

  async getAccommodationsByPlan(travelPlanId: number): Promise<Accommodation[]> {
    return this.accommodations.filter((a) => a.travelPlanId === travelPlanId);
  }

  async upsertItineraryDetail(detail: ItineraryDetailUpsert): Promise<number> {
    const existing = this.details.find(
      (d) => d.travelPlanId === detail.travelPlanId && d.dayNumber === detail.dayNumber
    );
    if (existing) {
      existing.itinerary = detail.itinerary;
      existing.recommendedSpots = detail.recommendedSpots;
      existing.recommendedRestaurants = detail.recommendedRestaurants;
      existing.updatedAt = new Date();
      return existing.id;
    }

    const now = new Date();
    const created: ItineraryDetail = { id: this.nextId++, ...detail, createdAt: now, updatedAt: now };
    this.details.push(created);
    return created.id;
  }

  async getItineraryDetails(travelPlanId: number): Promise<ItineraryDetail[]> {
    return this.details
      .filter((d) => d.travelPlanId === travelPlanId)
      .sort((a, b) => a.dayNumber - b.dayNumber);
  }
}

export function createStorage(config: Pick<AppConfig, "DATABASE_URL" | "USE_IN_MEMORY_DB" | "NODE_ENV">): IStorage {
  if (config.USE_IN_MEMORY_DB) {
    console.log("[Storage] Using in-memory storage");
    return new InMemoryStorage();
  }
  if (!config.DATABASE_URL) {
    console.warn("[Storage] DATABASE_URL not set; falling back to in-memory storage");
    return new InMemoryStorage();
  }

  const { db } = createDatabase(config.DATABASE_URL, config.NODE_ENV === "production");
  return new DatabaseStorage(db);
}
