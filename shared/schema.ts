import { pgTable, text, serial, integer, timestamp, jsonb, numeric, date, doublePrecision, index, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// ============================================================================
// JSON VALUES
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ============================================================================
// TRAVEL PLANS
// ============================================================================

export const travelPlans = pgTable("travel_plans", {
  id: serial("id").primaryKey(),
  destination: text("destination").notNull(),
  startDate: date("start_date", { mode: "string" }).notNull(),
  endDate: date("end_date", { mode: "string" }).notNull(),
  // numeric columns come back from pg as strings
  budgetMin: numeric("budget_min", { precision: 10, scale: 2 }).notNull().default("0"),
  budgetMax: numeric("budget_max", { precision: 10, scale: 2 }).notNull().default("0"),
  interests: jsonb("interests").$type<string[]>().notNull().default([]),
  foodPreferences: jsonb("food_preferences").$type<string[]>().notNull().default([]),
  travelers: text("travelers").notNull().default(""),
  referenceNotes: jsonb("reference_notes").$type<string[]>().notNull().default([]), // note URLs
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
}, (table) => ({
  destinationIdx: index("travel_plans_destination_idx").on(table.destination),
}));

// ============================================================================
// ITINERARY DETAILS (one row per plan + day)
// ============================================================================

export const itineraryDetails = pgTable("itinerary_details", {
  id: serial("id").primaryKey(),
  travelPlanId: integer("travel_plan_id").references(() => travelPlans.id, { onDelete: "cascade" }).notNull(),
  dayNumber: integer("day_number").notNull(),
  itinerary: jsonb("itinerary").$type<JsonObject>().notNull(),
  recommendedSpots: jsonb("recommended_spots").$type<JsonObject[]>().notNull().default([]),
  recommendedRestaurants: jsonb("recommended_restaurants").$type<JsonObject[]>().notNull().default([]),
  createdAt: timestamp("created_at").defaultNow(),
  updatedAt: timestamp("updated_at").defaultNow(),
}, (table) => ({
  planDayIdx: uniqueIndex("itinerary_details_plan_day_idx").on(table.travelPlanId, table.dayNumber),
}));

// ============================================================================
// FLIGHTS & ACCOMMODATIONS (authoritative trip facts)
// ============================================================================

export const flights = pgTable("flights", {
  id: serial("id").primaryKey(),
  travelPlanId: integer("travel_plan_id").references(() => travelPlans.id, { onDelete: "cascade" }).notNull(),
  departureAirport: text("departure_airport").notNull(),
  arrivalAirport: text("arrival_airport").notNull(),
  departureTime: timestamp("departure_time").notNull(),
  arrivalTime: timestamp("arrival_time"), // arrival of this leg, or the return time of a round trip
  departureLatitude: doublePrecision("departure_latitude"),
  departureLongitude: doublePrecision("departure_longitude"),
  arrivalLatitude: doublePrecision("arrival_latitude"),
  arrivalLongitude: doublePrecision("arrival_longitude"),
  createdAt: timestamp("created_at").defaultNow(),
}, (table) => ({
  planIdx: index("flights_travel_plan_id_idx").on(table.travelPlanId),
}));

export const accommodations = pgTable("accommodations", {
  id: serial("id").primaryKey(),
  travelPlanId: integer("travel_plan_id").references(() => travelPlans.id, { onDelete: "cascade" }).notNull(),
  city: text("city").notNull(),
  address: text("address").notNull(),
  checkInDate: date("check_in_date", { mode: "string" }),
  checkOutDate: date("check_out_date", { mode: "string" }),
  latitude: doublePrecision("latitude"),
  longitude: doublePrecision("longitude"),
  createdAt: timestamp("created_at").defaultNow(),
}, (table) => ({
  planIdx: index("accommodations_travel_plan_id_idx").on(table.travelPlanId),
}));

// ============================================================================
// INSERT SCHEMAS
// ============================================================================

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected a YYYY-MM-DD date");

export const insertFlightSchema = createInsertSchema(flights, {
  departureAirport: z.string().min(1),
  arrivalAirport: z.string().min(1),
  departureTime: z.coerce.date(),
  arrivalTime: z.coerce.date().nullable().optional(),
}).omit({
  id: true,
  travelPlanId: true,
  createdAt: true,
});

export const insertAccommodationSchema = createInsertSchema(accommodations, {
  city: z.string().min(1),
  address: z.string().min(1),
  checkInDate: isoDate.nullable().optional(),
  checkOutDate: isoDate.nullable().optional(),
}).omit({
  id: true,
  travelPlanId: true,
  createdAt: true,
});

export type TravelPlan = typeof travelPlans.$inferSelect;
export type InsertTravelPlan = typeof travelPlans.$inferInsert;

export type ItineraryDetail = typeof itineraryDetails.$inferSelect;

export type Flight = typeof flights.$inferSelect;
export type InsertFlight = z.infer<typeof insertFlightSchema>;

export type Accommodation = typeof accommodations.$inferSelect;
export type InsertAccommodation = z.infer<typeof insertAccommodationSchema>;

// ============================================================================
// API REQUEST SCHEMAS
// ============================================================================

const tagList = z.array(z.string().trim().min(1)).default([]);

export const createTravelPlanRequestSchema = z.object({
  destination: z.string().trim().min(1, "Destination is required"),
  startDate: isoDate,
  endDate: isoDate,
  interests: tagList,
  foodPreferences: tagList,
  travelers: z.string().default(""),
  budgetMin: z.coerce.number().min(0).default(0),
  budgetMax: z.coerce.number().min(0).default(0),
  referenceNotes: z.array(z.string().url()).default([]),
  flights: z.array(insertFlightSchema).default([]),
  accommodations: z.array(insertAccommodationSchema).default([]),
})
  .refine((plan) => plan.endDate >= plan.startDate, {
    message: "endDate must not be before startDate",
    path: ["endDate"],
  })
  .refine((plan) => plan.budgetMin <= plan.budgetMax, {
    message: "budgetMin must not exceed budgetMax",
    path: ["budgetMax"],
  });

export type CreateTravelPlanRequest = z.infer<typeof createTravelPlanRequestSchema>;

export const recommendationsQuerySchema = z.object({
  destination: z.string().trim().min(1, "Destination is required"),
  interests: z.string().optional(),
  food_preferences: z.string().optional(),
});

export const attractionSearchQuerySchema = z.object({
  city: z.string().trim().min(1, "City is required"),
  keyword: z.string().trim().optional(),
});

export const restaurantSearchQuerySchema = attractionSearchQuerySchema.extend({
  cuisine_type: z.string().trim().optional(),
});

export const geocodeQuerySchema = z.object({
  address: z.string().trim().min(1, "Address is required"),
  location: z.string().trim().optional(),
});
