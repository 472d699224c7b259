import { describe, it, expect } from 'vitest';
import { InMemoryStorage } from './storage';

const PLAN = {
  destination: '成都',
  startDate: '2025-06-01',
  endDate: '2025-06-03',
  budgetMin: '3000',
  budgetMax: '5000',
};

describe('InMemoryStorage', () => {
  it('should create and read plans with defaults', async () => {
    const storage = new InMemoryStorage();
    const plan = await storage.createTravelPlan(PLAN);

    expect(await storage.getTravelPlan(plan.id)).toEqual(plan);
    expect(plan.interests).toEqual([]);
    expect(plan.travelers).toBe('');
    expect(await storage.getTravelPlan(999)).toBeUndefined();
  });

  it('should list plans newest first', async () => {
    const storage = new InMemoryStorage();
    const first = await storage.createTravelPlan(PLAN);
    const second = await storage.createTravelPlan({ ...PLAN, destination: '重庆' });

    expect((await storage.listTravelPlans()).map((p) => p.id)).toEqual([second.id, first.id]);
  });

  it('should keep trip facts per plan in insertion order', async () => {
    const storage = new InMemoryStorage();
    const plan = await storage.createTravelPlan(PLAN);
    const other = await storage.createTravelPlan(PLAN);

    await storage.createFlight(plan.id, {
      departureAirport: 'SHA',
      arrivalAirport: 'TFU',
      departureTime: new Date('2025-06-01T08:00:00Z'),
    });
    await storage.createAccommodation(plan.id, { city: '成都', address: '春熙路1号', latitude: 30.66, longitude: 104.06 });
    await storage.createAccommodation(plan.id, { city: '成都', address: '天府广场' });
    await storage.createAccommodation(other.id, { city: '重庆', address: '解放碑' });

    const flights = await storage.getFlightsByPlan(plan.id);
    expect(flights).toHaveLength(1);
    expect(flights[0].arrivalTime).toBeNull();

    const stays = await storage.getAccommodationsByPlan(plan.id);
    expect(stays.map((s) => s.address)).toEqual(['春熙路1号', '天府广场']);
    expect(stays[1]).toMatchObject({ checkInDate: null, latitude: null });
  });

  it('should upsert one detail per plan and day', async () => {
    const storage = new InMemoryStorage();
    const plan = await storage.createTravelPlan(PLAN);

    const firstId = await storage.upsertItineraryDetail({
      travelPlanId: plan.id,
      dayNumber: 2,
      itinerary: { theme: 'old' },
      recommendedSpots: [],
      recommendedRestaurants: [],
    });
    await storage.upsertItineraryDetail({
      travelPlanId: plan.id,
      dayNumber: 1,
      itinerary: { theme: 'day one' },
      recommendedSpots: [],
      recommendedRestaurants: [],
    });
    const secondId = await storage.upsertItineraryDetail({
      travelPlanId: plan.id,
      dayNumber: 2,
      itinerary: { theme: 'new' },
      recommendedSpots: [{ name: '武侯祠' }],
      recommendedRestaurants: [],
    });

    expect(secondId).toBe(firstId);
    const details = await storage.getItineraryDetails(plan.id);
    expect(details.map((d) => [d.dayNumber, d.itinerary.theme])).toEqual([
      [1, 'day one'],
      [2, 'new'],
    ]);
    expect(details[1].recommendedSpots).toEqual([{ name: '武侯祠' }]);
  });
});
