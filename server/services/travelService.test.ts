import { describe, it, expect, vi } from 'vitest';
import type { TravelPlan } from '@shared/schema';
import {
  RECOMMENDATION_LIMIT,
  createPlanWithFacts,
  filterByFoodPreferences,
  filterByInterests,
  getRecommendations,
  searchPlaces,
  toTripRequest,
  withLodgingCoordinates,
} from './travelService';
import { InMemoryStorage } from '../storage';
import type { GeocodeResult, Geocoder, LocationClient, PlaceRecommendation } from './itinerary';

// ============================================================================
// TEST DATA
// ============================================================================

const createPlace = (overrides: Partial<PlaceRecommendation> = {}): PlaceRecommendation => ({
  name: 'Test Place',
  address: null,
  lat: 30,
  lng: 104,
  type: null,
  ...overrides,
});

const ATTRACTIONS = [
  createPlace({ name: '武侯祠', description: '三国历史遗迹' }),
  createPlace({ name: '大熊猫繁育研究基地', description: '看熊猫' }),
];
const RESTAURANTS = [
  createPlace({ name: '陈麻婆豆腐', type: '餐饮服务;中餐厅;四川菜(川菜)' }),
  createPlace({ name: '星巴克', type: '餐饮服务;咖啡厅' }),
];

class FakeLocations implements LocationClient {
  constructor(private readonly attractions: PlaceRecommendation[], private readonly restaurants: PlaceRecommendation[]) {}

  async geocode(): Promise<GeocodeResult | null> {
    return null;
  }

  async searchAttractions(): Promise<PlaceRecommendation[]> {
    return this.attractions;
  }

  async searchRestaurants(): Promise<PlaceRecommendation[]> {
    return this.restaurants;
  }
}

// ============================================================================
// FILTER TESTS
// ============================================================================

describe('filterByInterests', () => {
  it('should keep attractions whose name or description matches', () => {
    expect(filterByInterests(ATTRACTIONS, ['历史']).map((a) => a.name)).toEqual(['武侯祠']);
    expect(filterByInterests(ATTRACTIONS, ['熊猫']).map((a) => a.name)).toEqual(['大熊猫繁育研究基地']);
  });

  it('should fall back to the full list when nothing matches', () => {
    expect(filterByInterests(ATTRACTIONS, ['滑雪'])).toEqual(ATTRACTIONS);
  });
});

describe('filterByFoodPreferences', () => {
  it('should match against the POI type when no cuisine is set', () => {
    expect(filterByFoodPreferences(RESTAURANTS, ['川菜']).map((r) => r.name)).toEqual(['陈麻婆豆腐']);
  });

  it('should ignore blank preferences', () => {
    expect(filterByFoodPreferences(RESTAURANTS, [' '])).toEqual(RESTAURANTS);
  });
});

describe('getRecommendations', () => {
  it('should filter and cap both lists', async () => {
    const many = Array.from({ length: 25 }, (_, i) => createPlace({ name: `景点${i}` }));
    const result = await getRecommendations(new FakeLocations(many, RESTAURANTS), '成都', [], ['咖啡']);

    expect(result.attractions).toHaveLength(RECOMMENDATION_LIMIT);
    expect(result.restaurants.map((r) => r.name)).toEqual(['星巴克']);
  });
});

// ============================================================================
// TRIP REQUEST TESTS
// ============================================================================

describe('toTripRequest', () => {
  it('should convert decimal budget strings to numbers', () => {
    const plan: TravelPlan = {
      id: 3,
      destination: '成都',
      startDate: '2025-06-01',
      endDate: '2025-06-03',
      budgetMin: '3000.00',
      budgetMax: 'abc',
      interests: ['美食'],
      foodPreferences: [],
      travelers: '2位成人',
      referenceNotes: ['http://xhslink.com/abc'],
      createdAt: null,
      updatedAt: null,
    };

    expect(toTripRequest(plan)).toEqual({
      travelPlanId: 3,
      destination: '成都',
      startDate: '2025-06-01',
      endDate: '2025-06-03',
      interests: ['美食'],
      foodPreferences: [],
      travelers: '2位成人',
      budgetMin: 3000,
      budgetMax: 0,
      referenceNoteUrls: ['http://xhslink.com/abc'],
    });
  });
});

// ============================================================================
// PLACE SEARCH TESTS
// ============================================================================

describe('searchPlaces', () => {
  it('should filter by keyword across name and description', () => {
    expect(searchPlaces(ATTRACTIONS, '三国').map((a) => a.name)).toEqual(['武侯祠']);
    expect(searchPlaces(ATTRACTIONS, undefined)).toEqual(ATTRACTIONS);
  });

  it('should filter restaurants by cuisine', () => {
    expect(searchPlaces(RESTAURANTS, undefined, '咖啡').map((r) => r.name)).toEqual(['星巴克']);
    expect(searchPlaces(RESTAURANTS, '豆腐', '咖啡')).toEqual([]);
  });
});

// ============================================================================
// PLAN CREATION TESTS
// ============================================================================

const geocoderReturning = (result: GeocodeResult | null) => ({
  geocode: vi.fn(async (_address: string, _hintCity?: string): Promise<GeocodeResult | null> => result),
});

describe('withLodgingCoordinates', () => {
  it('should keep coordinates the request already has', async () => {
    const geocoder = geocoderReturning({ lat: 1, lng: 2, formattedAddress: null });
    const stay = { city: '成都', address: '春熙路1号', latitude: 30.66, longitude: 104.06 };

    expect(await withLodgingCoordinates(geocoder, stay)).toEqual(stay);
    expect(geocoder.geocode).not.toHaveBeenCalled();
  });

  it('should geocode the city and address when coordinates are missing', async () => {
    const geocoder = geocoderReturning({ lat: 30.65, lng: 104.08, formattedAddress: '四川省成都市锦江区春熙路1号' });

    const stay = await withLodgingCoordinates(geocoder, { city: '成都', address: '春熙路1号' });

    expect(geocoder.geocode).toHaveBeenCalledWith('成都 春熙路1号', '成都');
    expect(stay).toEqual({ city: '成都', address: '春熙路1号', latitude: 30.65, longitude: 104.08 });
  });

  it('should store null coordinates when the lookup fails', async () => {
    const geocoder: Geocoder = { geocode: vi.fn(async () => { throw new Error('timeout'); }) };

    const stay = await withLodgingCoordinates(geocoder, { city: '成都', address: '春熙路1号', latitude: 30.66 });

    expect(stay).toMatchObject({ latitude: null, longitude: null });
  });
});

describe('createPlanWithFacts', () => {
  it('should store the plan, its flights and geocoded stays', async () => {
    const storage = new InMemoryStorage();
    const geocoder = geocoderReturning({ lat: 30.65, lng: 104.08, formattedAddress: null });

    const created = await createPlanWithFacts(storage, geocoder, {
      destination: '成都',
      startDate: '2025-06-01',
      endDate: '2025-06-03',
      interests: [],
      foodPreferences: [],
      travelers: '',
      budgetMin: 3000,
      budgetMax: 5000,
      referenceNotes: [],
      flights: [{ departureAirport: 'SHA', arrivalAirport: 'TFU', departureTime: new Date('2025-06-01T08:00:00Z') }],
      accommodations: [{ city: '成都', address: '春熙路1号', checkInDate: '2025-06-01', checkOutDate: '2025-06-03' }],
    });

    expect(created.budgetMin).toBe('3000');
    expect(created.flights).toHaveLength(1);
    expect(created.accommodations[0]).toMatchObject({ latitude: 30.65, longitude: 104.08 });
    expect(await storage.getAccommodationsByPlan(created.id)).toEqual(created.accommodations);
  });
});
