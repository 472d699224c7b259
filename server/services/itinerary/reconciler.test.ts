/**
 * Unit Tests for the Day Reconciler
 *
 * Run with: npx vitest run server/services/itinerary/reconciler.test.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { normalizeNotes, parseDurationMinutes, reconcileDay, synthesizeDayActivities, type ReconcileContext } from './reconciler';
import type { GeocodeResult, Geocoder, ItineraryDetailUpsert, ItineraryDetailWriter, PlaceRecommendation } from './types';

// ============================================================================
// TEST DATA
// ============================================================================

class FakeGeocoder implements Geocoder {
  calls: string[] = [];

  constructor(private readonly result: GeocodeResult | null | Error = { lat: 1, lng: 2, formattedAddress: null }) {}

  async geocode(address: string): Promise<GeocodeResult | null> {
    this.calls.push(address);
    if (this.result instanceof Error) throw this.result;
    return this.result;
  }
}

class RecordingWriter implements ItineraryDetailWriter {
  upserts: ItineraryDetailUpsert[] = [];

  async upsertItineraryDetail(detail: ItineraryDetailUpsert): Promise<number> {
    this.upserts.push(detail);
    return this.upserts.length;
  }
}

const createPlace = (name: string, lat: number | null, lng: number | null, type: string | null = null): PlaceRecommendation => ({
  name,
  address: `${name}地址`,
  lat,
  lng,
  type,
});

const ATTRACTIONS = [
  createPlace('宽窄巷子', 30.67, 104.05),
  createPlace('武侯祠', 30.64, 104.04),
  createPlace('杜甫草堂', null, null),
];
const RESTAURANTS = [createPlace('陈麻婆豆腐', 30.66, 104.07, '餐饮服务;中餐厅;四川菜(川菜)')];

function createContext(overrides: Partial<ReconcileContext> = {}): ReconcileContext {
  return {
    travelPlanId: 7,
    destination: '成都',
    startDate: '2025-06-01',
    totalDays: 3,
    recommendations: { attractions: ATTRACTIONS, restaurants: RESTAURANTS },
    facts: { accommodations: [], flights: [] },
    geocoder: new FakeGeocoder(),
    writer: new RecordingWriter(),
    ...overrides,
  };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// FIELD COERCION TESTS
// ============================================================================

describe('parseDurationMinutes', () => {
  it('should read numbers as minutes', () => {
    expect(parseDurationMinutes(90)).toBe(90);
    expect(parseDurationMinutes('45分钟')).toBe(45);
  });

  it('should read hour texts', () => {
    expect(parseDurationMinutes('2-3小时')).toBe(120);
    expect(parseDurationMinutes('1.5 hours')).toBe(90);
    expect(parseDurationMinutes('2h')).toBe(120);
  });

  it('should take the unit from the first number only', () => {
    expect(parseDurationMinutes('30分钟-1小时')).toBe(30);
    expect(parseDurationMinutes('90 minutes with a break')).toBe(90);
    expect(parseDurationMinutes('about 40 min, longer with a tour')).toBe(40);
  });

  it('should reject unreadable values', () => {
    expect(parseDurationMinutes(0)).toBeNull();
    expect(parseDurationMinutes('半天')).toBeNull();
    expect(parseDurationMinutes(null)).toBeNull();
  });
});

describe('normalizeNotes', () => {
  it('should wrap a single string', () => {
    expect(normalizeNotes(' 早去人少 ')).toEqual(['早去人少']);
  });

  it('should keep non-empty strings and numbers', () => {
    expect(normalizeNotes(['a', '', 3, null, { x: 1 }])).toEqual(['a', '3']);
  });
});

// ============================================================================
// SYNTHESIS TESTS
// ============================================================================

describe('synthesizeDayActivities', () => {
  it('should pick attraction, restaurant, attraction with per-day offsets', () => {
    const recs = { attractions: ATTRACTIONS, restaurants: RESTAURANTS };
    expect(synthesizeDayActivities(1, recs).map((a) => [a.segment, a.raw.name])).toEqual([
      ['morning', '宽窄巷子'],
      ['afternoon', '陈麻婆豆腐'],
      ['evening', '武侯祠'],
    ]);
    expect(synthesizeDayActivities(2, recs).map((a) => a.raw.name)).toEqual(['杜甫草堂', '陈麻婆豆腐', '宽窄巷子']);
  });

  it('should skip slots whose list is empty', () => {
    expect(synthesizeDayActivities(1, { attractions: [], restaurants: RESTAURANTS })).toHaveLength(1);
    expect(synthesizeDayActivities(1, { attractions: [], restaurants: [] })).toEqual([]);
  });
});

// ============================================================================
// RECONCILE TESTS
// ============================================================================

describe('reconcileDay', () => {
  it('should build items in schedule order with backfilled coordinates', async () => {
    const geocoder = new FakeGeocoder();
    const writer = new RecordingWriter();
    const day = await reconcileDay(createContext({ geocoder, writer }), 1, {
      theme: '老成都',
      schedule: {
        morning: [
          { type: 'spot', name: '宽窄巷子景区', play_time_minutes: 90, notes: ['早去人少', ''] },
          { type: 'spot', name: '人民公园', recommended_time: '2-3小时', commute_from_prev: { mode: '地铁' } },
        ],
        afternoon: [{ name: '陈麻婆', cuisine: '川菜', price_range: '人均80-120' }],
        evening: [],
      },
    });

    expect(day.date).toBe('2025-06-01');
    expect(day.theme).toBe('老成都');
    expect(day.tips).toBe('');
    expect(day.items.map((item) => item.uniqueId)).toEqual(['spot_1_0', 'spot_1_1', 'rest_1_0']);

    const [first, second, meal] = day.items;
    expect(first).toMatchObject({ name: '宽窄巷子景区', lat: 30.67, lng: 104.05, duration: 90, notes: ['早去人少'] });
    expect(first.cost_label).toBe('门票以景区公示为准');
    expect(second).toMatchObject({ lat: 1, lng: 2, duration: 120, commute_from_prev: { mode: '地铁' } });
    expect(meal).toMatchObject({
      category: '美食',
      segment: 'afternoon',
      lat: 30.66,
      lng: 104.07,
      cuisine: '川菜',
      cost_label: '人均80-120',
      cost_yuan: 80,
    });

    expect(geocoder.calls).toEqual(['成都 人民公园']);
    expect(day.stats).toEqual({
      spots: 2,
      restaurants: 1,
      schedule: { morning: 2, afternoon: 1, evening: 0 },
      grouped: { morning: 2, afternoon: 1, evening: 0 },
      total: 3,
      synthesized: false,
    });

    expect(writer.upserts).toHaveLength(1);
    expect(writer.upserts[0].dayNumber).toBe(1);
    expect(writer.upserts[0].recommendedSpots[1]).toMatchObject({ name: '人民公园', latitude: 1, longitude: 2 });
  });

  it('should truncate persisted spots and restaurants but keep every item', async () => {
    const writer = new RecordingWriter();
    const spots = Array.from({ length: 7 }, (_, i) => ({ type: 'spot', name: `景点${i}`, latitude: 30, longitude: 104 }));
    const meals = Array.from({ length: 4 }, (_, i) => ({ type: 'restaurant', name: `餐馆${i}`, latitude: 30, longitude: 104 }));

    const day = await reconcileDay(createContext({ writer }), 2, { schedule: { morning: spots, evening: meals } });

    expect(day.items).toHaveLength(11);
    expect(day.itinerary.spots).toHaveLength(7);
    expect(writer.upserts[0].recommendedSpots.map((s) => s.name)).toEqual(['景点0', '景点1', '景点2', '景点3', '景点4']);
    expect(writer.upserts[0].recommendedRestaurants).toHaveLength(3);
  });

  it('should synthesize an empty day from recommendations', async () => {
    const geocoder = new FakeGeocoder();
    const day = await reconcileDay(createContext({ geocoder }), 2, { schedule: { morning: [], afternoon: [], evening: [] } });

    expect(day.stats.synthesized).toBe(true);
    expect(day.stats.total).toBe(3);
    expect(day.stats.schedule).toEqual({ morning: 0, afternoon: 0, evening: 0 });
    expect(day.grouped.morning[0]).toMatchObject({ name: '杜甫草堂', duration: 120, lat: 1, lng: 2 });
    expect(day.grouped.afternoon[0]).toMatchObject({
      name: '陈麻婆豆腐',
      duration: 60,
      cuisine: '餐饮服务;中餐厅;四川菜(川菜)',
      cost_label: '人均50-150元（估算）',
      cost_yuan: 50,
    });
    expect(day.grouped.evening[0].name).toBe('宽窄巷子');
    expect(geocoder.calls).toEqual(['成都 杜甫草堂']);
  });

  it('should default the theme of a missing day', async () => {
    const day = await reconcileDay(createContext({ recommendations: { attractions: [], restaurants: [] } }), 3, undefined);
    expect(day.theme).toBe('第3天行程');
    expect(day.date).toBe('2025-06-03');
    expect(day.items).toEqual([]);
  });

  it('should name unnamed activities with placeholders and skip their lookup', async () => {
    const geocoder = new FakeGeocoder();
    const day = await reconcileDay(createContext({ geocoder }), 1, {
      schedule: { morning: [{ type: 'spot' }], afternoon: [{ type: 'restaurant' }] },
    });
    expect(day.items.map((item) => item.name)).toEqual(['景点1', '餐厅1']);
    expect(day.items[0].lat).toBeNull();
    expect(geocoder.calls).toEqual([]);
  });

  it('should join note-style tips', async () => {
    const day = await reconcileDay(createContext(), 1, { tips: ['带伞', '早起'], schedule: { morning: [{ name: '宽窄巷子' }] } });
    expect(day.tips).toBe('带伞\n早起');
  });

  it('should leave coordinates empty when geocoding fails', async () => {
    const geocoder = new FakeGeocoder(new Error('timeout'));
    const day = await reconcileDay(createContext({ geocoder }), 1, { schedule: { morning: [{ name: '东郊记忆' }] } });
    expect(day.items[0]).toMatchObject({ lat: null, lng: null });
  });

  it('should propagate persistence failures', async () => {
    const writer: ItineraryDetailWriter = {
      upsertItineraryDetail: async () => {
        throw new Error('connection refused');
      },
    };
    await expect(reconcileDay(createContext({ writer }), 1, {})).rejects.toThrow('connection refused');
  });
});
