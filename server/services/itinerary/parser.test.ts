/**
 * Unit Tests for the Itinerary Response Parser
 *
 * Run with: npx vitest run server/services/itinerary/parser.test.ts
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  buildDefaultItinerary,
  findJsonValueEnd,
  parseItineraryResponse,
  parseItineraryResponseDetailed,
  stripCodeFences,
} from './parser';

// ============================================================================
// TEST DATA
// ============================================================================

const ONE_DAY = { day_1: { theme: '老城漫步', schedule: { morning: [{ name: '宽窄巷子' }] } } };
const ONE_DAY_JSON = JSON.stringify(ONE_DAY);

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

// ============================================================================
// HELPER TESTS
// ============================================================================

describe('stripCodeFences', () => {
  it('should remove a json fence', () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
  });

  it('should remove a bare fence', () => {
    expect(stripCodeFences('```\n{"a":1}\n```  ')).toBe('{"a":1}');
  });

  it('should leave unfenced text alone', () => {
    expect(stripCodeFences('{"a":1}')).toBe('{"a":1}');
  });
});

describe('findJsonValueEnd', () => {
  it('should find the matching close brace', () => {
    const text = 'x {"a":{"b":1}} y';
    expect(findJsonValueEnd(text, 2)).toBe(15);
  });

  it('should ignore braces inside strings', () => {
    const text = '{"a":"}{"}';
    expect(findJsonValueEnd(text, 0)).toBe(text.length);
  });

  it('should return -1 for an unterminated object', () => {
    expect(findJsonValueEnd('{"a":1', 0)).toBe(-1);
  });
});

// ============================================================================
// PARSER TESTS
// ============================================================================

describe('parseItineraryResponseDetailed', () => {
  it('should parse a plain JSON reply as whole text', () => {
    const outcome = parseItineraryResponseDetailed(ONE_DAY_JSON, 1);
    expect(outcome.strategy).toBe('whole_text');
    expect(outcome.itinerary).toEqual(ONE_DAY);
    expect(outcome.failures).toEqual([]);
  });

  it('should parse a fenced reply', () => {
    const outcome = parseItineraryResponseDetailed('```json\n' + ONE_DAY_JSON + '\n```', 1);
    expect(outcome.strategy).toBe('whole_text');
    expect(outcome.itinerary).toEqual(ONE_DAY);
  });

  it('should extract an object surrounded by prose and trailing garbage', () => {
    const reply = `好的，以下是您的行程：\n${ONE_DAY_JSON}\n祝您旅途愉快！}`;
    const outcome = parseItineraryResponseDetailed(reply, 1);
    expect(outcome.strategy).toBe('embedded_object');
    expect(outcome.itinerary).toEqual(ONE_DAY);
    expect(outcome.failures.map((f) => f.strategy)).toEqual(['whole_text']);
  });

  it('should skip a stray brace in the prose before the object', () => {
    const reply = 'note {broken\n{"day_1":{"theme":"a}b"}}';
    const outcome = parseItineraryResponseDetailed(reply, 1);
    expect(outcome.strategy).toBe('embedded_object');
    expect(outcome.itinerary).toEqual({ day_1: { theme: 'a}b' } });
  });

  it('should fall back to the default itinerary for unparseable text', () => {
    const outcome = parseItineraryResponseDetailed('not json at all', 3);
    expect(outcome.strategy).toBeNull();
    expect(outcome.failures).toHaveLength(3);
    expect(Object.keys(outcome.itinerary)).toEqual(['day_1', 'day_2', 'day_3']);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('should reject a top-level array', () => {
    const outcome = parseItineraryResponseDetailed('[1, 2]', 2);
    expect(outcome.strategy).toBeNull();
    expect(outcome.itinerary).toEqual(buildDefaultItinerary(2));
  });

  it('should treat null and empty replies as unparseable', () => {
    expect(parseItineraryResponse(null, 1)).toEqual(buildDefaultItinerary(1));
    expect(parseItineraryResponse('', 1)).toEqual(buildDefaultItinerary(1));
  });
});

describe('buildDefaultItinerary', () => {
  it('should build one empty day per trip day', () => {
    expect(buildDefaultItinerary(2)).toEqual({
      day_1: { theme: '第1天行程', schedule: { morning: [], afternoon: [], evening: [] }, tips: '' },
      day_2: { theme: '第2天行程', schedule: { morning: [], afternoon: [], evening: [] }, tips: '' },
    });
  });
});
