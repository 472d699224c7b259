import { describe, it, expect } from 'vitest';
import { RESTAURANT_FALLBACK_COST, SPOT_FALLBACK_COST, estimateCost, extractAmount } from './costEstimate';

describe('extractAmount', () => {
  it('should take the first number', () => {
    expect(extractAmount('人均80-120')).toBe(80);
    expect(extractAmount('约35.5元')).toBe(35.5);
  });

  it('should read free entry as zero', () => {
    expect(extractAmount('免费')).toBe(0);
    expect(extractAmount('Free admission')).toBe(0);
  });

  it('should return null without a number', () => {
    expect(extractAmount('以现场为准')).toBeNull();
  });
});

describe('estimateCost', () => {
  describe('restaurants', () => {
    it('should use a price range text', () => {
      expect(estimateCost({ price_range: '人均80-120' }, 'restaurant')).toEqual({ label: '人均80-120', amount: 80 });
    });

    it('should label a numeric price range', () => {
      expect(estimateCost({ price_range: 95 }, 'restaurant')).toEqual({ label: '人均95元', amount: 95 });
    });

    it('should fall back to the default estimate', () => {
      expect(estimateCost({ name: '小吃店' }, 'restaurant')).toEqual(RESTAURANT_FALLBACK_COST);
    });
  });

  describe('spots', () => {
    it('should read free tickets', () => {
      expect(estimateCost({ ticket_price: '免费' }, 'spot')).toEqual({ label: '免费', amount: 0 });
    });

    it('should label a numeric ticket price', () => {
      expect(estimateCost({ ticket_price: 60 }, 'spot')).toEqual({ label: '门票60元', amount: 60 });
    });

    it('should keep a price text without a number', () => {
      expect(estimateCost({ price: '以现场为准' }, 'spot')).toEqual({ label: '以现场为准', amount: null });
    });

    it('should fall back when no price field is set', () => {
      expect(estimateCost({ ticket_price: '' }, 'spot')).toEqual(SPOT_FALLBACK_COST);
    });
  });
});
