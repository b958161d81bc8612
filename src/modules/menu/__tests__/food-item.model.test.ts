import { describe, it, expect } from 'vitest';
import { dietaryInfo, priceCategory } from '../food-item.model.js';

describe('food-item.model', () => {
  describe('priceCategory', () => {
    it('puts amounts below 10.00 in Budget', () => {
      expect(priceCategory({ price: 100 })).toBe('Budget');
      expect(priceCategory({ price: 999 })).toBe('Budget');
    });

    it('puts 10.00 through 25.00 in Mid-range', () => {
      expect(priceCategory({ price: 1000 })).toBe('Mid-range');
      expect(priceCategory({ price: 2500 })).toBe('Mid-range');
    });

    it('puts amounts above 25.00 in Premium', () => {
      expect(priceCategory({ price: 2501 })).toBe('Premium');
      expect(priceCategory({ price: 10000 })).toBe('Premium');
    });
  });

  describe('dietaryInfo', () => {
    it('lists Vegetarian before Spicy', () => {
      expect(dietaryInfo({ isVegetarian: true, isSpicy: true })).toEqual(['Vegetarian', 'Spicy']);
    });

    it('lists only the flags that are set', () => {
      expect(dietaryInfo({ isVegetarian: false, isSpicy: true })).toEqual(['Spicy']);
      expect(dietaryInfo({ isVegetarian: true, isSpicy: false })).toEqual(['Vegetarian']);
      expect(dietaryInfo({ isVegetarian: false, isSpicy: false })).toEqual([]);
    });
  });
});
