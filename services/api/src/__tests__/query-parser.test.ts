import { describe, it, expect } from '@jest/globals';
import {
  parseQuery,
  parseBudget,
  parseBedroomCount,
  findCity,
  CITY_KEYWORDS,
} from '../services/query-parser.js';

const PUNE_KEYWORDS = ['pune', 'pimpri', 'chinchwad', 'wakad', 'hinjewadi', 'mamurdi'];

describe('Query Parser', () => {
  describe('parseQuery', () => {
    it('extracts every filter from a typical query', () => {
      expect(parseQuery('3BHK flat in Pune under ₹1.2 Cr')).toEqual({
        bedroomCount: 3,
        maxBudget: 12_000_000,
        city: 'pune',
        cityKeywords: PUNE_KEYWORDS,
        propertyType: 'apartment',
      });
    });

    it('is deterministic for the same text', () => {
      const first = parseQuery('2BHK in Mumbai ready to move under 80 lakh');
      const second = parseQuery('2BHK in Mumbai ready to move under 80 lakh');
      expect(second).toEqual(first);
      expect(second).not.toBe(first);
    });

    it('returns no filters when nothing is recognised', () => {
      expect(parseQuery('show me something nice')).toEqual({});
    });

    it('is case-insensitive', () => {
      expect(parseQuery('2bhk in MUMBAI')).toEqual(parseQuery('2BHK in mumbai'));
    });
  });

  describe('bedroom count', () => {
    it('accepts an optional space before BHK', () => {
      expect(parseBedroomCount('3 bhk')).toBe(3);
      expect(parseBedroomCount('3bhk')).toBe(3);
    });

    it('uses the first occurrence', () => {
      expect(parseBedroomCount('2bhk or 3bhk')).toBe(2);
    });

    it('is absent without a BHK token', () => {
      expect(parseBedroomCount('villa in goa')).toBeUndefined();
    });
  });

  describe('budget', () => {
    it('parses crore amounts with a rupee sign and decimals', () => {
      expect(parseQuery('₹1.2 Cr').maxBudget).toBe(12_000_000);
      expect(parseBudget('2 crores')).toBe(20_000_000);
    });

    it('parses lakh amounts', () => {
      expect(parseQuery('80 lakh').maxBudget).toBe(8_000_000);
      expect(parseBudget('45 lacs')).toBe(4_500_000);
    });

    it('parses the short lakh form', () => {
      expect(parseBudget('budget 75l')).toBe(7_500_000);
      expect(parseBudget('budget 75 l')).toBe(7_500_000);
    });

    it('parses millions', () => {
      expect(parseBudget('1.5 million')).toBe(15_000_000);
    });

    it('strips thousands separators', () => {
      expect(parseBudget('2,500 lakhs')).toBe(250_000_000);
    });

    it('prefers crore over lakh regardless of position in the text', () => {
      expect(parseBudget('2 crore or 50 lakh')).toBe(20_000_000);
      expect(parseBudget('50 lakh or 2 crore')).toBe(20_000_000);
    });

    it('is absent without a budget token', () => {
      expect(parseBudget('3bhk in pune')).toBeUndefined();
    });
  });

  describe('city', () => {
    it('maps a locality alias to its canonical city and keeps all keywords', () => {
      const filters = parseQuery('flat in Chembur');
      expect(filters.city).toBe('mumbai');
      expect(filters.cityKeywords).toContain('chembur');
      expect(filters.cityKeywords).toContain('mumbai');
      expect(filters.cityKeywords).toContain('thane');
    });

    it('recognises multi-word aliases', () => {
      expect(findCity('near electronic city')?.city).toBe('bangalore');
      expect(findCity('salt lake sector 5')?.city).toBe('kolkata');
    });

    it('follows table order rather than text order', () => {
      expect(parseQuery('mumbai or pune').city).toBe('pune');
    });

    it('covers the seven supported cities', () => {
      expect(CITY_KEYWORDS.map((entry) => entry.city)).toEqual([
        'pune',
        'mumbai',
        'bangalore',
        'delhi',
        'hyderabad',
        'chennai',
        'kolkata',
      ]);
    });
  });

  describe('status', () => {
    it('detects ready-to-move queries', () => {
      expect(parseQuery('ready to move flat').status).toBe('ready');
      expect(parseQuery('immediate possession').status).toBe('ready');
    });

    it('detects under-construction queries', () => {
      expect(parseQuery('under construction in thane').status).toBe('under_construction');
      expect(parseQuery('upcoming launches').status).toBe('under_construction');
    });

    it('lets ready win when both are present', () => {
      expect(parseQuery('upcoming or ready').status).toBe('ready');
    });
  });

  describe('property type', () => {
    it('checks apartment, then villa, then plot', () => {
      expect(parseQuery('flat or villa').propertyType).toBe('apartment');
      expect(parseQuery('villa with a plot').propertyType).toBe('villa');
      expect(parseQuery('plot in mamurdi').propertyType).toBe('plot');
    });
  });

  describe('furnishing', () => {
    it('parses unfurnished as UNFURNISHED, not FURNISHED', () => {
      expect(parseQuery('unfurnished 2BHK').furnishing).toBe('UNFURNISHED');
    });

    it('parses semi-furnished', () => {
      expect(parseQuery('semi-furnished flat').furnishing).toBe('SEMI-FURNISHED');
      expect(parseQuery('semi furnished flat').furnishing).toBe('SEMI-FURNISHED');
    });

    it('parses plain furnished', () => {
      expect(parseQuery('fully furnished flat').furnishing).toBe('FURNISHED');
    });

    it('ignores "semi" without "furnished"', () => {
      expect(parseQuery('semi detached').furnishing).toBeUndefined();
    });
  });
});
