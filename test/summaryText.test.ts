import { describe, expect, it } from 'vitest';
import { ValidationError } from '../src/utils/ErrorHandler.js';
import {
  buildSummaryText,
  fitSummaryText,
  formatArtistList,
  formatPeriodLabel,
  textLength
} from '../src/utils/SummaryText.js';
import { ARTISTS } from './helpers.js';

const JUNE_2026 = new Date(2026, 5, 1);

describe('formatPeriodLabel', () => {
  it('maps each period to its label', () => {
    expect(formatPeriodLabel('overall')).toBe('All-Time');
    expect(formatPeriodLabel('7day')).toBe('Weekly');
    expect(formatPeriodLabel('1month')).toBe('Monthly');
    expect(formatPeriodLabel('3month')).toBe('Quarterly');
    expect(formatPeriodLabel('6month')).toBe('Semi-Annual');
  });

  it('shows 12month as the current year', () => {
    expect(formatPeriodLabel('12month', JUNE_2026)).toBe('2026');
    expect(formatPeriodLabel('12month')).toBe(String(new Date().getFullYear()));
  });

  it('rejects an unknown period', () => {
    expect(() => formatPeriodLabel('yearly')).toThrow(ValidationError);
    expect(() => formatPeriodLabel('yearly')).toThrow('Período desconocido: "yearly"');
  });
});

describe('formatArtistList', () => {
  it('returns an empty string for no entries', () => {
    expect(formatArtistList([])).toBe('');
  });

  it('renders a single entry without separators', () => {
    expect(formatArtistList([{ name: 'Solo', playCount: 7 }])).toBe('Solo (7)');
  });

  it('joins two entries with an ampersand', () => {
    expect(formatArtistList(ARTISTS.slice(0, 2))).toBe('Artist A (50) & Artist B (30)');
  });

  it('joins the rest with commas and the last one with an ampersand', () => {
    expect(formatArtistList(ARTISTS)).toBe('Artist A (50), Artist B (30) & Artist C (10)');
  });

  it('uses a single ampersand right before the last entry', () => {
    for (let count = 2; count <= 6; count++) {
      const entries = Array.from({ length: count }, (_, i) => ({ name: `Band ${i}`, playCount: 100 - i }));
      const text = formatArtistList(entries);

      expect(text.split(', ').length - 1).toBe(count - 2);
      expect(text.split(' & ').length - 1).toBe(1);
      expect(text.endsWith(` & Band ${count - 1} (${101 - count})`)).toBe(true);
    }
  });
});

describe('buildSummaryText', () => {
  it('builds the weekly summary', () => {
    expect(buildSummaryText(ARTISTS, '7day', JUNE_2026))
      .toBe('♪ My Weekly Top 3 artists: Artist A (50), Artist B (30) & Artist C (10)');
  });

  it('uses the year for 12month', () => {
    expect(buildSummaryText(ARTISTS.slice(0, 1), '12month', JUNE_2026))
      .toBe('♪ My 2026 Top 1 artists: Artist A (50)');
  });

  it('is empty when there are no entries', () => {
    expect(buildSummaryText([], '7day')).toBe('');
  });

  it('rejects an unknown period', () => {
    expect(() => buildSummaryText(ARTISTS, 'fortnight')).toThrow(ValidationError);
  });
});

describe('fitSummaryText', () => {
  const full = '♪ My Weekly Top 3 artists: Artist A (50), Artist B (30) & Artist C (10)';

  it('keeps the full text when it fits', () => {
    expect(textLength(full)).toBe(71);
    expect(fitSummaryText(ARTISTS, '7day', 71)).toBe(full);
  });

  it('drops artists from the end until the text fits', () => {
    expect(fitSummaryText(ARTISTS, '7day', 70)).toBe('♪ My Weekly Top 2 artists: Artist A (50) & Artist B (30)');
    expect(fitSummaryText(ARTISTS, '7day', 55)).toBe('♪ My Weekly Top 1 artists: Artist A (50)');
  });

  it('returns null when not even one artist fits', () => {
    expect(fitSummaryText(ARTISTS, '7day', 39)).toBeNull();
  });

  it('measures with the given function', () => {
    const doubled = (text: string): number => textLength(text) * 2;

    expect(fitSummaryText(ARTISTS, '7day', 112, new Date(), doubled)).toBe('♪ My Weekly Top 2 artists: Artist A (50) & Artist B (30)');
    expect(fitSummaryText(ARTISTS, '7day', 79, new Date(), doubled)).toBeNull();
  });

  it('counts code points, not UTF-16 units', () => {
    expect(textLength('♪ 🎸')).toBe(3);
  });
});
