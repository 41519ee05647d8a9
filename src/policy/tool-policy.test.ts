/**
 * Tests for allow-list glob matching.
 */

import { describe, it, expect } from 'vitest';
import { globMatch, isWildcard, matchesAnyPattern } from './tool-policy.js';

describe('globMatch', () => {
  it('matches exact names', () => {
    expect(globMatch('polygon_news', 'polygon_news')).toBe(true);
    expect(globMatch('polygon_news', 'polygon_news_extra')).toBe(false);
  });

  it('supports trailing wildcards', () => {
    expect(globMatch('polygon_*', 'polygon_crypto_rsi')).toBe(true);
    expect(globMatch('polygon_*', 'binance_get_price')).toBe(false);
  });

  it('supports inner wildcards', () => {
    expect(globMatch('binance_*_tool_notes', 'binance_save_tool_notes')).toBe(true);
    expect(globMatch('binance_*_tool_notes', 'binance_read_tool_notes')).toBe(true);
    expect(globMatch('binance_*_tool_notes', 'binance_trading_notes')).toBe(false);
  });

  it('treats regex metacharacters literally', () => {
    expect(globMatch('a.b*', 'a.bc')).toBe(true);
    expect(globMatch('a.b*', 'axbc')).toBe(false);
  });

  it('anchors the whole name', () => {
    expect(globMatch('news*', 'polygon_news')).toBe(false);
  });
});

describe('isWildcard', () => {
  it('detects the star', () => {
    expect(isWildcard('polygon_*')).toBe(true);
    expect(isWildcard('polygon_news')).toBe(false);
  });
});

describe('matchesAnyPattern', () => {
  it('returns true when one pattern matches', () => {
    expect(matchesAnyPattern('Read', ['polygon_*', 'Read'])).toBe(true);
  });

  it('returns false for an empty list', () => {
    expect(matchesAnyPattern('Read', [])).toBe(false);
  });
});
