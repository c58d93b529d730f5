/**
 * Unit tests for page decoding and page URL construction
 */

import { describe, it, expect } from 'vitest';
import { buildPageUrl, decodePage, isRecord, parseJson } from './page-decoder.js';

describe('decodePage()', () => {
  it('should decode items and cursor', () => {
    const body = JSON.stringify({ data: { items: [{ id: 'g1' }], next_cursor: 'c1' } });

    expect(decodePage<{ id: string }>(body)).toEqual({
      items: [{ id: 'g1' }],
      nextCursor: 'c1',
    });
  });

  it('should treat a missing or null cursor as the last page', () => {
    expect(decodePage('{"data":{"items":[1]}}')).toEqual({ items: [1], nextCursor: null });
    expect(decodePage('{"data":{"items":[1],"next_cursor":null}}')).toEqual({
      items: [1],
      nextCursor: null,
    });
  });

  it('should treat a blank or non-string cursor as the last page', () => {
    expect(decodePage('{"data":{"items":[],"next_cursor":"   "}}')?.nextCursor).toBeNull();
    expect(decodePage('{"data":{"items":[],"next_cursor":42}}')?.nextCursor).toBeNull();
  });

  it('should decode missing or null items as an empty page', () => {
    expect(decodePage('{"data":{"next_cursor":"c1"}}')).toEqual({ items: [], nextCursor: 'c1' });
    expect(decodePage('{"data":{"items":null}}')).toEqual({ items: [], nextCursor: null });
  });

  it.each([
    ['an empty body', ''],
    ['invalid JSON', 'not json'],
    ['a JSON array', '[]'],
    ['a missing data object', '{"items":[]}'],
    ['a data array', '{"data":[]}'],
    ['non-array items', '{"data":{"items":"nope"}}'],
  ])('should return null for %s', (_label, body) => {
    expect(decodePage(body)).toBeNull();
  });
});

describe('buildPageUrl()', () => {
  it('should request the first page without a cursor', () => {
    expect(buildPageUrl('groups', 100, null)).toBe('groups?limit=100');
  });

  it('should URL-encode the cursor', () => {
    expect(buildPageUrl('groups', 100, 'a b/c')).toBe('groups?limit=100&cursor=a+b%2Fc');
    expect(buildPageUrl('groups', 100, 'eyJ0=')).toBe('groups?limit=100&cursor=eyJ0%3D');
  });

  it('should append to an endpoint that already has a query string', () => {
    expect(buildPageUrl('connectors?schema=public', 50, 'c1')).toBe(
      'connectors?schema=public&limit=50&cursor=c1'
    );
  });
});

describe('helpers', () => {
  it('isRecord() should accept plain objects only', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord('data')).toBe(false);
  });

  it('parseJson() should return undefined for invalid JSON', () => {
    expect(parseJson('{"a":1}')).toEqual({ a: 1 });
    expect(parseJson('{')).toBeUndefined();
  });
});
