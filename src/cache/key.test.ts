import { describe, test, expect } from 'vitest';
import { canonicalStringify, makeFilterCacheKey } from './key.js';

describe('Filter cache key generation', () => {
  describe('canonicalStringify', () => {
    test('should handle primitives consistently', () => {
      expect(canonicalStringify(null)).toBe('null');
      expect(canonicalStringify(undefined)).toBe('undefined');
      expect(canonicalStringify(42)).toBe('42');
      expect(canonicalStringify('hello')).toBe('"hello"');
      expect(canonicalStringify(true)).toBe('true');
    });

    test('should sort object keys deterministically', () => {
      expect(canonicalStringify({ b: 2, a: 1, c: 3 })).toBe('{"a":1,"b":2,"c":3}');
      expect(canonicalStringify({ c: 3, b: 2, a: 1 })).toBe('{"a":1,"b":2,"c":3}');
    });

    test('should handle nested objects and keep array order', () => {
      const obj = {
        outer: { z: 26, a: { nested: true, value: 42 } },
        array: [3, 1, { b: 2, a: 1 }],
      };

      expect(canonicalStringify(obj)).toBe('{"array":[3,1,{"a":1,"b":2}],"outer":{"a":{"nested":true,"value":42},"z":26}}');
    });
  });

  describe('makeFilterCacheKey', () => {
    const base = {
      templateId: 'plan-template',
      endpoint: 'http://example.com/dtj/api/plan',
      method: 'POST',
      sourceId: 1161,
      params: { date: '2025-01-01', periodType: 11 },
      fields: ['cls', 'year'],
    };

    test('should produce a sha256 hex digest', () => {
      expect(makeFilterCacheKey(base)).toMatch(/^[0-9a-f]{64}$/);
    });

    test('should ignore param key order, field order and method case', () => {
      const reordered = {
        ...base,
        method: 'post',
        params: { periodType: 11, date: '2025-01-01' },
        fields: ['year', 'cls', 'year'],
      };

      expect(makeFilterCacheKey(reordered)).toBe(makeFilterCacheKey(base));
    });

    test('should differ when any part of the signature differs', () => {
      const key = makeFilterCacheKey(base);

      expect(makeFilterCacheKey({ ...base, templateId: 'other' })).not.toBe(key);
      expect(makeFilterCacheKey({ ...base, sourceId: 1162 })).not.toBe(key);
      expect(makeFilterCacheKey({ ...base, params: { date: '2026-01-01', periodType: 11 } })).not.toBe(key);
      expect(makeFilterCacheKey({ ...base, fields: ['cls'] })).not.toBe(key);
      expect(makeFilterCacheKey({ ...base, endpoint: 'http://example.com/dtj/api/fact' })).not.toBe(key);
    });
  });
});
