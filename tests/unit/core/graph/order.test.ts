/**
 * Tests for identity ordering.
 */
import { describe, it, expect } from 'vitest';
import { compareIdentity, sortIdentities } from '../../../../src/core/graph/order.js';

describe('compareIdentity', () => {
  it('should order by code unit, upper case first', () => {
    expect(compareIdentity('B', 'a')).toBeLessThan(0);
    expect(compareIdentity('a', 'B')).toBeGreaterThan(0);
    expect(compareIdentity('x', 'x')).toBe(0);
  });
});

describe('sortIdentities', () => {
  it('should sort a copy of any iterable', () => {
    const input = new Set(['shared', 'Core', 'feature']);

    expect(sortIdentities(input)).toEqual(['Core', 'feature', 'shared']);
    expect([...input]).toEqual(['shared', 'Core', 'feature']);
  });
});
