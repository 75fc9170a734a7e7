/**
 * Tests for Severity Aggregation
 */

import {
  aggregateSeverity,
  calculateCompatibilityScore,
  compareSeverity,
  filterBySeverity,
  isSeverity,
  meetsSeverity,
} from '../src/core/severity';
import { Severity, Violation } from '../src/core/types';

function violation(severity: Severity, name = 'Test'): Violation {
  return {
    name,
    description: name,
    severity,
    category: 'schema',
    context: 'schema: Test',
    schema: 'Test',
    path: '',
  };
}

describe('Severity', () => {
  test('orders breaking above warning above change', () => {
    expect(compareSeverity('breaking', 'warning')).toBeGreaterThan(0);
    expect(compareSeverity('warning', 'change')).toBeGreaterThan(0);
    expect(compareSeverity('change', 'breaking')).toBeLessThan(0);
    expect(compareSeverity('warning', 'warning')).toBe(0);
  });

  test('meetsSeverity includes the threshold', () => {
    expect(meetsSeverity('warning', 'warning')).toBe(true);
    expect(meetsSeverity('breaking', 'warning')).toBe(true);
    expect(meetsSeverity('change', 'warning')).toBe(false);
  });

  test('isSeverity accepts only known levels', () => {
    expect(isSeverity('breaking')).toBe(true);
    expect(isSeverity('info')).toBe(false);
  });

  // ─── Aggregation ──────────────────────────────────────────────────────

  describe('aggregateSeverity', () => {
    test('empty list is change', () => {
      expect(aggregateSeverity([])).toBe('change');
    });

    test('takes the most severe level', () => {
      expect(aggregateSeverity([violation('change'), violation('warning')])).toBe('warning');
      expect(
        aggregateSeverity([violation('warning'), violation('breaking'), violation('change')])
      ).toBe('breaking');
      expect(aggregateSeverity([violation('change'), violation('change')])).toBe('change');
    });
  });

  test('filterBySeverity keeps order', () => {
    const list = [
      violation('change', 'a'),
      violation('breaking', 'b'),
      violation('warning', 'c'),
      violation('breaking', 'd'),
    ];

    expect(filterBySeverity(list, 'warning').map((v) => v.name)).toEqual(['b', 'c', 'd']);
    expect(filterBySeverity(list, 'breaking').map((v) => v.name)).toEqual(['b', 'd']);
    expect(filterBySeverity(list, 'change')).toHaveLength(4);
  });

  // ─── Score ────────────────────────────────────────────────────────────

  describe('calculateCompatibilityScore', () => {
    test('is 100 without violations', () => {
      expect(calculateCompatibilityScore([])).toBe(100);
    });

    test('deducts per severity', () => {
      expect(
        calculateCompatibilityScore([violation('breaking'), violation('warning'), violation('change')])
      ).toBe(79);
    });

    test('never drops below zero', () => {
      const many = Array.from({ length: 8 }, () => violation('breaking'));
      expect(calculateCompatibilityScore(many)).toBe(0);
    });
  });
});
