import { describe, it, expect } from 'vitest';
import { clamp, sum, toCount, toStringValue } from '../lib/utils.js';

describe('utils', () => {
	describe('clamp', () => {
		it('keeps values inside the range', () => {
			expect(clamp(5, 0, 10)).toBe(5);
			expect(clamp(-3, 0, 10)).toBe(0);
			expect(clamp(42, 0, 10)).toBe(10);
		});

		it('collapses non-finite input to the minimum', () => {
			expect(clamp(Number.NaN, 1, 10)).toBe(1);
			expect(clamp(Number.POSITIVE_INFINITY, 1, 10)).toBe(1);
		});
	});

	describe('toCount', () => {
		it('truncates fractions and negatives', () => {
			expect(toCount(3.9)).toBe(3);
			expect(toCount(-2)).toBe(0);
		});

		it('respects the upper bound', () => {
			expect(toCount(70_000, 65_535)).toBe(65_535);
		});
	});

	describe('sum', () => {
		it('adds values', () => {
			expect(sum([1, 2, 3])).toBe(6);
			expect(sum([])).toBe(0);
		});
	});

	describe('toStringValue', () => {
		it('returns strings unchanged', () => {
			expect(toStringValue('hello')).toBe('hello');
		});

		it('renders null and undefined as empty', () => {
			expect(toStringValue(null)).toBe('');
			expect(toStringValue(undefined)).toBe('');
		});

		it('renders numbers and booleans', () => {
			expect(toStringValue(42)).toBe('42');
			expect(toStringValue(false)).toBe('false');
		});

		it('renders dates as ISO strings', () => {
			expect(toStringValue(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
		});

		it('uses a custom toString', () => {
			const value = { toString: () => 'custom' };
			expect(toStringValue(value)).toBe('custom');
		});

		it('serializes plain objects and arrays as JSON', () => {
			expect(toStringValue({ a: 1 })).toBe('{"a":1}');
			expect(toStringValue([1, 'b'])).toBe('[1,"b"]');
		});
	});
});
