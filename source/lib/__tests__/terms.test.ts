import {describe, it, expect} from 'vitest';
import {normalizeTerms, splitTerms} from '../terms.js';

describe('normalizeTerms', () => {
	it('collapses commas and whitespace to single spaces', () => {
		expect(normalizeTerms('客户号, 客户编码，  custNo')).toBe(
			'客户号 客户编码 custNo',
		);
	});

	it('trims the ends', () => {
		expect(normalizeTerms('  账户 ')).toBe('账户');
	});

	it('returns undefined when nothing is left', () => {
		expect(normalizeTerms(' ,， ')).toBeUndefined();
		expect(normalizeTerms(null)).toBeUndefined();
		expect(normalizeTerms(undefined)).toBeUndefined();
	});
});

describe('splitTerms', () => {
	it('splits on every separator', () => {
		expect(splitTerms('a,b，c\td  e')).toEqual(['a', 'b', 'c', 'd', 'e']);
	});
});
