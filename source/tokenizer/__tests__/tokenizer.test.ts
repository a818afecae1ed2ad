import {describe, it, expect} from 'vitest';
import {FakeSegmenter} from '../../__tests__/helpers.js';
import {JiebaSegmenter, TokenizerState} from '../index.js';

describe('TokenizerState', () => {
	it('learns a term so it is no longer split', async () => {
		const segmenter = new FakeSegmenter();
		const tokenizer = new TokenizerState(segmenter);

		expect(await tokenizer.segment('客户号')).toEqual(['客', '户', '号']);

		expect(await tokenizer.learn('客户号')).toBe(true);
		expect(await tokenizer.segment('客户号')).toEqual(['客户号']);
		expect(tokenizer.hasLearned('客户号')).toBe(true);
	});

	it('refuses empty and whitespace-bearing terms', async () => {
		const tokenizer = new TokenizerState(new FakeSegmenter());

		expect(await tokenizer.learn('   ')).toBe(false);
		expect(await tokenizer.learn('客户 号')).toBe(false);
		expect(tokenizer.learnedCount).toBe(0);
	});

	it('warms up from a list of names', async () => {
		const tokenizer = new TokenizerState(new FakeSegmenter());

		expect(await tokenizer.warmUp(['客户', '', '账户'])).toBe(2);
		expect(tokenizer.learnedCount).toBe(2);
	});
});

describe('JiebaSegmenter', () => {
	it('keeps a learned vocabulary term as one token', async () => {
		const tokenizer = new TokenizerState(new JiebaSegmenter());
		const term = '琛瑜枢';

		expect(await tokenizer.segment(term)).not.toEqual([term]);

		await tokenizer.learn(term);

		expect(await tokenizer.segment(term)).toEqual([term]);
		expect(await tokenizer.segment(`${term}编号`)).toContain(term);
	});

	it('emits inner words in search mode', async () => {
		const segmenter = new JiebaSegmenter();
		const precise = segmenter.cut('中华人民共和国', 'precise');
		const search = segmenter.cut('中华人民共和国', 'search');

		expect(precise.join('')).toBe('中华人民共和国');
		expect(search.length).toBeGreaterThan(precise.length);
	});
});
