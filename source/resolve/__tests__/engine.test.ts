import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import {FakeSegmenter} from '../../__tests__/helpers.js';
import {StoreError} from '../../lib/errors.js';
import {SqliteVocabularyStore} from '../../store/sqlite.js';
import type {WordRoot} from '../../store/types.js';
import {TokenizerState} from '../../tokenizer/index.js';
import {TermResolutionEngine, rankCandidates} from '../engine.js';

describe('TermResolutionEngine', () => {
	let store: SqliteVocabularyStore;
	let segmenter: FakeSegmenter;
	let engine: TermResolutionEngine;

	beforeEach(() => {
		store = SqliteVocabularyStore.open(':memory:');
		segmenter = new FakeSegmenter(['客户', '编号', '状态']);
		engine = new TermResolutionEngine(
			store.wordRoots,
			new TokenizerState(segmenter),
		);
	});

	afterEach(() => {
		store.close();
	});

	it('returns nothing for blank input', async () => {
		expect(await engine.suggest('')).toEqual([]);
		expect(await engine.suggest('   ')).toEqual([]);
		expect(segmenter.cuts).toEqual([]);
	});

	it('resolves the whole phrase without segmenting', async () => {
		store.wordRoots.insert({
			cnName: '客户号',
			enAbbr: 'cust_no',
			associatedTerms: '客户编号',
		});

		const segments = await engine.suggest(' 客户编号 ');

		expect(segments).toHaveLength(1);
		expect(segments[0]?.word).toBe('客户编号');
		expect(segments[0]?.candidates.map(c => c.cnName)).toEqual(['客户号']);
		expect(segmenter.cuts).toEqual([]);
	});

	it('segments when the phrase matches nothing, keeping unresolved tokens', async () => {
		store.wordRoots.insert({cnName: '客户', enAbbr: 'cust'});
		store.wordRoots.insert({cnName: '编号', enAbbr: 'no'});

		const segments = await engine.suggest('客户编号状态');

		expect(segmenter.cuts).toEqual(['客户编号状态']);
		expect(
			segments.map(s => [s.word, s.candidates.map(c => c.enAbbr)]),
		).toEqual([
			['客户', ['cust']],
			['编号', ['no']],
			['状态', []],
		]);
	});

	it('ranks the exact name first regardless of insertion order', async () => {
		store.wordRoots.insert({
			cnName: '顾客',
			enAbbr: 'cstmr',
			associatedTerms: '客户',
		});
		store.wordRoots.insert({cnName: '客户', enAbbr: 'cust'});
		store.wordRoots.insert({
			cnName: '买方',
			enAbbr: 'buyer',
			associatedTerms: '客户',
		});

		const [segment] = await engine.suggest('客户');

		expect(segment?.candidates.map(c => c.cnName)).toEqual([
			'客户',
			'买方',
			'顾客',
		]);
	});

	it('degrades a failing lookup to no candidates', async () => {
		vi.spyOn(store.wordRoots, 'findByTerm').mockImplementation(() => {
			throw new StoreError('database is locked');
		});

		expect(await engine.suggest('客户')).toEqual([
			{word: '客户', candidates: []},
		]);
	});
});

describe('rankCandidates', () => {
	const root = (id: number, cnName: string): WordRoot => ({
		id,
		cnName,
		enAbbr: 'x',
		enFullName: null,
		associatedTerms: null,
		remark: null,
		createdAt: '2024-01-01T00:00:00.000Z',
	});

	it('orders by code point after the exact match', () => {
		expect(
			rankCandidates('b', [root(1, 'c'), root(2, 'B'), root(3, 'b'), root(4, 'a')]).map(
				r => r.id,
			),
		).toEqual([3, 2, 4, 1]);
	});

	it('sorts supplementary-plane names after the BMP', () => {
		expect(
			rankCandidates('x', [root(1, '\u{20000}'), root(2, '\uFF21')]).map(r => r.id),
		).toEqual([2, 1]);
	});
});
