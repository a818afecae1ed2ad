/**
 * Shared test helpers: in-process stand-ins for the vector index,
 * segmenter and embedding model.
 */

import {EmbeddingGateway} from '../embeddings/gateway.js';
import {MockEmbeddingProvider} from '../embeddings/mock.js';
import type {EmbeddingProvider} from '../embeddings/types.js';
import type {CollectionName} from '../lib/constants.js';
import {createNullLogger, type Logger} from '../lib/logger.js';
import {SqliteVocabularyStore} from '../store/sqlite.js';
import {VocabularySynchronizer} from '../sync/synchronizer.js';
import type {SegmentMode, Segmenter} from '../tokenizer/index.js';
import {TokenizerState} from '../tokenizer/index.js';
import type {VectorHit, VectorIndex, VectorPoint} from '../vector/types.js';

export const TEST_DIMENSIONS = 8;

type IndexOperation =
	| 'upsert'
	| 'replaceAll'
	| 'deleteByIds'
	| 'deleteAll'
	| 'search';

/**
 * Vector index held in memory, recording every call.
 * Operations listed in `failing` reject.
 */
export class InMemoryVectorIndex implements VectorIndex {
	readonly collections = new Map<CollectionName, Map<number, VectorPoint>>();
	readonly calls: Array<{op: IndexOperation; collection: CollectionName}> =
		[];
	readonly failing = new Set<IndexOperation>();
	closed = false;

	async ensureCollection(collection: CollectionName): Promise<void> {
		if (!this.collections.has(collection)) {
			this.collections.set(collection, new Map());
		}
	}

	async upsert(collection: CollectionName, points: VectorPoint[]): Promise<void> {
		this.record('upsert', collection);
		const stored = this.points(collection);
		for (const point of points) stored.set(point.id, point);
	}

	async replaceAll(
		collection: CollectionName,
		points: VectorPoint[],
	): Promise<void> {
		this.record('replaceAll', collection);
		this.collections.set(collection, new Map(points.map(p => [p.id, p])));
	}

	async deleteByIds(collection: CollectionName, ids: number[]): Promise<void> {
		this.record('deleteByIds', collection);
		const points = this.points(collection);
		for (const id of ids) points.delete(id);
	}

	async deleteAll(collection: CollectionName): Promise<void> {
		this.record('deleteAll', collection);
		this.points(collection).clear();
	}

	async search(
		collection: CollectionName,
		vector: number[],
		k: number,
	): Promise<VectorHit[]> {
		this.record('search', collection);
		return [...this.points(collection).values()]
			.map(point => ({
				id: point.id,
				score: dot(vector, point.vector),
				payload: point.payload,
			}))
			.sort((a, b) => b.score - a.score)
			.slice(0, k);
	}

	async count(collection: CollectionName): Promise<number> {
		return this.points(collection).size;
	}

	close(): void {
		this.closed = true;
	}

	ids(collection: CollectionName): number[] {
		return [...this.points(collection).keys()].sort((a, b) => a - b);
	}

	callsTo(op: IndexOperation): number {
		return this.calls.filter(c => c.op === op).length;
	}

	private record(op: IndexOperation, collection: CollectionName): void {
		this.calls.push({op, collection});
		if (this.failing.has(op)) {
			throw new Error(`${op} unavailable`);
		}
	}

	private points(collection: CollectionName): Map<number, VectorPoint> {
		let points = this.collections.get(collection);
		if (!points) {
			points = new Map();
			this.collections.set(collection, points);
		}
		return points;
	}
}

function dot(a: number[], b: number[]): number {
	let sum = 0;
	for (let i = 0; i < a.length; i++) sum += (a[i] ?? 0) * (b[i] ?? 0);
	return sum;
}

/**
 * Longest-match segmenter over a small word list; unknown characters
 * come out one at a time.
 */
export class FakeSegmenter implements Segmenter {
	readonly words = new Set<string>();
	readonly cuts: string[] = [];

	constructor(words: string[] = []) {
		for (const word of words) this.words.add(word);
	}

	cut(text: string, _mode: SegmentMode): string[] {
		this.cuts.push(text);
		const chars = [...text];
		const tokens: string[] = [];
		let i = 0;
		while (i < chars.length) {
			let match = chars[i] ?? '';
			for (let j = chars.length; j > i + 1; j--) {
				const candidate = chars.slice(i, j).join('');
				if (this.words.has(candidate)) {
					match = candidate;
					break;
				}
			}
			tokens.push(match);
			i += [...match].length;
		}
		return tokens;
	}

	addWord(word: string): void {
		this.words.add(word);
	}
}

/**
 * Provider whose model always fails, counting attempts.
 */
export class FailingEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions = TEST_DIMENSIONS;
	calls = 0;

	async initialize(): Promise<void> {}

	async embed(): Promise<number[][]> {
		this.calls++;
		throw new Error('model offline');
	}

	async embedSingle(): Promise<number[]> {
		this.calls++;
		throw new Error('model offline');
	}

	close(): void {}
}

export interface SyncFixture {
	store: SqliteVocabularyStore;
	index: InMemoryVectorIndex;
	segmenter: FakeSegmenter;
	tokenizer: TokenizerState;
	gateway: EmbeddingGateway;
	sync: VocabularySynchronizer;
}

/**
 * Synchronizer over an in-memory SQLite store and the fakes above.
 */
export function createSyncFixture(
	options: {
		provider?: EmbeddingProvider;
		enforceReferences?: boolean;
		logger?: Logger;
	} = {},
): SyncFixture {
	const store = SqliteVocabularyStore.open(':memory:');
	const index = new InMemoryVectorIndex();
	const segmenter = new FakeSegmenter();
	const tokenizer = new TokenizerState(segmenter);
	const gateway = new EmbeddingGateway(
		options.provider ?? new MockEmbeddingProvider(TEST_DIMENSIONS),
	);
	const sync = new VocabularySynchronizer({
		store,
		gateway,
		index,
		tokenizer,
		logger: options.logger ?? createNullLogger(),
		enforceReferences: options.enforceReferences,
	});
	return {store, index, segmenter, tokenizer, gateway, sync};
}
