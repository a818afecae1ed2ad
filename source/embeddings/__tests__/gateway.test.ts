import {describe, it, expect} from 'vitest';
import {EmbeddingError} from '../../lib/errors.js';
import {EmbeddingGateway} from '../gateway.js';
import {MockEmbeddingProvider, hashCodePoints} from '../mock.js';
import type {EmbeddingProvider} from '../types.js';

/**
 * Provider that records how many calls overlap.
 */
class OverlapTracker implements EmbeddingProvider {
	readonly dimensions = 4;
	active = 0;
	peak = 0;

	async initialize(): Promise<void> {}

	async embed(texts: string[]): Promise<number[][]> {
		this.active++;
		this.peak = Math.max(this.peak, this.active);
		await new Promise(resolve => setTimeout(resolve, 5));
		this.active--;
		return texts.map(() => [1, 0, 0, 0]);
	}

	async embedSingle(): Promise<number[]> {
		return [1, 0, 0, 0];
	}

	close(): void {}
}

class ShortBatchProvider extends OverlapTracker {
	override async embed(): Promise<number[][]> {
		return [[1, 0, 0, 0]];
	}
}

describe('EmbeddingGateway', () => {
	it('never runs two model calls at once', async () => {
		const tracker = new OverlapTracker();
		const gateway = new EmbeddingGateway(tracker);

		await Promise.all([
			gateway.embed(['a']),
			gateway.embed(['b', 'c']),
			gateway.embedSingle('d'),
		]);

		expect(tracker.peak).toBe(1);
		expect(gateway.pendingCount).toBe(0);
	});

	it('returns one vector per text in order', async () => {
		const gateway = new EmbeddingGateway(new MockEmbeddingProvider(16));
		const provider = new MockEmbeddingProvider(16);

		const vectors = await gateway.embed(['客户', '账户']);

		expect(vectors).toEqual(await provider.embed(['客户', '账户']));
		expect(vectors[0]).toHaveLength(16);
	});

	it('skips the model for an empty batch', async () => {
		const tracker = new OverlapTracker();
		const gateway = new EmbeddingGateway(tracker);

		expect(await gateway.embed([])).toEqual([]);
		expect(tracker.peak).toBe(0);
	});

	it('rejects a batch with the wrong number of vectors', async () => {
		const gateway = new EmbeddingGateway(new ShortBatchProvider());

		await expect(gateway.embed(['a', 'b'])).rejects.toThrow(
			'Embedding model returned 1 vectors for 2 texts',
		);
	});

	it('wraps model failures in EmbeddingError', async () => {
		const gateway = new EmbeddingGateway({
			dimensions: 4,
			async initialize() {},
			async embed() {
				throw new Error('out of memory');
			},
			async embedSingle() {
				return [];
			},
			close() {},
		});

		const error = await gateway.embed(['a']).catch((e: unknown) => e);
		expect(error).toBeInstanceOf(EmbeddingError);
		expect(error).toHaveProperty('message', 'Embedding failed: out of memory');
	});
});

describe('MockEmbeddingProvider', () => {
	it('is deterministic and unit length', async () => {
		const provider = new MockEmbeddingProvider(32);
		const [a] = await provider.embed(['客户编号']);
		const b = await provider.embedSingle('客户编号');

		expect(a).toEqual(b);
		const norm = Math.sqrt(b.reduce((sum, v) => sum + v * v, 0));
		expect(norm).toBeCloseTo(1, 6);
	});

	it('hashes supplementary-plane characters as whole code points', async () => {
		expect(hashCodePoints('\u{20000}')).toBe(137518367);

		const provider = new MockEmbeddingProvider(16);
		const [a, b] = await provider.embed(['\u{20000}', '\u{20001}']);
		expect(a).not.toEqual(b);
	});
});
