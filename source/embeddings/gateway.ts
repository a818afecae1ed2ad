/**
 * Embedding Gateway - serialized access to a single embedding model.
 *
 * The model instance is stateful and not re-entrant, so every call (single
 * or batch) runs through a one-slot queue. The slot covers only the
 * inference call; callers do their store and index I/O after it resolves.
 */

import pLimit, {type LimitFunction} from 'p-limit';
import {EmbeddingError} from '../lib/errors.js';
import type {EmbeddingProvider} from './types.js';

export class EmbeddingGateway {
	private readonly limit: LimitFunction = pLimit(1);

	constructor(private readonly provider: EmbeddingProvider) {}

	get dimensions(): number {
		return this.provider.dimensions;
	}

	/** Calls waiting for the model. */
	get pendingCount(): number {
		return this.limit.pendingCount;
	}

	/**
	 * Embed a batch of texts.
	 * @returns One vector per text, in input order
	 * @throws EmbeddingError if the model fails or returns a mismatched batch
	 */
	async embed(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) return [];

		const vectors = await this.limit(() => this.invoke(texts));

		if (vectors.length !== texts.length) {
			throw new EmbeddingError(
				`Embedding model returned ${vectors.length} vectors for ${texts.length} texts`,
			);
		}
		for (const vector of vectors) {
			if (vector.length !== this.provider.dimensions) {
				throw new EmbeddingError(
					`Embedding has ${vector.length} dimensions, expected ${this.provider.dimensions}`,
				);
			}
		}
		return vectors;
	}

	/**
	 * Embed a single text.
	 */
	async embedSingle(text: string): Promise<number[]> {
		const [vector] = await this.embed([text]);
		if (!vector) {
			throw new EmbeddingError('Embedding model returned no vector');
		}
		return vector;
	}

	private async invoke(texts: string[]): Promise<number[][]> {
		try {
			return await this.provider.embed(texts);
		} catch (error) {
			if (error instanceof EmbeddingError) throw error;
			throw new EmbeddingError(
				`Embedding failed: ${error instanceof Error ? error.message : String(error)}`,
				error,
			);
		}
	}
}
