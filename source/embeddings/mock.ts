/**
 * Offline embedding provider used by tests and `TERMBASE_EMBEDDING=mock`.
 *
 * Each text is hashed per code point and the hash seeds a small PRNG that
 * fills the vector, which is then scaled to unit length. Equal texts give
 * equal vectors; there is no semantic similarity between different texts.
 */

import {DEFAULT_EMBEDDING_DIMENSIONS} from '../lib/constants.js';
import type {EmbeddingProvider, ModelProgressCallback} from './types.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a over code points, so a supplementary-plane character
 * contributes one value instead of two surrogates.
 */
export function hashCodePoints(text: string): number {
	let hash = FNV_OFFSET;
	for (const ch of text) {
		hash ^= ch.codePointAt(0) ?? 0;
		hash = Math.imul(hash, FNV_PRIME) >>> 0;
	}
	return hash;
}

// xorshift32; a zero state would stick at zero
function nextState(state: number): number {
	let x = state || 0x9e3779b9;
	x ^= x << 13;
	x ^= x >>> 17;
	x ^= x << 5;
	return x >>> 0;
}

export class MockEmbeddingProvider implements EmbeddingProvider {
	constructor(readonly dimensions: number = DEFAULT_EMBEDDING_DIMENSIONS) {}

	async initialize(onProgress?: ModelProgressCallback): Promise<void> {
		onProgress?.('ready');
	}

	async embed(texts: string[]): Promise<number[][]> {
		return texts.map(text => this.vectorFor(text));
	}

	async embedSingle(text: string): Promise<number[]> {
		return this.vectorFor(text);
	}

	close(): void {}

	private vectorFor(text: string): number[] {
		let state = hashCodePoints(text);
		const values: number[] = [];
		let sumSquares = 0;
		for (let i = 0; i < this.dimensions; i++) {
			state = nextState(state);
			const value = state / 0xffffffff - 0.5;
			values.push(value);
			sumSquares += value * value;
		}
		const norm = Math.sqrt(sumSquares);
		return norm > 0 ? values.map(v => v / norm) : values;
	}
}
