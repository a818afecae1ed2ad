/**
 * Local embedding provider using a multilingual sentence model.
 *
 * Uses Xenova/paraphrase-multilingual-MiniLM-L12-v2 via @huggingface/transformers
 * (ONNX Runtime).
 * - 384 dimensions
 * - Handles Chinese and English vocabulary text
 * - Runs offline once the model is in the cache directory
 */

import {pipeline, type FeatureExtractionPipeline} from '@huggingface/transformers';
import {
	DEFAULT_EMBEDDING_DIMENSIONS,
	DEFAULT_EMBEDDING_MODEL,
} from '../lib/constants.js';
import {EmbeddingError} from '../lib/errors.js';
import type {EmbeddingProvider, ModelProgressCallback} from './types.js';

const BATCH_SIZE = 32;

export interface LocalEmbeddingOptions {
	model?: string;
	dimensions?: number;
	cacheDir?: string;
}

function reportProgress(info: unknown, onProgress: ModelProgressCallback) {
	if (typeof info !== 'object' || info === null || !('status' in info)) {
		return;
	}
	if (info.status === 'progress' && 'progress' in info) {
		const file = 'file' in info ? String(info.file) : undefined;
		onProgress('downloading', Number(info.progress), file);
	} else if (info.status === 'initiate') {
		onProgress('loading');
	}
}

/**
 * Local embedding provider backed by a transformers.js pipeline.
 */
export class LocalEmbeddingProvider implements EmbeddingProvider {
	readonly dimensions: number;
	private readonly model: string;
	private readonly cacheDir?: string;
	private extractor: FeatureExtractionPipeline | null = null;
	private initPromise: Promise<void> | null = null;

	constructor(options: LocalEmbeddingOptions = {}) {
		this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
		this.dimensions = options.dimensions ?? DEFAULT_EMBEDDING_DIMENSIONS;
		this.cacheDir = options.cacheDir;
	}

	async initialize(onProgress?: ModelProgressCallback): Promise<void> {
		if (this.extractor) return;

		if (!this.initPromise) {
			this.initPromise = this.load(onProgress).catch((error: unknown) => {
				this.initPromise = null;
				throw error;
			});
		}
		await this.initPromise;
	}

	private async load(onProgress?: ModelProgressCallback): Promise<void> {
		try {
			// First load downloads the model into cacheDir
			this.extractor = await pipeline('feature-extraction', this.model, {
				dtype: 'q8',
				...(this.cacheDir ? {cache_dir: this.cacheDir} : {}),
				progress_callback: (info: unknown) => {
					if (onProgress) reportProgress(info, onProgress);
				},
			});
		} catch (error) {
			throw new EmbeddingError(
				`Failed to load embedding model ${this.model}: ${error instanceof Error ? error.message : String(error)}`,
				error,
			);
		}
		onProgress?.('ready');
	}

	async embed(texts: string[]): Promise<number[][]> {
		if (texts.length === 0) {
			return [];
		}

		const extractor = await this.getExtractor();
		const results: number[][] = [];

		for (let i = 0; i < texts.length; i += BATCH_SIZE) {
			const batch = texts.slice(i, i + BATCH_SIZE);
			const output = await extractor(batch, {
				pooling: 'mean',
				normalize: true,
			});

			// Output tensor is [batch, dimensions], flattened row-major
			const data = Array.from(output.data as Float32Array);
			for (let row = 0; row < batch.length; row++) {
				results.push(
					data.slice(row * this.dimensions, (row + 1) * this.dimensions),
				);
			}
		}

		return results;
	}

	async embedSingle(text: string): Promise<number[]> {
		const [vector] = await this.embed([text]);
		if (!vector) {
			throw new EmbeddingError('Embedding model returned no vector');
		}
		return vector;
	}

	close(): void {
		this.extractor = null;
		this.initPromise = null;
	}

	private async getExtractor(): Promise<FeatureExtractionPipeline> {
		await this.initialize();
		if (!this.extractor) {
			throw new EmbeddingError('Embedding model is not loaded');
		}
		return this.extractor;
	}
}
