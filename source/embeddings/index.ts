/**
 * Embeddings module for generating vector embeddings.
 */

import type {TermbaseConfig} from '../lib/config.js';
import {LocalEmbeddingProvider} from './local.js';
import {MockEmbeddingProvider} from './mock.js';
import type {EmbeddingProvider} from './types.js';

export {EmbeddingGateway} from './gateway.js';
export {LocalEmbeddingProvider} from './local.js';
export {MockEmbeddingProvider} from './mock.js';

export type {EmbeddingProvider, ModelProgressCallback} from './types.js';

/**
 * Create the provider selected by config.
 */
export function createEmbeddingProvider(
	config: TermbaseConfig,
): EmbeddingProvider {
	switch (config.embeddingProvider) {
		case 'local':
			return new LocalEmbeddingProvider({
				model: config.embeddingModel,
				dimensions: config.embeddingDimensions,
				cacheDir: config.modelCacheDir,
			});
		case 'mock':
			return new MockEmbeddingProvider(config.embeddingDimensions);
	}
}
