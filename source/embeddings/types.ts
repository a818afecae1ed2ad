/**
 * Embedding Provider Types.
 *
 * Types for embedding providers that generate vector embeddings from text.
 */

/**
 * Progress callback for model loading/downloading.
 * @param status - Current status: 'downloading', 'loading', 'ready'
 * @param progress - Download progress 0-100 (only for 'downloading')
 * @param message - Optional message (e.g., file being downloaded)
 */
export type ModelProgressCallback = (
	status: 'downloading' | 'loading' | 'ready',
	progress?: number,
	message?: string,
) => void;

/**
 * Embedding provider interface for generating vector embeddings.
 *
 * Providers wrap a stateful model and are not safe for concurrent calls;
 * go through EmbeddingGateway instead of calling a provider directly.
 */
export interface EmbeddingProvider {
	/** Number of dimensions in the embedding vectors */
	readonly dimensions: number;

	/**
	 * Initialize the provider (load model, etc.)
	 * Must be called before using embed() or embedSingle().
	 * @param onProgress - Optional callback for download/loading progress
	 */
	initialize(onProgress?: ModelProgressCallback): Promise<void>;

	/**
	 * Generate embeddings for multiple texts.
	 * @returns One vector per text, in input order
	 */
	embed(texts: string[]): Promise<number[][]>;

	/**
	 * Generate embedding for a single text.
	 */
	embedSingle(text: string): Promise<number[]>;

	/**
	 * Close the provider and free resources.
	 */
	close(): void;
}
