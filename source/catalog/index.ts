/**
 * Catalog - owner of every vocabulary resource.
 *
 * Opens the store, the vector index, the embedding model and the tokenizer,
 * and wires them into the synchronizer, resolver and search. Nothing is
 * served until the model has loaded and the tokenizer has been seeded.
 */

import {
	EmbeddingGateway,
	createEmbeddingProvider,
	type EmbeddingProvider,
	type ModelProgressCallback,
} from '../embeddings/index.js';
import type {TermbaseConfig} from '../lib/config.js';
import {COLLECTIONS, DEFAULT_PAGE_SIZE} from '../lib/constants.js';
import {errorMessage} from '../lib/errors.js';
import {createNullLogger, toError, type Logger} from '../lib/logger.js';
import {TermResolutionEngine} from '../resolve/index.js';
import {HybridSearch} from '../search/index.js';
import {SqliteVocabularyStore} from '../store/index.js';
import type {
	Page,
	StandardField,
	VocabularyStore,
	WordRoot,
} from '../store/types.js';
import {VocabularySynchronizer} from '../sync/index.js';
import {TokenizerState, type Segmenter} from '../tokenizer/index.js';
import {LanceVectorIndex} from '../vector/index.js';
import type {VectorIndex} from '../vector/types.js';

// ============================================================================
// Types
// ============================================================================

export interface ListOptions {
	/** 1-based page number (default 1) */
	page?: number;
	/** Rows per page (default 20) */
	pageSize?: number;
	/** Case-insensitive substring filter */
	q?: string;
}

export type HealthStatus =
	| {status: 'up'; database: 'connected'}
	| {status: 'down'; error: 'database_error'};

/**
 * Replacements for the resources open() would otherwise create.
 * A supplied vector index must already be connected.
 */
export interface CatalogOverrides {
	store?: VocabularyStore;
	index?: VectorIndex;
	provider?: EmbeddingProvider;
	segmenter?: Segmenter;
	logger?: Logger;
	enforceReferences?: boolean;
	onModelProgress?: ModelProgressCallback;
	/** Skip the startup resync (default false) */
	skipResync?: boolean;
}

const COMPONENT = 'Catalog';

// ============================================================================
// Catalog
// ============================================================================

export class Catalog {
	readonly synchronizer: VocabularySynchronizer;
	readonly resolver: TermResolutionEngine;
	readonly search: HybridSearch;

	private constructor(
		readonly store: VocabularyStore,
		private readonly index: VectorIndex,
		private readonly provider: EmbeddingProvider,
		readonly tokenizer: TokenizerState,
		private readonly logger: Logger,
		enforceReferences: boolean,
	) {
		const gateway = new EmbeddingGateway(provider);
		this.synchronizer = new VocabularySynchronizer({
			store,
			gateway,
			index,
			tokenizer,
			logger,
			enforceReferences,
		});
		this.resolver = new TermResolutionEngine(store.wordRoots, tokenizer, logger);
		this.search = new HybridSearch(store, gateway, index, logger);
	}

	/**
	 * Open every resource and bring the vector index in line with the store.
	 *
	 * @throws if the store, the index, the model or the tokenizer warm-up
	 * fails. A failed startup resync is logged, not thrown.
	 */
	static async open(
		config: TermbaseConfig,
		overrides: CatalogOverrides = {},
	): Promise<Catalog> {
		const logger = overrides.logger ?? createNullLogger();
		// Resources opened here; supplied ones stay with the caller
		const created: Array<{close(): void}> = [];
		const own = <T extends {close(): void}>(resource: T): T => {
			created.push(resource);
			return resource;
		};

		try {
			const store =
				overrides.store ?? own(SqliteVocabularyStore.open(config.databasePath));
			const index =
				overrides.index ??
				own(await connectIndex(config.vectorDbPath, logger));
			const provider =
				overrides.provider ?? own(createEmbeddingProvider(config));

			await index.ensureCollection(COLLECTIONS.WORD_ROOTS, provider.dimensions);
			await index.ensureCollection(
				COLLECTIONS.STANDARD_FIELDS,
				provider.dimensions,
			);

			logger.info(COMPONENT, 'Loading embedding model', {
				provider: config.embeddingProvider,
				model: config.embeddingModel,
			});
			await provider.initialize(overrides.onModelProgress);

			const tokenizer = new TokenizerState(
				overrides.segmenter,
				logger,
			);
			await tokenizer.warmUp(store.wordRoots.listNames());

			const catalog = new Catalog(
				store,
				index,
				provider,
				tokenizer,
				logger,
				overrides.enforceReferences ?? true,
			);

			if (!overrides.skipResync) {
				await catalog.resyncOnStartup();
			}

			logger.info(COMPONENT, 'Catalog ready');
			return catalog;
		} catch (error) {
			logger.error(COMPONENT, 'Catalog failed to open', toError(error));
			for (const resource of created.reverse()) {
				resource.close();
			}
			throw error;
		}
	}

	// ============================================================
	// Reads
	// ============================================================

	listWordRoots(options: ListOptions = {}): Page<WordRoot> {
		const {offset, limit, pattern} = resolvePaging(options);
		return this.store.wordRoots.listPage(offset, limit, pattern);
	}

	listFields(options: ListOptions = {}): Page<StandardField> {
		const {offset, limit, pattern} = resolvePaging(options);
		return this.store.fields.listPage(offset, limit, pattern);
	}

	/**
	 * Constituent word roots of a field, in composition order.
	 * Ids that no longer resolve are skipped.
	 * @returns null when the field does not exist
	 */
	getFieldDetails(id: number): WordRoot[] | null {
		const field = this.store.fields.getById(id);
		if (!field) return null;

		const byId = new Map(
			this.store.wordRoots
				.getByIds(field.compositionIds)
				.map(root => [root.id, root]),
		);
		const roots: WordRoot[] = [];
		for (const rootId of field.compositionIds) {
			const root = byId.get(rootId);
			if (root) roots.push(root);
		}
		return roots;
	}

	health(): HealthStatus {
		try {
			this.store.ping();
			return {status: 'up', database: 'connected'};
		} catch (error) {
			this.logger.warn(COMPONENT, 'Health check failed', {
				error: errorMessage(error),
			});
			return {status: 'down', error: 'database_error'};
		}
	}

	close(): void {
		this.provider.close();
		this.index.close();
		this.store.close();
	}

	private async resyncOnStartup(): Promise<void> {
		try {
			await this.synchronizer.resyncAll();
		} catch (error) {
			this.logger.error(
				COMPONENT,
				'Startup resync failed; vector index may be stale',
				toError(error),
			);
		}
	}
}

async function connectIndex(
	vectorDbPath: string,
	logger: Logger,
): Promise<VectorIndex> {
	const index = new LanceVectorIndex(vectorDbPath, logger);
	await index.connect();
	return index;
}

function resolvePaging(options: ListOptions): {
	offset: number;
	limit: number;
	pattern: string | undefined;
} {
	const page = Math.max(1, Math.trunc(options.page ?? 1));
	const limit = Math.max(1, Math.trunc(options.pageSize ?? DEFAULT_PAGE_SIZE));
	const pattern = options.q?.trim() || undefined;
	return {offset: (page - 1) * limit, limit, pattern};
}
