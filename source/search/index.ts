/**
 * Hybrid search over the vocabulary.
 *
 * Lexical first: a non-empty lexical result is returned as is and the
 * embedding model is never consulted. Semantic search runs only when the
 * lexical pass finds nothing, and any backend failure there yields [].
 */

import type {EmbeddingGateway} from '../embeddings/gateway.js';
import {
	COLLECTIONS,
	LEXICAL_SEARCH_LIMIT,
	SEMANTIC_SEARCH_LIMIT,
	type CollectionName,
} from '../lib/constants.js';
import {errorMessage} from '../lib/errors.js';
import type {Logger} from '../lib/logger.js';
import type {StandardField, VocabularyStore, WordRoot} from '../store/types.js';
import type {VectorHit, VectorIndex} from '../vector/types.js';
import type {SearchHit} from './types.js';

export type {SearchHit, SearchSource} from './types.js';

const COMPONENT = 'Search';

function fieldHit(field: StandardField): SearchHit {
	return {
		id: field.id,
		cnName: field.cnName,
		enName: field.enName,
		score: null,
		source: 'lexical',
	};
}

function rootHit(root: WordRoot): SearchHit {
	return {
		id: root.id,
		cnName: root.cnName,
		enName: root.enAbbr,
		score: null,
		source: 'lexical',
	};
}

/**
 * Map a vector hit to a search hit using its payload.
 * @param nameKey - payload key holding the English name
 */
function vectorHitToSearchHit(hit: VectorHit, nameKey: string): SearchHit {
	return {
		id: hit.id,
		cnName: hit.payload['cnName'] ?? '',
		enName: hit.payload[nameKey] ?? '',
		score: hit.score,
		source: 'semantic',
	};
}

export class HybridSearch {
	constructor(
		private readonly store: VocabularyStore,
		private readonly gateway: EmbeddingGateway,
		private readonly index: VectorIndex,
		private readonly logger?: Logger,
	) {}

	/**
	 * Search standard fields.
	 */
	async searchFields(query: string): Promise<SearchHit[]> {
		const q = query.trim();
		if (!q) return [];

		const lexical = this.lexical('fields', () =>
			this.store.fields.searchLexical(q, LEXICAL_SEARCH_LIMIT).map(fieldHit),
		);
		if (lexical.length > 0) return lexical;

		return this.semantic(COLLECTIONS.STANDARD_FIELDS, q, 'enName');
	}

	/**
	 * Search word roots.
	 */
	async searchRoots(query: string): Promise<SearchHit[]> {
		const q = query.trim();
		if (!q) return [];

		const lexical = this.lexical('word roots', () =>
			this.store.wordRoots.searchLexical(q, LEXICAL_SEARCH_LIMIT).map(rootHit),
		);
		if (lexical.length > 0) return lexical;

		return this.semantic(COLLECTIONS.WORD_ROOTS, q, 'enAbbr');
	}

	/**
	 * Word roots closest in meaning to the query, skipping the lexical pass.
	 */
	async similarRoots(query: string): Promise<SearchHit[]> {
		const q = query.trim();
		if (!q) return [];
		return this.semantic(COLLECTIONS.WORD_ROOTS, q, 'enAbbr');
	}

	private lexical(kind: string, run: () => SearchHit[]): SearchHit[] {
		try {
			return run();
		} catch (error) {
			this.logger?.warn(COMPONENT, `Lexical search over ${kind} failed`, {
				error: errorMessage(error),
			});
			return [];
		}
	}

	private async semantic(
		collection: CollectionName,
		query: string,
		nameKey: string,
	): Promise<SearchHit[]> {
		try {
			const vector = await this.gateway.embedSingle(query);
			const hits = await this.index.search(
				collection,
				vector,
				SEMANTIC_SEARCH_LIMIT,
			);
			return hits.map(hit => vectorHitToSearchHit(hit, nameKey));
		} catch (error) {
			this.logger?.warn(COMPONENT, 'Semantic search unavailable', {
				collection,
				error: errorMessage(error),
			});
			return [];
		}
	}
}
