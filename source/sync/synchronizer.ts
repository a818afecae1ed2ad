/**
 * Dual-store synchronizer - the vocabulary write path.
 *
 * Every mutation is a two-step pipeline:
 * 1. Write the relational store. Failures here are returned to the caller
 *    and nothing else runs.
 * 2. Re-embed the entity and reflect it in the vector index (plus the
 *    tokenizer dictionary for word roots). Failures here are logged and
 *    tolerated: the store is authoritative and resync repairs the index.
 */

import {COLLECTIONS, type CollectionName} from '../lib/constants.js';
import type {EmbeddingGateway} from '../embeddings/gateway.js';
import {
	ReferenceIntegrityError,
	ValidationError,
	errorMessage,
} from '../lib/errors.js';
import {toError, type Logger} from '../lib/logger.js';
import type {
	StandardField,
	StandardFieldInput,
	VocabularyStore,
	WordRoot,
	WordRootInput,
} from '../store/types.js';
import type {TokenizerState} from '../tokenizer/index.js';
import type {VectorIndex, VectorPoint} from '../vector/types.js';
import {
	standardFieldPoint,
	standardFieldText,
	wordRootPoint,
	wordRootText,
} from './points.js';
import {parseStandardFieldInput, parseWordRootInput} from './validation.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Outcome of a batch import. Rows fail independently.
 */
export interface ImportResult {
	successCount: number;
	failureCount: number;
	/** One message per failed row, with its 1-based row number */
	errors: string[];
}

export interface ResyncResult {
	collection: CollectionName;
	/** Points written to the index */
	points: number;
}

/**
 * Outcome of clearing a vocabulary table. The relational clear has always
 * succeeded when this is returned; the vector clear may not have.
 */
export type ClearResult =
	| {vectorCleared: true}
	| {vectorCleared: false; vectorError: string};

export interface SynchronizerOptions {
	store: VocabularyStore;
	gateway: EmbeddingGateway;
	index: VectorIndex;
	tokenizer: TokenizerState;
	logger: Logger;
	/**
	 * Reject standard fields whose composition names unknown word roots
	 * (default: true).
	 */
	enforceReferences?: boolean;
}

const COMPONENT = 'Synchronizer';

// ============================================================================
// Synchronizer
// ============================================================================

export class VocabularySynchronizer {
	private readonly store: VocabularyStore;
	private readonly gateway: EmbeddingGateway;
	private readonly index: VectorIndex;
	private readonly tokenizer: TokenizerState;
	private readonly logger: Logger;
	private readonly enforceReferences: boolean;

	constructor(options: SynchronizerOptions) {
		this.store = options.store;
		this.gateway = options.gateway;
		this.index = options.index;
		this.tokenizer = options.tokenizer;
		this.logger = options.logger;
		this.enforceReferences = options.enforceReferences ?? true;
	}

	// ============================================================
	// Word roots
	// ============================================================

	/**
	 * Create a word root.
	 * @throws ValidationError | StoreError
	 */
	async createWordRoot(payload: unknown): Promise<WordRoot> {
		const input = parseWordRootInput(payload);
		this.logger.info(COMPONENT, 'Creating word root', {
			cnName: input.cnName,
			enAbbr: input.enAbbr,
		});

		const root = this.store.wordRoots.insert(input);
		await this.afterWordRootWrite(root);

		this.logger.info(COMPONENT, 'Word root created', {id: root.id});
		return root;
	}

	/**
	 * Update a word root in place, keeping its id.
	 * @returns null when no word root has this id
	 * @throws ValidationError | StoreError
	 */
	async updateWordRoot(id: number, payload: unknown): Promise<WordRoot | null> {
		const input = parseWordRootInput(payload);
		this.logger.info(COMPONENT, 'Updating word root', {id});

		const root = this.store.wordRoots.update(id, input);
		if (!root) return null;

		await this.afterWordRootWrite(root);
		return root;
	}

	/**
	 * Delete a word root and its vector point.
	 * @returns false when no row was deleted; the index is not touched then
	 * @throws StoreError
	 */
	async deleteWordRoot(id: number): Promise<boolean> {
		const affected = this.store.wordRoots.delete(id);
		if (affected === 0) return false;

		this.logger.info(COMPONENT, 'Word root deleted', {id});
		await this.deletePoints(COLLECTIONS.WORD_ROOTS, [id]);
		this.refreshStandardFlags();
		return true;
	}

	/**
	 * Import word roots in bulk.
	 *
	 * One embedding call covers every valid row; rows are then written one
	 * at a time and failed rows are left out of the index batch.
	 */
	async batchCreateWordRoots(items: unknown[]): Promise<ImportResult> {
		this.logger.info(COMPONENT, 'Batch importing word roots', {
			total: items.length,
		});

		return this.runBatch<WordRootInput, WordRoot>(items, {
			kind: 'word root',
			collection: COLLECTIONS.WORD_ROOTS,
			parse: parseWordRootInput,
			text: wordRootText,
			write: input => this.store.wordRoots.insert(input),
			point: wordRootPoint,
			afterWrite: root => this.learn(root.cnName),
		});
	}

	// ============================================================
	// Standard fields
	// ============================================================

	/**
	 * Create a standard field.
	 * @throws ValidationError | ReferenceIntegrityError | StoreError
	 */
	async createField(payload: unknown): Promise<StandardField> {
		const input = this.parseField(payload);
		this.logger.info(COMPONENT, 'Creating standard field', {
			cnName: input.cnName,
			enName: input.enName,
		});

		const field = this.store.fields.insert(input);
		await this.syncField(field);

		this.logger.info(COMPONENT, 'Standard field created', {id: field.id});
		return field;
	}

	/**
	 * Update a standard field in place, keeping its id.
	 * @returns null when no field has this id
	 * @throws ValidationError | ReferenceIntegrityError | StoreError
	 */
	async updateField(
		id: number,
		payload: unknown,
	): Promise<StandardField | null> {
		const input = this.parseField(payload);
		this.logger.info(COMPONENT, 'Updating standard field', {id});

		const field = this.store.fields.update(id, input);
		if (!field) return null;

		await this.syncField(field);
		return field;
	}

	/**
	 * Delete a standard field and its vector point.
	 * @returns false when no row was deleted; the index is not touched then
	 * @throws StoreError
	 */
	async deleteField(id: number): Promise<boolean> {
		const affected = this.store.fields.delete(id);
		if (affected === 0) return false;

		this.logger.info(COMPONENT, 'Standard field deleted', {id});
		await this.deletePoints(COLLECTIONS.STANDARD_FIELDS, [id]);
		return true;
	}

	/**
	 * Import standard fields in bulk. Same contract as word roots.
	 */
	async batchCreateFields(items: unknown[]): Promise<ImportResult> {
		this.logger.info(COMPONENT, 'Batch importing standard fields', {
			total: items.length,
		});

		return this.runBatch<StandardFieldInput, StandardField>(items, {
			kind: 'standard field',
			collection: COLLECTIONS.STANDARD_FIELDS,
			parse: payload => this.parseField(payload),
			text: standardFieldText,
			write: input => this.store.fields.insert(input),
			point: standardFieldPoint,
		});
	}

	// ============================================================
	// Resync and clear
	// ============================================================

	/**
	 * Rebuild the word_roots collection from the store.
	 * @throws EmbeddingError | VectorIndexError | StoreError
	 */
	async resyncWordRoots(): Promise<ResyncResult> {
		const roots = this.store.wordRoots.listAll();
		const vectors = await this.gateway.embed(roots.map(wordRootText));
		const points = roots.map((root, i) => wordRootPoint(root, vectorAt(vectors, i)));

		await this.index.replaceAll(COLLECTIONS.WORD_ROOTS, points);
		this.logger.info(COMPONENT, 'Word roots resynced', {points: points.length});
		return {collection: COLLECTIONS.WORD_ROOTS, points: points.length};
	}

	/**
	 * Rebuild the standard_fields collection from the store.
	 * @throws EmbeddingError | VectorIndexError | StoreError
	 */
	async resyncFields(): Promise<ResyncResult> {
		const fields = this.store.fields.listAll();
		const vectors = await this.gateway.embed(fields.map(standardFieldText));
		const points = fields.map((field, i) =>
			standardFieldPoint(field, vectorAt(vectors, i)),
		);

		await this.index.replaceAll(COLLECTIONS.STANDARD_FIELDS, points);
		this.logger.info(COMPONENT, 'Standard fields resynced', {
			points: points.length,
		});
		return {collection: COLLECTIONS.STANDARD_FIELDS, points: points.length};
	}

	async resyncAll(): Promise<ResyncResult[]> {
		return [await this.resyncWordRoots(), await this.resyncFields()];
	}

	/**
	 * Delete every word root, then every word_roots point.
	 * @throws StoreError when the relational clear fails
	 */
	async clearWordRoots(): Promise<ClearResult> {
		this.store.wordRoots.clear();
		this.logger.info(COMPONENT, 'Word roots table cleared');
		this.refreshStandardFlags();
		return this.clearCollection(COLLECTIONS.WORD_ROOTS);
	}

	/**
	 * Delete every standard field, then every standard_fields point.
	 * @throws StoreError when the relational clear fails
	 */
	async clearFields(): Promise<ClearResult> {
		this.store.fields.clear();
		this.logger.info(COMPONENT, 'Standard fields table cleared');
		return this.clearCollection(COLLECTIONS.STANDARD_FIELDS);
	}

	// ============================================================
	// Internals
	// ============================================================

	private parseField(payload: unknown): StandardFieldInput {
		const input = parseStandardFieldInput(payload);
		if (this.enforceReferences) {
			if (input.compositionIds.length === 0) {
				throw new ValidationError(
					'Invalid standard field: compositionIds must name at least one word root',
					['compositionIds: must not be empty'],
				);
			}
			const missing = this.store.fields.missingWordRootIds(input.compositionIds);
			if (missing.length > 0) {
				throw new ReferenceIntegrityError(missing);
			}
		}
		return input;
	}

	private async afterWordRootWrite(root: WordRoot): Promise<void> {
		await this.learn(root.cnName);
		await this.syncPoint(
			COLLECTIONS.WORD_ROOTS,
			wordRootText(root),
			vector => wordRootPoint(root, vector),
		);
	}

	private async syncField(field: StandardField): Promise<void> {
		await this.syncPoint(
			COLLECTIONS.STANDARD_FIELDS,
			standardFieldText(field),
			vector => standardFieldPoint(field, vector),
		);
	}

	/**
	 * Embed one entity and upsert its point. Never throws.
	 */
	private async syncPoint(
		collection: CollectionName,
		text: string,
		toPoint: (vector: number[]) => VectorPoint,
	): Promise<void> {
		let point: VectorPoint;
		try {
			point = toPoint(await this.gateway.embedSingle(text));
		} catch (error) {
			this.logger.warn(COMPONENT, 'Embedding failed; index left stale', {
				collection,
				error: errorMessage(error),
			});
			return;
		}
		await this.upsertPoints(collection, [point]);
	}

	private async upsertPoints(
		collection: CollectionName,
		points: VectorPoint[],
	): Promise<void> {
		if (points.length === 0) return;
		try {
			await this.index.upsert(collection, points);
			this.logger.debug(COMPONENT, 'Vector index updated', {
				collection,
				points: points.length,
			});
		} catch (error) {
			this.logger.warn(COMPONENT, 'Vector upsert failed; index left stale', {
				collection,
				ids: points.map(p => p.id),
				error: errorMessage(error),
			});
		}
	}

	private async deletePoints(
		collection: CollectionName,
		ids: number[],
	): Promise<void> {
		try {
			await this.index.deleteByIds(collection, ids);
		} catch (error) {
			this.logger.warn(COMPONENT, 'Vector delete failed; index left stale', {
				collection,
				ids,
				error: errorMessage(error),
			});
		}
	}

	private async clearCollection(
		collection: CollectionName,
	): Promise<ClearResult> {
		try {
			await this.index.deleteAll(collection);
			return {vectorCleared: true};
		} catch (error) {
			this.logger.error(
				COMPONENT,
				`Store cleared but vector clear failed for ${collection}`,
				toError(error),
			);
			return {vectorCleared: false, vectorError: errorMessage(error)};
		}
	}

	private async learn(name: string): Promise<void> {
		try {
			await this.tokenizer.learn(name);
		} catch (error) {
			this.logger.warn(COMPONENT, 'Tokenizer learn failed', {
				name,
				error: errorMessage(error),
			});
		}
	}

	private refreshStandardFlags(): void {
		try {
			this.store.fields.refreshStandardFlags();
		} catch (error) {
			this.logger.warn(COMPONENT, 'Standard flag refresh failed', {
				error: errorMessage(error),
			});
		}
	}

	private async runBatch<TInput extends {cnName: string}, TEntity>(
		items: unknown[],
		steps: {
			kind: string;
			collection: CollectionName;
			parse: (payload: unknown) => TInput;
			text: (input: TInput) => string;
			write: (input: TInput) => TEntity;
			point: (entity: TEntity, vector: number[]) => VectorPoint;
			afterWrite?: (entity: TEntity) => Promise<void>;
		},
	): Promise<ImportResult> {
		const errors: string[] = [];
		const prepared: Array<{row: number; input: TInput}> = [];

		items.forEach((item, i) => {
			try {
				prepared.push({row: i + 1, input: steps.parse(item)});
			} catch (error) {
				errors.push(
					`Row ${i + 1}: ${steps.kind} [${nameOf(item)}] failed: ${errorMessage(error)}`,
				);
			}
		});

		let vectors: number[][] | null = null;
		try {
			vectors = await this.gateway.embed(
				prepared.map(p => steps.text(p.input)),
			);
		} catch (error) {
			this.logger.warn(COMPONENT, 'Batch embedding failed; rows written without vectors', {
				collection: steps.collection,
				error: errorMessage(error),
			});
		}

		let successCount = 0;
		const points: VectorPoint[] = [];

		for (const [i, {row, input}] of prepared.entries()) {
			let entity: TEntity;
			try {
				entity = steps.write(input);
			} catch (error) {
				errors.push(
					`Row ${row}: ${steps.kind} [${input.cnName}] failed: ${errorMessage(error)}`,
				);
				continue;
			}

			successCount++;
			if (steps.afterWrite) await steps.afterWrite(entity);
			const vector = vectors?.[i];
			if (vector) points.push(steps.point(entity, vector));
		}

		await this.upsertPoints(steps.collection, points);

		this.logger.info(COMPONENT, 'Batch import finished', {
			collection: steps.collection,
			successCount,
			failureCount: errors.length,
		});
		return {successCount, failureCount: errors.length, errors};
	}
}

function vectorAt(vectors: number[][], i: number): number[] {
	const vector = vectors[i];
	if (!vector) {
		throw new RangeError(`Missing embedding for item ${i}`);
	}
	return vector;
}

function nameOf(item: unknown): string {
	if (typeof item === 'object' && item !== null && 'cnName' in item) {
		return String(item.cnName);
	}
	return '?';
}
