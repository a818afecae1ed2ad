/**
 * Error types for the catalog.
 *
 * Store errors surface to callers on mutation paths. Embedding and vector
 * index errors are logged and tolerated on mutation paths and degrade search
 * to empty results.
 */

/**
 * Input rejected before it reached the store.
 */
export class ValidationError extends Error {
	readonly issues: string[];

	constructor(message: string, issues: string[] = []) {
		super(message);
		this.name = 'ValidationError';
		this.issues = issues;
	}
}

/**
 * Relational read or write failure.
 */
export class StoreError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, {cause});
		this.name = 'StoreError';
	}
}

/**
 * Unique constraint violated (e.g. a word root name already exists).
 */
export class DuplicateEntryError extends StoreError {
	constructor(message: string, cause?: unknown) {
		super(message, cause);
		this.name = 'DuplicateEntryError';
	}
}

/**
 * A standard field references word roots that do not exist.
 */
export class ReferenceIntegrityError extends Error {
	readonly missingIds: number[];

	constructor(missingIds: number[]) {
		super(`Unknown word root ids: ${missingIds.join(', ')}`);
		this.name = 'ReferenceIntegrityError';
		this.missingIds = missingIds;
	}
}

export class EmbeddingError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, {cause});
		this.name = 'EmbeddingError';
	}
}

export class VectorIndexError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, {cause});
		this.name = 'VectorIndexError';
	}
}

/**
 * Extract a human-readable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
