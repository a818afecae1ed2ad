/**
 * termbase - vocabulary catalog with hybrid term resolution.
 */

export {Catalog, type CatalogOverrides, type HealthStatus, type ListOptions} from './catalog/index.js';
export {loadConfig, saveConfig, createDefaultConfig, type TermbaseConfig} from './lib/config.js';
export {
	DuplicateEntryError,
	EmbeddingError,
	ReferenceIntegrityError,
	StoreError,
	ValidationError,
	VectorIndexError,
} from './lib/errors.js';
export {createLogger, createNullLogger, type Logger} from './lib/logger.js';
export {TermResolutionEngine, type Segment} from './resolve/index.js';
export {HybridSearch, type SearchHit} from './search/index.js';
export type {StandardField, WordRoot} from './store/types.js';
export {
	VocabularySynchronizer,
	type ClearResult,
	type ImportResult,
} from './sync/index.js';
