/**
 * Constants - Paths, collection names, and tuning constants.
 *
 * This module defines the core constants used throughout the catalog.
 */

import os from 'node:os';
import path from 'node:path';

// ============================================================================
// Directory Paths
// ============================================================================

/**
 * Environment variable to override the termbase home directory.
 */
export const TERMBASE_HOME_ENV = 'TERMBASE_HOME';

/**
 * Get the termbase home directory.
 *
 * Default: ~/.local/share/termbase
 * Override: $TERMBASE_HOME
 * Linux (conventional): $XDG_DATA_HOME/termbase
 */
export function getTermbaseHomeDir(): string {
	const override = process.env[TERMBASE_HOME_ENV]?.trim();
	if (override) return override;

	const xdg = process.env['XDG_DATA_HOME']?.trim();
	if (xdg) return path.join(xdg, 'termbase');

	return path.join(os.homedir(), '.local', 'share', 'termbase');
}

/**
 * Get the path to the config file.
 */
export function getConfigPath(dataDir: string): string {
	return path.join(dataDir, 'config.json');
}

/**
 * Get the default path to the SQLite database file.
 */
export function getDatabasePath(dataDir: string): string {
	return path.join(dataDir, 'termbase.db');
}

/**
 * Get the default path to the LanceDB directory.
 */
export function getVectorDbPath(dataDir: string): string {
	return path.join(dataDir, 'vectors');
}

/**
 * Get the default model cache directory.
 */
export function getModelCacheDir(dataDir: string): string {
	return path.join(dataDir, 'models');
}

// ============================================================================
// Logging Paths
// ============================================================================

/**
 * Get the path to the logs directory.
 */
export function getLogsDir(dataDir: string): string {
	return path.join(dataDir, 'logs');
}

/**
 * Get the path to today's log file.
 * Format: {dataDir}/logs/YYYY-MM-DD.log
 */
export function getLogPath(dataDir: string): string {
	const date = new Date().toISOString().split('T')[0];
	return path.join(getLogsDir(dataDir), `${date}.log`);
}

// ============================================================================
// Vector Collections
// ============================================================================

export const COLLECTIONS = {
	WORD_ROOTS: 'word_roots',
	STANDARD_FIELDS: 'standard_fields',
} as const;

export type CollectionName = (typeof COLLECTIONS)[keyof typeof COLLECTIONS];

// ============================================================================
// Embedding Configuration
// ============================================================================

/**
 * Multilingual sentence model, 384 dimensions.
 */
export const DEFAULT_EMBEDDING_MODEL =
	'Xenova/paraphrase-multilingual-MiniLM-L12-v2';

export const DEFAULT_EMBEDDING_DIMENSIONS = 384;

// ============================================================================
// Resolution and Search
// ============================================================================

/**
 * Dictionary weight for learned vocabulary terms.
 * Large enough that the segmenter never splits a known term.
 */
export const LEARNED_TERM_WEIGHT = 99999;

/** Maximum rows returned by the lexical search pass. */
export const LEXICAL_SEARCH_LIMIT = 10;

/** Nearest neighbours returned by the semantic search pass. */
export const SEMANTIC_SEARCH_LIMIT = 5;

export const DEFAULT_PAGE_SIZE = 20;
