/**
 * Config - termbase configuration loading and management.
 *
 * Configuration is layered: built-in defaults, then the data directory's
 * config.json, then TERMBASE_* environment variables.
 */

import fs from 'node:fs/promises';
import {z} from 'zod';
import {
	DEFAULT_EMBEDDING_DIMENSIONS,
	DEFAULT_EMBEDDING_MODEL,
	getConfigPath,
	getDatabasePath,
	getModelCacheDir,
	getTermbaseHomeDir,
	getVectorDbPath,
} from './constants.js';
import {ValidationError} from './errors.js';
import {LOG_LEVELS, type LogLevel} from './logger.js';

// ============================================================================
// Types
// ============================================================================

export type EmbeddingProviderType = 'local' | 'mock';

export interface TermbaseConfig {
	/** Directory holding config.json, logs, and default store paths */
	dataDir: string;
	/** SQLite file path, or ':memory:' */
	databasePath: string;
	/** LanceDB directory */
	vectorDbPath: string;
	embeddingProvider: EmbeddingProviderType;
	embeddingModel: string;
	embeddingDimensions: number;
	/** Where downloaded model files are cached */
	modelCacheDir: string;
	logLevel: LogLevel;
}

// ============================================================================
// Schema
// ============================================================================

const fileConfigSchema = z
	.object({
		databasePath: z.string().min(1),
		vectorDbPath: z.string().min(1),
		embeddingProvider: z.enum(['local', 'mock']),
		embeddingModel: z.string().min(1),
		embeddingDimensions: z.number().int().positive(),
		modelCacheDir: z.string().min(1),
		logLevel: z.enum(['debug', 'info', 'warn', 'error']),
	})
	.partial()
	.strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ============================================================================
// Defaults
// ============================================================================

/**
 * Default configuration rooted at a data directory.
 */
export function createDefaultConfig(dataDir: string): TermbaseConfig {
	return {
		dataDir,
		databasePath: getDatabasePath(dataDir),
		vectorDbPath: getVectorDbPath(dataDir),
		embeddingProvider: 'local',
		embeddingModel: DEFAULT_EMBEDDING_MODEL,
		embeddingDimensions: DEFAULT_EMBEDDING_DIMENSIONS,
		modelCacheDir: getModelCacheDir(dataDir),
		logLevel: 'info',
	};
}

// ============================================================================
// Config I/O
// ============================================================================

/**
 * Read environment overrides.
 * Unknown enum values are rejected rather than ignored.
 */
export function readEnvOverrides(
	env: NodeJS.ProcessEnv = process.env,
): FileConfig {
	const overrides: FileConfig = {};

	const dbPath = env['TERMBASE_DB_PATH']?.trim();
	if (dbPath) overrides.databasePath = dbPath;

	const vectorPath = env['TERMBASE_VECTOR_PATH']?.trim();
	if (vectorPath) overrides.vectorDbPath = vectorPath;

	const cacheDir = env['TERMBASE_MODEL_CACHE']?.trim();
	if (cacheDir) overrides.modelCacheDir = cacheDir;

	const provider = env['TERMBASE_EMBEDDING']?.trim();
	if (provider) {
		if (provider !== 'local' && provider !== 'mock') {
			throw new ValidationError(
				`TERMBASE_EMBEDDING must be "local" or "mock", got "${provider}"`,
			);
		}
		overrides.embeddingProvider = provider;
	}

	const level = env['TERMBASE_LOG_LEVEL']?.trim();
	if (level) {
		const match = LOG_LEVELS.find(l => l === level);
		if (!match) {
			throw new ValidationError(
				`TERMBASE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${level}"`,
			);
		}
		overrides.logLevel = match;
	}

	return overrides;
}

/**
 * Load config for a data directory, merging with defaults.
 *
 * A missing config.json is expected on first run. A config.json that exists
 * but cannot be parsed or validated is an error; falling back to defaults
 * would silently point the catalog at a different database.
 */
export async function loadConfig(
	dataDir: string = getTermbaseHomeDir(),
	env: NodeJS.ProcessEnv = process.env,
): Promise<TermbaseConfig> {
	const configPath = getConfigPath(dataDir);
	const fileConfig = await readConfigFile(configPath);

	return {
		...createDefaultConfig(dataDir),
		...fileConfig,
		...readEnvOverrides(env),
	};
}

async function readConfigFile(configPath: string): Promise<FileConfig> {
	try {
		await fs.access(configPath);
	} catch {
		return {};
	}

	const content = await fs.readFile(configPath, 'utf-8');

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (parseError) {
		throw new ValidationError(
			`Invalid config.json at ${configPath}: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
		);
	}

	const parsed = fileConfigSchema.safeParse(raw);
	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			i => `${i.path.join('.') || '(root)'}: ${i.message}`,
		);
		throw new ValidationError(`Invalid config.json at ${configPath}`, issues);
	}

	return parsed.data;
}

/**
 * Save the file-backed part of a config.
 * Creates the data directory if it doesn't exist.
 */
export async function saveConfig(
	dataDir: string,
	config: FileConfig,
): Promise<void> {
	await fs.mkdir(dataDir, {recursive: true});
	await fs.writeFile(
		getConfigPath(dataDir),
		JSON.stringify(fileConfigSchema.parse(config), null, '\t') + '\n',
	);
}
