/**
 * Vocabulary entities and the store contract.
 */

// ============================================================================
// Entities
// ============================================================================

/**
 * Atomic vocabulary unit.
 */
export interface WordRoot {
	id: number;
	/** Chinese name; the lexical key */
	cnName: string;
	/** English abbreviation */
	enAbbr: string;
	enFullName: string | null;
	/** Normalized synonym string (single-space separated) */
	associatedTerms: string | null;
	remark: string | null;
	/** ISO-8601 */
	createdAt: string;
}

/**
 * Composite vocabulary unit assembled from word roots.
 */
export interface StandardField {
	id: number;
	cnName: string;
	enName: string;
	/** Constituent word root ids in assembly order */
	compositionIds: number[];
	dataType: string;
	associatedTerms: string | null;
	/** Derived by the store: composition is non-empty and fully resolvable */
	isStandard: boolean;
	createdAt: string;
}

export interface WordRootInput {
	cnName: string;
	enAbbr: string;
	enFullName?: string | null;
	associatedTerms?: string | null;
	remark?: string | null;
}

export interface StandardFieldInput {
	cnName: string;
	enName: string;
	compositionIds: number[];
	dataType: string;
	associatedTerms?: string | null;
}

// ============================================================================
// Rows (snake_case columns as stored)
// ============================================================================

export interface WordRootRow {
	id: number;
	cn_name: string;
	en_abbr: string;
	en_full_name: string | null;
	associated_terms: string | null;
	remark: string | null;
	created_at: string;
}

export interface StandardFieldRow {
	id: number;
	field_cn_name: string;
	field_en_name: string;
	/** JSON array of integers */
	composition_ids: string;
	data_type: string;
	associated_terms: string | null;
	is_standard: number;
	created_at: string;
}

export function rowToWordRoot(row: WordRootRow): WordRoot {
	return {
		id: row.id,
		cnName: row.cn_name,
		enAbbr: row.en_abbr,
		enFullName: row.en_full_name,
		associatedTerms: row.associated_terms,
		remark: row.remark,
		createdAt: row.created_at,
	};
}

export function rowToStandardField(row: StandardFieldRow): StandardField {
	return {
		id: row.id,
		cnName: row.field_cn_name,
		enName: row.field_en_name,
		compositionIds: parseCompositionIds(row.composition_ids),
		dataType: row.data_type,
		associatedTerms: row.associated_terms,
		isStandard: row.is_standard === 1,
		createdAt: row.created_at,
	};
}

function parseCompositionIds(json: string): number[] {
	const value: unknown = JSON.parse(json);
	if (!Array.isArray(value)) return [];
	return value.filter((v): v is number => typeof v === 'number');
}

// ============================================================================
// Store contract
// ============================================================================

export interface Page<T> {
	items: T[];
	total: number;
}

/**
 * Relational persistence for one entity kind.
 *
 * Pattern arguments are case-insensitive substring matches.
 */
export interface EntityStore<T, TInput> {
	insert(input: TInput): T;
	/** @returns the updated entity, or null when no row has this id */
	update(id: number, input: TInput): T | null;
	/** @returns rows affected */
	delete(id: number): number;
	getById(id: number): T | null;
	listPage(offset: number, limit: number, pattern?: string): Page<T>;
	count(pattern?: string): number;
	listAll(): T[];
	/**
	 * Lexical candidates for a term: name equals the term, or the synonym
	 * string contains it as a whole token.
	 */
	findByTerm(term: string): T[];
	/** Substring match on name and synonyms, store order, capped. */
	searchLexical(query: string, limit: number): T[];
	/** Delete every row and restart identifiers at 1. */
	clear(): void;
}

export type WordRootStore = EntityStore<WordRoot, WordRootInput> & {
	listNames(): string[];
	getByIds(ids: number[]): WordRoot[];
};

export type StandardFieldStore = EntityStore<
	StandardField,
	StandardFieldInput
> & {
	/** Subset of ids with no word root row, in input order. */
	missingWordRootIds(ids: number[]): number[];
	/** Recompute is_standard for every field. */
	refreshStandardFlags(): void;
};

export interface VocabularyStore {
	readonly wordRoots: WordRootStore;
	readonly fields: StandardFieldStore;
	/** Cheap connectivity check. */
	ping(): void;
	close(): void;
}
