/**
 * Search result types.
 */

/**
 * Which pass produced a hit.
 */
export type SearchSource =
	| 'lexical' // Substring match on name and synonyms
	| 'semantic'; // Nearest neighbours in the vector index

/**
 * A single search hit. Same shape for both passes.
 */
export interface SearchHit {
	/** Vocabulary id */
	id: number;
	/** Chinese name */
	cnName: string;
	/** English name (fields) or abbreviation (word roots) */
	enName: string;
	/** Cosine similarity for semantic hits, null for lexical hits */
	score: number | null;
	source: SearchSource;
}
