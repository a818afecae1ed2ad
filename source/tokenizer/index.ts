/**
 * Tokenizer State - the shared, mutable segmentation dictionary.
 *
 * Segmentation reads run concurrently; learning a term takes the write lock
 * only for the in-memory dictionary mutation.
 */

import {Jieba} from '@node-rs/jieba';
import {dict} from '@node-rs/jieba/dict.js';
import {LEARNED_TERM_WEIGHT} from '../lib/constants.js';
import type {Logger} from '../lib/logger.js';
import {ReadWriteLock} from '../lib/rw-lock.js';

/**
 * 'precise' yields non-overlapping tokens; 'search' also emits the shorter
 * words inside long tokens.
 */
export type SegmentMode = 'precise' | 'search';

/**
 * Dictionary-backed segmenter.
 */
export interface Segmenter {
	cut(text: string, mode: SegmentMode): string[];
	addWord(word: string, weight: number): void;
}

/**
 * Segmenter backed by jieba with its bundled dictionary.
 */
export class JiebaSegmenter implements Segmenter {
	private readonly jieba: Jieba;

	constructor() {
		this.jieba = Jieba.withDict(dict);
	}

	cut(text: string, mode: SegmentMode): string[] {
		return mode === 'search'
			? this.jieba.cutForSearch(text, false)
			: this.jieba.cut(text, false);
	}

	addWord(word: string, weight: number): void {
		// User dictionary line: "<word> <freq>"
		this.jieba.loadDict(Buffer.from(`${word} ${Math.trunc(weight)}\n`, 'utf-8'));
	}
}

/**
 * Terms the jieba user-dictionary format cannot hold: whitespace separates
 * the columns of a dictionary line.
 */
function isLearnable(term: string): boolean {
	return term.length > 0 && !/\s/.test(term);
}

export class TokenizerState {
	private readonly lock = new ReadWriteLock();
	private readonly learned = new Set<string>();

	constructor(
		private readonly segmenter: Segmenter = new JiebaSegmenter(),
		private readonly logger?: Logger,
	) {}

	/**
	 * Segment text into an ordered sequence of substrings.
	 */
	async segment(text: string, mode: SegmentMode = 'precise'): Promise<string[]> {
		return this.lock.withRead(() => this.segmenter.cut(text, mode));
	}

	/**
	 * Add a term to the dictionary with the given weight.
	 * @returns false when the term cannot be learned
	 */
	async learn(term: string, weight: number = LEARNED_TERM_WEIGHT): Promise<boolean> {
		const word = term.trim();
		if (!isLearnable(word)) {
			this.logger?.debug('Tokenizer', 'Skipping unlearnable term', {term});
			return false;
		}

		await this.lock.withWrite(() => {
			this.segmenter.addWord(word, weight);
			this.learned.add(word);
		});
		return true;
	}

	/**
	 * Seed the dictionary with every known vocabulary name.
	 * Runs before the catalog accepts traffic; errors propagate.
	 */
	async warmUp(names: Iterable<string>): Promise<number> {
		let count = 0;
		for (const name of names) {
			if (await this.learn(name)) count++;
		}
		this.logger?.info('Tokenizer', 'Custom dictionary loaded', {terms: count});
		return count;
	}

	/** Whether a term has been learned in this process. */
	hasLearned(term: string): boolean {
		return this.learned.has(term.trim());
	}

	get learnedCount(): number {
		return this.learned.size;
	}
}
