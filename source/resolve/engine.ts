/**
 * Term Resolution Engine - maps free text onto known word roots.
 *
 * The whole phrase is tried first; only when it matches nothing is the text
 * segmented and each token resolved on its own.
 */

import {errorMessage} from '../lib/errors.js';
import type {Logger} from '../lib/logger.js';
import type {WordRoot, WordRootStore} from '../store/types.js';
import type {TokenizerState} from '../tokenizer/index.js';

/**
 * A resolved slice of the input and the word roots that match it.
 * An empty candidate list marks a term with no known root.
 */
export interface Segment {
	word: string;
	candidates: WordRoot[];
}

const COMPONENT = 'Resolver';

function compareCodePoints(a: string, b: string): number {
	const left = Array.from(a);
	const right = Array.from(b);
	const length = Math.min(left.length, right.length);
	for (let i = 0; i < length; i++) {
		const diff = (left[i]?.codePointAt(0) ?? 0) - (right[i]?.codePointAt(0) ?? 0);
		if (diff !== 0) return diff;
	}
	return left.length - right.length;
}

/**
 * Exact name matches first, then by name in code point order.
 */
export function rankCandidates(term: string, candidates: WordRoot[]): WordRoot[] {
	return [...candidates].sort((a, b) => {
		const exactA = a.cnName === term ? 0 : 1;
		const exactB = b.cnName === term ? 0 : 1;
		if (exactA !== exactB) return exactA - exactB;
		if (a.cnName === b.cnName) return a.id - b.id;
		return compareCodePoints(a.cnName, b.cnName);
	});
}

export class TermResolutionEngine {
	constructor(
		private readonly roots: WordRootStore,
		private readonly tokenizer: TokenizerState,
		private readonly logger?: Logger,
	) {}

	async suggest(text: string): Promise<Segment[]> {
		const input = text.trim();
		if (!input) return [];

		const whole = this.candidatesFor(input);
		if (whole.length > 0) {
			this.logger?.debug(COMPONENT, 'Whole phrase matched', {
				input,
				candidates: whole.length,
			});
			return [{word: input, candidates: whole}];
		}

		const tokens = await this.tokenizer.segment(input, 'precise');
		const segments: Segment[] = [];
		for (const token of tokens) {
			const word = token.trim();
			if (!word) continue;
			segments.push({word, candidates: this.candidatesFor(word)});
		}
		return segments;
	}

	/**
	 * Lexical candidates for a term, ranked. Store failures degrade to none.
	 */
	private candidatesFor(term: string): WordRoot[] {
		try {
			return rankCandidates(term, this.roots.findByTerm(term));
		} catch (error) {
			this.logger?.warn(COMPONENT, 'Candidate lookup failed', {
				term,
				error: errorMessage(error),
			});
			return [];
		}
	}
}
