/**
 * Embedding text and vector payloads for vocabulary entities.
 */

import type {
	StandardField,
	StandardFieldInput,
	WordRoot,
	WordRootInput,
} from '../store/types.js';
import type {VectorPoint} from '../vector/types.js';

/**
 * Salient text of a word root: name, full English name, synonyms.
 */
export function wordRootText(root: WordRootInput): string {
	return [root.cnName, root.enFullName ?? '', root.associatedTerms ?? ''].join(
		' ',
	);
}

/**
 * Salient text of a standard field: name, English name, synonyms.
 */
export function standardFieldText(field: StandardFieldInput): string {
	return [field.cnName, field.enName, field.associatedTerms ?? ''].join(' ');
}

export function wordRootPoint(root: WordRoot, vector: number[]): VectorPoint {
	return {
		id: root.id,
		vector,
		payload: {cnName: root.cnName, enAbbr: root.enAbbr},
	};
}

export function standardFieldPoint(
	field: StandardField,
	vector: number[],
): VectorPoint {
	return {
		id: field.id,
		vector,
		payload: {cnName: field.cnName, enName: field.enName},
	};
}
