/**
 * Synonym string normalization.
 */

/**
 * Normalize a synonym list to single-space separated tokens.
 * ASCII and full-width commas count as separators. A string with no tokens
 * normalizes to undefined.
 *
 * @example
 * normalizeTerms('客户号, 客户编码，  custNo'); // '客户号 客户编码 custNo'
 */
export function normalizeTerms(
	input: string | null | undefined,
): string | undefined {
	if (input === null || input === undefined) return undefined;

	const tokens = splitTerms(input);
	return tokens.length > 0 ? tokens.join(' ') : undefined;
}

/**
 * Split a synonym string into tokens.
 */
export function splitTerms(input: string): string[] {
	return input
		.replace(/[,，]/g, ' ')
		.split(/\s+/)
		.filter(t => t.length > 0);
}

/**
 * Fold text for case-insensitive matching: full-width forms to their ASCII
 * counterparts, then lower case.
 *
 * @example
 * foldText('客户ＩＤ'); // '客户id'
 */
export function foldText(input: string): string {
	return input.normalize('NFKC').toLowerCase();
}
