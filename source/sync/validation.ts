/**
 * Input schemas for vocabulary mutations.
 *
 * Parsing also normalizes: names are trimmed and synonym strings are
 * collapsed to single-space separated tokens.
 */

import {z} from 'zod';
import {ValidationError} from '../lib/errors.js';
import {normalizeTerms} from '../lib/terms.js';
import type {StandardFieldInput, WordRootInput} from '../store/types.js';

const requiredText = z.string().trim().min(1, 'must not be empty');

const optionalText = z
	.string()
	.nullish()
	.transform(v => {
		const trimmed = v?.trim();
		return trimmed ? trimmed : null;
	});

const synonyms = z
	.string()
	.nullish()
	.transform(v => normalizeTerms(v) ?? null);

export const wordRootInputSchema = z.object({
	cnName: requiredText,
	enAbbr: requiredText,
	enFullName: optionalText,
	associatedTerms: synonyms,
	remark: optionalText,
});

export const standardFieldInputSchema = z.object({
	cnName: requiredText,
	enName: requiredText,
	compositionIds: z.array(z.number().int().positive()),
	dataType: requiredText,
	associatedTerms: synonyms,
});

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, kind: string, input: unknown): T {
	const result = schema.safeParse(input);
	if (!result.success) {
		const issues = formatIssues(result.error);
		throw new ValidationError(`Invalid ${kind}: ${issues.join('; ')}`, issues);
	}
	return result.data;
}

/**
 * Validate and normalize a word root payload.
 * @throws ValidationError
 */
export function parseWordRootInput(input: unknown): WordRootInput {
	return parseWith(wordRootInputSchema, 'word root', input);
}

/**
 * Validate and normalize a standard field payload.
 * @throws ValidationError
 */
export function parseStandardFieldInput(input: unknown): StandardFieldInput {
	return parseWith(standardFieldInputSchema, 'standard field', input);
}
