/**
 * Command handlers for the termbase CLI.
 *
 * Each handler runs against an open catalog and returns the text to print.
 */

import fs from 'node:fs/promises';
import type {Catalog} from '../catalog/index.js';
import {ValidationError} from '../lib/errors.js';
import {
	formatClearResult,
	formatField,
	formatHealth,
	formatImportResult,
	formatPage,
	formatResync,
	formatSearchHits,
	formatSegments,
	formatWordRoot,
} from './format.js';

export type EntityKind = 'roots' | 'fields';

export interface CommandFlags {
	page?: number;
	pageSize?: number;
	q?: string;
}

export const COMMANDS = [
	'resync',
	'import',
	'suggest',
	'search',
	'similar',
	'list',
	'details',
	'delete',
	'clear',
	'health',
] as const;

export type CommandName = (typeof COMMANDS)[number];

export function isCommand(value: string): value is CommandName {
	return COMMANDS.some(c => c === value);
}

function parseKind(value: string | undefined): EntityKind {
	if (value === 'roots' || value === 'fields') return value;
	throw new ValidationError(
		`Expected "roots" or "fields", got "${value ?? ''}"`,
	);
}

function parseId(value: string | undefined): number {
	const id = Number(value);
	if (!Number.isInteger(id) || id <= 0) {
		throw new ValidationError(`Expected a positive integer id, got "${value ?? ''}"`);
	}
	return id;
}

function requireText(args: string[], what: string): string {
	const text = args.join(' ').trim();
	if (!text) {
		throw new ValidationError(`Missing ${what}`);
	}
	return text;
}

/**
 * Read a JSON file holding an array of entity payloads.
 */
export async function readImportFile(filePath: string): Promise<unknown[]> {
	const content = await fs.readFile(filePath, 'utf-8');

	let raw: unknown;
	try {
		raw = JSON.parse(content);
	} catch (parseError) {
		throw new ValidationError(
			`Invalid JSON in ${filePath}: ${parseError instanceof Error ? parseError.message : String(parseError)}`,
		);
	}
	if (!Array.isArray(raw)) {
		throw new ValidationError(`${filePath} must contain a JSON array`);
	}
	return raw;
}

/**
 * Run one command.
 * @throws ValidationError on bad arguments; store errors propagate
 */
export async function runCommand(
	catalog: Catalog,
	command: CommandName,
	args: string[],
	flags: CommandFlags = {},
): Promise<string> {
	switch (command) {
		case 'resync':
			return formatResync(await catalog.synchronizer.resyncAll());

		case 'import': {
			const kind = parseKind(args[0]);
			const items = await readImportFile(requireText(args.slice(1), 'file path'));
			const result =
				kind === 'roots'
					? await catalog.synchronizer.batchCreateWordRoots(items)
					: await catalog.synchronizer.batchCreateFields(items);
			return formatImportResult(result);
		}

		case 'suggest':
			return formatSegments(
				await catalog.resolver.suggest(requireText(args, 'text')),
			);

		case 'search': {
			const kind = parseKind(args[0]);
			const query = requireText(args.slice(1), 'query');
			const hits =
				kind === 'roots'
					? await catalog.search.searchRoots(query)
					: await catalog.search.searchFields(query);
			return formatSearchHits(query, hits);
		}

		case 'similar': {
			const query = requireText(args, 'query');
			return formatSearchHits(query, await catalog.search.similarRoots(query));
		}

		case 'list': {
			const kind = parseKind(args[0]);
			return kind === 'roots'
				? formatPage(catalog.listWordRoots(flags), formatWordRoot)
				: formatPage(catalog.listFields(flags), formatField);
		}

		case 'details': {
			const id = parseId(args[0]);
			const roots = catalog.getFieldDetails(id);
			if (roots === null) return `Standard field ${id} not found`;
			return roots.map(formatWordRoot).join('\n');
		}

		case 'delete': {
			const kind = parseKind(args[0]);
			const id = parseId(args[1]);
			const deleted =
				kind === 'roots'
					? await catalog.synchronizer.deleteWordRoot(id)
					: await catalog.synchronizer.deleteField(id);
			return deleted ? `Deleted ${id}` : `${id} not found`;
		}

		case 'clear': {
			const kind = parseKind(args[0]);
			const result =
				kind === 'roots'
					? await catalog.synchronizer.clearWordRoots()
					: await catalog.synchronizer.clearFields();
			return formatClearResult(kind, result);
		}

		case 'health':
			return formatHealth(catalog.health());
	}
}
