import {describe, it, expect, beforeAll, beforeEach, afterEach} from 'vitest';
import chalk from 'chalk';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
	FakeSegmenter,
	InMemoryVectorIndex,
	TEST_DIMENSIONS,
} from '../../__tests__/helpers.js';
import {Catalog} from '../../catalog/index.js';
import {MockEmbeddingProvider} from '../../embeddings/mock.js';
import {createDefaultConfig} from '../../lib/config.js';
import {ValidationError} from '../../lib/errors.js';
import {SqliteVocabularyStore} from '../../store/sqlite.js';
import {isCommand, readImportFile, runCommand} from '../commands.js';

describe('runCommand', () => {
	let dir: string;
	let catalog: Catalog;

	beforeAll(() => {
		chalk.level = 0;
	});

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'termbase-cli-test-'));
		catalog = await Catalog.open(
			{...createDefaultConfig(dir), embeddingDimensions: TEST_DIMENSIONS},
			{
				store: SqliteVocabularyStore.open(':memory:'),
				index: new InMemoryVectorIndex(),
				provider: new MockEmbeddingProvider(TEST_DIMENSIONS),
				segmenter: new FakeSegmenter(),
			},
		);
	});

	afterEach(async () => {
		catalog.close();
		await fs.rm(dir, {recursive: true, force: true});
	});

	it('imports roots from a JSON file and resolves them', async () => {
		const file = path.join(dir, 'roots.json');
		await fs.writeFile(
			file,
			JSON.stringify([
				{cnName: '客户', enAbbr: 'cust'},
				{cnName: '编号', enAbbr: 'no'},
			]),
		);

		expect(await runCommand(catalog, 'import', ['roots', file])).toBe(
			'Imported 2, failed 0',
		);
		expect(await runCommand(catalog, 'suggest', ['客户编号'])).toBe(
			['客户', '  #1 客户 cust', '编号', '  #2 编号 no'].join('\n'),
		);
	});

	it('lists failed import rows', async () => {
		const file = path.join(dir, 'roots.json');
		await fs.writeFile(file, JSON.stringify([{cnName: '客户'}]));

		expect(await runCommand(catalog, 'import', ['roots', file])).toBe(
			'Imported 0, failed 1\n  Row 1: word root [客户] failed: Invalid word root: enAbbr: Required',
		);
	});

	it('reports lexical search hits', async () => {
		await catalog.synchronizer.createWordRoot({cnName: '客户', enAbbr: 'cust'});

		expect(await runCommand(catalog, 'search', ['roots', '客'])).toBe(
			'Found 1 results for "客" (lexical):\n  #1 客户 cust',
		);
	});

	it('reports missing entities', async () => {
		expect(await runCommand(catalog, 'delete', ['fields', '5'])).toBe(
			'5 not found',
		);
		expect(await runCommand(catalog, 'details', ['9'])).toBe(
			'Standard field 9 not found',
		);
	});

	it('lists a page of roots', async () => {
		await catalog.synchronizer.createWordRoot({cnName: '客户', enAbbr: 'cust'});

		expect(await runCommand(catalog, 'list', ['roots'], {q: 'cust'})).toBe(
			'#1 客户 cust\n1 of 1',
		);
	});

	it('clears a table', async () => {
		expect(await runCommand(catalog, 'clear', ['roots'])).toBe('Cleared roots');
		expect(await runCommand(catalog, 'health', [])).toBe(
			'up (database connected)',
		);
	});

	it('rejects bad arguments', async () => {
		await expect(
			runCommand(catalog, 'list', ['tables']),
		).rejects.toBeInstanceOf(ValidationError);
		await expect(runCommand(catalog, 'delete', ['roots', 'x'])).rejects.toThrow(
			'Expected a positive integer id, got "x"',
		);
	});
});

describe('readImportFile', () => {
	it('requires a JSON array', async () => {
		const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'termbase-import-test-'));
		const file = path.join(dir, 'one.json');
		await fs.writeFile(file, '{"cnName":"客户"}');

		await expect(readImportFile(file)).rejects.toThrow(
			`${file} must contain a JSON array`,
		);
		await fs.rm(dir, {recursive: true, force: true});
	});
});

describe('isCommand', () => {
	it('knows the command names', () => {
		expect(isCommand('suggest')).toBe(true);
		expect(isCommand('serve')).toBe(false);
	});
});
