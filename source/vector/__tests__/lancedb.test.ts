import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import * as lancedb from '@lancedb/lancedb';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {COLLECTIONS} from '../../lib/constants.js';
import {VectorIndexError} from '../../lib/errors.js';
import {LanceVectorIndex} from '../lancedb.js';
import type {VectorPoint} from '../types.js';

const DIMS = 4;

function point(id: number, vector: number[], cnName: string): VectorPoint {
	return {id, vector, payload: {cnName, enAbbr: `r${id}`}};
}

describe('LanceVectorIndex', () => {
	let dir: string;
	let index: LanceVectorIndex;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'termbase-vectors-test-'));
		index = new LanceVectorIndex(dir);
		await index.connect();
		await index.ensureCollection(COLLECTIONS.WORD_ROOTS, DIMS);
	});

	afterEach(async () => {
		index.close();
		await fs.rm(dir, {recursive: true, force: true});
	});

	it('upserts by id without duplicating points', async () => {
		await index.upsert(COLLECTIONS.WORD_ROOTS, [
			point(1, [1, 0, 0, 0], '客户'),
			point(2, [0, 1, 0, 0], '账户'),
		]);
		await index.upsert(COLLECTIONS.WORD_ROOTS, [point(1, [0, 0, 1, 0], '客户号')]);

		expect(await index.count(COLLECTIONS.WORD_ROOTS)).toBe(2);
		const [hit] = await index.search(COLLECTIONS.WORD_ROOTS, [0, 0, 1, 0], 1);
		expect(hit?.id).toBe(1);
		expect(hit?.payload).toEqual({cnName: '客户号', enAbbr: 'r1'});
		expect(hit?.score).toBeCloseTo(1, 5);
	});

	it('orders search hits by cosine similarity', async () => {
		await index.upsert(COLLECTIONS.WORD_ROOTS, [
			point(1, [1, 0, 0, 0], 'a'),
			point(2, [0.8, 0.6, 0, 0], 'b'),
			point(3, [0, 0, 0, 1], 'c'),
		]);

		const hits = await index.search(COLLECTIONS.WORD_ROOTS, [1, 0, 0, 0], 2);

		expect(hits.map(h => h.id)).toEqual([1, 2]);
		expect(hits[1]?.score).toBeCloseTo(0.8, 5);
	});

	it('deletes by id and deletes all', async () => {
		await index.upsert(COLLECTIONS.WORD_ROOTS, [
			point(1, [1, 0, 0, 0], 'a'),
			point(2, [0, 1, 0, 0], 'b'),
			point(3, [0, 0, 1, 0], 'c'),
		]);

		await index.deleteByIds(COLLECTIONS.WORD_ROOTS, [2]);
		expect(await index.listIds(COLLECTIONS.WORD_ROOTS)).toEqual([1, 3]);

		await index.deleteAll(COLLECTIONS.WORD_ROOTS);
		expect(await index.count(COLLECTIONS.WORD_ROOTS)).toBe(0);
	});

	it('replaces the whole collection', async () => {
		await index.upsert(COLLECTIONS.WORD_ROOTS, [
			point(1, [1, 0, 0, 0], 'a'),
			point(2, [0, 1, 0, 0], 'b'),
		]);

		await index.replaceAll(COLLECTIONS.WORD_ROOTS, [point(5, [0, 0, 1, 0], 'e')]);

		expect(await index.listIds(COLLECTIONS.WORD_ROOTS)).toEqual([5]);
	});

	it('stays usable after a replace fails midway', async () => {
		const db = await lancedb.connect(dir);
		const adopted = new LanceVectorIndex(dir);
		await adopted.connect(db);
		await adopted.ensureCollection(COLLECTIONS.WORD_ROOTS, DIMS);
		await adopted.upsert(COLLECTIONS.WORD_ROOTS, [point(1, [1, 0, 0, 0], 'a')]);

		vi.spyOn(db, 'createEmptyTable').mockRejectedValueOnce(new Error('disk full'));
		await expect(
			adopted.replaceAll(COLLECTIONS.WORD_ROOTS, [point(2, [0, 1, 0, 0], 'b')]),
		).rejects.toBeInstanceOf(VectorIndexError);

		await adopted.upsert(COLLECTIONS.WORD_ROOTS, [point(3, [0, 0, 1, 0], 'c')]);
		expect(await adopted.listIds(COLLECTIONS.WORD_ROOTS)).toEqual([1, 3]);

		await adopted.replaceAll(COLLECTIONS.WORD_ROOTS, [point(2, [0, 1, 0, 0], 'b')]);
		expect(await adopted.listIds(COLLECTIONS.WORD_ROOTS)).toEqual([2]);
		adopted.close();
	});

	it('recreates a collection whose dimensions changed', async () => {
		await index.upsert(COLLECTIONS.WORD_ROOTS, [point(1, [1, 0, 0, 0], 'a')]);

		await index.ensureCollection(COLLECTIONS.WORD_ROOTS, 8);

		expect(await index.count(COLLECTIONS.WORD_ROOTS)).toBe(0);
	});

	it('rejects use of a collection that was never ensured', async () => {
		await expect(
			index.search(COLLECTIONS.STANDARD_FIELDS, [1, 0, 0, 0], 5),
		).rejects.toBeInstanceOf(VectorIndexError);
	});
});
