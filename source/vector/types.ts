/**
 * Vector index contract.
 *
 * Point ids are vocabulary ids used verbatim; there is no mapping table
 * between the relational store and the index.
 */

import type {CollectionName} from '../lib/constants.js';

export type PointPayload = Record<string, string>;

export interface VectorPoint {
	id: number;
	vector: number[];
	payload: PointPayload;
}

export interface VectorHit {
	id: number;
	/** Cosine similarity, higher is closer */
	score: number;
	payload: PointPayload;
}

export interface VectorIndex {
	/** Create the collection if missing (cosine, fixed dimensions). */
	ensureCollection(collection: CollectionName, dimensions: number): Promise<void>;
	/** Insert or overwrite points by id. */
	upsert(collection: CollectionName, points: VectorPoint[]): Promise<void>;
	/** Replace the whole collection with exactly these points. */
	replaceAll(collection: CollectionName, points: VectorPoint[]): Promise<void>;
	deleteByIds(collection: CollectionName, ids: number[]): Promise<void>;
	deleteAll(collection: CollectionName): Promise<void>;
	search(
		collection: CollectionName,
		vector: number[],
		k: number,
	): Promise<VectorHit[]>;
	count(collection: CollectionName): Promise<number>;
	close(): void;
}
