/**
 * Vector index wrapping an embedded LanceDB database.
 *
 * One table per collection. Rows carry the vocabulary id, the embedding,
 * and a JSON payload of display fields.
 */

import * as lancedb from '@lancedb/lancedb';
import {makeArrowTable} from '@lancedb/lancedb';
import type {Connection, Table} from '@lancedb/lancedb';
import type {CollectionName} from '../lib/constants.js';
import {VectorIndexError} from '../lib/errors.js';
import type {Logger} from '../lib/logger.js';
import {createPointSchema} from './schema.js';
import type {PointPayload, VectorHit, VectorIndex, VectorPoint} from './types.js';

type PointRow = {id: number; vector: number[]; payload: string};

function pointToRow(point: VectorPoint): PointRow {
	return {
		id: point.id,
		vector: point.vector,
		payload: JSON.stringify(point.payload),
	};
}

function parsePayload(raw: unknown): PointPayload {
	if (typeof raw !== 'string') return {};
	const value: unknown = JSON.parse(raw);
	if (typeof value !== 'object' || value === null) return {};

	const payload: PointPayload = {};
	for (const [key, v] of Object.entries(value)) {
		if (typeof v === 'string') payload[key] = v;
	}
	return payload;
}

/**
 * Convert a LanceDB result row into a hit.
 * LanceDB reports cosine distance (1 - similarity) in _distance.
 */
function rowToHit(row: unknown): VectorHit | null {
	if (typeof row !== 'object' || row === null) return null;
	if (!('id' in row) || typeof row.id !== 'number') return null;

	const distance =
		'_distance' in row && typeof row._distance === 'number'
			? row._distance
			: 1;

	return {
		id: row.id,
		score: 1 - distance,
		payload: 'payload' in row ? parsePayload(row.payload) : {},
	};
}

function wrap(operation: string, collection: string, error: unknown) {
	const message = error instanceof Error ? error.message : String(error);
	return new VectorIndexError(`${operation} [${collection}]: ${message}`, error);
}

export class LanceVectorIndex implements VectorIndex {
	private db: Connection | null = null;
	private readonly tables = new Map<CollectionName, Table>();
	private readonly dimensions = new Map<CollectionName, number>();

	constructor(
		private readonly dbPath: string,
		private readonly logger?: Logger,
	) {}

	/**
	 * Connect to the LanceDB database, or adopt an open connection.
	 */
	async connect(connection?: Connection): Promise<void> {
		if (connection) {
			this.db = connection;
			return;
		}
		try {
			this.db = await lancedb.connect(this.dbPath);
		} catch (error) {
			throw wrap('Connect', this.dbPath, error);
		}
	}

	async ensureCollection(
		collection: CollectionName,
		dimensions: number,
	): Promise<void> {
		const db = this.getDb();
		try {
			const tableNames = await db.tableNames();
			if (tableNames.includes(collection)) {
				const table = await db.openTable(collection);
				const existing = await this.getTableVectorDimensions(table);
				if (existing !== null && existing !== dimensions) {
					// Model changed - vectors are derived, so rebuild empty
					this.logger?.warn('VectorIndex', 'Dimension mismatch, recreating', {
						collection,
						existing,
						required: dimensions,
					});
					await db.dropTable(collection);
					this.tables.set(
						collection,
						await db.createEmptyTable(collection, createPointSchema(dimensions)),
					);
				} else {
					this.tables.set(collection, table);
				}
			} else {
				this.logger?.info('VectorIndex', 'Creating collection', {
					collection,
					dimensions,
				});
				this.tables.set(
					collection,
					await db.createEmptyTable(collection, createPointSchema(dimensions)),
				);
			}
			this.dimensions.set(collection, dimensions);
		} catch (error) {
			throw wrap('Ensure collection', collection, error);
		}
	}

	async upsert(collection: CollectionName, points: VectorPoint[]): Promise<void> {
		if (points.length === 0) return;
		const table = this.getTable(collection);
		try {
			await table
				.mergeInsert('id')
				.whenMatchedUpdateAll()
				.whenNotMatchedInsertAll()
				.execute(this.toArrow(collection, points));
		} catch (error) {
			throw wrap('Upsert', collection, error);
		}
	}

	/**
	 * Overwrite the collection with an empty table, then add the points.
	 *
	 * On failure the table handle is reopened from whatever is on disk, so
	 * later writes and a retried replace still work.
	 */
	async replaceAll(
		collection: CollectionName,
		points: VectorPoint[],
	): Promise<void> {
		const db = this.getDb();
		const dimensions = this.getDimensions(collection);
		try {
			// Build the batch before touching the table
			const data = points.length > 0 ? this.toArrow(collection, points) : null;
			const table = await db.createEmptyTable(
				collection,
				createPointSchema(dimensions),
				{mode: 'overwrite'},
			);
			this.tables.set(collection, table);
			if (data) await table.add(data);
		} catch (error) {
			await this.reopen(collection, dimensions);
			throw wrap('Replace', collection, error);
		}
	}

	async deleteByIds(collection: CollectionName, ids: number[]): Promise<void> {
		if (ids.length === 0) return;
		const table = this.getTable(collection);
		const list = ids.map(id => Math.trunc(id)).join(', ');
		try {
			await table.delete(`id IN (${list})`);
		} catch (error) {
			throw wrap('Delete', collection, error);
		}
	}

	async deleteAll(collection: CollectionName): Promise<void> {
		const table = this.getTable(collection);
		try {
			await table.delete('id IS NOT NULL');
		} catch (error) {
			throw wrap('Delete all', collection, error);
		}
	}

	async search(
		collection: CollectionName,
		vector: number[],
		k: number,
	): Promise<VectorHit[]> {
		const table = this.getTable(collection);
		try {
			const rows = await table
				.vectorSearch(vector)
				.distanceType('cosine')
				.limit(k)
				.toArray();
			const hits: VectorHit[] = [];
			for (const row of rows) {
				const hit = rowToHit(row);
				if (hit) hits.push(hit);
			}
			return hits;
		} catch (error) {
			throw wrap('Search', collection, error);
		}
	}

	async count(collection: CollectionName): Promise<number> {
		const table = this.getTable(collection);
		try {
			return await table.countRows();
		} catch (error) {
			throw wrap('Count', collection, error);
		}
	}

	/**
	 * Ids currently stored in a collection, ascending.
	 */
	async listIds(collection: CollectionName): Promise<number[]> {
		const table = this.getTable(collection);
		try {
			const rows = await table.query().select(['id']).toArray();
			const ids: number[] = [];
			for (const row of rows) {
				const hit = rowToHit(row);
				if (hit) ids.push(hit.id);
			}
			return ids.sort((a, b) => a - b);
		} catch (error) {
			throw wrap('List ids', collection, error);
		}
	}

	close(): void {
		// LanceDB connections don't need explicit closing in the JS SDK
		this.db = null;
		this.tables.clear();
	}

	private toArrow(collection: CollectionName, points: VectorPoint[]) {
		const schema = createPointSchema(this.getDimensions(collection));
		return makeArrowTable(points.map(pointToRow), {schema});
	}

	/**
	 * Get the vector column dimensions from a table schema.
	 * Returns null if vector column not found.
	 */
	private async getTableVectorDimensions(table: Table): Promise<number | null> {
		try {
			const schema = await table.schema();
			const type: unknown = schema.fields.find(f => f.name === 'vector')?.type;
			if (
				typeof type === 'object' &&
				type !== null &&
				'listSize' in type &&
				typeof type.listSize === 'number'
			) {
				return type.listSize;
			}
			return null;
		} catch {
			return null;
		}
	}

	/**
	 * Refresh the cached handle after a failed replace: open the table if it
	 * still exists, otherwise create it empty.
	 */
	private async reopen(
		collection: CollectionName,
		dimensions: number,
	): Promise<void> {
		const db = this.getDb();
		this.tables.delete(collection);
		try {
			const tableNames = await db.tableNames();
			this.tables.set(
				collection,
				tableNames.includes(collection)
					? await db.openTable(collection)
					: await db.createEmptyTable(collection, createPointSchema(dimensions)),
			);
		} catch (error) {
			this.logger?.error(
				'VectorIndex',
				`Could not reopen ${collection} after a failed replace`,
				error instanceof Error ? error : new Error(String(error)),
			);
		}
	}

	private getDb(): Connection {
		if (!this.db) {
			throw new VectorIndexError('Vector index not connected. Call connect() first.');
		}
		return this.db;
	}

	private getTable(collection: CollectionName): Table {
		const table = this.tables.get(collection);
		if (!table) {
			throw new VectorIndexError(
				`Collection ${collection} not available. Call ensureCollection() first.`,
			);
		}
		return table;
	}

	private getDimensions(collection: CollectionName): number {
		const dimensions = this.dimensions.get(collection);
		if (dimensions === undefined) {
			throw new VectorIndexError(
				`Collection ${collection} not available. Call ensureCollection() first.`,
			);
		}
		return dimensions;
	}
}
