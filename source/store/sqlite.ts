/**
 * Vocabulary store backed by SQLite (better-sqlite3).
 *
 * The store is the system of record: it assigns identifiers and owns the
 * content of every word root and standard field.
 */

import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import {DuplicateEntryError, StoreError} from '../lib/errors.js';
import {foldText} from '../lib/terms.js';
import {IS_STANDARD_EXPR, SCHEMA_SQL, TABLES} from './schema.js';
import {
	rowToStandardField,
	rowToWordRoot,
	type Page,
	type StandardField,
	type StandardFieldInput,
	type StandardFieldRow,
	type StandardFieldStore,
	type VocabularyStore,
	type WordRoot,
	type WordRootInput,
	type WordRootRow,
	type WordRootStore,
} from './types.js';

// ============================================================================
// Helpers
// ============================================================================

/**
 * Escape LIKE wildcards so user input matches literally (ESCAPE '\').
 */
export function escapeLike(s: string): string {
	return s.replace(/[\\%_]/g, c => `\\${c}`);
}

type PageParams = {pattern: string; limit: number; offset: number};
type SearchParams = {pattern: string; limit: number};

// Matched against fold_text(column)
function containsPattern(s: string): string {
	return `%${escapeLike(foldText(s))}%`;
}

function tokenPattern(s: string): string {
	return `% ${escapeLike(s)} %`;
}

function isUniqueViolation(error: unknown): boolean {
	return (
		error instanceof Database.SqliteError &&
		(error.code === 'SQLITE_CONSTRAINT_UNIQUE' ||
			error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
	);
}

/**
 * Run a driver call, translating driver errors into StoreError.
 */
function guard<T>(operation: string, fn: () => T): T {
	try {
		return fn();
	} catch (error) {
		if (error instanceof StoreError) throw error;
		const message = error instanceof Error ? error.message : String(error);
		if (isUniqueViolation(error)) {
			throw new DuplicateEntryError(`${operation}: ${message}`, error);
		}
		throw new StoreError(`${operation}: ${message}`, error);
	}
}

function resetSequence(db: Database.Database, table: string): void {
	// sqlite_sequence exists once any AUTOINCREMENT table has had a row
	const hasSequence = db
		.prepare<[], {name: string}>(
			"SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'sqlite_sequence'",
		)
		.get();
	if (hasSequence) {
		db.prepare('DELETE FROM sqlite_sequence WHERE name = ?').run(table);
	}
}

// ============================================================================
// Word roots
// ============================================================================

const ROOT_COLUMNS =
	'id, cn_name, en_abbr, en_full_name, associated_terms, remark, created_at';

class SqliteWordRootStore implements WordRootStore {
	constructor(private readonly db: Database.Database) {}

	insert(input: WordRootInput): WordRoot {
		return guard('Insert word root', () => {
			const row = this.db
				.prepare<unknown[], WordRootRow>(
					`INSERT INTO word_roots (cn_name, en_abbr, en_full_name, associated_terms, remark)
					 VALUES (?, ?, ?, ?, ?)
					 RETURNING ${ROOT_COLUMNS}`,
				)
				.get(
					input.cnName,
					input.enAbbr,
					input.enFullName ?? null,
					input.associatedTerms ?? null,
					input.remark ?? null,
				);
			if (!row) throw new StoreError('Insert word root: no row returned');
			return rowToWordRoot(row);
		});
	}

	update(id: number, input: WordRootInput): WordRoot | null {
		return guard('Update word root', () => {
			const row = this.db
				.prepare<unknown[], WordRootRow>(
					`UPDATE word_roots
					 SET cn_name = ?, en_abbr = ?, en_full_name = ?, associated_terms = ?, remark = ?
					 WHERE id = ?
					 RETURNING ${ROOT_COLUMNS}`,
				)
				.get(
					input.cnName,
					input.enAbbr,
					input.enFullName ?? null,
					input.associatedTerms ?? null,
					input.remark ?? null,
					id,
				);
			return row ? rowToWordRoot(row) : null;
		});
	}

	delete(id: number): number {
		return guard('Delete word root', () => {
			return this.db.prepare('DELETE FROM word_roots WHERE id = ?').run(id)
				.changes;
		});
	}

	getById(id: number): WordRoot | null {
		return guard('Get word root', () => {
			const row = this.db
				.prepare<[number], WordRootRow>(
					`SELECT ${ROOT_COLUMNS} FROM word_roots WHERE id = ?`,
				)
				.get(id);
			return row ? rowToWordRoot(row) : null;
		});
	}

	getByIds(ids: number[]): WordRoot[] {
		if (ids.length === 0) return [];
		return guard('Get word roots', () => {
			return this.db
				.prepare<[string], WordRootRow>(
					`SELECT ${ROOT_COLUMNS} FROM word_roots
					 WHERE id IN (SELECT value FROM json_each(?))
					 ORDER BY id`,
				)
				.all(JSON.stringify(ids))
				.map(rowToWordRoot);
		});
	}

	listPage(offset: number, limit: number, pattern?: string): Page<WordRoot> {
		return guard('List word roots', () => {
			const total = this.count(pattern);
			const rows = pattern
				? this.db
						.prepare<PageParams, WordRootRow>(
							`SELECT ${ROOT_COLUMNS} FROM word_roots
							 WHERE fold_text(cn_name) LIKE @pattern ESCAPE '\\' OR fold_text(en_abbr) LIKE @pattern ESCAPE '\\'
							 ORDER BY created_at DESC, id DESC
							 LIMIT @limit OFFSET @offset`,
						)
						.all({pattern: containsPattern(pattern), limit, offset})
				: this.db
						.prepare<[number, number], WordRootRow>(
							`SELECT ${ROOT_COLUMNS} FROM word_roots
							 ORDER BY created_at DESC, id DESC
							 LIMIT ? OFFSET ?`,
						)
						.all(limit, offset);
			return {items: rows.map(rowToWordRoot), total};
		});
	}

	count(pattern?: string): number {
		return guard('Count word roots', () => {
			const row = pattern
				? this.db
						.prepare<{pattern: string}, {total: number}>(
							`SELECT count(*) AS total FROM word_roots
							 WHERE fold_text(cn_name) LIKE @pattern ESCAPE '\\' OR fold_text(en_abbr) LIKE @pattern ESCAPE '\\'`,
						)
						.get({pattern: containsPattern(pattern)})
				: this.db
						.prepare<[], {total: number}>(
							'SELECT count(*) AS total FROM word_roots',
						)
						.get();
			return row?.total ?? 0;
		});
	}

	listAll(): WordRoot[] {
		return guard('List all word roots', () => {
			return this.db
				.prepare<[], WordRootRow>(
					`SELECT ${ROOT_COLUMNS} FROM word_roots ORDER BY id`,
				)
				.all()
				.map(rowToWordRoot);
		});
	}

	listNames(): string[] {
		return guard('List word root names', () => {
			return this.db
				.prepare<[], {cn_name: string}>(
					'SELECT cn_name FROM word_roots ORDER BY id',
				)
				.all()
				.map(r => r.cn_name);
		});
	}

	findByTerm(term: string): WordRoot[] {
		return guard('Find word roots by term', () => {
			return this.db
				.prepare<[string, string], WordRootRow>(
					`SELECT ${ROOT_COLUMNS} FROM word_roots
					 WHERE cn_name = ?
					    OR (' ' || associated_terms || ' ') LIKE ? ESCAPE '\\'
					 ORDER BY id`,
				)
				.all(term, tokenPattern(term))
				.map(rowToWordRoot);
		});
	}

	searchLexical(query: string, limit: number): WordRoot[] {
		return guard('Search word roots', () => {
			return this.db
				.prepare<SearchParams, WordRootRow>(
					`SELECT ${ROOT_COLUMNS} FROM word_roots
					 WHERE fold_text(cn_name) LIKE @pattern ESCAPE '\\' OR fold_text(associated_terms) LIKE @pattern ESCAPE '\\'
					 ORDER BY id
					 LIMIT @limit`,
				)
				.all({pattern: containsPattern(query), limit})
				.map(rowToWordRoot);
		});
	}

	clear(): void {
		guard('Clear word roots', () => {
			this.db.transaction(() => {
				this.db.prepare('DELETE FROM word_roots').run();
				resetSequence(this.db, TABLES.WORD_ROOTS);
			})();
		});
	}
}

// ============================================================================
// Standard fields
// ============================================================================

const FIELD_COLUMNS =
	'id, field_cn_name, field_en_name, composition_ids, data_type, associated_terms, is_standard, created_at';

class SqliteStandardFieldStore implements StandardFieldStore {
	constructor(private readonly db: Database.Database) {}

	insert(input: StandardFieldInput): StandardField {
		return guard('Insert standard field', () => {
			const row = this.db.transaction(() => {
				const inserted = this.db
					.prepare<unknown[], {id: number}>(
						`INSERT INTO standard_fields (field_cn_name, field_en_name, composition_ids, data_type, associated_terms)
						 VALUES (?, ?, ?, ?, ?)
						 RETURNING id`,
					)
					.get(
						input.cnName,
						input.enName,
						JSON.stringify(input.compositionIds),
						input.dataType,
						input.associatedTerms ?? null,
					);
				if (!inserted) {
					throw new StoreError('Insert standard field: no row returned');
				}
				return this.refreshAndRead(inserted.id);
			})();
			if (!row) throw new StoreError('Insert standard field: row vanished');
			return rowToStandardField(row);
		});
	}

	update(id: number, input: StandardFieldInput): StandardField | null {
		return guard('Update standard field', () => {
			const row = this.db.transaction(() => {
				const changes = this.db
					.prepare(
						`UPDATE standard_fields
						 SET field_cn_name = ?, field_en_name = ?, composition_ids = ?, data_type = ?, associated_terms = ?
						 WHERE id = ?`,
					)
					.run(
						input.cnName,
						input.enName,
						JSON.stringify(input.compositionIds),
						input.dataType,
						input.associatedTerms ?? null,
						id,
					).changes;
				return changes > 0 ? this.refreshAndRead(id) : undefined;
			})();
			return row ? rowToStandardField(row) : null;
		});
	}

	delete(id: number): number {
		return guard('Delete standard field', () => {
			return this.db.prepare('DELETE FROM standard_fields WHERE id = ?').run(id)
				.changes;
		});
	}

	getById(id: number): StandardField | null {
		return guard('Get standard field', () => {
			const row = this.readRow(id);
			return row ? rowToStandardField(row) : null;
		});
	}

	listPage(
		offset: number,
		limit: number,
		pattern?: string,
	): Page<StandardField> {
		return guard('List standard fields', () => {
			const total = this.count(pattern);
			const rows = pattern
				? this.db
						.prepare<PageParams, StandardFieldRow>(
							`SELECT ${FIELD_COLUMNS} FROM standard_fields
							 WHERE fold_text(field_cn_name) LIKE @pattern ESCAPE '\\' OR fold_text(associated_terms) LIKE @pattern ESCAPE '\\'
							 ORDER BY created_at DESC, id DESC
							 LIMIT @limit OFFSET @offset`,
						)
						.all({pattern: containsPattern(pattern), limit, offset})
				: this.db
						.prepare<[number, number], StandardFieldRow>(
							`SELECT ${FIELD_COLUMNS} FROM standard_fields
							 ORDER BY created_at DESC, id DESC
							 LIMIT ? OFFSET ?`,
						)
						.all(limit, offset);
			return {items: rows.map(rowToStandardField), total};
		});
	}

	count(pattern?: string): number {
		return guard('Count standard fields', () => {
			const row = pattern
				? this.db
						.prepare<{pattern: string}, {total: number}>(
							`SELECT count(*) AS total FROM standard_fields
							 WHERE fold_text(field_cn_name) LIKE @pattern ESCAPE '\\' OR fold_text(associated_terms) LIKE @pattern ESCAPE '\\'`,
						)
						.get({pattern: containsPattern(pattern)})
				: this.db
						.prepare<[], {total: number}>(
							'SELECT count(*) AS total FROM standard_fields',
						)
						.get();
			return row?.total ?? 0;
		});
	}

	listAll(): StandardField[] {
		return guard('List all standard fields', () => {
			return this.db
				.prepare<[], StandardFieldRow>(
					`SELECT ${FIELD_COLUMNS} FROM standard_fields ORDER BY id`,
				)
				.all()
				.map(rowToStandardField);
		});
	}

	findByTerm(term: string): StandardField[] {
		return guard('Find standard fields by term', () => {
			return this.db
				.prepare<[string, string], StandardFieldRow>(
					`SELECT ${FIELD_COLUMNS} FROM standard_fields
					 WHERE field_cn_name = ?
					    OR (' ' || associated_terms || ' ') LIKE ? ESCAPE '\\'
					 ORDER BY id`,
				)
				.all(term, tokenPattern(term))
				.map(rowToStandardField);
		});
	}

	searchLexical(query: string, limit: number): StandardField[] {
		return guard('Search standard fields', () => {
			return this.db
				.prepare<SearchParams, StandardFieldRow>(
					`SELECT ${FIELD_COLUMNS} FROM standard_fields
					 WHERE fold_text(field_cn_name) LIKE @pattern ESCAPE '\\' OR fold_text(associated_terms) LIKE @pattern ESCAPE '\\'
					 ORDER BY id
					 LIMIT @limit`,
				)
				.all({pattern: containsPattern(query), limit})
				.map(rowToStandardField);
		});
	}

	missingWordRootIds(ids: number[]): number[] {
		if (ids.length === 0) return [];
		return guard('Check word root ids', () => {
			const found = new Set(
				this.db
					.prepare<[string], {id: number}>(
						'SELECT id FROM word_roots WHERE id IN (SELECT value FROM json_each(?))',
					)
					.all(JSON.stringify(ids))
					.map(r => r.id),
			);
			return ids.filter(id => !found.has(id));
		});
	}

	refreshStandardFlags(): void {
		guard('Refresh standard flags', () => {
			this.db
				.prepare(`UPDATE standard_fields SET is_standard = ${IS_STANDARD_EXPR}`)
				.run();
		});
	}

	clear(): void {
		guard('Clear standard fields', () => {
			this.db.transaction(() => {
				this.db.prepare('DELETE FROM standard_fields').run();
				resetSequence(this.db, TABLES.STANDARD_FIELDS);
			})();
		});
	}

	private refreshAndRead(id: number): StandardFieldRow | undefined {
		this.db
			.prepare(
				`UPDATE standard_fields SET is_standard = ${IS_STANDARD_EXPR} WHERE id = ?`,
			)
			.run(id);
		return this.readRow(id);
	}

	private readRow(id: number): StandardFieldRow | undefined {
		return this.db
			.prepare<[number], StandardFieldRow>(
				`SELECT ${FIELD_COLUMNS} FROM standard_fields WHERE id = ?`,
			)
			.get(id);
	}
}

// ============================================================================
// Store
// ============================================================================

export class SqliteVocabularyStore implements VocabularyStore {
	readonly wordRoots: WordRootStore;
	readonly fields: StandardFieldStore;

	private constructor(private readonly db: Database.Database) {
		this.wordRoots = new SqliteWordRootStore(db);
		this.fields = new SqliteStandardFieldStore(db);
	}

	/**
	 * Open (and migrate) a store. Pass ':memory:' for an in-process database.
	 */
	static open(databasePath: string): SqliteVocabularyStore {
		return guard('Open database', () => {
			if (databasePath !== ':memory:') {
				fs.mkdirSync(path.dirname(databasePath), {recursive: true});
			}
			const db = new Database(databasePath);
			db.pragma('journal_mode = WAL');
			db.function('fold_text', {deterministic: true}, (value: unknown) =>
				typeof value === 'string' ? foldText(value) : null,
			);
			db.exec(SCHEMA_SQL);
			return new SqliteVocabularyStore(db);
		});
	}

	ping(): void {
		guard('Ping', () => {
			this.db.prepare('SELECT 1').get();
		});
	}

	close(): void {
		this.db.close();
	}
}
