/**
 * SQLite schema for the vocabulary tables.
 *
 * AUTOINCREMENT keeps identifiers from being reused after a delete, since an
 * id is also the vector point id. clear() resets the sequence explicitly.
 */

export const TABLES = {
	WORD_ROOTS: 'word_roots',
	STANDARD_FIELDS: 'standard_fields',
} as const;

export const SCHEMA_SQL = `
	CREATE TABLE IF NOT EXISTS word_roots (
		id INTEGER PRIMARY KEY AUTOINCREMENT,
		cn_name TEXT NOT NULL UNIQUE,
		en_abbr TEXT NOT NULL,
		en_full_name TEXT,
		associated_terms TEXT,
		remark TEXT,
		created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
	);

	CREATE TABLE IF NOT EXISTS standard_fields (
		id INTEGER PRIMARY KEY AUTOINCREMENT,
		field_cn_name TEXT NOT NULL,
		field_en_name TEXT NOT NULL,
		composition_ids TEXT NOT NULL DEFAULT '[]',
		data_type TEXT NOT NULL,
		associated_terms TEXT,
		is_standard INTEGER NOT NULL DEFAULT 0,
		created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
	);

	CREATE INDEX IF NOT EXISTS idx_word_roots_created_at ON word_roots(created_at);
	CREATE INDEX IF NOT EXISTS idx_standard_fields_created_at ON standard_fields(created_at);
`;

/**
 * Expression computing is_standard for a standard_fields row.
 */
export const IS_STANDARD_EXPR = `
	CASE
		WHEN json_array_length(standard_fields.composition_ids) > 0
			AND NOT EXISTS (
				SELECT 1 FROM json_each(standard_fields.composition_ids) AS j
				WHERE NOT EXISTS (SELECT 1 FROM word_roots AS r WHERE r.id = j.value)
			)
		THEN 1
		ELSE 0
	END
`;
