import {describe, it, expect, beforeEach, afterEach, vi} from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {getLogPath} from '../constants.js';
import {combineLoggers, createLogger, formatEntry, type Logger} from '../logger.js';

describe('logger', () => {
	let dataDir: string;

	beforeEach(async () => {
		dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'termbase-log-test-'));
	});

	afterEach(async () => {
		await fs.rm(dataDir, {recursive: true, force: true});
	});

	it('formats level, component and data', () => {
		const entry = formatEntry('warn', 'Sync', 'Upsert failed', {id: 3});

		expect(entry).toMatch(
			/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] \[WARN \] Sync: Upsert failed\n {2}\{"id":3\}$/,
		);
	});

	it('includes the error message for errors', () => {
		const entry = formatEntry('error', 'Catalog', 'Open failed', new Error('disk full'));

		expect(entry).toContain('] [ERROR] Catalog: Open failed\n  Error: disk full');
	});

	it('writes entries at or above the minimum level to the daily file', async () => {
		const logger = createLogger(dataDir, 'info');
		logger.debug('Test', 'hidden');
		logger.info('Test', 'shown');

		const content = await fs.readFile(getLogPath(dataDir), 'utf-8');
		const lines = content.trim().split('\n');
		expect(lines).toHaveLength(1);
		expect(lines[0]).toMatch(/\[INFO \] Test: shown$/);
	});

	it('reports an unwritable log location once on stderr', async () => {
		const blocked = path.join(dataDir, 'blocked');
		await fs.writeFile(blocked, '');
		const stderr = vi
			.spyOn(process.stderr, 'write')
			.mockImplementation(() => true);

		try {
			const logger = createLogger(blocked, 'info');
			logger.info('Test', 'first');
			logger.error('Test', 'second');

			expect(stderr).toHaveBeenCalledTimes(1);
			expect(String(stderr.mock.calls[0]?.[0])).toMatch(
				/^termbase: cannot write log file under .*blocked: /,
			);
		} finally {
			stderr.mockRestore();
		}
	});

	it('fans out to every combined logger', () => {
		const seen: string[] = [];
		const recorder = (name: string): Logger => ({
			debug() {},
			info(_component, message) {
				seen.push(`${name}:${message}`);
			},
			warn() {},
			error() {},
		});

		combineLoggers(recorder('a'), recorder('b')).info('Test', 'hello');

		expect(seen).toEqual(['a:hello', 'b:hello']);
	});
});
