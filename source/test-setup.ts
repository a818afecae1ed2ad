import os from 'node:os';
import path from 'node:path';

// Ensure tests never write to real user data directories.
process.env['TERMBASE_HOME'] =
	process.env['TERMBASE_HOME'] ??
	path.join(os.tmpdir(), `termbase-test-home-${process.pid}`);

// Tests never download a model.
process.env['TERMBASE_EMBEDDING'] = 'mock';
