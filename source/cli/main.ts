#!/usr/bin/env node
/**
 * termbase CLI entry point.
 */

import chalk from 'chalk';
import meow from 'meow';
import {Catalog} from '../catalog/index.js';
import {loadConfig} from '../lib/config.js';
import {getTermbaseHomeDir} from '../lib/constants.js';
import {ValidationError, errorMessage} from '../lib/errors.js';
import {
	combineLoggers,
	createConsoleLogger,
	createLogger,
	toError,
} from '../lib/logger.js';
import {COMMANDS, isCommand, runCommand} from './commands.js';

const cli = meow(
	`
	Usage
	  $ termbase <command> [args]

	Commands
	  resync                        Rebuild the vector index from the database
	  import <roots|fields> <file>  Import a JSON array of entries
	  suggest <text>                Resolve text into word roots
	  search <roots|fields> <query> Lexical, then semantic search
	  similar <query>               Word roots closest in meaning
	  list <roots|fields>           List entries, newest first
	  details <fieldId>             Word roots of a standard field, in order
	  delete <roots|fields> <id>    Delete one entry
	  clear <roots|fields>          Delete every entry of a kind
	  health                        Check the database connection

	Options
	  --page       Page number for list (default 1)
	  --page-size  Page size for list (default 20)
	  --q          Filter for list
	  --help       Show help
	  --version    Show version

	Environment
	  TERMBASE_HOME, TERMBASE_DB_PATH, TERMBASE_VECTOR_PATH,
	  TERMBASE_EMBEDDING (local|mock), TERMBASE_MODEL_CACHE, TERMBASE_LOG_LEVEL
`,
	{
		importMeta: import.meta,
		flags: {
			page: {type: 'number'},
			pageSize: {type: 'number'},
			q: {type: 'string'},
		},
	},
);

async function main(): Promise<number> {
	const [command, ...args] = cli.input;
	if (!command || !isCommand(command)) {
		process.stderr.write(
			chalk.red(`Unknown command "${command ?? ''}". Expected one of: ${COMMANDS.join(', ')}`) +
				'\n',
		);
		return 2;
	}

	const config = await loadConfig(getTermbaseHomeDir());
	const logger = combineLoggers(
		createLogger(config.dataDir, config.logLevel),
		createConsoleLogger('warn'),
	);

	const catalog = await Catalog.open(config, {
		logger,
		// The resync command does its own full rebuild
		skipResync: command === 'resync',
		onModelProgress: (status, progress) => {
			if (status === 'downloading' && progress !== undefined) {
				process.stderr.write(chalk.dim(`\rDownloading model ${progress.toFixed(0)}%`));
			} else if (status === 'ready') {
				process.stderr.write('\r\x1b[K');
			}
		},
	});

	try {
		const output = await runCommand(catalog, command, args, {
			page: cli.flags.page,
			pageSize: cli.flags.pageSize,
			q: cli.flags.q,
		});
		process.stdout.write(output + '\n');
		return 0;
	} catch (error) {
		if (!(error instanceof ValidationError)) {
			logger.error('CLI', `Command ${command} failed`, toError(error));
		}
		process.stderr.write(chalk.red(errorMessage(error)) + '\n');
		return 1;
	} finally {
		catalog.close();
	}
}

main().then(
	code => {
		process.exitCode = code;
	},
	(error: unknown) => {
		process.stderr.write(chalk.red(`Fatal: ${errorMessage(error)}`) + '\n');
		process.exitCode = 1;
	},
);
