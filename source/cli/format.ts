/**
 * Terminal formatting for command output.
 */

import chalk from 'chalk';
import type {HealthStatus} from '../catalog/index.js';
import type {Segment} from '../resolve/index.js';
import type {SearchHit} from '../search/index.js';
import type {Page, StandardField, WordRoot} from '../store/types.js';
import type {ClearResult, ImportResult, ResyncResult} from '../sync/index.js';

/**
 * Get score color based on value.
 */
function getScoreColor(score: number): (s: string) => string {
	if (score > 0.8) return chalk.green;
	if (score > 0.5) return chalk.yellow;
	return chalk.red;
}

export function formatWordRoot(root: WordRoot): string {
	const parts = [
		chalk.dim(`#${root.id}`),
		chalk.white(root.cnName),
		chalk.cyan(root.enAbbr),
	];
	if (root.enFullName) parts.push(chalk.dim(`(${root.enFullName})`));
	if (root.associatedTerms) parts.push(chalk.dim(`[${root.associatedTerms}]`));
	return parts.join(' ');
}

export function formatField(field: StandardField): string {
	const parts = [
		chalk.dim(`#${field.id}`),
		chalk.white(field.cnName),
		chalk.cyan(field.enName),
		chalk.magenta(field.dataType),
		chalk.dim(`roots=[${field.compositionIds.join(', ')}]`),
	];
	if (!field.isStandard) parts.push(chalk.yellow('non-standard'));
	return parts.join(' ');
}

export function formatPage<T>(
	page: Page<T>,
	format: (item: T) => string,
): string {
	if (page.items.length === 0) {
		return chalk.dim(`No entries (total ${page.total})`);
	}
	return [
		...page.items.map(format),
		chalk.dim(`${page.items.length} of ${page.total}`),
	].join('\n');
}

/**
 * Format search hits for display with colors.
 */
export function formatSearchHits(query: string, hits: SearchHit[]): string {
	if (hits.length === 0) {
		return chalk.dim(`No results found for "${query}"`);
	}

	const source = hits[0]?.source ?? 'lexical';
	const lines = [
		chalk.bold(`Found ${hits.length} results for `) +
			chalk.cyan(`"${query}"`) +
			chalk.dim(` (${source}):`),
	];
	for (const hit of hits) {
		const score =
			hit.score === null ? '' : ` ${getScoreColor(hit.score)(hit.score.toFixed(4))}`;
		lines.push(
			`  ${chalk.dim(`#${hit.id}`)} ${chalk.white(hit.cnName)} ${chalk.cyan(hit.enName)}${score}`,
		);
	}
	return lines.join('\n');
}

export function formatSegments(segments: Segment[]): string {
	if (segments.length === 0) {
		return chalk.dim('Nothing to resolve');
	}

	const lines: string[] = [];
	for (const segment of segments) {
		lines.push(chalk.bold(segment.word));
		if (segment.candidates.length === 0) {
			lines.push(chalk.yellow('  no known word root'));
			continue;
		}
		for (const root of segment.candidates) {
			lines.push(`  ${formatWordRoot(root)}`);
		}
	}
	return lines.join('\n');
}

export function formatImportResult(result: ImportResult): string {
	const lines = [
		`${chalk.green(`Imported ${result.successCount}`)}, ` +
			(result.failureCount > 0
				? chalk.red(`failed ${result.failureCount}`)
				: chalk.dim('failed 0')),
	];
	for (const error of result.errors) {
		lines.push(chalk.red(`  ${error}`));
	}
	return lines.join('\n');
}

export function formatResync(results: ResyncResult[]): string {
	return results
		.map(r => `Resynced ${chalk.cyan(r.collection)}: ${r.points} points`)
		.join('\n');
}

export function formatClearResult(table: string, result: ClearResult): string {
	if (result.vectorCleared) {
		return chalk.green(`Cleared ${table}`);
	}
	return (
		chalk.green(`Cleared ${table}`) +
		'\n' +
		chalk.yellow(`Vector index not cleared: ${result.vectorError}`)
	);
}

export function formatHealth(health: HealthStatus): string {
	return health.status === 'up'
		? chalk.green(`up (database ${health.database})`)
		: chalk.red(`down (${health.error})`);
}
