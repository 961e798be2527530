import chalk from 'chalk';
import {
	type ApplicationRecord,
	type CommandOutcome,
	type QueuedCommand,
	type SearchResult,
	setLogColors,
	truncateText,
} from 'botdeck';
import type { SessionSummary } from './protocol.js';

// ── Spinner ──

const SPINNER_FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

export class Spinner {
	private intervalId: ReturnType<typeof setInterval> | null = null;
	private frameIndex = 0;
	private message: string;

	constructor(message: string) {
		this.message = message;
	}

	start(): void {
		if (this.intervalId || !process.stdout.isTTY) return;
		this.frameIndex = 0;

		this.intervalId = setInterval(() => {
			const frame = SPINNER_FRAMES[this.frameIndex % SPINNER_FRAMES.length];
			process.stdout.write(`\r${chalk.cyan(frame)} ${this.message}`);
			this.frameIndex++;
		}, 80);
	}

	stop(finalMessage?: string): void {
		if (this.intervalId) {
			clearInterval(this.intervalId);
			this.intervalId = null;
			// Clear the spinner line
			process.stdout.write('\r\x1b[K');
		}
		if (finalMessage) {
			console.log(finalMessage);
		}
	}
}

// ── Outcomes ──

const RENDERING_PREVIEW = 120;

/**
 * One line per outcome, e.g. `1 ✓ robot.battery() 3ms` followed by an
 * indented output or error line.
 */
export function formatOutcome(outcome: CommandOutcome): string[] {
	const index = chalk.bold.white(`${outcome.position + 1}`);
	const icon = outcome.status === 'success' ? chalk.green('✓') : chalk.red('✗');
	const lines = [`${index} ${icon} ${chalk.yellow(outcome.command)} ${chalk.dim(`${outcome.durationMs}ms`)}`];

	if (outcome.status === 'success') {
		if (outcome.rendering) {
			lines.push(`  ${chalk.dim('output:')} ${truncateText(outcome.rendering, RENDERING_PREVIEW)}`);
		}
	} else {
		lines.push(`  ${chalk.red(`${outcome.kind}:`)} ${outcome.error}`);
	}

	return lines;
}

export function displayOutcomes(outcomes: readonly CommandOutcome[]): void {
	if (outcomes.length === 0) {
		console.log(chalk.yellow('Queue is empty; nothing to execute.'));
		return;
	}

	for (const outcome of outcomes) {
		for (const line of formatOutcome(outcome)) {
			console.log(line);
		}
	}

	const failed = outcomes.filter((o) => o.status === 'failure').length;
	const summary = `${outcomes.length - failed} succeeded, ${failed} failed`;
	console.log(failed > 0 ? chalk.yellow(summary) : chalk.green(summary));
}

// ── Queue ──

export function formatQueue(commands: readonly QueuedCommand[]): string[] {
	return commands.map((command, i) => `  ${chalk.dim(`${i + 1}.`)} ${command.text}`);
}

export function displayQueue(sessionId: string, commands: readonly QueuedCommand[]): void {
	if (commands.length === 0) {
		console.log(chalk.yellow(`No commands queued for session "${sessionId}".`));
		return;
	}
	console.log(chalk.bold(`Queued commands for "${sessionId}" (${commands.length}):`));
	for (const line of formatQueue(commands)) {
		console.log(line);
	}
}

// ── Search ──

export function formatApplication(record: ApplicationRecord): string {
	const author = record.author ? chalk.dim(` by ${record.author}`) : '';
	const description = record.description ? ` - ${record.description}` : '';
	return `  ${chalk.cyan(record.name)}${author}${description}`;
}

export function displaySearchResult(result: SearchResult): void {
	const noun = result.count === 1 ? 'application' : 'applications';
	console.log(chalk.bold(`${result.count} ${noun} found`));
	for (const record of result.matches) {
		console.log(formatApplication(record));
	}
}

// ── Sessions ──

export function displaySessions(sessions: readonly SessionSummary[]): void {
	if (sessions.length === 0) {
		console.log(chalk.yellow('No sessions.'));
		return;
	}

	console.log(chalk.bold(`Sessions (${sessions.length}):`));
	for (const session of sessions) {
		const accessed = session.lastAccessedAt
			? `  last used ${new Date(session.lastAccessedAt).toLocaleTimeString()}`
			: '';
		console.log(
			`  ${chalk.cyan(session.id)}  ${session.pending} pending  ${session.submitted} submitted  ${session.batches} batch(es)${accessed}`,
		);
	}
}

// ── Colours ──

/**
 * Colours are on unless `--no-color` was passed or `NO_COLOR` is set. Log
 * lines go to stderr and only carry colour when it is a terminal.
 */
export function configureColors(
	flag: boolean,
	env: NodeJS.ProcessEnv = process.env,
	stderrIsTTY = Boolean(process.stderr.isTTY),
): boolean {
	const enabled = flag && !env.NO_COLOR;
	setLogColors(enabled && stderrIsTTY);
	if (!enabled) {
		chalk.level = 0;
	}
	return enabled;
}

// ── Helpers ──

export function displayError(message: string): void {
	console.error(chalk.red('Error:'), message);
}

export function displayWarning(message: string): void {
	console.warn(chalk.yellow('Warning:'), message);
}

export function displayInfo(message: string): void {
	console.log(chalk.blue('Info:'), message);
}

export function displaySeparator(): void {
	console.log(chalk.dim('─'.repeat(60)));
}

export function displayHeader(title: string): void {
	console.log('');
	console.log(chalk.bold.white(title));
	console.log(chalk.dim('═'.repeat(60)));
}
