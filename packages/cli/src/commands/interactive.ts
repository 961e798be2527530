import * as readline from 'node:readline';
import type { Command } from 'commander';
import chalk from 'chalk';
import {
	Config,
	MemoryQueueStore,
	type RobotConsole,
	SEARCH_FIELDS,
	createRobotConsole,
	errorMessage,
} from 'botdeck';
import {
	displayError,
	displayInfo,
	displayOutcomes,
	displayQueue,
	displaySearchResult,
	displaySeparator,
} from '../display.js';

interface InteractiveOptions {
	session: string;
}

export interface ReplContext {
	console: RobotConsole;
	sessionId: string;
	/** Set while a batch runs so Ctrl+C can cancel it. */
	batch?: AbortController;
}

/**
 * In-process REPL over a simulated robot. Lines that are not REPL commands
 * are queued as robot commands.
 */
export function registerInteractiveCommand(program: Command): void {
	program
		.command('interactive')
		.alias('repl')
		.description('Queue and run commands against a simulated robot in this process')
		.option('-s, --session <id>', 'Session ID to use', 'default')
		.action((options: InteractiveOptions) => {
			console.log(chalk.bold.white('botdeck interactive console'));
			console.log(chalk.dim('Type robot commands to queue them, "run" to execute, "help" for more.'));
			displaySeparator();

			const context: ReplContext = {
				console: createRobotConsole(Config.instance(), { store: new MemoryQueueStore() }),
				sessionId: options.session,
			};

			const rl = readline.createInterface({
				input: process.stdin,
				output: process.stdout,
				prompt: chalk.cyan(`${options.session}> `),
				terminal: true,
			});

			let pending = Promise.resolve();

			rl.on('line', (line) => {
				pending = pending
					.then(async () => {
						const shouldQuit = await handleReplLine(line, context);
						if (shouldQuit) {
							rl.close();
						} else {
							rl.prompt();
						}
					})
					.catch((error: unknown) => {
						displayError(errorMessage(error));
						rl.prompt();
					});
			});

			rl.on('SIGINT', () => {
				if (context.batch) {
					context.batch.abort(new Error('interrupted'));
				} else {
					rl.close();
				}
			});

			rl.on('close', () => {
				console.log('');
				displayInfo('Leaving interactive console.');
				process.exit(0);
			});

			rl.prompt();
		});
}

// ── Line handling ──

export async function handleReplLine(line: string, context: ReplContext): Promise<boolean> {
	const trimmed = line.trim();
	if (!trimmed) return false;

	const [word, ...rest] = trimmed.split(/\s+/);
	const argument = rest.join(' ');

	switch (word.toLowerCase()) {
		case 'run':
		case 'execute': {
			context.batch = new AbortController();
			try {
				const report = await context.console.executeBatch(context.sessionId, {
					signal: context.batch.signal,
				});
				displayOutcomes(report.outcomes);
				if (report.remaining.length > 0) {
					console.log(chalk.dim(`${report.remaining.length} command(s) still queued.`));
				}
			} finally {
				context.batch = undefined;
			}
			return false;
		}

		case 'queue':
		case 'list': {
			displayQueue(context.sessionId, await context.console.listQueue(context.sessionId));
			return false;
		}

		case 'clear': {
			await context.console.clearQueue(context.sessionId);
			console.log(chalk.green('Queue cleared.'));
			return false;
		}

		case 'search': {
			displaySearchResult(await context.console.search(argument, SEARCH_FIELDS));
			return false;
		}

		case 'ops':
		case 'operations': {
			console.log(context.console.describeOperations());
			return false;
		}

		case 'help': {
			printHelp();
			return false;
		}

		case 'quit':
		case 'exit':
		case 'q': {
			return true;
		}

		default: {
			const command = await context.console.submitCommand(context.sessionId, trimmed);
			console.log(chalk.green('Queued:'), command.text, chalk.dim(`#${command.seq}`));
			return false;
		}
	}
}

function printHelp(): void {
	console.log(chalk.bold('Available commands:'));
	console.log('');
	const commands = [
		['<robot command>', "Queue a command, e.g. robot.say_text('hi')"],
		['run', 'Execute the queued commands in order'],
		['queue', 'Show the queued commands'],
		['clear', 'Drop the queued commands'],
		['search [text]', 'Search the applications catalog'],
		['ops', 'List the operations commands can call'],
		['help', 'Show this help message'],
		['quit', 'Exit the interactive console'],
	];

	for (const [cmd, desc] of commands) {
		console.log(`  ${chalk.cyan(cmd.padEnd(20))} ${desc}`);
	}
}
