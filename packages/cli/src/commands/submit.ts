import type { Command } from 'commander';
import chalk from 'chalk';
import { QueuedCommandSchema, errorMessage } from 'botdeck';
import { request } from '../client.js';

export function registerSubmitCommand(program: Command): void {
	program
		.command('submit')
		.description('Queue a robot command without running it')
		.argument('<text...>', "Command text, e.g. robot.say_text('hello')")
		.option('-s, --session <id>', 'Session ID to use', 'default')
		.action(async (words: string[], options: { session: string }) => {
			try {
				const command = QueuedCommandSchema.parse(
					await request('submit', { session: options.session, text: words.join(' ') }),
				);
				console.log(chalk.green('Queued:'), command.text, chalk.dim(`#${command.seq}`));
			} catch (error) {
				console.error(chalk.red('Failed to queue command:'), errorMessage(error));
				process.exit(1);
			}
		});
}
