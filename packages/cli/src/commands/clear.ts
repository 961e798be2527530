import type { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from 'botdeck';
import { request } from '../client.js';

export function registerClearCommand(program: Command): void {
	program
		.command('clear')
		.description('Drop every queued command without running it')
		.option('-s, --session <id>', 'Session ID to use', 'default')
		.action(async (options: { session: string }) => {
			try {
				await request('clear', { session: options.session });
				console.log(chalk.green('Cleared queue for'), options.session);
			} catch (error) {
				console.error(chalk.red('Failed to clear queue:'), errorMessage(error));
				process.exit(1);
			}
		});
}
