import type { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from 'botdeck';
import { request } from '../client.js';
import { QueueListingSchema } from '../protocol.js';
import { displayQueue } from '../display.js';

export function registerQueueCommand(program: Command): void {
	program
		.command('queue')
		.description('Show the commands queued for a session')
		.option('-s, --session <id>', 'Session ID to use', 'default')
		.action(async (options: { session: string }) => {
			try {
				const commands = QueueListingSchema.parse(await request('queue', { session: options.session }));
				displayQueue(options.session, commands);
			} catch (error) {
				console.error(chalk.red('Failed to read queue:'), errorMessage(error));
				process.exit(1);
			}
		});
}
