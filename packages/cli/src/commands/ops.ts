import type { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from 'botdeck';
import { request } from '../client.js';
import { OperationsSchema } from '../protocol.js';

export function registerOpsCommand(program: Command): void {
	program
		.command('ops')
		.description('List the operations commands can call')
		.action(async () => {
			try {
				const operations = OperationsSchema.parse(await request('operations'));
				console.log(chalk.bold(`Operations (${operations.names.length}):`));
				console.log(operations.help);
			} catch (error) {
				console.error(chalk.red('Failed to list operations:'), errorMessage(error));
				process.exit(1);
			}
		});
}
