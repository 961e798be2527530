import type { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from 'botdeck';
import { request } from '../client.js';
import { BatchReportSchema } from '../protocol.js';
import { Spinner, displayOutcomes } from '../display.js';

export function registerExecuteCommand(program: Command): void {
	program
		.command('execute')
		.alias('run')
		.description('Run every queued command in order against the robot')
		.option('-s, --session <id>', 'Session ID to use', 'default')
		.action(async (options: { session: string }) => {
			const spinner = new Spinner(`Executing queue for "${options.session}"...`);
			spinner.start();
			try {
				const report = BatchReportSchema.parse(await request('execute', { session: options.session }));
				spinner.stop();
				displayOutcomes(report.outcomes);
				if (report.remaining.length > 0) {
					console.log(chalk.dim(`${report.remaining.length} command(s) still queued.`));
				}
			} catch (error) {
				spinner.stop();
				console.error(chalk.red('Failed to execute queue:'), errorMessage(error));
				process.exit(1);
			}
		});
}
