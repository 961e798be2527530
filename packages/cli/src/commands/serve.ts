import type { Command } from 'commander';
import chalk from 'chalk';
import { Config, createRobotConsole, errorMessage } from 'botdeck';
import { CLIServer } from '../server.js';
import { displayError } from '../display.js';

export function registerServeCommand(program: Command): void {
	program
		.command('serve')
		.description('Start the botdeck server that holds the command queues and the robot')
		.action(async () => {
			const config = Config.instance();
			const server = new CLIServer({
				console: createRobotConsole(config),
				socketPath: config.socketPath,
			});

			try {
				const socketPath = await server.start();
				console.log(chalk.green('botdeck server listening on'), socketPath);
				console.log(chalk.dim('Press Ctrl+C to stop.'));
			} catch (error) {
				displayError(`Failed to start server: ${errorMessage(error)}`);
				process.exit(1);
			}

			const shutdown = () => {
				server.stop().then(
					() => process.exit(0),
					(error: unknown) => {
						displayError(errorMessage(error));
						process.exit(1);
					},
				);
			};
			process.once('SIGINT', shutdown);
			process.once('SIGTERM', shutdown);
		});
}
