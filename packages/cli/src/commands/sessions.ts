import type { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { errorMessage } from 'botdeck';
import { request } from '../client.js';
import { SessionSummarySchema } from '../protocol.js';
import { displaySessions } from '../display.js';

export function registerSessionsCommand(program: Command): void {
	program
		.command('sessions')
		.description('List sessions with queued commands or recent activity')
		.action(async () => {
			try {
				const sessions = z.array(SessionSummarySchema).parse(await request('sessions'));
				displaySessions(sessions);
			} catch (error) {
				console.error(chalk.red('Failed to list sessions:'), errorMessage(error));
				process.exit(1);
			}
		});
}
