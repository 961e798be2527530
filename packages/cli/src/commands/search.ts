import type { Command } from 'commander';
import chalk from 'chalk';
import { SEARCH_FIELDS, errorMessage, parseSearchFields } from 'botdeck';
import { request } from '../client.js';
import { SearchResultSchema } from '../protocol.js';
import { displaySearchResult } from '../display.js';

export function registerSearchCommand(program: Command): void {
	program
		.command('search')
		.description('Search the applications catalog')
		.argument('[query]', 'Text to look for (omit to list everything)', '')
		.option('-f, --fields <list>', 'Comma-separated fields to match', SEARCH_FIELDS.join(','))
		.action(async (query: string, options: { fields: string }) => {
			try {
				const fields = [...parseSearchFields(options.fields)];
				const result = SearchResultSchema.parse(await request('search', { text: query, fields }));
				displaySearchResult(result);
			} catch (error) {
				console.error(chalk.red('Search failed:'), errorMessage(error));
				process.exit(1);
			}
		});
}
