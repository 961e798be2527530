#!/usr/bin/env node
import { Command } from 'commander';
import { Config, setGlobalLogLevel } from 'botdeck';
import { configureColors } from './display.js';
import { registerServeCommand } from './commands/serve.js';
import { registerSubmitCommand } from './commands/submit.js';
import { registerExecuteCommand } from './commands/execute.js';
import { registerClearCommand } from './commands/clear.js';
import { registerQueueCommand } from './commands/queue.js';
import { registerSearchCommand } from './commands/search.js';
import { registerOpsCommand } from './commands/ops.js';
import { registerSessionsCommand } from './commands/sessions.js';
import { registerInteractiveCommand } from './commands/interactive.js';

const program = new Command();

program
	.name('botdeck')
	.description('Queue robot commands per session and run them in order')
	.version('0.1.0')
	.option('--socket <path>', 'Server socket path')
	.option('-v, --verbose', 'Log debug output', false)
	.option('--no-color', 'Disable coloured output');

program.hook('preAction', () => {
	const { socket, verbose, color }: { socket?: unknown; verbose?: unknown; color?: unknown } = program.opts();
	configureColors(color !== false);
	const config = Config.instance(typeof socket === 'string' ? { socketPath: socket } : undefined);
	setGlobalLogLevel(verbose === true ? 'debug' : config.logLevel);
});

// ── Server ──
registerServeCommand(program);

// ── Queue commands ──
registerSubmitCommand(program);
registerExecuteCommand(program);
registerClearCommand(program);
registerQueueCommand(program);
registerSessionsCommand(program);

// ── Catalog commands ──
registerSearchCommand(program);
registerOpsCommand(program);

// ── Interactive ──
registerInteractiveCommand(program);

program.parseAsync().catch((error: unknown) => {
	console.error(error instanceof Error ? error.message : String(error));
	process.exit(1);
});
