import * as net from 'node:net';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Duplex } from 'node:stream';
import { type RobotConsole, createLogger, errorMessage, timed } from 'botdeck';
import { SessionManager } from './sessions.js';
import {
	type CLIRequest,
	type CLIResponse,
	type SessionSummary,
	parseRequest,
	serializeResponse,
} from './protocol.js';

const logger = createLogger('cli-server');

export interface CLIServerOptions {
	console: RobotConsole;
	socketPath: string;
}

/**
 * Hosts a RobotConsole behind a unix socket speaking newline-delimited JSON.
 * A client that disconnects cancels any batch it started.
 */
export class CLIServer {
	private server: net.Server | null = null;
	readonly sessions: SessionManager;
	readonly console: RobotConsole;
	readonly socketPath: string;

	constructor(options: CLIServerOptions) {
		this.console = options.console;
		this.socketPath = options.socketPath;
		this.sessions = new SessionManager();
	}

	async start(): Promise<string> {
		fs.mkdirSync(path.dirname(this.socketPath), { recursive: true });

		// Clean up stale socket
		if (fs.existsSync(this.socketPath)) {
			fs.unlinkSync(this.socketPath);
		}

		return new Promise((resolve, reject) => {
			const server = net.createServer((socket) => this.serveConnection(socket));
			this.server = server;

			server.on('error', reject);
			server.listen(this.socketPath, () => {
				logger.info(`Listening on ${this.socketPath}`);
				resolve(this.socketPath);
			});
		});
	}

	/** Answer newline-delimited requests arriving on one connection. */
	serveConnection(socket: Duplex): void {
		const controller = new AbortController();
		let buffer = '';
		let queue = Promise.resolve();

		// Decode across chunk boundaries so split multi-byte characters survive.
		socket.setEncoding('utf8');
		socket.on('data', (data: string | Buffer) => {
			buffer += data.toString();
			const lines = buffer.split('\n');
			buffer = lines.pop() ?? '';

			for (const line of lines) {
				if (!line.trim()) continue;
				// Requests on one connection are answered in order.
				queue = queue
					.then(async () => {
						const response = await this.handleLine(line, controller.signal);
						if (!socket.destroyed) {
							socket.write(serializeResponse(response));
						}
					})
					.catch((error: unknown) => {
						logger.error(`Failed to answer request: ${errorMessage(error)}`);
					});
			}
		});

		socket.on('close', () => {
			controller.abort(new Error('client disconnected'));
		});

		socket.on('error', (error: Error) => {
			logger.debug(`Client connection error: ${error.message}`);
		});
	}

	async handleLine(line: string, signal?: AbortSignal): Promise<CLIResponse> {
		const parsed = parseRequest(line);
		if (!parsed.ok) {
			return { id: parsed.error.id, success: false, error: parsed.error.message };
		}
		return this.handle(parsed.value, signal);
	}

	async handle(request: CLIRequest, signal?: AbortSignal): Promise<CLIResponse> {
		try {
			const { result: data, durationMs } = await timed(request.command, () =>
				this.dispatch(request, signal),
			);
			logger.debug(`${request.command} handled in ${durationMs.toFixed(1)}ms`);
			return { id: request.id, success: true, data };
		} catch (error) {
			return { id: request.id, success: false, error: errorMessage(error) };
		}
	}

	private async dispatch(request: CLIRequest, signal?: AbortSignal): Promise<unknown> {
		switch (request.command) {
			case 'submit': {
				const command = await this.console.submitCommand(request.args.session, request.args.text);
				this.sessions.recordSubmit(request.args.session);
				return command;
			}

			case 'execute': {
				const report = await this.console.executeBatch(request.args.session, { signal });
				this.sessions.recordBatch(request.args.session);
				return report;
			}

			case 'clear': {
				await this.console.clearQueue(request.args.session);
				this.sessions.touch(request.args.session);
				return { session: request.args.session };
			}

			case 'queue':
				return this.console.listQueue(request.args.session);

			case 'search':
				return this.console.search(request.args.text, request.args.fields);

			case 'operations':
				return {
					names: this.console.executor.catalog.getNames(),
					help: this.console.describeOperations(),
				};

			case 'sessions':
				return this.listSessions();
		}
	}

	private async listSessions(): Promise<SessionSummary[]> {
		const stored = await this.console.sessions();
		const ids = [...new Set([...stored, ...this.sessions.list().map((s) => s.id)])].sort();

		return Promise.all(
			ids.map(async (id) => {
				const activity = this.sessions.get(id);
				const pending = (await this.console.listQueue(id)).length;
				return {
					id,
					pending,
					submitted: activity?.submitted ?? 0,
					batches: activity?.batches ?? 0,
					lastAccessedAt: activity?.lastAccessedAt,
				};
			}),
		);
	}

	async stop(): Promise<void> {
		const server = this.server;
		if (!server) return;
		this.server = null;

		return new Promise((resolve) => {
			server.close(() => {
				if (fs.existsSync(this.socketPath)) {
					fs.unlinkSync(this.socketPath);
				}
				logger.info('Server stopped');
				resolve();
			});
		});
	}
}
