import * as net from 'node:net';
import { Config, generateId } from 'botdeck';
import {
	type CLICommand,
	type CLIResponse,
	parseResponse,
	serializeRequest,
} from './protocol.js';

export class ServerUnavailableError extends Error {
	constructor(socketPath: string, options?: ErrorOptions) {
		super(`botdeck server is not running at ${socketPath}. Start it with "botdeck serve".`, options);
		this.name = 'ServerUnavailableError';
	}
}

/**
 * Send one request to the server and wait for its response line.
 */
export function sendRequest(
	command: CLICommand,
	args: Record<string, unknown> = {},
	socketPath = Config.instance().socketPath,
): Promise<CLIResponse> {
	const id = generateId(8);

	return new Promise((resolve, reject) => {
		const socket = net.createConnection(socketPath);
		let buffer = '';
		let connected = false;

		socket.on('connect', () => {
			connected = true;
			socket.write(serializeRequest({ id, command, args }));
		});

		socket.setEncoding('utf8');
		socket.on('data', (data: string | Buffer) => {
			buffer += data.toString();
			const newline = buffer.indexOf('\n');
			if (newline === -1) return;

			const response = parseResponse(buffer.slice(0, newline));
			socket.end();
			if (!response) {
				reject(new Error('Malformed response from server'));
			} else {
				resolve(response);
			}
		});

		socket.on('error', (error) => {
			reject(connected ? error : new ServerUnavailableError(socketPath, { cause: error }));
		});

		socket.on('close', () => {
			reject(new Error('Server closed the connection before responding'));
		});
	});
}

/**
 * Like sendRequest, but throws when the server reports a failure.
 */
export async function request(
	command: CLICommand,
	args: Record<string, unknown> = {},
): Promise<unknown> {
	const response = await sendRequest(command, args);
	if (!response.success) {
		throw new Error(response.error ?? `${command} failed`);
	}
	return response.data;
}
