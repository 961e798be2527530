import { test, expect, describe, beforeEach, vi } from 'vitest';
import { Duplex } from 'node:stream';
import {
	MemoryQueueStore,
	RobotConsole,
	SessionQueues,
	SimulatedRobotProvider,
	StaticApplicationProvider,
} from 'botdeck';
import { CLIServer } from './server.js';
import {
	BatchReportSchema,
	QueueListingSchema,
	SearchResultSchema,
	SessionSummarySchema,
	parseResponse,
} from './protocol.js';
import { z } from 'zod';

function line(value: unknown): string {
	return JSON.stringify(value);
}

function connection(): { socket: Duplex; written: string[] } {
	const written: string[] = [];
	const socket = new Duplex({
		read() {},
		write(chunk: Buffer, _encoding, callback) {
			written.push(chunk.toString());
			callback();
		},
	});
	return { socket, written };
}

describe('CLIServer', () => {
	let provider: SimulatedRobotProvider;
	let server: CLIServer;

	beforeEach(() => {
		provider = new SimulatedRobotProvider({ timeScale: 0 });
		server = new CLIServer({
			socketPath: '/tmp/botdeck-test-unused.sock',
			console: new RobotConsole({
				queues: new SessionQueues(new MemoryQueueStore()),
				devices: provider,
				applications: new StaticApplicationProvider([
					{ name: 'RobotArm', description: 'Pick things up', author: 'Dana' },
					{ name: 'Lamp', description: 'Blink the lights', author: 'Robin' },
				]),
			}),
		});
	});

	function submit(session: string, text: string) {
		return server.handleLine(line({ id: 's', command: 'submit', args: { session, text } }));
	}

	test('queues a submitted command', async () => {
		const response = await submit('alice', "robot.say_text('hi')");

		expect(response.id).toBe('s');
		expect(response.success).toBe(true);
		expect(response.data).toMatchObject({ text: "robot.say_text('hi')", seq: 0 });

		const queue = await server.handleLine(line({ id: 'q', command: 'queue', args: { session: 'alice' } }));
		expect(QueueListingSchema.parse(queue.data).map((c) => c.text)).toEqual(["robot.say_text('hi')"]);
	});

	test('uses the default session when none is given', async () => {
		await server.handleLine(line({ id: '1', command: 'submit', args: { text: 'robot.stop()' } }));

		const queue = await server.handleLine(line({ id: '2', command: 'queue', args: {} }));
		expect(QueueListingSchema.parse(queue.data)).toHaveLength(1);
	});

	test('executes the queue and reports outcomes in order', async () => {
		await submit('alice', 'robot.stop()');
		await submit('alice', 'robot.fly()');

		const response = await server.handleLine(line({ id: 'e', command: 'execute', args: { session: 'alice' } }));
		const report = BatchReportSchema.parse(response.data);

		expect(report.outcomes.map((o) => (o.status === 'success' ? 'ok' : o.error))).toEqual([
			'ok',
			'Unknown operation "fly"',
		]);
		expect(report.remaining).toEqual([]);
	});

	test('cancels a batch when the client goes away', async () => {
		await submit('alice', 'robot.stop()');
		const controller = new AbortController();
		controller.abort();

		const response = await server.handle(
			{ id: 'e', command: 'execute', args: { session: 'alice' } },
			controller.signal,
		);
		const report = BatchReportSchema.parse(response.data);

		expect(report.outcomes.map((o) => o.status === 'failure' && o.kind)).toEqual(['cancelled']);
		expect(report.remaining.map((c) => c.text)).toEqual(['robot.stop()']);
		expect(provider.acquireCount).toBe(0);
	});

	test('reports queue errors as failed responses', async () => {
		expect(await submit('alice', '   ')).toEqual({
			id: 's',
			success: false,
			error: 'Command text must not be empty',
		});
	});

	test('rejects a second execute for a session that is running', async () => {
		await submit('alice', 'robot.wait(0.05)');

		const first = server.handleLine(line({ id: 'e1', command: 'execute', args: { session: 'alice' } }));
		const second = await server.handleLine(line({ id: 'e2', command: 'execute', args: { session: 'alice' } }));

		expect(second).toEqual({
			id: 'e2',
			success: false,
			error: 'A batch is already executing for session "alice"',
		});
		expect((await first).success).toBe(true);
	});

	test('searches applications', async () => {
		const response = await server.handleLine(
			line({ id: 'f', command: 'search', args: { text: 'BOT', fields: ['name'] } }),
		);

		expect(SearchResultSchema.parse(response.data)).toEqual({
			matches: [{ name: 'RobotArm', description: 'Pick things up', author: 'Dana' }],
			count: 1,
		});
	});

	test('rejects unknown search fields', async () => {
		const response = await server.handleLine(
			line({ id: 'f', command: 'search', args: { text: 'x', fields: ['version'] } }),
		);

		expect(response).toEqual({
			id: 'f',
			success: false,
			error:
				"Invalid request: args.fields.0: Invalid enum value. Expected 'name' | 'description' | 'author', received 'version'",
		});
	});

	test('lists operations', async () => {
		const response = await server.handleLine(line({ id: 'o', command: 'operations' }));
		const data = z.object({ names: z.array(z.string()), help: z.string() }).parse(response.data);

		expect(data.names).toHaveLength(13);
		expect(data.help.split('\n')[0]).toBe('- say_text(text): Speak the given text');
	});

	test('lists sessions with their activity', async () => {
		await submit('alice', 'robot.stop()');
		await server.handleLine(line({ id: 'e', command: 'execute', args: { session: 'alice' } }));
		await submit('bob', 'robot.stop()');

		const response = await server.handleLine(line({ id: 'l', command: 'sessions' }));
		const sessions = z.array(SessionSummarySchema).parse(response.data);

		expect(sessions.map(({ id, pending, submitted, batches }) => ({ id, pending, submitted, batches }))).toEqual([
			{ id: 'alice', pending: 0, submitted: 1, batches: 1 },
			{ id: 'bob', pending: 1, submitted: 1, batches: 0 },
		]);
	});

	test('answers unknown commands with an error', async () => {
		const response = await server.handleLine(line({ id: '9', command: 'dance', args: {} }));

		expect(response).toEqual({
			id: '9',
			success: false,
			error:
				"Invalid request: command: Invalid discriminator value. Expected 'submit' | 'execute' | 'clear' | 'queue' | 'search' | 'operations' | 'sessions'",
		});
	});

	test('answers malformed lines with an error', async () => {
		expect(await server.handleLine('{nope')).toEqual({
			id: '',
			success: false,
			error: 'Malformed request: not valid JSON',
		});
	});

	test('clears a queue', async () => {
		await submit('alice', 'robot.stop()');
		const response = await server.handleLine(line({ id: 'c', command: 'clear', args: { session: 'alice' } }));

		expect(response).toEqual({ id: 'c', success: true, data: { session: 'alice' } });
		const queue = await server.handleLine(line({ id: 'q', command: 'queue', args: { session: 'alice' } }));
		expect(queue.data).toEqual([]);
	});

	test('decodes characters split across chunks', async () => {
		const { socket, written } = connection();
		server.serveConnection(socket);

		const text = "robot.say_text('héllo')";
		const bytes = Buffer.from(`${line({ id: 'u', command: 'submit', args: { session: 'alice', text } })}\n`);
		const split = bytes.indexOf(Buffer.from('é')) + 1;
		socket.push(bytes.subarray(0, split));
		socket.push(bytes.subarray(split));

		await vi.waitFor(() => {
			expect(written).toHaveLength(1);
		});
		expect(parseResponse(written[0])).toMatchObject({ id: 'u', success: true, data: { text } });
		socket.destroy();
	});
});
