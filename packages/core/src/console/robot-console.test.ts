import { test, expect, describe, beforeEach } from 'vitest';
import { RobotConsole } from './robot-console.js';
import { StaticApplicationProvider } from '../apps/provider.js';
import { SimulatedRobot, SimulatedRobotProvider } from '../device/simulated-robot.js';
import { BatchInProgressError, InvalidCommandError, InvalidSessionIdError } from '../errors.js';
import { SessionQueues } from '../queue/session-queues.js';
import { MemoryQueueStore } from '../queue/store.js';
import { sleep } from '../utils.js';

describe('RobotConsole', () => {
	let provider: SimulatedRobotProvider;
	let robotConsole: RobotConsole;

	beforeEach(() => {
		provider = new SimulatedRobotProvider({ timeScale: 0 });
		robotConsole = new RobotConsole({
			queues: new SessionQueues(new MemoryQueueStore()),
			devices: provider,
			applications: new StaticApplicationProvider([
				{ name: 'RobotArm', description: 'Pick things up', author: 'Dana' },
				{ name: 'Lamp', description: 'Blink the lights', author: 'Robin' },
			]),
		});
	});

	describe('queue actions', () => {
		test('submitting queues without executing', async () => {
			await robotConsole.submitCommand('alice', "robot.say_text('hi')");

			expect((await robotConsole.listQueue('alice')).map((c) => c.text)).toEqual(["robot.say_text('hi')"]);
			expect(provider.acquireCount).toBe(0);
		});

		test('rejects empty commands', async () => {
			await expect(robotConsole.submitCommand('alice', '  ')).rejects.toThrow(InvalidCommandError);
		});

		test('clearing empties the queue without executing', async () => {
			await robotConsole.submitCommand('alice', 'robot.stop()');
			await robotConsole.clearQueue('alice');

			expect(await robotConsole.listQueue('alice')).toEqual([]);
			expect(provider.acquireCount).toBe(0);
		});

		test('emits queue events', async () => {
			const events: string[] = [];
			robotConsole.events.on('queue:append', ({ sessionId, seq }) => events.push(`append:${sessionId}:${seq}`));
			robotConsole.events.on('queue:clear', ({ sessionId }) => events.push(`clear:${sessionId}`));

			await robotConsole.submitCommand('alice', 'robot.stop()');
			await robotConsole.clearQueue('alice');

			expect(events).toEqual(['append:alice:0', 'clear:alice']);
		});

		test('lists sessions with stored queues', async () => {
			await robotConsole.submitCommand('bob', 'robot.stop()');
			await robotConsole.submitCommand('alice', 'robot.stop()');

			expect(await robotConsole.sessions()).toEqual(['alice', 'bob']);
		});
	});

	describe('executeBatch', () => {
		test('runs the queue in order and empties it', async () => {
			await robotConsole.submitCommand('alice', "robot.say_text('hi')");
			await robotConsole.submitCommand('alice', 'robot.set_head_angle(90)');
			await robotConsole.submitCommand('alice', 'robot.battery()');

			const report = await robotConsole.executeBatch('alice');

			expect(report.outcomes.map((o) => o.status)).toEqual(['success', 'failure', 'success']);
			expect(report.acknowledged).toBe(3);
			expect(report.remaining).toEqual([]);
			expect(await robotConsole.listQueue('alice')).toEqual([]);
		});

		test('keeps commands appended while the batch runs', async () => {
			await robotConsole.submitCommand('alice', 'robot.wait(0.05)');

			const batch = robotConsole.executeBatch('alice');
			await sleep(10);
			await robotConsole.submitCommand('alice', 'robot.stop()');
			const report = await batch;

			expect(report.outcomes.map((o) => o.command)).toEqual(['robot.wait(0.05)']);
			expect(report.remaining.map((c) => c.text)).toEqual(['robot.stop()']);
			expect((await robotConsole.listQueue('alice')).map((c) => c.text)).toEqual(['robot.stop()']);
		});

		test('rejects a second batch for the same session while one runs', async () => {
			await robotConsole.submitCommand('alice', 'robot.wait(0.05)');

			const first = robotConsole.executeBatch('alice');
			await expect(robotConsole.executeBatch('alice')).rejects.toThrow(BatchInProgressError);
			expect(robotConsole.isExecuting('alice')).toBe(true);

			await first;
			expect(robotConsole.isExecuting('alice')).toBe(false);
		});

		test('runs batches for different sessions independently', async () => {
			const multi = new RobotConsole({
				queues: new SessionQueues(new MemoryQueueStore()),
				devices: {
					acquire: async () => new SimulatedRobot({ timeScale: 0 }),
					release: async () => undefined,
				},
				applications: new StaticApplicationProvider([]),
			});
			await multi.submitCommand('alice', 'robot.stop()');
			await multi.submitCommand('bob', 'robot.battery()');

			const [alice, bob] = await Promise.all([multi.executeBatch('alice'), multi.executeBatch('bob')]);

			expect(alice.outcomes.map((o) => o.status)).toEqual(['success']);
			expect(bob.outcomes.map((o) => o.status)).toEqual(['success']);
		});

		test('keeps cancelled commands queued', async () => {
			await robotConsole.submitCommand('alice', 'robot.stop()');
			await robotConsole.submitCommand('alice', 'robot.wait(5)');
			await robotConsole.submitCommand('alice', 'robot.battery()');

			const controller = new AbortController();
			setTimeout(() => controller.abort(), 20);
			const report = await robotConsole.executeBatch('alice', { signal: controller.signal });

			expect(report.outcomes.map((o) => o.status)).toEqual(['success', 'failure', 'failure']);
			expect(report.acknowledged).toBe(1);
			expect(report.remaining.map((c) => c.text)).toEqual(['robot.wait(5)', 'robot.battery()']);
			expect(provider.isHeld).toBe(false);
		});

		test('drops the batch when the device is unavailable', async () => {
			provider.setAvailable(false);
			await robotConsole.submitCommand('alice', 'robot.stop()');
			await robotConsole.submitCommand('alice', 'robot.battery()');

			const report = await robotConsole.executeBatch('alice');

			expect(report.outcomes.map((o) => (o.status === 'failure' ? o.error : ''))).toEqual([
				'unavailable device',
				'unavailable device',
			]);
			expect(report.remaining).toEqual([]);
		});

		test('an empty queue yields no outcomes', async () => {
			const report = await robotConsole.executeBatch('alice');

			expect(report.outcomes).toEqual([]);
			expect(report.acknowledged).toBe(0);
			expect(provider.acquireCount).toBe(0);
		});

		test('rejects invalid session ids', async () => {
			await expect(robotConsole.executeBatch('../x')).rejects.toThrow(InvalidSessionIdError);
		});
	});

	describe('search and help', () => {
		test('searches the application catalog', async () => {
			const result = await robotConsole.search('BOT', ['name']);

			expect(result.matches.map((r) => r.name)).toEqual(['RobotArm']);
			expect(result.count).toBe(1);
		});

		test('describes the operations', () => {
			expect(robotConsole.describeOperations().split('\n')).toContain('- say_text(text): Speak the given text');
		});
	});
});
