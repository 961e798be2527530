import { test, expect, describe, beforeEach } from 'vitest';
import { CommandQueue } from './command-queue.js';
import { InvalidCommandError, QueueFullError } from '../errors.js';

describe('CommandQueue', () => {
	let queue: CommandQueue;

	beforeEach(() => {
		queue = new CommandQueue();
	});

	describe('append', () => {
		test('keeps insertion order', () => {
			queue.append("robot.say_text('one')");
			queue.append('robot.battery()');
			queue.append("robot.say_text('three')");

			expect(queue.snapshot().map((c) => c.text)).toEqual([
				"robot.say_text('one')",
				'robot.battery()',
				"robot.say_text('three')",
			]);
		});

		test('assigns increasing sequence numbers', () => {
			const first = queue.append('robot.stop()');
			const second = queue.append('robot.stop()');

			expect(first.seq).toBe(0);
			expect(second.seq).toBe(1);
		});

		test('trims surrounding whitespace', () => {
			const command = queue.append('  robot.battery()  \n');
			expect(command.text).toBe('robot.battery()');
		});

		test('rejects empty text without changing the queue', () => {
			queue.append('robot.stop()');

			expect(() => queue.append('')).toThrow(InvalidCommandError);
			expect(queue.length).toBe(1);
		});

		test('rejects whitespace-only text', () => {
			expect(() => queue.append(' \t\n ')).toThrow(InvalidCommandError);
			expect(queue.isEmpty).toBe(true);
		});

		test('rejects appends beyond maxLength', () => {
			const bounded = new CommandQueue({ maxLength: 2 });
			bounded.append('robot.stop()');
			bounded.append('robot.stop()');

			expect(() => bounded.append('robot.stop()')).toThrow(QueueFullError);
			expect(bounded.length).toBe(2);
		});
	});

	describe('clear', () => {
		test('empties the queue', () => {
			queue.append('robot.stop()');
			queue.append('robot.battery()');
			queue.clear();

			expect(queue.isEmpty).toBe(true);
			expect(queue.snapshot()).toEqual([]);
		});

		test('is idempotent on an empty queue', () => {
			queue.clear();
			queue.clear();
			expect(queue.length).toBe(0);
		});

		test('does not reuse sequence numbers', () => {
			queue.append('robot.stop()');
			queue.clear();
			expect(queue.append('robot.stop()').seq).toBe(1);
		});
	});

	describe('snapshot', () => {
		test('is unaffected by later appends', () => {
			queue.append('robot.stop()');
			const snapshot = queue.snapshot();
			queue.append('robot.battery()');

			expect(snapshot).toHaveLength(1);
			expect(queue.length).toBe(2);
		});

		test('is frozen', () => {
			queue.append('robot.stop()');
			const snapshot = queue.snapshot();

			expect(Object.isFrozen(snapshot)).toBe(true);
			expect(Object.isFrozen(snapshot[0])).toBe(true);
		});
	});

	describe('acknowledge', () => {
		test('removes commands up to and including the sequence number', () => {
			queue.append('robot.stop()');
			queue.append('robot.battery()');
			queue.append('robot.status()');

			const removed = queue.acknowledge(1);

			expect(removed).toBe(2);
			expect(queue.snapshot().map((c) => c.text)).toEqual(['robot.status()']);
		});

		test('keeps commands appended after the snapshot', () => {
			queue.append('robot.stop()');
			const snapshot = queue.snapshot();
			queue.append('robot.battery()');

			queue.acknowledge(snapshot[snapshot.length - 1].seq);

			expect(queue.snapshot().map((c) => c.text)).toEqual(['robot.battery()']);
		});
	});

	describe('state', () => {
		test('round-trips through toState and fromState', () => {
			queue.append('robot.stop()');
			queue.append('robot.battery()');

			const restored = CommandQueue.fromState(queue.toState());

			expect(restored.snapshot()).toEqual(queue.snapshot());
			expect(restored.append('robot.status()').seq).toBe(2);
		});

		test('rejects a state holding a blank command', () => {
			expect(() =>
				CommandQueue.fromState({
					nextSeq: 1,
					commands: [{ text: '   ', seq: 0, enqueuedAt: 0 }],
				}),
			).toThrow();
		});

		test('rejects a state whose commands are not below nextSeq', () => {
			expect(() =>
				CommandQueue.fromState({
					nextSeq: 1,
					commands: [{ text: 'robot.stop()', seq: 4, enqueuedAt: 0 }],
				}),
			).toThrow();
		});
	});
});
