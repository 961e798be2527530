import { InvalidCommandError, QueueFullError } from '../errors.js';
import {
	type CommandQueueOptions,
	type QueuedCommand,
	type QueueState,
	QueueStateSchema,
} from './types.js';

const DEFAULT_MAX_LENGTH = 100;

/**
 * Ordered list of pending commands for one session.
 *
 * Every command gets a sequence number when appended. The executor runs a
 * snapshot and then acknowledges through the last sequence number it
 * consumed, so commands appended while a batch runs are kept for the next one.
 */
export class CommandQueue {
	private commands: QueuedCommand[];
	private nextSeq: number;
	readonly maxLength: number;

	constructor(options: CommandQueueOptions = {}, state?: QueueState) {
		this.maxLength = options.maxLength ?? DEFAULT_MAX_LENGTH;
		this.commands = state ? state.commands.map((c) => ({ ...c })) : [];
		this.nextSeq = state?.nextSeq ?? 0;
	}

	static fromState(state: unknown, options: CommandQueueOptions = {}): CommandQueue {
		return new CommandQueue(options, QueueStateSchema.parse(state));
	}

	append(text: string): QueuedCommand {
		const trimmed = text.trim();
		if (!trimmed) {
			throw new InvalidCommandError();
		}
		if (this.commands.length >= this.maxLength) {
			throw new QueueFullError(this.maxLength);
		}

		const command: QueuedCommand = {
			text: trimmed,
			seq: this.nextSeq++,
			enqueuedAt: Date.now(),
		};
		this.commands.push(command);
		return { ...command };
	}

	clear(): void {
		this.commands = [];
	}

	snapshot(): readonly QueuedCommand[] {
		return Object.freeze(this.commands.map((c) => Object.freeze({ ...c })));
	}

	/**
	 * Remove every command with `seq <= throughSeq`.
	 * Returns the number of commands removed.
	 */
	acknowledge(throughSeq: number): number {
		const before = this.commands.length;
		this.commands = this.commands.filter((c) => c.seq > throughSeq);
		return before - this.commands.length;
	}

	get length(): number {
		return this.commands.length;
	}

	get isEmpty(): boolean {
		return this.commands.length === 0;
	}

	toState(): QueueState {
		return {
			nextSeq: this.nextSeq,
			commands: this.commands.map((c) => ({ ...c })),
		};
	}
}
