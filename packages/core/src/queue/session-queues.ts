import { createLogger } from '../logging.js';
import { KeyedMutex } from '../utils.js';
import { CommandQueue } from './command-queue.js';
import { assertSessionId } from './store.js';
import type { CommandQueueOptions, QueuedCommand, QueueStore } from './types.js';

const logger = createLogger('session-queues');

/**
 * Session-scoped access to command queues. Every operation loads the
 * session's queue from the store, applies one change and saves it back inside
 * a per-session critical section, so appends, clears and acknowledgements
 * for the same session never interleave.
 */
export class SessionQueues {
	private readonly store: QueueStore;
	private readonly options: CommandQueueOptions;
	private readonly mutex = new KeyedMutex();

	constructor(store: QueueStore, options: CommandQueueOptions = {}) {
		this.store = store;
		this.options = options;
	}

	append(sessionId: string, text: string): Promise<QueuedCommand> {
		return this.update(sessionId, (queue) => queue.append(text));
	}

	clear(sessionId: string): Promise<void> {
		return this.update(sessionId, (queue) => queue.clear());
	}

	snapshot(sessionId: string): Promise<readonly QueuedCommand[]> {
		return this.read(sessionId, (queue) => queue.snapshot());
	}

	acknowledge(sessionId: string, throughSeq: number): Promise<number> {
		return this.update(sessionId, (queue) => {
			const removed = queue.acknowledge(throughSeq);
			logger.debug(`Acknowledged ${removed} command(s) through seq ${throughSeq} for ${sessionId}`);
			return removed;
		});
	}

	sessions(): Promise<string[]> {
		return this.store.list();
	}

	private async load(sessionId: string): Promise<CommandQueue> {
		const state = await this.store.load(sessionId);
		return new CommandQueue(this.options, state);
	}

	private async read<T>(sessionId: string, fn: (queue: CommandQueue) => T): Promise<T> {
		assertSessionId(sessionId);
		return this.mutex.run(sessionId, async () => fn(await this.load(sessionId)));
	}

	private async update<T>(sessionId: string, fn: (queue: CommandQueue) => T): Promise<T> {
		assertSessionId(sessionId);
		return this.mutex.run(sessionId, async () => {
			const queue = await this.load(sessionId);
			const result = fn(queue);
			await this.store.save(sessionId, queue.toState());
			return result;
		});
	}
}
