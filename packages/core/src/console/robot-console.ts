import { searchApplications } from '../apps/search.js';
import { JsonFileApplicationProvider } from '../apps/provider.js';
import type { ApplicationProvider, SearchField, SearchResult } from '../apps/types.js';
import { CommandExecutor } from '../commands/executor.js';
import type { CommandOutcome } from '../commands/types.js';
import type { Config } from '../config/config.js';
import { SimulatedRobotProvider } from '../device/simulated-robot.js';
import type { DeviceProvider, Robot } from '../device/types.js';
import { BatchInProgressError } from '../errors.js';
import { EventHub } from '../events/event-hub.js';
import type { ConsoleEventMap } from '../events/types.js';
import { createLogger } from '../logging.js';
import { SessionQueues } from '../queue/session-queues.js';
import { FileQueueStore, assertSessionId } from '../queue/store.js';
import type { QueuedCommand, QueueStore } from '../queue/types.js';
import { generateId } from '../utils.js';

const logger = createLogger('console');

export interface RobotConsoleOptions {
	queues: SessionQueues;
	devices: DeviceProvider<Robot>;
	applications: ApplicationProvider;
	executor?: CommandExecutor;
}

export interface ExecuteBatchOptions {
	signal?: AbortSignal;
}

export interface BatchReport {
	sessionId: string;
	batchId: string;
	outcomes: readonly CommandOutcome[];
	/** Commands removed from the queue after the batch. */
	acknowledged: number;
	/** Commands still queued: appended during the batch, or cancelled. */
	remaining: readonly QueuedCommand[];
}

/**
 * The user-facing actions: submit, execute, clear and list per session,
 * plus application search.
 */
export class RobotConsole {
	readonly executor: CommandExecutor;
	readonly queues: SessionQueues;
	private readonly devices: DeviceProvider<Robot>;
	private readonly applications: ApplicationProvider;
	private readonly executing = new Set<string>();

	constructor(options: RobotConsoleOptions) {
		this.queues = options.queues;
		this.devices = options.devices;
		this.applications = options.applications;
		this.executor = options.executor ?? new CommandExecutor();
	}

	get events(): EventHub<ConsoleEventMap> {
		return this.executor.events;
	}

	async submitCommand(sessionId: string, text: string): Promise<QueuedCommand> {
		const command = await this.queues.append(sessionId, text);
		this.events.emit('queue:append', { sessionId, text: command.text, seq: command.seq });
		return command;
	}

	/**
	 * Execute everything queued for the session. Only one batch per session
	 * runs at a time; a second call while one is in flight is rejected.
	 */
	async executeBatch(sessionId: string, options: ExecuteBatchOptions = {}): Promise<BatchReport> {
		assertSessionId(sessionId);
		if (this.executing.has(sessionId)) {
			throw new BatchInProgressError(sessionId);
		}
		this.executing.add(sessionId);

		try {
			const batchId = generateId();
			const snapshot = await this.queues.snapshot(sessionId);
			const outcomes = await this.executor.execute(snapshot, this.devices, {
				signal: options.signal,
				batchId,
			});

			// Cancelled commands stay queued for the next batch.
			let throughSeq: number | undefined;
			for (const outcome of outcomes) {
				if (outcome.status === 'failure' && outcome.kind === 'cancelled') break;
				throughSeq = outcome.seq;
			}

			const acknowledged =
				throughSeq === undefined ? 0 : await this.queues.acknowledge(sessionId, throughSeq);
			const remaining = await this.queues.snapshot(sessionId);

			logger.info(
				`Session ${sessionId}: ran ${outcomes.length} command(s), ${remaining.length} still queued`,
			);
			return { sessionId, batchId, outcomes, acknowledged, remaining };
		} finally {
			this.executing.delete(sessionId);
		}
	}

	isExecuting(sessionId: string): boolean {
		return this.executing.has(sessionId);
	}

	async clearQueue(sessionId: string): Promise<void> {
		await this.queues.clear(sessionId);
		this.events.emit('queue:clear', { sessionId });
	}

	listQueue(sessionId: string): Promise<readonly QueuedCommand[]> {
		return this.queues.snapshot(sessionId);
	}

	sessions(): Promise<string[]> {
		return this.queues.sessions();
	}

	async search(text: string, fields: Iterable<SearchField>): Promise<SearchResult> {
		const catalog = await this.applications.list();
		return searchApplications(catalog, { text, fields: new Set(fields) });
	}

	describeOperations(): string {
		return this.executor.catalog.describe();
	}
}

export interface ConsoleOverrides {
	store?: QueueStore;
	devices?: DeviceProvider<Robot>;
	applications?: ApplicationProvider;
}

/**
 * Wire a console from configuration: file-backed queues, the applications
 * file and a simulated robot unless overridden.
 */
export function createRobotConsole(config: Config, overrides: ConsoleOverrides = {}): RobotConsole {
	const { device, queue } = config;
	const store = overrides.store ?? new FileQueueStore(config.queueStoreDir);

	return new RobotConsole({
		queues: new SessionQueues(store, { maxLength: queue.maxLength }),
		devices: overrides.devices ?? new SimulatedRobotProvider({ name: device.boundName }),
		applications:
			overrides.applications ?? new JsonFileApplicationProvider(config.applicationsFile),
		executor: new CommandExecutor({
			commandTimeoutMs: device.commandTimeoutMs,
			acquireTimeoutMs: device.acquireTimeoutMs,
			boundName: device.boundName,
		}),
	});
}
