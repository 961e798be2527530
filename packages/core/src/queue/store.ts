import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { InvalidSessionIdError } from '../errors.js';
import { createLogger } from '../logging.js';
import { isSessionId } from '../types.js';
import { generateId, isNotFound } from '../utils.js';
import { type QueueState, type QueueStore, QueueStateSchema } from './types.js';

const logger = createLogger('queue-store');

export function assertSessionId(sessionId: string): void {
	if (!isSessionId(sessionId)) {
		throw new InvalidSessionIdError(sessionId);
	}
}

function cloneState(state: QueueState): QueueState {
	return {
		nextSeq: state.nextSeq,
		commands: state.commands.map((c) => ({ ...c })),
	};
}

export class MemoryQueueStore implements QueueStore {
	private states = new Map<string, QueueState>();

	async load(sessionId: string): Promise<QueueState | undefined> {
		const state = this.states.get(sessionId);
		return state ? cloneState(state) : undefined;
	}

	async save(sessionId: string, state: QueueState): Promise<void> {
		this.states.set(sessionId, cloneState(state));
	}

	async delete(sessionId: string): Promise<boolean> {
		return this.states.delete(sessionId);
	}

	async list(): Promise<string[]> {
		return [...this.states.keys()].sort();
	}
}

/**
 * One JSON file per session under `dir`. Writes go to a temp file that is
 * renamed over the target, so a reader never sees a half-written queue.
 */
export class FileQueueStore implements QueueStore {
	readonly dir: string;

	constructor(dir: string) {
		this.dir = dir;
	}

	private filePath(sessionId: string): string {
		assertSessionId(sessionId);
		return path.join(this.dir, `${sessionId}.json`);
	}

	async load(sessionId: string): Promise<QueueState | undefined> {
		const filePath = this.filePath(sessionId);
		let raw: string;
		try {
			raw = await fs.readFile(filePath, 'utf-8');
		} catch (error) {
			if (isNotFound(error)) return undefined;
			throw error;
		}
		return QueueStateSchema.parse(JSON.parse(raw));
	}

	async save(sessionId: string, state: QueueState): Promise<void> {
		const filePath = this.filePath(sessionId);
		await fs.mkdir(this.dir, { recursive: true, mode: 0o700 });

		const tmpPath = `${filePath}.${generateId(6)}.tmp`;
		await fs.writeFile(tmpPath, JSON.stringify(state, null, 2), { mode: 0o600 });
		await fs.rename(tmpPath, filePath);
		logger.debug(`Saved ${state.commands.length} command(s) for session ${sessionId}`);
	}

	async delete(sessionId: string): Promise<boolean> {
		try {
			await fs.unlink(this.filePath(sessionId));
			return true;
		} catch (error) {
			if (isNotFound(error)) return false;
			throw error;
		}
	}

	async list(): Promise<string[]> {
		let entries: string[];
		try {
			entries = await fs.readdir(this.dir);
		} catch (error) {
			if (isNotFound(error)) return [];
			throw error;
		}
		return entries
			.filter((name) => name.endsWith('.json'))
			.map((name) => name.slice(0, -'.json'.length))
			.filter(isSessionId)
			.sort();
	}
}
