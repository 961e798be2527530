import { nanoid } from 'nanoid';
import { CommandCancelledError, CommandTimeoutError } from './errors.js';

// ── ID generation ──

export function generateId(size = 12): string {
	return nanoid(size);
}

// ── Text utilities ──

export function truncateText(text: string, maxLength: number, suffix = '...'): string {
	if (text.length <= maxLength) return text;
	return text.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Render a value returned by a robot operation for display.
 * Absent values render as the empty string.
 */
export function renderValue(value: unknown): string {
	if (value === undefined || value === null) return '';
	if (typeof value === 'string') return value;
	if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
		return String(value);
	}
	try {
		return JSON.stringify(value) ?? String(value);
	} catch {
		// Circular structures
		return String(value);
	}
}

// ── Filesystem ──

export function isNotFound(error: unknown): boolean {
	return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ── Timing ──

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(signal.reason);
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			reject(signal?.reason);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort);
			resolve();
		}, ms);
		signal?.addEventListener('abort', onAbort, { once: true });
	});
}

/** Longest delay `setTimeout` honours; anything above fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface DeadlineOptions {
	timeoutMs: number;
	/** Outer cancellation; aborting it rejects with CommandCancelledError. */
	signal?: AbortSignal;
}

/**
 * Run `fn` with a deadline. The signal handed to `fn` is aborted when the
 * deadline passes or the outer signal fires, so cooperative work can stop.
 */
export function withDeadline<T>(
	fn: (signal: AbortSignal) => Promise<T>,
	options: DeadlineOptions,
): Promise<T> {
	const { timeoutMs, signal } = options;
	if (signal?.aborted) {
		return Promise.reject(new CommandCancelledError());
	}

	const controller = new AbortController();

	return new Promise<T>((resolve, reject) => {
		let settled = false;

		const finish = (settle: () => void) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			signal?.removeEventListener('abort', onAbort);
			settle();
		};

		const onAbort = () => {
			const error = new CommandCancelledError({ cause: signal?.reason });
			controller.abort(error);
			finish(() => reject(error));
		};

		const timer = setTimeout(() => {
			const error = new CommandTimeoutError(timeoutMs);
			controller.abort(error);
			finish(() => reject(error));
		}, Math.min(timeoutMs, MAX_TIMER_DELAY_MS));

		signal?.addEventListener('abort', onAbort, { once: true });

		Promise.resolve()
			.then(() => fn(controller.signal))
			.then(
				(value) => finish(() => resolve(value)),
				(error: unknown) => finish(() => reject(error)),
			);
	});
}

export class Timer {
	private startTime: number;

	constructor() {
		this.startTime = performance.now();
	}

	elapsed(): number {
		return Math.round(performance.now() - this.startTime);
	}

	reset(): void {
		this.startTime = performance.now();
	}
}

// ── Concurrency ──

/**
 * Serializes async critical sections that share a key. Sections with
 * different keys run independently.
 */
export class KeyedMutex {
	private tails = new Map<string, Promise<void>>();

	async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
		const previous = this.tails.get(key) ?? Promise.resolve();
		const current = previous.then(fn);
		const tail = current.then(
			() => undefined,
			() => undefined,
		);
		this.tails.set(key, tail);

		try {
			return await current;
		} finally {
			if (this.tails.get(key) === tail) {
				this.tails.delete(key);
			}
		}
	}

	isLocked(key: string): boolean {
		return this.tails.has(key);
	}
}
