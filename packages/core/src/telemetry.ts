import { createLogger } from './logging.js';

const logger = createLogger('perf');

export interface TimingResult<T> {
	result: T;
	durationMs: number;
}

/**
 * Runs an async function and logs how long it took at debug level.
 */
export async function timed<T>(
	label: string,
	fn: () => Promise<T>,
): Promise<TimingResult<T>> {
	const start = performance.now();
	try {
		const result = await fn();
		const durationMs = performance.now() - start;
		logger.debug(`${label}: ${durationMs.toFixed(1)}ms`);
		return { result, durationMs };
	} catch (error) {
		const durationMs = performance.now() - start;
		logger.debug(`${label}: FAILED after ${durationMs.toFixed(1)}ms`);
		throw error;
	}
}
