import { z } from 'zod';

export const QueuedCommandSchema = z.object({
	text: z.string().trim().min(1),
	/** Monotonic per-queue sequence number; never reused after a clear. */
	seq: z.number().int().nonnegative(),
	enqueuedAt: z.number(),
});

export type QueuedCommand = z.infer<typeof QueuedCommandSchema>;

export const QueueStateSchema = z
	.object({
		nextSeq: z.number().int().nonnegative(),
		commands: z.array(QueuedCommandSchema),
	})
	.refine((state) => state.commands.every((c) => c.seq < state.nextSeq), {
		message: 'every command seq must be below nextSeq',
	});

export type QueueState = z.infer<typeof QueueStateSchema>;

export interface CommandQueueOptions {
	/** Reject appends once this many commands are pending. */
	maxLength?: number;
}

/**
 * Persistence for per-session queues. Implementations only move whole
 * states; atomicity against concurrent queue operations comes from
 * SessionQueues, which wraps every load-mutate-save in a critical section.
 */
export interface QueueStore {
	load(sessionId: string): Promise<QueueState | undefined>;
	save(sessionId: string, state: QueueState): Promise<void>;
	delete(sessionId: string): Promise<boolean>;
	list(): Promise<string[]>;
}
