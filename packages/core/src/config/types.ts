import { z } from 'zod';
import { MAX_TIMER_DELAY_MS } from '../utils.js';

export const DeviceConfigSchema = z.object({
	commandTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(10_000),
	acquireTimeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).default(5_000),
	boundName: z.string().regex(/^[A-Za-z_]\w*$/).default('robot'),
});

export type DeviceConfig = z.infer<typeof DeviceConfigSchema>;

export const QueueConfigSchema = z.object({
	maxLength: z.number().int().positive().default(100),
	storeDir: z.string().optional(),
});

export type QueueConfig = z.infer<typeof QueueConfigSchema>;

export const GlobalConfigSchema = z.object({
	device: DeviceConfigSchema.default({}),
	queue: QueueConfigSchema.default({}),
	applicationsFile: z.string().optional(),
	socketPath: z.string().optional(),
	logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

export const ConfigFileSchema = z.object({
	device: DeviceConfigSchema.partial().optional(),
	queue: QueueConfigSchema.partial().optional(),
	applicationsFile: z.string().optional(),
	socketPath: z.string().optional(),
	logLevel: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type ConfigFileContents = z.infer<typeof ConfigFileSchema>;
