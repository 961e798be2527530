import { z } from 'zod';
import {
	ApplicationRecordSchema,
	FAILURE_KINDS,
	QueuedCommandSchema,
	type Result,
	SEARCH_FIELDS,
	err,
	ok,
} from 'botdeck';

const SessionArgs = z.object({ session: z.string().default('default') });

export const CLIRequestSchema = z.discriminatedUnion('command', [
	z.object({
		id: z.string(),
		command: z.literal('submit'),
		args: SessionArgs.extend({ text: z.string() }),
	}),
	z.object({ id: z.string(), command: z.literal('execute'), args: SessionArgs }),
	z.object({ id: z.string(), command: z.literal('clear'), args: SessionArgs }),
	z.object({ id: z.string(), command: z.literal('queue'), args: SessionArgs }),
	z.object({
		id: z.string(),
		command: z.literal('search'),
		args: z.object({
			text: z.string().default(''),
			fields: z.array(z.enum(SEARCH_FIELDS)).default([...SEARCH_FIELDS]),
		}),
	}),
	z.object({ id: z.string(), command: z.literal('operations'), args: z.object({}).default({}) }),
	z.object({ id: z.string(), command: z.literal('sessions'), args: z.object({}).default({}) }),
]);

export type CLIRequest = z.infer<typeof CLIRequestSchema>;
export type CLICommand = CLIRequest['command'];

/** What goes on the wire; the server validates it against CLIRequestSchema. */
export interface WireRequest {
	id: string;
	command: string;
	args?: unknown;
}

export interface CLIResponse {
	id: string;
	success: boolean;
	data?: unknown;
	error?: string;
}

export const CLIResponseSchema = z.object({
	id: z.string(),
	success: z.boolean(),
	data: z.unknown().optional(),
	error: z.string().optional(),
});

export function serializeRequest(req: WireRequest): string {
	return JSON.stringify(req) + '\n';
}

/**
 * Parse one request line. On failure the error carries the request id when
 * one could be read, so the server can still answer it.
 */
export function parseRequest(data: string): Result<CLIRequest, { id: string; message: string }> {
	let raw: unknown;
	try {
		raw = JSON.parse(data.trim());
	} catch {
		return err({ id: '', message: 'Malformed request: not valid JSON' });
	}

	const parsed = CLIRequestSchema.safeParse(raw);
	if (parsed.success) {
		return ok(parsed.data);
	}

	const id = z.object({ id: z.string() }).safeParse(raw);
	const message = parsed.error.issues
		.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
		.join('; ');
	return err({ id: id.success ? id.data.id : '', message: `Invalid request: ${message}` });
}

export function serializeResponse(res: CLIResponse): string {
	return JSON.stringify(res) + '\n';
}

export function parseResponse(data: string): CLIResponse | null {
	let raw: unknown;
	try {
		raw = JSON.parse(data.trim());
	} catch {
		return null;
	}
	const parsed = CLIResponseSchema.safeParse(raw);
	return parsed.success ? parsed.data : null;
}

// ── Response payloads ──

const OutcomeBaseSchema = z.object({
	command: z.string(),
	position: z.number(),
	seq: z.number(),
	durationMs: z.number(),
});

export const CommandOutcomeSchema = z.discriminatedUnion('status', [
	OutcomeBaseSchema.extend({ status: z.literal('success'), rendering: z.string() }),
	OutcomeBaseSchema.extend({
		status: z.literal('failure'),
		kind: z.enum(FAILURE_KINDS),
		error: z.string(),
	}),
]);

export const BatchReportSchema = z.object({
	sessionId: z.string(),
	batchId: z.string(),
	outcomes: z.array(CommandOutcomeSchema),
	acknowledged: z.number(),
	remaining: z.array(QueuedCommandSchema),
});

export const QueueListingSchema = z.array(QueuedCommandSchema);

export const SearchResultSchema = z.object({
	matches: z.array(ApplicationRecordSchema),
	count: z.number(),
});

export const OperationsSchema = z.object({
	names: z.array(z.string()),
	help: z.string(),
});

export const SessionSummarySchema = z.object({
	id: z.string(),
	pending: z.number(),
	submitted: z.number(),
	batches: z.number(),
	lastAccessedAt: z.number().optional(),
});

export type SessionSummary = z.infer<typeof SessionSummarySchema>;
