export class BotdeckError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'BotdeckError';
	}
}

// ── Queue errors ──

export class InvalidCommandError extends BotdeckError {
	constructor(message = 'Command text must not be empty', options?: ErrorOptions) {
		super(message, options);
		this.name = 'InvalidCommandError';
	}
}

export class QueueFullError extends BotdeckError {
	public readonly maxLength: number;

	constructor(maxLength: number, options?: ErrorOptions) {
		super(`Command queue is full (${maxLength} pending commands)`, options);
		this.name = 'QueueFullError';
		this.maxLength = maxLength;
	}
}

export class InvalidSessionIdError extends BotdeckError {
	public readonly sessionId: string;

	constructor(sessionId: string, options?: ErrorOptions) {
		super(
			`Invalid session ID "${sessionId}". Only letters, digits, hyphens and underscores are allowed.`,
			options,
		);
		this.name = 'InvalidSessionIdError';
		this.sessionId = sessionId;
	}
}

// ── Command errors ──

export class CommandParseError extends BotdeckError {
	public readonly text: string;
	public readonly offset: number;

	constructor(text: string, offset: number, message: string, options?: ErrorOptions) {
		super(`Cannot parse command at column ${offset + 1}: ${message}`, options);
		this.name = 'CommandParseError';
		this.text = text;
		this.offset = offset;
	}
}

export class UnknownOperationError extends BotdeckError {
	public readonly operation: string;

	constructor(operation: string, options?: ErrorOptions) {
		super(`Unknown operation "${operation}"`, options);
		this.name = 'UnknownOperationError';
		this.operation = operation;
	}
}

export class SchemaViolationError extends BotdeckError {
	public readonly field: string;
	public readonly issues: string[];

	constructor(field: string, issues: string[], options?: ErrorOptions) {
		super(`Validation failed for "${field}": ${issues.join('; ')}`, options);
		this.name = 'SchemaViolationError';
		this.field = field;
		this.issues = issues;
	}
}

export class CommandFailedError extends BotdeckError {
	public readonly operation: string;

	constructor(operation: string, message: string, options?: ErrorOptions) {
		super(`Operation "${operation}" failed: ${message}`, options);
		this.name = 'CommandFailedError';
		this.operation = operation;
	}
}

export class CommandTimeoutError extends BotdeckError {
	public readonly timeoutMs: number;

	constructor(timeoutMs: number, options?: ErrorOptions) {
		super('timeout', options);
		this.name = 'CommandTimeoutError';
		this.timeoutMs = timeoutMs;
	}
}

export class CommandCancelledError extends BotdeckError {
	constructor(options?: ErrorOptions) {
		super('cancelled', options);
		this.name = 'CommandCancelledError';
	}
}

// ── Device errors ──

export class DeviceUnavailableError extends BotdeckError {
	constructor(message = 'unavailable device', options?: ErrorOptions) {
		super(message, options);
		this.name = 'DeviceUnavailableError';
	}
}

export class BatchInProgressError extends BotdeckError {
	public readonly sessionId: string;

	constructor(sessionId: string, options?: ErrorOptions) {
		super(`A batch is already executing for session "${sessionId}"`, options);
		this.name = 'BatchInProgressError';
		this.sessionId = sessionId;
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
