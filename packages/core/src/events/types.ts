import type { CommandOutcome } from '../commands/types.js';

export interface ConsoleEventMap {
	'batch:start': { batchId: string; size: number };
	'command:outcome': { batchId: string; outcome: CommandOutcome };
	'batch:end': { batchId: string; outcomes: readonly CommandOutcome[]; durationMs: number };
	'queue:append': { sessionId: string; text: string; seq: number };
	'queue:clear': { sessionId: string };
}
