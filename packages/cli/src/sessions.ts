export interface SessionActivity {
	id: string;
	createdAt: number;
	lastAccessedAt: number;
	submitted: number;
	batches: number;
}

/**
 * Tracks what each session has done since the server started. Queue
 * contents live in the queue store; this only keeps activity counters.
 */
export class SessionManager {
	private sessions = new Map<string, SessionActivity>();

	touch(id: string): SessionActivity {
		const now = Date.now();
		let session = this.sessions.get(id);
		if (!session) {
			session = { id, createdAt: now, lastAccessedAt: now, submitted: 0, batches: 0 };
			this.sessions.set(id, session);
		}
		session.lastAccessedAt = now;
		return session;
	}

	recordSubmit(id: string): void {
		this.touch(id).submitted++;
	}

	recordBatch(id: string): void {
		this.touch(id).batches++;
	}

	get(id: string): SessionActivity | undefined {
		const session = this.sessions.get(id);
		return session ? { ...session } : undefined;
	}

	list(): SessionActivity[] {
		return [...this.sessions.values()].map((s) => ({ ...s }));
	}

	get activeCount(): number {
		return this.sessions.size;
	}
}
