import { createLogger } from '../logging.js';

const logger = createLogger('event-hub');

type Handler<T> = (payload: T) => void;

type HandlerSets<EventMap> = { [K in keyof EventMap]?: Set<Handler<EventMap[K]>> };

export interface HistoryEntry {
	event: string;
	payload: unknown;
	timestamp: number;
}

export class EventHub<EventMap extends object> {
	private handlers: HandlerSets<EventMap> = {};
	private history: HistoryEntry[] = [];
	private maxHistory: number;

	constructor(options?: { maxHistory?: number }) {
		this.maxHistory = options?.maxHistory ?? 100;
	}

	on<K extends keyof EventMap & string>(event: K, handler: Handler<EventMap[K]>): () => void {
		let handlers = this.handlers[event];
		if (!handlers) {
			handlers = new Set<Handler<EventMap[K]>>();
			this.handlers[event] = handlers;
		}
		handlers.add(handler);

		return () => {
			this.handlers[event]?.delete(handler);
		};
	}

	once<K extends keyof EventMap & string>(event: K, handler: Handler<EventMap[K]>): () => void {
		const wrappedHandler: Handler<EventMap[K]> = (payload) => {
			off();
			handler(payload);
		};
		const off = this.on(event, wrappedHandler);
		return off;
	}

	emit<K extends keyof EventMap & string>(event: K, payload: EventMap[K]): void {
		this.recordHistory(event, payload);
		const handlers = this.handlers[event];
		if (!handlers) return;

		for (const handler of [...handlers]) {
			try {
				handler(payload);
			} catch (error) {
				logger.error(`Error in event handler for "${event}":`, error);
			}
		}
	}

	off<K extends keyof EventMap & string>(event: K, handler?: Handler<EventMap[K]>): void {
		if (handler) {
			this.handlers[event]?.delete(handler);
		} else {
			delete this.handlers[event];
		}
	}

	removeAllListeners(): void {
		this.handlers = {};
	}

	getHistory(event?: keyof EventMap & string): HistoryEntry[] {
		if (event) {
			return this.history.filter((h) => h.event === event);
		}
		return [...this.history];
	}

	clearHistory(): void {
		this.history = [];
	}

	private recordHistory(event: string, payload: unknown): void {
		this.history.push({ event, payload, timestamp: Date.now() });
		if (this.history.length > this.maxHistory) {
			this.history = this.history.slice(-this.maxHistory);
		}
	}
}
