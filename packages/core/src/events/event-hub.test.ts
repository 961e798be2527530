import { test, expect, describe, beforeEach, vi } from 'vitest';
import { EventHub } from './event-hub.js';

interface TestEvents {
	ping: { n: number };
	done: { ok: boolean };
}

describe('EventHub', () => {
	let hub: EventHub<TestEvents>;

	beforeEach(() => {
		hub = new EventHub<TestEvents>({ maxHistory: 3 });
	});

	test('delivers payloads to every handler', () => {
		const a = vi.fn();
		const b = vi.fn();
		hub.on('ping', a);
		hub.on('ping', b);

		hub.emit('ping', { n: 1 });

		expect(a).toHaveBeenCalledWith({ n: 1 });
		expect(b).toHaveBeenCalledWith({ n: 1 });
	});

	test('the returned function unsubscribes', () => {
		const handler = vi.fn();
		const off = hub.on('ping', handler);
		off();

		hub.emit('ping', { n: 1 });
		expect(handler).not.toHaveBeenCalled();
	});

	test('once handlers fire a single time', () => {
		const handler = vi.fn();
		hub.once('done', handler);

		hub.emit('done', { ok: true });
		hub.emit('done', { ok: false });

		expect(handler).toHaveBeenCalledTimes(1);
		expect(handler).toHaveBeenCalledWith({ ok: true });
	});

	test('a throwing handler does not stop the others', () => {
		const after = vi.fn();
		hub.on('ping', () => {
			throw new Error('handler failed');
		});
		hub.on('ping', after);

		hub.emit('ping', { n: 2 });
		expect(after).toHaveBeenCalledWith({ n: 2 });
	});

	test('off without a handler removes every handler for the event', () => {
		const handler = vi.fn();
		hub.on('ping', handler);
		hub.off('ping');

		hub.emit('ping', { n: 1 });
		expect(handler).not.toHaveBeenCalled();
	});

	test('keeps a bounded history', () => {
		hub.emit('ping', { n: 1 });
		hub.emit('ping', { n: 2 });
		hub.emit('done', { ok: true });
		hub.emit('ping', { n: 3 });

		expect(hub.getHistory().map((h) => h.event)).toEqual(['ping', 'done', 'ping']);
		expect(hub.getHistory('ping').map((h) => h.payload)).toEqual([{ n: 2 }, { n: 3 }]);

		hub.clearHistory();
		expect(hub.getHistory()).toEqual([]);
	});
});
