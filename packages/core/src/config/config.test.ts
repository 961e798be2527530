import { test, expect, describe, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Config } from './config.js';

const ENV_KEYS = [
	'BOTDECK_HOME',
	'BOTDECK_COMMAND_TIMEOUT_MS',
	'BOTDECK_ACQUIRE_TIMEOUT_MS',
	'BOTDECK_QUEUE_MAX_LENGTH',
	'BOTDECK_QUEUE_DIR',
	'BOTDECK_APPLICATIONS_FILE',
	'BOTDECK_SOCKET_PATH',
	'BOTDECK_LOG_LEVEL',
];

describe('Config', () => {
	let home: string;
	let savedEnv: Record<string, string | undefined>;

	beforeEach(() => {
		savedEnv = Object.fromEntries(ENV_KEYS.map((key) => [key, process.env[key]]));
		for (const key of ENV_KEYS) delete process.env[key];

		home = fs.mkdtempSync(path.join(os.tmpdir(), 'botdeck-config-'));
		process.env.BOTDECK_HOME = home;
		Config.reset();
	});

	afterEach(() => {
		Config.reset();
		fs.rmSync(home, { recursive: true, force: true });
		for (const key of ENV_KEYS) {
			const value = savedEnv[key];
			if (value === undefined) delete process.env[key];
			else process.env[key] = value;
		}
	});

	function writeConfigFile(contents: string): void {
		fs.writeFileSync(path.join(home, 'config.json'), contents);
	}

	test('uses defaults without a config file', () => {
		const config = Config.instance();

		expect(config.device).toEqual({ commandTimeoutMs: 10_000, acquireTimeoutMs: 5_000, boundName: 'robot' });
		expect(config.queue.maxLength).toBe(100);
		expect(config.logLevel).toBe('info');
		expect(config.queueStoreDir).toBe(path.join(home, 'queues'));
		expect(config.applicationsFile).toBe(path.join(home, 'applications.json'));
		expect(config.socketPath).toBe(path.join(os.tmpdir(), 'botdeck', 'server.sock'));
	});

	test('returns the same instance until reset', () => {
		const first = Config.instance();
		expect(Config.instance()).toBe(first);

		Config.reset();
		expect(Config.instance()).not.toBe(first);
	});

	test('reads the config file', () => {
		writeConfigFile(JSON.stringify({ device: { commandTimeoutMs: 2000 }, logLevel: 'warn' }));
		const config = Config.instance();

		expect(config.device.commandTimeoutMs).toBe(2000);
		expect(config.device.acquireTimeoutMs).toBe(5000);
		expect(config.logLevel).toBe('warn');
	});

	test('environment variables override the file', () => {
		writeConfigFile(JSON.stringify({ device: { commandTimeoutMs: 2000 } }));
		process.env.BOTDECK_COMMAND_TIMEOUT_MS = '3000';
		process.env.BOTDECK_QUEUE_DIR = '/srv/queues';
		process.env.BOTDECK_LOG_LEVEL = 'DEBUG';

		const config = Config.instance();

		expect(config.device.commandTimeoutMs).toBe(3000);
		expect(config.queueStoreDir).toBe('/srv/queues');
		expect(config.logLevel).toBe('debug');
	});

	test('explicit overrides win over the environment', () => {
		process.env.BOTDECK_COMMAND_TIMEOUT_MS = '3000';
		const config = Config.instance({ device: { commandTimeoutMs: 4000 }, socketPath: '/tmp/test.sock' });

		expect(config.device.commandTimeoutMs).toBe(4000);
		expect(config.socketPath).toBe('/tmp/test.sock');
	});

	test('rejects a command timeout longer than a timer can wait', () => {
		process.env.BOTDECK_COMMAND_TIMEOUT_MS = '3000000000';
		expect(() => Config.instance()).toThrow();
	});

	test('ignores non-integer numbers in the environment', () => {
		process.env.BOTDECK_QUEUE_MAX_LENGTH = 'lots';
		expect(Config.instance().queue.maxLength).toBe(100);
	});

	test('ignores an invalid config file', () => {
		writeConfigFile('{ not json');
		expect(Config.instance().device.commandTimeoutMs).toBe(10_000);
	});

	test('saves and reloads the config file', () => {
		Config.saveConfigFile({ queue: { maxLength: 5 } });

		expect(Config.loadConfigFile()).toEqual({ queue: { maxLength: 5 } });
		expect(Config.instance().queue.maxLength).toBe(5);
	});
});
