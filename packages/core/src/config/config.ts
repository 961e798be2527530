import { config as loadDotenv } from 'dotenv';
import * as path from 'node:path';
import * as os from 'node:os';
import * as fs from 'node:fs';
import {
	type GlobalConfig,
	GlobalConfigSchema,
	type ConfigFileContents,
	ConfigFileSchema,
} from './types.js';
import type { DeepPartial } from '../types.js';
import { createLogger } from '../logging.js';

const logger = createLogger('config');

let _instance: Config | undefined;

type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is ConfigLayer {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function envInt(value: string | undefined): number | undefined {
	if (value === undefined || value.trim() === '') return undefined;
	const parsed = Number(value);
	return Number.isInteger(parsed) ? parsed : undefined;
}

export class Config {
	readonly config: GlobalConfig;

	private constructor(overrides: DeepPartial<GlobalConfig> = {}) {
		loadDotenv();

		// Config file first, then environment, then explicit overrides
		const fileConfig = Config.loadConfigFile();
		const merged = this.deepMerge(fileConfig, this.envLayer(), overrides);
		this.config = GlobalConfigSchema.parse(merged);
	}

	static instance(overrides?: DeepPartial<GlobalConfig>): Config {
		if (!_instance) {
			_instance = new Config(overrides);
		}
		return _instance;
	}

	static reset(): void {
		_instance = undefined;
	}

	private envLayer(): ConfigLayer {
		const env = process.env;
		const logLevel = env.BOTDECK_LOG_LEVEL?.toLowerCase();

		return {
			device: {
				commandTimeoutMs: envInt(env.BOTDECK_COMMAND_TIMEOUT_MS),
				acquireTimeoutMs: envInt(env.BOTDECK_ACQUIRE_TIMEOUT_MS),
			},
			queue: {
				maxLength: envInt(env.BOTDECK_QUEUE_MAX_LENGTH),
				storeDir: env.BOTDECK_QUEUE_DIR || undefined,
			},
			applicationsFile: env.BOTDECK_APPLICATIONS_FILE || undefined,
			socketPath: env.BOTDECK_SOCKET_PATH || undefined,
			logLevel: logLevel || undefined,
		};
	}

	private deepMerge(...layers: ConfigLayer[]): ConfigLayer {
		const result: ConfigLayer = {};

		for (const layer of layers) {
			for (const [key, value] of Object.entries(layer)) {
				const existing = result[key];
				if (isPlainObject(value) && isPlainObject(existing)) {
					result[key] = this.deepMerge(existing, value);
				} else if (isPlainObject(value)) {
					result[key] = this.deepMerge(value);
				} else if (value !== undefined) {
					result[key] = value;
				}
			}
		}

		return result;
	}

	get device() {
		return this.config.device;
	}

	get queue() {
		return this.config.queue;
	}

	get logLevel() {
		return this.config.logLevel;
	}

	get queueStoreDir(): string {
		return this.config.queue.storeDir ?? path.join(Config.configDir, 'queues');
	}

	get applicationsFile(): string {
		return this.config.applicationsFile ?? path.join(Config.configDir, 'applications.json');
	}

	get socketPath(): string {
		return this.config.socketPath ?? path.join(os.tmpdir(), 'botdeck', 'server.sock');
	}

	static get configDir(): string {
		return process.env.BOTDECK_HOME || path.join(os.homedir(), '.botdeck');
	}

	static get configFilePath(): string {
		return path.join(Config.configDir, 'config.json');
	}

	static loadConfigFile(): ConfigFileContents {
		const filePath = Config.configFilePath;
		if (!fs.existsSync(filePath)) {
			return {};
		}

		try {
			const raw = fs.readFileSync(filePath, 'utf-8');
			const parsed = ConfigFileSchema.parse(JSON.parse(raw));
			logger.debug(`Loaded config from ${filePath}`);
			return parsed;
		} catch (error) {
			logger.warn(`Ignoring invalid config file ${filePath}: ${error}`);
			return {};
		}
	}

	static saveConfigFile(config: ConfigFileContents): void {
		const filePath = Config.configFilePath;
		fs.mkdirSync(path.dirname(filePath), { recursive: true });
		fs.writeFileSync(filePath, JSON.stringify(config, null, 2), 'utf-8');
		logger.info(`Config saved to ${filePath}`);
	}
}
