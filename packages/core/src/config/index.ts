export { Config } from './config.js';
export {
	type DeviceConfig,
	DeviceConfigSchema,
	type QueueConfig,
	QueueConfigSchema,
	type GlobalConfig,
	GlobalConfigSchema,
	type ConfigFileContents,
	ConfigFileSchema,
} from './types.js';
