// ── Console ──
export {
	RobotConsole,
	createRobotConsole,
	type RobotConsoleOptions,
	type ExecuteBatchOptions,
	type BatchReport,
	type ConsoleOverrides,
} from './console/robot-console.js';

// ── Queue ──
export { CommandQueue } from './queue/command-queue.js';
export { SessionQueues } from './queue/session-queues.js';
export { MemoryQueueStore, FileQueueStore, assertSessionId } from './queue/store.js';
export {
	type QueuedCommand,
	QueuedCommandSchema,
	type QueueState,
	QueueStateSchema,
	type CommandQueueOptions,
	type QueueStore,
} from './queue/types.js';

// ── Commands ──
export { CommandExecutor, type CommandExecutorOptions, type ExecuteOptions } from './commands/executor.js';
export { CommandCatalog } from './commands/catalog/catalog.js';
export type { CatalogOptions, OperationArguments } from './commands/catalog/types.js';
export { parseCommand, type ParsedCommand, type ParseOptions, type Literal } from './commands/parser.js';
export {
	type ExecutionContext,
	type OperationSpec,
	type CommandOutcome,
	type SuccessOutcome,
	type FailureOutcome,
	type FailureKind,
	FAILURE_KINDS,
	UNAVAILABLE_DEVICE,
	TIMEOUT,
	CANCELLED,
} from './commands/types.js';

// ── Device ──
export {
	SimulatedRobot,
	SimulatedRobotProvider,
	DEFAULT_ANIMATIONS,
	type SimulatedRobotOptions,
	type SimulatedRobotProviderOptions,
} from './device/simulated-robot.js';
export {
	type Robot,
	type RobotStatus,
	type BatteryState,
	type BatteryLevel,
	type DeviceProvider,
	HEAD_ANGLE_RANGE,
	LIFT_HEIGHT_RANGE,
} from './device/types.js';

// ── Applications ──
export { searchApplications, parseSearchFields } from './apps/search.js';
export { StaticApplicationProvider, JsonFileApplicationProvider } from './apps/provider.js';
export {
	type ApplicationRecord,
	ApplicationRecordSchema,
	ApplicationCatalogSchema,
	type ApplicationProvider,
	SEARCH_FIELDS,
	type SearchField,
	type SearchQuery,
	type SearchResult,
} from './apps/types.js';

// ── Events ──
export { EventHub, type HistoryEntry } from './events/event-hub.js';
export type { ConsoleEventMap } from './events/types.js';

// ── Config ──
export {
	Config,
	type GlobalConfig,
	GlobalConfigSchema,
	type DeviceConfig,
	type QueueConfig,
	type ConfigFileContents,
} from './config/index.js';

// ── Errors ──
export {
	BotdeckError,
	InvalidCommandError,
	QueueFullError,
	InvalidSessionIdError,
	CommandParseError,
	UnknownOperationError,
	SchemaViolationError,
	CommandFailedError,
	CommandTimeoutError,
	CommandCancelledError,
	DeviceUnavailableError,
	BatchInProgressError,
	errorMessage,
} from './errors.js';

// ── Logging ──
export {
	Logger,
	createLogger,
	setGlobalLogLevel,
	setLogColors,
	formatLogLine,
} from './logging.js';

// ── Utilities ──
export { generateId, truncateText, renderValue, sleep, withDeadline, Timer, KeyedMutex } from './utils.js';
export { timed, type TimingResult } from './telemetry.js';
export {
	type SessionId,
	isSessionId,
	type Result,
	ok,
	err,
	LogLevel,
	type LogLevelName,
} from './types.js';
