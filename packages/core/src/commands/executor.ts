import { CommandCatalog } from './catalog/catalog.js';
import type { CatalogOptions } from './catalog/types.js';
import { parseCommand } from './parser.js';
import {
	CANCELLED,
	type CommandOutcome,
	DriveStraightParamsSchema,
	EmptyParamsSchema,
	type FailureKind,
	PlayAnimationParamsSchema,
	SayTextParamsSchema,
	SetFreeplayParamsSchema,
	SetHeadAngleParamsSchema,
	SetLiftHeightParamsSchema,
	SetWheelMotorsParamsSchema,
	TIMEOUT,
	TurnInPlaceParamsSchema,
	UNAVAILABLE_DEVICE,
	WaitParamsSchema,
} from './types.js';
import type { DeviceProvider, Robot } from '../device/types.js';
import type { QueuedCommand } from '../queue/types.js';
import { EventHub } from '../events/event-hub.js';
import type { ConsoleEventMap } from '../events/types.js';
import {
	CommandCancelledError,
	CommandTimeoutError,
	SchemaViolationError,
	errorMessage,
} from '../errors.js';
import { createLogger } from '../logging.js';
import { generateId, renderValue, sleep, Timer, withDeadline } from '../utils.js';

const logger = createLogger('executor');

const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;
const DEFAULT_ACQUIRE_TIMEOUT_MS = 5_000;

export interface CommandExecutorOptions {
	catalog?: CatalogOptions;
	commandTimeoutMs?: number;
	acquireTimeoutMs?: number;
	/** Name the robot is addressed by in command text. */
	boundName?: string;
	events?: EventHub<ConsoleEventMap>;
}

export interface ExecuteOptions {
	/** Aborting cancels the in-flight command and every command after it. */
	signal?: AbortSignal;
	batchId?: string;
}

export class CommandExecutor {
	readonly catalog: CommandCatalog;
	readonly events: EventHub<ConsoleEventMap>;
	readonly commandTimeoutMs: number;
	readonly acquireTimeoutMs: number;
	readonly boundName: string;

	constructor(options?: CommandExecutorOptions) {
		this.catalog = new CommandCatalog(options?.catalog);
		this.events = options?.events ?? new EventHub<ConsoleEventMap>();
		this.commandTimeoutMs = options?.commandTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
		this.acquireTimeoutMs = options?.acquireTimeoutMs ?? DEFAULT_ACQUIRE_TIMEOUT_MS;
		this.boundName = options?.boundName ?? 'robot';

		this.registerBuiltinOperations();
	}

	private registerBuiltinOperations(): void {
		// Speech
		this.catalog.register({
			name: 'say_text',
			description: 'Speak the given text',
			schema: SayTextParamsSchema,
			handler: async ({ text }, { robot, signal }) => {
				await robot.sayText(text, signal);
			},
		});

		// Sensors
		this.catalog.register({
			name: 'battery',
			description: 'Report battery level, voltage and charging state',
			schema: EmptyParamsSchema,
			handler: async (_params, { robot }) => robot.battery(),
		});

		this.catalog.register({
			name: 'status',
			description: 'Report wheel speeds, head angle, lift height and odometer',
			schema: EmptyParamsSchema,
			handler: async (_params, { robot }) => robot.status(),
		});

		// Motion
		this.catalog.register({
			name: 'stop',
			description: 'Stop both wheel motors',
			schema: EmptyParamsSchema,
			handler: async (_params, { robot }) => {
				await robot.stop();
			},
		});

		this.catalog.register({
			name: 'set_wheel_motors',
			description: 'Run the wheel motors at the given speeds until stopped',
			schema: SetWheelMotorsParamsSchema,
			handler: async ({ left_speed, right_speed }, { robot }) => {
				await robot.setWheelMotors(left_speed, right_speed);
			},
		});

		this.catalog.register({
			name: 'drive_straight',
			description: 'Drive straight for a distance',
			schema: DriveStraightParamsSchema,
			handler: async ({ distance_mm, speed_mmps }, { robot, signal }) => {
				await robot.driveStraight(distance_mm, speed_mmps, signal);
			},
		});

		this.catalog.register({
			name: 'turn_in_place',
			description: 'Turn on the spot',
			schema: TurnInPlaceParamsSchema,
			handler: async ({ angle_deg }, { robot, signal }) => {
				await robot.turnInPlace(angle_deg, signal);
			},
		});

		this.catalog.register({
			name: 'set_head_angle',
			description: 'Move the head to an angle',
			schema: SetHeadAngleParamsSchema,
			handler: async ({ angle_deg }, { robot }) => {
				await robot.setHeadAngle(angle_deg);
			},
		});

		this.catalog.register({
			name: 'set_lift_height',
			description: 'Move the lift to a height',
			schema: SetLiftHeightParamsSchema,
			handler: async ({ height }, { robot }) => {
				await robot.setLiftHeight(height);
			},
		});

		// Animations
		this.catalog.register({
			name: 'anim.play_animation',
			description: 'Play a named animation',
			schema: PlayAnimationParamsSchema,
			handler: async ({ name }, { robot, signal }) => {
				await robot.playAnimation(name, signal);
			},
		});

		this.catalog.register({
			name: 'anim.list_animations',
			description: 'List the animations the robot can play',
			schema: EmptyParamsSchema,
			handler: async (_params, { robot }) => robot.listAnimations(),
		});

		this.catalog.register({
			name: 'set_freeplay',
			description: 'Enable or disable autonomous behaviour',
			schema: SetFreeplayParamsSchema,
			handler: async ({ enabled }, { robot }) => {
				await robot.setFreeplay(enabled);
			},
		});

		// Wait
		this.catalog.register({
			name: 'wait',
			description: 'Pause before the next command',
			schema: WaitParamsSchema,
			handler: async ({ seconds }, { signal }) => {
				if (seconds * 1000 >= this.commandTimeoutMs) {
					throw new SchemaViolationError('wait', [
						`seconds: ${seconds}s does not fit within the ${this.commandTimeoutMs}ms command timeout`,
					]);
				}
				await sleep(seconds * 1000, signal);
			},
		});
	}

	/**
	 * Parse one command, resolve it in the catalog and run it against the
	 * robot. Resolves to the rendering of the operation's result.
	 */
	async evaluate(text: string, robot: Robot, signal: AbortSignal): Promise<string> {
		const parsed = parseCommand(text, { boundName: this.boundName });
		const value = await this.catalog.invoke(parsed.operation, parsed, { robot, signal });
		return renderValue(value);
	}

	/**
	 * Run a snapshot of commands in order against one acquired device.
	 *
	 * Returns exactly one outcome per command, in snapshot order. A failing
	 * command never stops the batch. The device is released on every path
	 * once it has been acquired.
	 */
	async execute(
		snapshot: readonly QueuedCommand[],
		devices: DeviceProvider<Robot>,
		options: ExecuteOptions = {},
	): Promise<CommandOutcome[]> {
		if (snapshot.length === 0) return [];

		const batchId = options.batchId ?? generateId();
		const batchTimer = new Timer();
		const outcomes: CommandOutcome[] = [];
		const record = (outcome: CommandOutcome) => {
			const frozen = Object.freeze(outcome);
			outcomes.push(frozen);
			this.events.emit('command:outcome', { batchId, outcome: frozen });
		};

		this.events.emit('batch:start', { batchId, size: snapshot.length });
		logger.debug(`Batch ${batchId}: ${snapshot.length} command(s)`);

		const robot = await this.acquire(devices, options.signal).catch((error: unknown) => {
			const cancelled = error instanceof CommandCancelledError;
			logger.warn(`Batch ${batchId}: device acquisition failed: ${errorMessage(error)}`);
			snapshot.forEach((command, position) => {
				record(
					cancelled
						? failure(command, position, 'cancelled', CANCELLED, 0)
						: failure(command, position, 'device_unavailable', UNAVAILABLE_DEVICE, 0),
				);
			});
			return undefined;
		});

		if (robot) {
			try {
				for (const [position, command] of snapshot.entries()) {
					if (options.signal?.aborted) {
						record(failure(command, position, 'cancelled', CANCELLED, 0));
						continue;
					}
					record(await this.runCommand(command, position, robot, options.signal));
				}
			} finally {
				await this.release(devices, robot, batchId);
			}
		}

		const durationMs = batchTimer.elapsed();
		this.events.emit('batch:end', { batchId, outcomes, durationMs });
		logger.debug(`Batch ${batchId} finished in ${durationMs}ms`);
		return outcomes;
	}

	private async runCommand(
		command: QueuedCommand,
		position: number,
		robot: Robot,
		signal?: AbortSignal,
	): Promise<CommandOutcome> {
		const timer = new Timer();
		try {
			const rendering = await withDeadline(
				(commandSignal) => this.evaluate(command.text, robot, commandSignal),
				{ timeoutMs: this.commandTimeoutMs, signal },
			);
			return {
				status: 'success',
				command: command.text,
				position,
				seq: command.seq,
				durationMs: timer.elapsed(),
				rendering,
			};
		} catch (error) {
			const durationMs = timer.elapsed();
			if (error instanceof CommandTimeoutError) {
				logger.warn(`"${command.text}" timed out after ${error.timeoutMs}ms`);
				return failure(command, position, 'timeout', TIMEOUT, durationMs);
			}
			if (error instanceof CommandCancelledError || signal?.aborted) {
				return failure(command, position, 'cancelled', CANCELLED, durationMs);
			}
			logger.debug(`"${command.text}" failed: ${errorMessage(error)}`);
			return failure(command, position, 'evaluation', errorMessage(error), durationMs);
		}
	}

	private async acquire(devices: DeviceProvider<Robot>, signal?: AbortSignal): Promise<Robot> {
		const acquisition: { pending?: Promise<Robot> } = {};
		try {
			return await withDeadline(
				(acquireSignal) => {
					acquisition.pending = devices.acquire(acquireSignal);
					return acquisition.pending;
				},
				{ timeoutMs: this.acquireTimeoutMs, signal },
			);
		} catch (error) {
			// A handle that arrives after the deadline still has to go back.
			const late = acquisition.pending;
			if (late) {
				void late.then(
					(handle) => devices.release(handle),
					() => undefined,
				).catch((releaseError: unknown) => {
					logger.warn(`Releasing a late device handle failed: ${errorMessage(releaseError)}`);
				});
			}
			throw error;
		}
	}

	private async release(devices: DeviceProvider<Robot>, robot: Robot, batchId: string): Promise<void> {
		try {
			await devices.release(robot);
		} catch (error) {
			logger.error(`Batch ${batchId}: releasing the device failed: ${errorMessage(error)}`);
		}
	}
}

function failure(
	command: QueuedCommand,
	position: number,
	kind: FailureKind,
	error: string,
	durationMs: number,
): CommandOutcome {
	return {
		status: 'failure',
		command: command.text,
		position,
		seq: command.seq,
		durationMs,
		kind,
		error,
	};
}
