import { DeviceUnavailableError } from '../errors.js';
import { createLogger } from '../logging.js';
import { sleep } from '../utils.js';
import {
	type BatteryState,
	type DeviceProvider,
	HEAD_ANGLE_RANGE,
	LIFT_HEIGHT_RANGE,
	type Robot,
	type RobotStatus,
} from './types.js';

const logger = createLogger('simulated-robot');

export const DEFAULT_ANIMATIONS = [
	'anim_turn_left_01',
	'anim_blackjack_victorwin_01',
	'anim_pounce_success_02',
	'anim_feedback_shutup_01',
	'anim_knowledgegraph_success_01',
	'anim_wakeword_groggyeyes_listenloop_01',
	'anim_fistbump_success_01',
	'anim_reacttoface_unidentified_01',
	'anim_rtpickup_loop_10',
	'anim_volume_stage_05',
	'ANIMATION_TEST',
	'soundTestAnim',
];

// Test animations that do not behave well on a real robot
const HIDDEN_ANIMATIONS = new Set(['ANIMATION_TEST', 'soundTestAnim']);

const WHEEL_SPEED_LIMIT = 220; // mm/s
const TURN_SPEED_DEG_PER_SEC = 90;

export interface SimulatedRobotOptions {
	name?: string;
	animations?: string[];
	/** Battery voltage; below 3.6V the level reads "low". */
	voltage?: number;
	isCharging?: boolean;
	/** Multiplier on simulated motion time. 0 makes every action instant. */
	timeScale?: number;
	/** Simulated duration of one spoken word or animation, in ms. */
	actionMs?: number;
}

export class SimulatedRobot implements Robot {
	readonly name: string;
	private readonly animations: string[];
	private readonly timeScale: number;
	private readonly actionMs: number;
	private voltage: number;
	private isCharging: boolean;
	private state: RobotStatus = {
		leftWheelSpeed: 0,
		rightWheelSpeed: 0,
		headAngleDeg: 0,
		liftHeight: 0,
		freeplay: false,
		odometerMm: 0,
	};

	constructor(options: SimulatedRobotOptions = {}) {
		this.name = options.name ?? 'robot';
		this.animations = options.animations ?? DEFAULT_ANIMATIONS;
		this.voltage = options.voltage ?? 3.9;
		this.isCharging = options.isCharging ?? false;
		this.timeScale = options.timeScale ?? 1;
		this.actionMs = options.actionMs ?? 250;
	}

	async sayText(text: string, signal?: AbortSignal): Promise<void> {
		const words = text.split(/\s+/).filter(Boolean).length;
		await this.simulate(words * this.actionMs, signal);
		this.state.lastSpoken = text;
		logger.debug(`${this.name} says "${text}"`);
	}

	async battery(): Promise<BatteryState> {
		let level: BatteryState['level'] = 'nominal';
		if (this.voltage < 3.6) level = 'low';
		else if (this.voltage >= 4.1) level = 'full';
		return { level, voltage: this.voltage, isCharging: this.isCharging };
	}

	async status(): Promise<RobotStatus> {
		return { ...this.state };
	}

	async stop(): Promise<void> {
		this.state.leftWheelSpeed = 0;
		this.state.rightWheelSpeed = 0;
	}

	async setWheelMotors(leftSpeed: number, rightSpeed: number): Promise<void> {
		if (Math.abs(leftSpeed) > WHEEL_SPEED_LIMIT || Math.abs(rightSpeed) > WHEEL_SPEED_LIMIT) {
			throw new RangeError(`Wheel speed must be within ±${WHEEL_SPEED_LIMIT} mm/s`);
		}
		this.state.leftWheelSpeed = leftSpeed;
		this.state.rightWheelSpeed = rightSpeed;
	}

	async driveStraight(distanceMm: number, speedMmps: number, signal?: AbortSignal): Promise<void> {
		if (speedMmps <= 0 || speedMmps > WHEEL_SPEED_LIMIT) {
			throw new RangeError(`Speed must be between 0 and ${WHEEL_SPEED_LIMIT} mm/s`);
		}
		await this.simulate((Math.abs(distanceMm) / speedMmps) * 1000, signal);
		this.state.odometerMm += Math.abs(distanceMm);
	}

	async turnInPlace(angleDeg: number, signal?: AbortSignal): Promise<void> {
		await this.simulate((Math.abs(angleDeg) / TURN_SPEED_DEG_PER_SEC) * 1000, signal);
	}

	async setHeadAngle(angleDeg: number): Promise<void> {
		if (angleDeg < HEAD_ANGLE_RANGE.min || angleDeg > HEAD_ANGLE_RANGE.max) {
			throw new RangeError(
				`Head angle must be between ${HEAD_ANGLE_RANGE.min} and ${HEAD_ANGLE_RANGE.max} degrees`,
			);
		}
		this.state.headAngleDeg = angleDeg;
	}

	async setLiftHeight(height: number): Promise<void> {
		if (height < LIFT_HEIGHT_RANGE.min || height > LIFT_HEIGHT_RANGE.max) {
			throw new RangeError(
				`Lift height must be between ${LIFT_HEIGHT_RANGE.min} and ${LIFT_HEIGHT_RANGE.max}`,
			);
		}
		this.state.liftHeight = height;
	}

	async listAnimations(): Promise<string[]> {
		return this.animations.filter((name) => !HIDDEN_ANIMATIONS.has(name)).sort();
	}

	async playAnimation(name: string, signal?: AbortSignal): Promise<void> {
		if (!this.animations.includes(name) || HIDDEN_ANIMATIONS.has(name)) {
			throw new Error(`Animation "${name}" is not available`);
		}
		await this.simulate(this.actionMs * 4, signal);
		this.state.lastAnimation = name;
	}

	async setFreeplay(enabled: boolean): Promise<void> {
		this.state.freeplay = enabled;
	}

	private async simulate(ms: number, signal?: AbortSignal): Promise<void> {
		const scaled = ms * this.timeScale;
		if (scaled > 0) {
			await sleep(scaled, signal);
		}
	}
}

export interface SimulatedRobotProviderOptions extends SimulatedRobotOptions {
	/** When false, every acquire fails as if the robot were offline. */
	available?: boolean;
}

/**
 * Hands out a single SimulatedRobot. A second acquire before the first
 * handle is released fails, since one robot cannot serve two batches.
 */
export class SimulatedRobotProvider implements DeviceProvider<Robot> {
	readonly robot: SimulatedRobot;
	private available: boolean;
	private held = false;
	acquireCount = 0;
	releaseCount = 0;

	constructor(options: SimulatedRobotProviderOptions = {}) {
		this.robot = new SimulatedRobot(options);
		this.available = options.available ?? true;
	}

	setAvailable(available: boolean): void {
		this.available = available;
	}

	get isHeld(): boolean {
		return this.held;
	}

	async acquire(): Promise<Robot> {
		if (!this.available) {
			throw new DeviceUnavailableError(`${this.robot.name} is not connected`);
		}
		if (this.held) {
			throw new DeviceUnavailableError(`${this.robot.name} is busy`);
		}
		this.held = true;
		this.acquireCount++;
		logger.debug(`Acquired ${this.robot.name}`);
		return this.robot;
	}

	async release(handle: Robot): Promise<void> {
		if (handle !== this.robot || !this.held) {
			throw new Error(`Release of a handle that was not acquired from this provider`);
		}
		await this.robot.stop();
		this.held = false;
		this.releaseCount++;
		logger.debug(`Released ${this.robot.name}`);
	}
}
