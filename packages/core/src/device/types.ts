// ── Robot capability ──

export type BatteryLevel = 'low' | 'nominal' | 'full';

export interface BatteryState {
	level: BatteryLevel;
	voltage: number;
	isCharging: boolean;
}

export interface RobotStatus {
	leftWheelSpeed: number;
	rightWheelSpeed: number;
	headAngleDeg: number;
	liftHeight: number;
	freeplay: boolean;
	odometerMm: number;
	lastSpoken?: string;
	lastAnimation?: string;
}

/** Head travel limits in degrees. */
export const HEAD_ANGLE_RANGE = { min: -22, max: 45 } as const;

/** Lift travel as a fraction of its full height. */
export const LIFT_HEIGHT_RANGE = { min: 0, max: 1 } as const;

/**
 * The operations a connected robot exposes. Long-running operations take an
 * AbortSignal and must stop when it fires.
 */
export interface Robot {
	readonly name: string;
	sayText(text: string, signal?: AbortSignal): Promise<void>;
	battery(): Promise<BatteryState>;
	status(): Promise<RobotStatus>;
	stop(): Promise<void>;
	setWheelMotors(leftSpeed: number, rightSpeed: number): Promise<void>;
	driveStraight(distanceMm: number, speedMmps: number, signal?: AbortSignal): Promise<void>;
	turnInPlace(angleDeg: number, signal?: AbortSignal): Promise<void>;
	setHeadAngle(angleDeg: number): Promise<void>;
	setLiftHeight(height: number): Promise<void>;
	listAnimations(): Promise<string[]>;
	playAnimation(name: string, signal?: AbortSignal): Promise<void>;
	setFreeplay(enabled: boolean): Promise<void>;
}

// ── Handle lifecycle ──

/**
 * Hands out a device handle for the duration of one batch.
 * `release` is called exactly once for every successful `acquire`.
 */
export interface DeviceProvider<T = Robot> {
	acquire(signal?: AbortSignal): Promise<T>;
	release(handle: T): Promise<void>;
}
