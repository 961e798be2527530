import { z } from 'zod';
import type { Robot } from '../device/types.js';
import { HEAD_ANGLE_RANGE, LIFT_HEIGHT_RANGE } from '../device/types.js';

// ── Operation parameter schemas ──
// Key order is the positional argument order.

export const SayTextParamsSchema = z.object({
	text: z.string().min(1).describe('Text to speak'),
});

export const EmptyParamsSchema = z.object({});

export const SetWheelMotorsParamsSchema = z.object({
	left_speed: z.number().describe('Left wheel speed in mm/s'),
	right_speed: z.number().describe('Right wheel speed in mm/s'),
});

export const DriveStraightParamsSchema = z.object({
	distance_mm: z.number().describe('Distance to drive in mm (negative drives backwards)'),
	speed_mmps: z.number().positive().default(100).describe('Speed in mm/s'),
});

export const TurnInPlaceParamsSchema = z.object({
	angle_deg: z.number().describe('Angle to turn in degrees (positive turns left)'),
});

export const SetHeadAngleParamsSchema = z.object({
	angle_deg: z
		.number()
		.min(HEAD_ANGLE_RANGE.min)
		.max(HEAD_ANGLE_RANGE.max)
		.describe(`Head angle in degrees (${HEAD_ANGLE_RANGE.min} to ${HEAD_ANGLE_RANGE.max})`),
});

export const SetLiftHeightParamsSchema = z.object({
	height: z
		.number()
		.min(LIFT_HEIGHT_RANGE.min)
		.max(LIFT_HEIGHT_RANGE.max)
		.describe('Lift height from 0 (down) to 1 (up)'),
});

export const PlayAnimationParamsSchema = z.object({
	name: z.string().min(1).describe('Animation name'),
});

export const SetFreeplayParamsSchema = z.object({
	enabled: z.boolean().describe('Let the robot act on its own'),
});

export const WaitParamsSchema = z.object({
	seconds: z.number().nonnegative().max(60).describe('Seconds to wait; must be shorter than the command timeout'),
});

// ── Operation definitions ──

export interface ExecutionContext {
	robot: Robot;
	/** Aborted when the command times out or the batch is cancelled. */
	signal: AbortSignal;
}

export interface OperationSpec<S extends z.AnyZodObject = z.AnyZodObject> {
	name: string;
	description: string;
	schema: S;
	/** Runs against the acquired device; the resolved value becomes the outcome's rendering. */
	handler(params: z.infer<S>, context: ExecutionContext): Promise<unknown>;
}

// ── Outcomes ──

export const FAILURE_KINDS = ['evaluation', 'timeout', 'device_unavailable', 'cancelled'] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

interface OutcomeBase {
	command: string;
	position: number;
	seq: number;
	durationMs: number;
}

export interface SuccessOutcome extends OutcomeBase {
	status: 'success';
	rendering: string;
}

export interface FailureOutcome extends OutcomeBase {
	status: 'failure';
	kind: FailureKind;
	error: string;
}

export type CommandOutcome = SuccessOutcome | FailureOutcome;

export const UNAVAILABLE_DEVICE = 'unavailable device';
export const TIMEOUT = 'timeout';
export const CANCELLED = 'cancelled';
