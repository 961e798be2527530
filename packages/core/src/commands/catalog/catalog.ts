import type { z, ZodTypeAny } from 'zod';
import type { ExecutionContext, OperationSpec } from '../types.js';
import type { CatalogOptions, OperationArguments } from './types.js';
import {
	BotdeckError,
	CommandFailedError,
	SchemaViolationError,
	UnknownOperationError,
	errorMessage,
} from '../../errors.js';

/**
 * The closed set of operations commands may call. Each operation binds its
 * arguments against a zod schema before the handler touches the device.
 */
export class CommandCatalog {
	private operations = new Map<string, OperationSpec>();
	private options: CatalogOptions;

	constructor(options?: CatalogOptions) {
		this.options = options ?? {};
	}

	register<S extends z.AnyZodObject>(operation: OperationSpec<S>): void {
		if (this.options.excludeOperations?.includes(operation.name)) return;
		if (
			this.options.includeOperations &&
			this.options.includeOperations.length > 0 &&
			!this.options.includeOperations.includes(operation.name)
		) {
			return;
		}

		this.operations.set(operation.name, operation);
	}

	unregister(name: string): void {
		this.operations.delete(name);
	}

	get(name: string): OperationSpec | undefined {
		return this.operations.get(name);
	}

	has(name: string): boolean {
		return this.operations.has(name);
	}

	getAll(): OperationSpec[] {
		return [...this.operations.values()];
	}

	getNames(): string[] {
		return [...this.operations.keys()];
	}

	get size(): number {
		return this.operations.size;
	}

	async invoke(
		name: string,
		args: OperationArguments,
		context: ExecutionContext,
	): Promise<unknown> {
		const operation = this.operations.get(name);
		if (!operation) {
			throw new UnknownOperationError(name);
		}

		const params = this.bindArguments(operation, args);
		const parsed = operation.schema.safeParse(params);
		if (!parsed.success) {
			throw new SchemaViolationError(
				name,
				parsed.error.issues.map((issue) => {
					const field = issue.path.join('.');
					return field ? `${field}: ${issue.message}` : issue.message;
				}),
			);
		}

		try {
			return await operation.handler(parsed.data, context);
		} catch (error) {
			if (error instanceof BotdeckError) throw error;
			throw new CommandFailedError(name, errorMessage(error), {
				cause: error,
			});
		}
	}

	/**
	 * Map positional arguments onto the schema keys in declaration order and
	 * merge keyword arguments by name.
	 */
	private bindArguments(operation: OperationSpec, args: OperationArguments): Record<string, unknown> {
		const keys = this.parameterNames(operation);
		const issues: string[] = [];

		if (args.positional.length > keys.length) {
			issues.push(
				`takes at most ${keys.length} argument(s) but ${args.positional.length} were given`,
			);
		}

		const params: Record<string, unknown> = {};
		args.positional.forEach((value, i) => {
			if (i < keys.length) params[keys[i]] = value;
		});

		for (const [key, value] of Object.entries(args.named)) {
			if (!keys.includes(key)) {
				issues.push(`unexpected argument "${key}"`);
			} else if (Object.hasOwn(params, key)) {
				issues.push(`argument "${key}" given twice`);
			} else {
				params[key] = value;
			}
		}

		if (issues.length > 0) {
			throw new SchemaViolationError(operation.name, issues);
		}
		return params;
	}

	private parameterNames(operation: OperationSpec): string[] {
		return Object.keys(operation.schema.shape);
	}

	// ── Help text ──

	/**
	 * Multi-line description of every operation with its call signature,
	 * e.g. `- drive_straight(distance_mm, speed_mmps?): Drive ...`.
	 */
	describe(): string {
		const lines: string[] = [];

		for (const operation of this.getAll()) {
			const shape: Record<string, ZodTypeAny> = operation.schema.shape;
			const signature = Object.entries(shape)
				.map(([key, type]) => (type.isOptional() ? `${key}?` : key))
				.join(', ');
			lines.push(`- ${operation.name}(${signature}): ${operation.description}`);

			for (const [key, type] of Object.entries(shape)) {
				if (type.description) {
					lines.push(`    ${key}: ${type.description}`);
				}
			}
		}

		return lines.join('\n');
	}
}
