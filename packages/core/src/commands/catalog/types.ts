import type { Literal } from '../parser.js';

export interface OperationArguments {
	positional: Literal[];
	named: Record<string, Literal>;
}

export interface CatalogOptions {
	excludeOperations?: string[];
	includeOperations?: string[];
}
