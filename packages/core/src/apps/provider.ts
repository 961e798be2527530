import * as fs from 'node:fs/promises';
import { createLogger } from '../logging.js';
import { isNotFound } from '../utils.js';
import { type ApplicationProvider, ApplicationCatalogSchema, type ApplicationRecord } from './types.js';

const logger = createLogger('applications');

export class StaticApplicationProvider implements ApplicationProvider {
	private readonly records: readonly ApplicationRecord[];

	constructor(records: readonly ApplicationRecord[]) {
		this.records = records.map((record) => ({ ...record }));
	}

	async list(): Promise<readonly ApplicationRecord[]> {
		return this.records;
	}
}

/**
 * Reads the catalog from a JSON array on every call, so edits to the file
 * show up without a restart. A missing file is an empty catalog.
 */
export class JsonFileApplicationProvider implements ApplicationProvider {
	constructor(readonly filePath: string) {}

	async list(): Promise<readonly ApplicationRecord[]> {
		let raw: string;
		try {
			raw = await fs.readFile(this.filePath, 'utf-8');
		} catch (error) {
			if (isNotFound(error)) {
				logger.debug(`No applications file at ${this.filePath}`);
				return [];
			}
			throw error;
		}
		return ApplicationCatalogSchema.parse(JSON.parse(raw));
	}
}
