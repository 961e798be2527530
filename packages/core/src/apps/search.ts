import { SchemaViolationError } from '../errors.js';
import {
	type ApplicationRecord,
	SEARCH_FIELDS,
	type SearchField,
	type SearchQuery,
	type SearchResult,
} from './types.js';

/**
 * Filter the catalog by a case-insensitive substring over the enabled fields.
 *
 * No enabled fields matches nothing; blank text matches everything. The
 * field check comes first, so a blank query with no fields is still empty.
 */
export function searchApplications(
	catalog: readonly ApplicationRecord[],
	query: SearchQuery,
): SearchResult {
	if (query.fields.size === 0) {
		return { matches: [], count: 0 };
	}

	// Only blank text is widened to everything; other text is matched as given.
	const needle = query.text.trim() ? query.text.toLowerCase() : '';
	const matches = needle
		? catalog.filter((record) =>
				[...query.fields].some((field) => record[field].toLowerCase().includes(needle)),
			)
		: [...catalog];

	return { matches, count: matches.length };
}

function isSearchField(value: string): value is SearchField {
	return SEARCH_FIELDS.some((field) => field === value);
}

/**
 * Parse a comma-separated field list such as `name,author`.
 * Blank input yields an empty set.
 */
export function parseSearchFields(input: string): Set<SearchField> {
	const fields = new Set<SearchField>();
	const unknown: string[] = [];

	for (const part of input.split(',')) {
		const name = part.trim().toLowerCase();
		if (!name) continue;
		if (isSearchField(name)) {
			fields.add(name);
		} else {
			unknown.push(`unknown field "${name}" (expected ${SEARCH_FIELDS.join(', ')})`);
		}
	}

	if (unknown.length > 0) {
		throw new SchemaViolationError('fields', unknown);
	}
	return fields;
}
