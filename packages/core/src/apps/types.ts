import { z } from 'zod';

export const ApplicationRecordSchema = z.object({
	name: z.string(),
	description: z.string().default(''),
	author: z.string().default(''),
});

export type ApplicationRecord = z.infer<typeof ApplicationRecordSchema>;

export const ApplicationCatalogSchema = z.array(ApplicationRecordSchema);

export const SEARCH_FIELDS = ['name', 'description', 'author'] as const;

export type SearchField = (typeof SEARCH_FIELDS)[number];

export interface SearchQuery {
	text: string;
	/** Fields to match against. An empty set matches nothing. */
	fields: ReadonlySet<SearchField>;
}

export interface SearchResult {
	matches: ApplicationRecord[];
	count: number;
}

export interface ApplicationProvider {
	list(): Promise<readonly ApplicationRecord[]>;
}
