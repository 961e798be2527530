import { test, expect, describe } from 'vitest';
import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const ManifestSchema = z.object({
	exports: z.object({ '.': z.object({ types: z.string(), default: z.string() }) }),
});

const BuildConfigSchema = z.object({
	compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function readJson(relative: string): unknown {
	return JSON.parse(fs.readFileSync(fileURLToPath(new URL(relative, import.meta.url)), 'utf8'));
}

describe('package entry points', () => {
	test('runtime entry is the compiled index inside the package', () => {
		const manifest = ManifestSchema.parse(readJson('../package.json'));
		const build = BuildConfigSchema.parse(readJson('../tsconfig.build.json'));

		expect(manifest.exports['.'].default).toBe(`./${build.compilerOptions.outDir}/index.js`);
		expect(manifest.exports['.'].types).toBe(`./${build.compilerOptions.rootDir}/index.ts`);
	});
});
