import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const serverSrc = fileURLToPath(new URL('./packages/server/src', import.meta.url));
const typesSrc = fileURLToPath(new URL('./packages/types/src', import.meta.url));

export default defineConfig({
	resolve: {
		alias: [
			// Order matters: more specific (subpath) before less specific (bare import).
			//
			// Resolve workspace packages to source so vi.mock() targets the same
			// physical file the server package reaches through relative imports.
			{ find: '@sonar-exporter/server/testing', replacement: `${serverSrc}/tests/fake-source.ts` },
			{ find: /^@sonar-exporter\/server\/(.+)$/, replacement: `${serverSrc}/$1.ts` },
			{ find: '@sonar-exporter/server', replacement: `${serverSrc}/index.ts` },
			{ find: '@sonar-exporter/types', replacement: `${typesSrc}/index.ts` }
		]
	},
	test: {
		include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
		setupFiles: ['apps/api/src/tests/setup.ts'],
		mockReset: true
	}
});
