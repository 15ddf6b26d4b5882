/**
 * Service settings, read once from the environment at startup.
 *
 * Per-metric export flags are not part of this: they are read on every
 * scrape through a `ConfigSource` (see exporter/config-source.ts).
 */

import { z } from 'zod';
import { ConfigError } from '@sonar-exporter/types';
import { parseBooleanFlag } from './exporter/config-source.js';

const booleanFlag = z
	.string()
	.optional()
	.transform((raw, ctx) => {
		if (raw === undefined || raw === '') return false;
		const value = parseBooleanFlag(raw);
		if (value === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a boolean: ${raw}` });
			return z.NEVER;
		}
		return value;
	});

export const SettingsSchema = z.object({
	SONAR_URL: z.string().url().default('http://localhost:9000'),
	SONAR_TOKEN: z
		.string()
		.optional()
		.transform((v) => (v === '' ? undefined : v)),
	SONAR_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
	EXPORTER_PUBLISH_PARTIAL: booleanFlag,
	PORT: z.coerce.number().int().min(0).max(65535).default(9100),
	HOST: z.string().min(1).default('0.0.0.0')
});

export interface Settings {
	sonarUrl: string;
	sonarToken?: string;
	requestTimeoutMs: number;
	publishPartial: boolean;
	port: number;
	host: string;
}

/**
 * Parse service settings.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
	const result = SettingsSchema.safeParse(env);
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
		throw new ConfigError(`Invalid settings: ${issues.join('; ')}`, { issues });
	}

	const s = result.data;
	return {
		sonarUrl: s.SONAR_URL,
		sonarToken: s.SONAR_TOKEN,
		requestTimeoutMs: s.SONAR_REQUEST_TIMEOUT_MS,
		publishPartial: s.EXPORTER_PUBLISH_PARTIAL,
		port: s.PORT,
		host: s.HOST
	};
}
