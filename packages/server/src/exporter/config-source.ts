/**
 * Boolean flag sources consulted by the metric selector.
 *
 * `getBoolean` returns `undefined` when the flag is absent; callers decide the
 * default.
 */

import { createLogger } from '../logger.js';

const log = createLogger('config');

export interface ConfigSource {
	getBoolean(key: string): boolean | undefined;
}

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

/** Parse a textual flag. Unrecognised text counts as absent. */
export function parseBooleanFlag(raw: string | undefined): boolean | undefined {
	if (raw === undefined) return undefined;
	const normalized = raw.trim().toLowerCase();
	if (TRUE_VALUES.has(normalized)) return true;
	if (FALSE_VALUES.has(normalized)) return false;
	return undefined;
}

/** `prometheus.export.new_bugs` → `PROMETHEUS_EXPORT_NEW_BUGS` */
export function toEnvName(key: string): string {
	return key.replace(/[.-]/g, '_').toUpperCase();
}

/**
 * Reads flags from environment variables on every call, so a changed
 * environment is picked up on the next scrape.
 */
export class EnvConfigSource implements ConfigSource {
	constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

	getBoolean(key: string): boolean | undefined {
		const name = toEnvName(key);
		const raw = this.env[name];
		const value = parseBooleanFlag(raw);
		if (raw !== undefined && value === undefined) {
			log.debug({ key, env: name, raw }, 'ignoring unrecognised boolean flag');
		}
		return value;
	}
}

/** Fixed flag map, for tests and programmatic embedding. */
export class StaticConfigSource implements ConfigSource {
	private readonly flags: Map<string, boolean>;

	constructor(flags: Record<string, boolean> = {}) {
		this.flags = new Map(Object.entries(flags));
	}

	getBoolean(key: string): boolean | undefined {
		return this.flags.get(key);
	}

	set(key: string, value: boolean): void {
		this.flags.set(key, value);
	}
}
