/**
 * Structured Pino logger factory for the SonarQube exporter.
 *
 * Every server-side module creates a child logger via `createLogger(module)`.
 * The child binds `{ module }` to every log line so you can filter by module
 * in production (`jq 'select(.module=="exporter")'`).
 *
 * Dev mode uses pino-pretty (if installed) for human-readable output.
 * Production emits newline-delimited JSON to stdout.
 *
 * Usage:
 *   import { createLogger } from '@sonar-exporter/server/logger';
 *   const log = createLogger('exporter');
 *   log.warn({ projectKey, metric }, 'dropping measurement');
 */

import { createRequire } from 'node:module';
import pino, { type Logger, type LoggerOptions } from 'pino';

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Known module names for discoverability. Arbitrary strings are also accepted. */
export type KnownModule = 'app' | 'server' | 'config' | 'exporter' | 'sonarqube' | 'catalog';

const isDev = process.env.NODE_ENV !== 'production';

// ---------------------------------------------------------------------------
// Serialisers
// ---------------------------------------------------------------------------

/**
 * Custom Pino serialiser for Error objects.
 * Handles ExporterError's extra fields (code, statusCode, context) as well
 * as plain Errors.
 */
function errorSerializer(err: unknown): unknown {
	if (!(err instanceof Error)) return err;

	const serialized: Record<string, unknown> = {
		type: err.name,
		message: err.message,
		stack: err.stack
	};

	if ('code' in err) serialized.code = err.code;
	if ('statusCode' in err) serialized.statusCode = err.statusCode;
	if ('context' in err) serialized.context = err.context;

	if (err.cause instanceof Error) {
		serialized.cause = { message: err.cause.message };
	}

	return serialized;
}

// ---------------------------------------------------------------------------
// Transport (dev vs prod)
// ---------------------------------------------------------------------------

function buildTransport(): LoggerOptions['transport'] {
	if (!isDev) return undefined; // JSON to stdout in production

	// Use pino-pretty in dev if available; fall back to default JSON
	try {
		createRequire(import.meta.url).resolve('pino-pretty');
		return {
			target: 'pino-pretty',
			options: {
				colorize: true,
				translateTime: 'HH:MM:ss.l',
				ignore: 'pid,hostname'
			}
		};
	} catch {
		return undefined;
	}
}

// ---------------------------------------------------------------------------
// Root logger
// ---------------------------------------------------------------------------

const rootOptions: LoggerOptions = {
	level: process.env.LOG_LEVEL || (isDev ? 'debug' : 'info'),
	serializers: {
		err: errorSerializer,
		error: errorSerializer
	},
	redact: {
		paths: ['token', 'authorization', '*.token', '*.authorization', 'headers.authorization'],
		censor: '[REDACTED]'
	},
	transport: buildTransport(),
	base: { service: 'sonarqube-exporter' }
};

/**
 * Root Pino logger instance.
 * Prefer `createLogger(module)` for module-scoped logging.
 */
export const logger: Logger = pino(rootOptions);

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a child logger scoped to a module.
 *
 * The child inherits the root logger's level, serialisers, and transport,
 * and binds `{ module }` plus any extra context to every log line.
 *
 * @example
 * const log = createLogger('sonarqube', { baseUrl: 'http://sonar:9000' });
 * log.debug({ path: '/api/project_branches/list' }, 'request');
 */
export function createLogger(
	module: KnownModule | (string & {}),
	context: Record<string, unknown> = {}
): Logger {
	return logger.child({ module, ...context });
}
