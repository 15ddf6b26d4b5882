/**
 * Structured error hierarchy for the SonarQube exporter.
 *
 * Every error carries a machine-readable `code`, an HTTP `statusCode`,
 * and an arbitrary `context` bag for structured logging. All errors
 * serialise cleanly to JSON (for Pino).
 *
 * Usage:
 *   throw new UpstreamError('SonarQube returned 503', { path: '/api/components/search' });
 *   throw new ConfigError('SONAR_URL must be a URL', { issues });
 */

// ---------------------------------------------------------------------------
// Base class
// ---------------------------------------------------------------------------

/**
 * Base error for all exporter-originated errors.
 *
 * Subclasses set a fixed `code` (e.g. `UPSTREAM_ERROR`) and default
 * `statusCode`.
 */
export class ExporterError extends Error {
	/** Machine-readable error code (e.g. `NOT_FOUND`, `UPSTREAM_ERROR`). */
	readonly code: string;

	/** HTTP status code to use when this error reaches an API boundary. */
	readonly statusCode: number;

	/** Arbitrary structured context for logging / diagnostics. */
	readonly context: Record<string, unknown>;

	/** Optional upstream error that caused this one. */
	readonly cause?: Error;

	constructor(
		code: string,
		message: string,
		statusCode: number,
		context: Record<string, unknown> = {},
		cause?: Error
	) {
		super(message, { cause });
		this.name = this.constructor.name;
		this.code = code;
		this.statusCode = statusCode;
		this.context = context;
		this.cause = cause;

		// Maintain proper stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Serialise for Pino / JSON structured logging.
	 * Pino calls `toJSON()` automatically when an error is passed as a value.
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			statusCode: this.statusCode,
			context: this.context,
			stack: this.stack,
			...(this.cause ? { cause: this.cause.message } : {})
		};
	}

	/**
	 * Build a safe JSON response body suitable for returning to API clients.
	 * Never exposes stack traces or internal context.
	 */
	toResponseBody(): { error: string; code: string; requestId?: string } {
		const requestId = this.context.requestId;
		return {
			error: this.message,
			code: this.code,
			...(typeof requestId === 'string' ? { requestId } : {})
		};
	}
}

// ---------------------------------------------------------------------------
// Concrete subclasses
// ---------------------------------------------------------------------------

/** Unknown route or resource. */
export class NotFoundError extends ExporterError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super('NOT_FOUND', message, 404, context, cause);
	}
}

/** Invalid service settings or metric catalog data. */
export class ConfigError extends ExporterError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super('CONFIG_ERROR', message, 500, context, cause);
	}
}

/** Rendering the exposition body failed; nothing is sent. */
export class SerializationError extends ExporterError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super('SERIALIZATION_ERROR', message, 500, context, cause);
	}
}

/**
 * SonarQube call failed (network error, timeout, non-2xx, malformed body).
 * Status 502 because the exporter is acting as a gateway to SonarQube.
 */
export class UpstreamError extends ExporterError {
	constructor(message: string, context: Record<string, unknown> = {}, cause?: Error) {
		super('UPSTREAM_ERROR', message, 502, context, cause);
	}
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Type guard: is the value an ExporterError?
 */
export function isExporterError(err: unknown): err is ExporterError {
	return err instanceof ExporterError;
}

/**
 * Wrap an unknown caught value into an ExporterError.
 * If it is already an ExporterError, returns it unchanged.
 * Otherwise wraps it in a generic 500 ExporterError.
 */
export function toExporterError(
	err: unknown,
	fallbackMessage = 'Internal server error'
): ExporterError {
	if (isExporterError(err)) return err;

	const cause = err instanceof Error ? err : undefined;
	const message = err instanceof Error ? err.message : fallbackMessage;

	return new ExporterError('INTERNAL_ERROR', message, 500, {}, cause);
}
