import { randomUUID } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';

/** Headers never written to logs. */
const REDACTED_HEADERS = new Set(['authorization', 'cookie', 'set-cookie', 'x-api-key']);

/** Only allow safe characters in request IDs to prevent log injection. */
export const VALID_REQUEST_ID = /^[a-zA-Z0-9._-]{1,128}$/;

/** Reuse a well-formed incoming X-Request-Id, otherwise mint one. */
export function resolveRequestId(header: string | string[] | undefined): string {
	if (typeof header === 'string' && VALID_REQUEST_ID.test(header)) {
		return header;
	}
	return `req-${randomUUID()}`;
}

/** Redact sensitive headers for log serialization. */
export function redactHeaders(
	headers: Record<string, string | string[] | undefined>
): Record<string, string | string[] | undefined> {
	const result: Record<string, string | string[] | undefined> = {};
	for (const [key, value] of Object.entries(headers)) {
		result[key] = REDACTED_HEADERS.has(key.toLowerCase()) ? '[REDACTED]' : value;
	}
	return result;
}

/**
 * Echoes the request ID on every response and logs one line per completed
 * request. Scrapers poll frequently, so completions go out at debug level
 * unless the response is an error.
 */
async function requestLogger(app: FastifyInstance): Promise<void> {
	app.addHook('onSend', async (request: FastifyRequest, reply, payload) => {
		void reply.header('x-request-id', request.id);
		return payload;
	});

	app.addHook('onResponse', async (request, reply) => {
		const entry = {
			method: request.method,
			url: request.url,
			statusCode: reply.statusCode,
			responseTimeMs: Math.round(reply.elapsedTime),
			headers: redactHeaders(request.headers)
		};
		if (reply.statusCode >= 500) {
			request.log.warn(entry, 'request failed');
		} else {
			request.log.debug(entry, 'request completed');
		}
	});
}

export default fp(requestLogger, { name: 'request-logger' });
