import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import {
	ConfigError,
	NotFoundError,
	SerializationError,
	UpstreamError
} from '@sonar-exporter/types';
import errorHandlerPlugin from './error-handler.js';

function buildTestApp() {
	const app = Fastify({ logger: false });
	app.register(errorHandlerPlugin);
	return app;
}

describe('error-handler plugin', () => {
	it('maps NotFoundError to 404', async () => {
		const app = buildTestApp();
		app.get('/test', () => {
			throw new NotFoundError('Project not found');
		});

		const res = await app.inject({ method: 'GET', url: '/test' });

		expect(res.statusCode).toBe(404);
		expect(res.json().code).toBe('NOT_FOUND');
	});

	it('maps ConfigError to 500', async () => {
		const app = buildTestApp();
		app.get('/test', () => {
			throw new ConfigError('Invalid metric catalog');
		});

		const res = await app.inject({ method: 'GET', url: '/test' });

		expect(res.statusCode).toBe(500);
		expect(res.json().code).toBe('CONFIG_ERROR');
	});

	it('maps SerializationError to 500', async () => {
		const app = buildTestApp();
		app.get('/test', () => {
			throw new SerializationError('Failed to render metrics');
		});

		const res = await app.inject({ method: 'GET', url: '/test' });

		expect(res.statusCode).toBe(500);
		expect(res.json().code).toBe('SERIALIZATION_ERROR');
	});

	it('maps UpstreamError to 502', async () => {
		const app = buildTestApp();
		app.get('/test', () => {
			throw new UpstreamError('SonarQube responded with HTTP 503', { status: 503 });
		});

		const res = await app.inject({ method: 'GET', url: '/test' });

		expect(res.statusCode).toBe(502);
		expect(res.json()).toMatchObject({
			error: 'SonarQube responded with HTTP 503',
			code: 'UPSTREAM_ERROR'
		});
	});

	it('wraps unknown errors as 500 INTERNAL_ERROR', async () => {
		const app = buildTestApp();
		app.get('/test', () => {
			throw new Error('something broke');
		});

		const res = await app.inject({ method: 'GET', url: '/test' });

		expect(res.statusCode).toBe(500);
		const body = res.json();
		expect(body.code).toBe('INTERNAL_ERROR');
		expect(body.error).toBe('Internal server error');
	});

	it('does not leak stack traces or context in responses', async () => {
		const app = buildTestApp();
		app.get('/test', () => {
			throw new UpstreamError('SonarQube is unreachable', { path: '/api/measures/component' });
		});

		const res = await app.inject({ method: 'GET', url: '/test' });

		const body = res.json();
		expect(body.stack).toBeUndefined();
		expect(body.context).toBeUndefined();
	});

	it('includes requestId from error context', async () => {
		const app = buildTestApp();
		app.get('/test', () => {
			throw new NotFoundError('Project not found', { requestId: 'req-123' });
		});

		const res = await app.inject({ method: 'GET', url: '/test' });

		expect(res.json().requestId).toBe('req-123');
	});

	it('falls back to the request id', async () => {
		const app = Fastify({ logger: false, genReqId: () => 'req-fixed' });
		app.register(errorHandlerPlugin);
		app.get('/test', () => {
			throw new Error('boom');
		});

		const res = await app.inject({ method: 'GET', url: '/test' });

		expect(res.json().requestId).toBe('req-fixed');
	});

	it('answers unknown routes with a NOT_FOUND body', async () => {
		const app = buildTestApp();

		const res = await app.inject({ method: 'GET', url: '/nope' });

		expect(res.statusCode).toBe(404);
		expect(res.json()).toMatchObject({
			error: 'Route GET /nope not found',
			code: 'NOT_FOUND'
		});
	});

	it('sets Content-Type to application/json', async () => {
		const app = buildTestApp();
		app.get('/test', () => {
			throw new UpstreamError('SonarQube is unreachable');
		});

		const res = await app.inject({ method: 'GET', url: '/test' });

		expect(res.headers['content-type']).toContain('application/json');
	});
});
