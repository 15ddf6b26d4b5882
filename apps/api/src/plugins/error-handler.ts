import fp from 'fastify-plugin';
import { NotFoundError, isExporterError, toExporterError } from '@sonar-exporter/types';
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

async function errorHandler(app: FastifyInstance): Promise<void> {
	app.setErrorHandler((error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
		const exporterError = toExporterError(error);

		// For unknown errors, use generic message to avoid leaking internals
		const body: Record<string, unknown> = isExporterError(error)
			? { ...error.toResponseBody() }
			: { error: 'Internal server error', code: 'INTERNAL_ERROR' };
		if (body.requestId === undefined) body.requestId = request.id;

		if (isExporterError(error)) {
			request.log.error({ err: error }, error.message);
		} else {
			request.log.error({ message: error.message, name: error.name }, 'Unhandled error');
		}

		return reply.status(exporterError.statusCode).type('application/json').send(body);
	});

	app.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
		const err = new NotFoundError(`Route ${request.method} ${request.url} not found`);
		return reply
			.status(err.statusCode)
			.send({ ...err.toResponseBody(), requestId: request.id });
	});
}

export default fp(errorHandler, { name: 'error-handler' });
