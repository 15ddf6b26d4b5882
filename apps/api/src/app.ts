import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import { createLogger, type ExportCoordinator, type Settings } from '@sonar-exporter/server';
import errorHandlerPlugin from './plugins/error-handler.js';
import requestLoggerPlugin, { resolveRequestId } from './plugins/request-logger.js';
import exporterPlugin from './plugins/exporter.js';
import { healthRoutes } from './routes/health.js';
import { metricsRoutes } from './routes/metrics.js';

const log = createLogger('app');

export interface AppOptions {
	/**
	 * Fastify server options
	 */
	fastifyOptions?: FastifyServerOptions;

	/**
	 * Service settings; used to build the SonarQube-backed coordinator when
	 * `coordinator` is not given.
	 */
	settings?: Settings;

	/**
	 * Pre-built scrape coordinator (tests, embedding).
	 */
	coordinator?: ExportCoordinator;
}

/**
 * Create a configured Fastify app instance
 *
 * @param options - App configuration options
 * @returns Fastify instance serving the scrape and health routes
 */
export async function createApp(options: AppOptions = {}): Promise<FastifyInstance> {
	const { fastifyOptions = {}, settings, coordinator } = options;

	const app = Fastify({
		logger: {
			level: process.env.LOG_LEVEL || 'info',
			serializers: {
				req(req) {
					return {
						method: req.method,
						url: req.url,
						remoteAddress: req.ip
					};
				},
				res(res) {
					return {
						statusCode: res.statusCode
					};
				}
			}
		},
		genReqId: (req) => resolveRequestId(req.headers['x-request-id']),
		...fastifyOptions
	});

	await app.register(errorHandlerPlugin);
	await app.register(requestLoggerPlugin);
	await app.register(exporterPlugin, { coordinator, settings });

	await app.register(healthRoutes);
	await app.register(metricsRoutes);

	log.info('Fastify app created with plugins and routes');
	return app;
}

/**
 * Start the Fastify server
 *
 * @param app - Fastify instance
 * @param port - Port to listen on
 * @param host - Host to bind to
 */
export async function startServer(app: FastifyInstance, port: number, host: string): Promise<void> {
	await app.listen({ port, host });
	log.info(`Server listening on ${host}:${port}`);
}

/**
 * Gracefully stop the Fastify server
 *
 * @param app - Fastify instance
 */
export async function stopServer(app: FastifyInstance): Promise<void> {
	try {
		await app.close();
		log.info('Server stopped gracefully');
	} catch (error) {
		log.error({ err: error }, 'Error stopping server');
		throw error;
	}
}
