import type { FastifyInstance } from 'fastify';

/**
 * Prometheus scrape endpoint.
 *
 * - GET /api/prometheus/metrics — full SonarQube snapshot in text format 0.0.4
 *
 * Every request runs a complete scrape cycle. Failures reach the error
 * handler before anything is written, so a failed scrape never sends a
 * partial body.
 */
export async function metricsRoutes(app: FastifyInstance): Promise<void> {
	app.get('/api/prometheus/metrics', async (_request, reply) => {
		const { body, contentType } = await app.exporter.handleScrape();
		return reply.status(200).type(contentType).send(body);
	});
}
