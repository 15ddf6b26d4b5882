import type { FastifyInstance } from 'fastify';
import { PACKAGE_VERSION } from '@sonar-exporter/types';

export interface HealthResponse {
	status: 'ok';
	service: string;
	version: string;
	timestamp: string;
	/** Where the last scrape cycle is, `idle` between scrapes. */
	exporter: string;
}

/**
 * Health route module.
 *
 * - GET /api/health — shallow liveness probe; never calls SonarQube
 */
export async function healthRoutes(app: FastifyInstance): Promise<void> {
	app.get('/api/health', async (): Promise<HealthResponse> => {
		return {
			status: 'ok',
			service: 'sonarqube-exporter',
			version: PACKAGE_VERSION,
			timestamp: new Date().toISOString(),
			exporter: app.exporter.state
		};
	});
}
