import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import {
	ConfigError,
	EnvConfigSource,
	ExportCoordinator,
	SonarQubeClient,
	type Settings
} from '@sonar-exporter/server';

export interface ExporterPluginOptions {
	/** Pre-built coordinator (tests, embedding). Takes precedence over `settings`. */
	coordinator?: ExportCoordinator;
	settings?: Settings;
}

declare module 'fastify' {
	interface FastifyInstance {
		exporter: ExportCoordinator;
	}
}

/** Coordinator wired to SonarQube and environment flags. */
export function createCoordinator(settings: Settings): ExportCoordinator {
	return new ExportCoordinator({
		source: new SonarQubeClient({
			baseUrl: settings.sonarUrl,
			token: settings.sonarToken,
			timeoutMs: settings.requestTimeoutMs
		}),
		config: new EnvConfigSource(),
		publishPartial: settings.publishPartial
	});
}

/**
 * Decorates the instance with the scrape coordinator.
 * One coordinator per app: its gauge registry and lock are shared by every
 * request the app serves.
 */
const exporterPlugin: FastifyPluginAsync<ExporterPluginOptions> = async (fastify, options) => {
	let coordinator = options.coordinator;
	if (!coordinator) {
		if (!options.settings) {
			throw new ConfigError('exporter plugin needs either a coordinator or settings');
		}
		coordinator = createCoordinator(options.settings);
	}

	fastify.decorate('exporter', coordinator);
};

export default fp(exporterPlugin, {
	name: 'exporter',
	fastify: '5.x'
});
