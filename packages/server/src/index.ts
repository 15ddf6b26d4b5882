/**
 * @sonar-exporter/server - Exporter core
 *
 * Metric catalog and selection, gauge registry, SonarQube client, scrape
 * coordination, logging and settings. The Fastify host lives in apps/api.
 */

export * from '@sonar-exporter/types';

export * from './logger.js';
export * from './config.js';
export * from './metrics.js';
export * from './exporter/index.js';
export * from './sonarqube/client.js';
