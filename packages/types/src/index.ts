/**
 * @sonar-exporter/types - Shared error hierarchy and types
 *
 * Used by both the exporter core (`@sonar-exporter/server`) and the
 * Fastify host (`apps/api`).
 */

export * from './errors.js';

export const PACKAGE_VERSION = '0.1.0';
