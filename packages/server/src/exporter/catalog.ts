/**
 * Built-in catalog of SonarQube metrics eligible for export.
 *
 * The entries live in `metric-catalog.json` and are validated once at load.
 * Keys become part of the exported gauge name verbatim, so each must be a
 * valid Prometheus name fragment.
 */

import { z } from 'zod';
import { ConfigError } from '@sonar-exporter/types';
import catalogData from './metric-catalog.json';

export const MetricDomainSchema = z.enum([
	'Issues',
	'Maintainability',
	'Reliability',
	'Security',
	'Size',
	'Coverage',
	'Complexity',
	'Duplications',
	'General'
]);

export type MetricDomain = z.infer<typeof MetricDomainSchema>;

export const MetricDefinitionSchema = z.object({
	key: z.string().regex(/^[a-z_][a-z0-9_]*$/, 'metric key must be a Prometheus name fragment'),
	description: z.string().min(1),
	domain: MetricDomainSchema
});

export type MetricDefinition = Readonly<z.infer<typeof MetricDefinitionSchema>>;

const CatalogSchema = z
	.array(MetricDefinitionSchema)
	.refine((defs) => new Set(defs.map((d) => d.key)).size === defs.length, {
		message: 'metric keys must be unique'
	});

/**
 * Validate raw catalog entries.
 *
 * @throws ConfigError when an entry is malformed or a key is duplicated
 */
export function parseCatalog(raw: unknown): readonly MetricDefinition[] {
	const result = CatalogSchema.safeParse(raw);
	if (!result.success) {
		throw new ConfigError('Invalid metric catalog', { issues: result.error.issues });
	}
	return Object.freeze(result.data.map((def) => Object.freeze(def)));
}

/** Every metric the exporter knows how to publish, in display order. */
export const METRIC_CATALOG: readonly MetricDefinition[] = parseCatalog(catalogData);

/** Look up a catalog entry by key. */
export function findMetric(
	key: string,
	catalog: readonly MetricDefinition[] = METRIC_CATALOG
): MetricDefinition | undefined {
	return catalog.find((def) => def.key === key);
}
