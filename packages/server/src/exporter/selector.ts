import type { MetricDefinition } from './catalog.js';
import type { ConfigSource } from './config-source.js';

/** Namespace for per-metric export flags: `prometheus.export.<metric-key>`. */
export const CONFIG_PREFIX = 'prometheus.export.';

export type EnabledMetricSet = readonly MetricDefinition[];

export function flagKey(metric: MetricDefinition): string {
	return CONFIG_PREFIX + metric.key;
}

/**
 * Subset of the catalog whose flag is explicitly true, in catalog order.
 * Absent flags mean disabled.
 */
export function computeEnabled(
	catalog: readonly MetricDefinition[],
	config: ConfigSource
): EnabledMetricSet {
	return catalog.filter((metric) => config.getBoolean(flagKey(metric)) ?? false);
}
