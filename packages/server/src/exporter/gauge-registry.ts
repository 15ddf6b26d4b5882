import { Gauge, MetricsRegistry } from '../metrics.js';
import type { EnabledMetricSet } from './selector.js';

/** Fixed prefix for every exported family: `sonarqube_<metric-key>`. */
export const METRIC_PREFIX = 'sonarqube_';

export const LABEL_NAMES = ['key', 'name', 'branch'] as const;

export interface ProjectLabels {
	projectKey: string;
	projectName: string;
	branchName: string;
}

export function gaugeName(metricKey: string): string {
	return METRIC_PREFIX + metricKey;
}

/**
 * One gauge per enabled metric, labeled by project key, project name and
 * branch.
 *
 * `rebuild` always starts from an empty registry: gauges are never patched
 * in place, so label tuples from an earlier scrape (deleted projects or
 * branches, disabled metrics) cannot survive into the next one.
 */
export class GaugeRegistry {
	private readonly gauges = new Map<string, Gauge>();

	constructor(readonly registry: MetricsRegistry = new MetricsRegistry()) {}

	rebuild(enabled: EnabledMetricSet): void {
		this.registry.clear();
		this.gauges.clear();

		for (const metric of enabled) {
			const gauge = this.registry.register(
				new Gauge({
					name: gaugeName(metric.key),
					help: metric.description,
					labelNames: LABEL_NAMES
				})
			);
			this.gauges.set(metric.key, gauge);
		}
	}

	/**
	 * Set the value for one project/branch. Returns false, without touching
	 * anything, when the metric has no gauge in the current set.
	 */
	setValue(metricKey: string, labels: ProjectLabels, value: number): boolean {
		const gauge = this.gauges.get(metricKey);
		if (!gauge) return false;

		gauge.set(
			{ key: labels.projectKey, name: labels.projectName, branch: labels.branchName },
			value
		);
		return true;
	}

	getValue(metricKey: string, labels: ProjectLabels): number | undefined {
		return this.gauges
			.get(metricKey)
			?.get({ key: labels.projectKey, name: labels.projectName, branch: labels.branchName });
	}

	has(metricKey: string): boolean {
		return this.gauges.has(metricKey);
	}

	/** Exported family names, in catalog order. */
	metricNames(): string[] {
		return this.registry.names();
	}
}
