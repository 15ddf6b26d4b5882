/**
 * Prometheus-compatible gauge collection and text exposition.
 *
 * A `MetricsRegistry` holds labeled `Gauge`s and renders them in the
 * Prometheus text exposition format (version 0.0.4). Registries are plain
 * instances: each exporter owns its own, nothing is process-global.
 *
 * Usage:
 *   const registry = new MetricsRegistry();
 *   const bugs = registry.register(
 *     new Gauge({ name: 'sonarqube_bugs', help: 'Bugs', labelNames: ['key', 'name', 'branch'] })
 *   );
 *   bugs.set({ key: 'P1', name: 'Proj One', branch: 'main' }, 7);
 *   reply.type(registry.contentType).send(registry.collect());
 */

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

export type Labels = Record<string, string>;

/** Escape a label value: backslash, double quote and line feed. */
export function escapeLabelValue(value: string): string {
	return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

/** Escape HELP text: backslash and line feed. */
export function escapeHelp(help: string): string {
	return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
}

/** Render a sample value, spelling out the non-finite specials. */
export function formatValue(value: number): string {
	if (Number.isNaN(value)) return 'NaN';
	if (value === Number.POSITIVE_INFINITY) return '+Inf';
	if (value === Number.NEGATIVE_INFINITY) return '-Inf';
	return String(value);
}

// ---------------------------------------------------------------------------
// Gauge
// ---------------------------------------------------------------------------

export interface GaugeOptions {
	name: string;
	help: string;
	labelNames?: readonly string[];
}

/**
 * A value that can go up and down, one per label tuple.
 *
 * Samples render in the order their label tuple was first written.
 */
export class Gauge {
	readonly name: string;
	readonly help: string;
	readonly labelNames: readonly string[];
	private values = new Map<string, { labelValues: string[]; value: number }>();

	constructor(opts: GaugeOptions) {
		this.name = opts.name;
		this.help = opts.help;
		this.labelNames = opts.labelNames ?? [];
	}

	/**
	 * Set the value for a label tuple, replacing any earlier value.
	 * Labels not declared in `labelNames` are ignored; missing ones render empty.
	 */
	set(labels: Labels = {}, value: number): void {
		const labelValues = this.labelNames.map((name) => labels[name] ?? '');
		this.values.set(JSON.stringify(labelValues), { labelValues, value });
	}

	/** Current value for a label tuple, if one was set. */
	get(labels: Labels = {}): number | undefined {
		const labelValues = this.labelNames.map((name) => labels[name] ?? '');
		return this.values.get(JSON.stringify(labelValues))?.value;
	}

	/** Number of label tuples with a value. */
	get size(): number {
		return this.values.size;
	}

	collect(): string[] {
		const lines: string[] = [
			`# HELP ${this.name} ${escapeHelp(this.help)}`,
			`# TYPE ${this.name} gauge`
		];
		for (const { labelValues, value } of this.values.values()) {
			const pairs = this.labelNames.map(
				(name, i) => `${name}="${escapeLabelValue(labelValues[i] ?? '')}"`
			);
			const series = pairs.length > 0 ? `${this.name}{${pairs.join(',')}}` : this.name;
			lines.push(`${series} ${formatValue(value)}`);
		}
		return lines;
	}
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/**
 * Metrics registry. Collects all registered gauges into Prometheus text
 * exposition format, in registration order.
 */
export class MetricsRegistry {
	private metrics = new Map<string, Gauge>();

	/** MIME type for the Prometheus scrape endpoint. */
	readonly contentType = 'text/plain; version=0.0.4; charset=utf-8';

	/**
	 * Register a gauge. Returns the gauge for chaining.
	 * Throws if a gauge with the same name is already registered.
	 */
	register<T extends Gauge>(metric: T): T {
		if (this.metrics.has(metric.name)) {
			throw new Error(`Metric ${metric.name} is already registered`);
		}
		this.metrics.set(metric.name, metric);
		return metric;
	}

	/** Names of every registered gauge, in registration order. */
	names(): string[] {
		return [...this.metrics.keys()];
	}

	/**
	 * Collect all metrics as Prometheus text exposition format.
	 * An empty registry yields an empty string.
	 */
	collect(): string {
		const lines = [...this.metrics.values()].flatMap((m) => m.collect());
		return lines.length > 0 ? lines.join('\n') + '\n' : '';
	}

	/** Unregister every metric. */
	clear(): void {
		this.metrics.clear();
	}
}
