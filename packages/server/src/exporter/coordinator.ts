import { UpstreamError, isExporterError, type ExporterError } from '@sonar-exporter/types';
import { createLogger } from '../logger.js';
import { MetricsRegistry } from '../metrics.js';
import { METRIC_CATALOG, type MetricDefinition } from './catalog.js';
import type { ConfigSource } from './config-source.js';
import { MeasurementFetcher } from './fetcher.js';
import { GaugeRegistry } from './gauge-registry.js';
import { Mutex } from './mutex.js';
import { SnapshotPublisher, type RenderedSnapshot } from './publisher.js';
import { computeEnabled, type EnabledMetricSet } from './selector.js';
import type { MeasurementSource, ScrapeReport } from './types.js';

const log = createLogger('exporter');

export type ExportState =
	| 'idle'
	| 'selecting-metrics'
	| 'rebuilding-registry'
	| 'fetching'
	| 'publishing';

export interface ExportCoordinatorOptions {
	source: MeasurementSource;
	config: ConfigSource;
	catalog?: readonly MetricDefinition[];
	/** Defaults to a fresh registry owned by this coordinator. */
	registry?: MetricsRegistry;
	pageSize?: number;
	/**
	 * When the measurement source fails mid-scrape, publish what was fetched so
	 * far instead of failing the request. Default false.
	 */
	publishPartial?: boolean;
}

export interface ScrapeResult extends RenderedSnapshot {
	report: ScrapeReport;
}

/**
 * Runs one scrape cycle per request: select enabled metrics, rebuild the
 * gauges, fetch from the measurement source, render.
 *
 * Cycles are serialised by a mutex, so a rebuild in one request can never
 * interleave with the fetch or render of another.
 */
export class ExportCoordinator {
	readonly gauges: GaugeRegistry;
	private readonly fetcher: MeasurementFetcher;
	private readonly publisher: SnapshotPublisher;
	private readonly catalog: readonly MetricDefinition[];
	private readonly config: ConfigSource;
	private readonly publishPartial: boolean;
	private readonly mutex = new Mutex();
	private currentState: ExportState = 'idle';
	private enabled: EnabledMetricSet = [];

	constructor(options: ExportCoordinatorOptions) {
		const registry = options.registry ?? new MetricsRegistry();
		this.gauges = new GaugeRegistry(registry);
		this.publisher = new SnapshotPublisher(registry);
		this.fetcher = new MeasurementFetcher(options.source, { pageSize: options.pageSize });
		this.catalog = options.catalog ?? METRIC_CATALOG;
		this.config = options.config;
		this.publishPartial = options.publishPartial ?? false;
	}

	get state(): ExportState {
		return this.currentState;
	}

	/** Metrics enabled by the most recent scrape. */
	get enabledMetrics(): EnabledMetricSet {
		return this.enabled;
	}

	/** Scrape and return only what the HTTP layer sends. */
	async handleScrape(): Promise<RenderedSnapshot> {
		const { body, contentType } = await this.scrape();
		return { body, contentType };
	}

	async scrape(): Promise<ScrapeResult> {
		return this.mutex.runExclusive(() => this.runCycle());
	}

	private async runCycle(): Promise<ScrapeResult> {
		const startedAt = performance.now();
		try {
			this.currentState = 'selecting-metrics';
			this.enabled = computeEnabled(this.catalog, this.config);

			this.currentState = 'rebuilding-registry';
			this.gauges.rebuild(this.enabled);

			const report: ScrapeReport = {
				enabledMetrics: this.enabled.length,
				projects: 0,
				branches: 0,
				applied: 0,
				dropped: []
			};

			if (this.enabled.length > 0) {
				this.currentState = 'fetching';
				await this.fetch(report);
			}

			this.currentState = 'publishing';
			const rendered = this.publisher.render();

			log.debug(
				{
					enabledMetrics: report.enabledMetrics,
					projects: report.projects,
					branches: report.branches,
					applied: report.applied,
					dropped: report.dropped.length,
					partial: report.failed !== undefined,
					durationMs: Math.round(performance.now() - startedAt)
				},
				'scrape complete'
			);

			return { ...rendered, report };
		} finally {
			this.currentState = 'idle';
		}
	}

	private async fetch(report: ScrapeReport): Promise<void> {
		try {
			await this.fetcher.collect(
				this.enabled,
				(metricKey, labels, value) => this.gauges.setValue(metricKey, labels, value),
				report
			);
		} catch (err) {
			const error = toUpstreamError(err);
			if (!this.publishPartial) throw error;

			log.error(
				{ err: error, projects: report.projects, applied: report.applied },
				'measurement source failed, publishing partial snapshot'
			);
			report.failed = error;
		}
	}
}

function toUpstreamError(err: unknown): ExporterError {
	if (isExporterError(err)) return err;
	return new UpstreamError(
		'Measurement source call failed',
		{},
		err instanceof Error ? err : undefined
	);
}
