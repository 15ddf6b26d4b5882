import type { ExporterError } from '@sonar-exporter/types';

// ── Measurement source contract ───────────────────────────────────────────

export interface Project {
	key: string;
	name: string;
}

export interface Branch {
	name: string;
	isMain: boolean;
}

export interface PeriodValue {
	value: string;
}

/** One metric for one project/branch, as reported by the source. */
export interface Measurement {
	metricKey: string;
	rawValue?: string;
	periodValues: PeriodValue[];
}

export interface ProjectPage {
	projects: Project[];
	total: number;
}

export interface ProjectSearch {
	pageSize: number;
	/** 1-based. Omitted for the initial count query. */
	page?: number;
}

/**
 * Everything the exporter needs from the analysis server.
 * `SonarQubeClient` is the HTTP implementation; tests use in-process fakes.
 */
export interface MeasurementSource {
	searchProjects(query: ProjectSearch): Promise<ProjectPage>;
	listBranches(projectKey: string): Promise<Branch[]>;
	fetchMeasurements(
		componentKey: string,
		branch: string,
		metricKeys: readonly string[]
	): Promise<Measurement[]>;
}

// ── Scrape results ────────────────────────────────────────────────────────

export type ResolvedValue = { ok: true; value: number } | { ok: false; reason: string };

export interface DroppedMeasurement {
	projectKey: string;
	projectName: string;
	branch: string;
	metricKey: string;
	rawValue: string | undefined;
	reason: string;
}

export interface ScrapeReport {
	enabledMetrics: number;
	projects: number;
	branches: number;
	/** Values written into the gauge registry. */
	applied: number;
	dropped: DroppedMeasurement[];
	/** Set when the fetch phase aborted and a partial snapshot was published. */
	failed?: ExporterError;
}
