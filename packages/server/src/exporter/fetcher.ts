import { createLogger } from '../logger.js';
import type { ProjectLabels } from './gauge-registry.js';
import { resolveMeasurement } from './resolve.js';
import type { EnabledMetricSet } from './selector.js';
import type { Branch, Measurement, MeasurementSource, Project, ScrapeReport } from './types.js';

const log = createLogger('exporter');

export const PROJECT_PAGE_SIZE = 500;

/** Receives each resolved value; returns false when the value was not stored. */
export type MeasurementSink = (metricKey: string, labels: ProjectLabels, value: number) => boolean;

export interface MeasurementFetcherOptions {
	pageSize?: number;
}

/**
 * Pulls projects, branches and measurements from a `MeasurementSource`.
 *
 * Calls are issued one at a time: one count query, one query per project
 * page, one branch listing per project and one measurement query per
 * project/branch pair.
 */
export class MeasurementFetcher {
	readonly pageSize: number;

	constructor(
		private readonly source: MeasurementSource,
		options: MeasurementFetcherOptions = {}
	) {
		this.pageSize = options.pageSize ?? PROJECT_PAGE_SIZE;
	}

	/**
	 * Every analyzed project, in page order.
	 * Pages run 1..ceil(total / pageSize); a total of zero issues no page query.
	 */
	async listAllProjects(): Promise<Project[]> {
		const { total } = await this.source.searchProjects({ pageSize: this.pageSize });
		const pageCount = Math.ceil(total / this.pageSize);

		const projects: Project[] = [];
		for (let page = 1; page <= pageCount; page++) {
			const result = await this.source.searchProjects({ pageSize: this.pageSize, page });
			projects.push(...result.projects);
		}
		return projects;
	}

	async listBranches(project: Project): Promise<Branch[]> {
		return this.source.listBranches(project.key);
	}

	async fetchMeasurements(
		project: Project,
		branch: Branch,
		enabled: EnabledMetricSet
	): Promise<Measurement[]> {
		return this.source.fetchMeasurements(
			project.key,
			branch.name,
			enabled.map((metric) => metric.key)
		);
	}

	/**
	 * Fetch and resolve every enabled measurement, handing each value to `sink`
	 * as soon as it is resolved.
	 *
	 * Progress is recorded on `report` as it happens, so a caller that catches a
	 * source failure still sees what was applied before it. Unparseable
	 * measurements are dropped with a warning and never abort the walk.
	 */
	async collect(
		enabled: EnabledMetricSet,
		sink: MeasurementSink,
		report: ScrapeReport
	): Promise<void> {
		const projects = await this.listAllProjects();
		report.projects = projects.length;

		for (const project of projects) {
			const branches = await this.listBranches(project);

			for (const branch of branches) {
				report.branches += 1;
				const measurements = await this.fetchMeasurements(project, branch, enabled);
				const labels: ProjectLabels = {
					projectKey: project.key,
					projectName: project.name,
					branchName: branch.name
				};

				for (const measurement of measurements) {
					const resolved = resolveMeasurement(measurement);
					if (resolved.ok) {
						if (sink(measurement.metricKey, labels, resolved.value)) report.applied += 1;
						continue;
					}

					const rawValue = measurement.rawValue ?? measurement.periodValues[0]?.value;
					report.dropped.push({
						projectKey: project.key,
						projectName: project.name,
						branch: branch.name,
						metricKey: measurement.metricKey,
						rawValue,
						reason: resolved.reason
					});
					log.warn(
						{
							projectKey: project.key,
							projectName: project.name,
							branch: branch.name,
							metric: measurement.metricKey,
							rawValue,
							reason: resolved.reason
						},
						'dropping measurement'
					);
				}
			}
		}
	}
}
