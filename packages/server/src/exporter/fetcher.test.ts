import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockWarn = vi.hoisted(() => vi.fn());

vi.mock('../logger.js', () => ({
	createLogger: () => ({
		info: vi.fn(),
		warn: (...args: unknown[]) => mockWarn(...args),
		error: vi.fn(),
		debug: vi.fn(),
		fatal: vi.fn(),
		child: vi.fn().mockReturnThis()
	})
}));

import type { MetricDefinition } from './catalog.js';
import { MeasurementFetcher, PROJECT_PAGE_SIZE, type MeasurementSink } from './fetcher.js';
import type { ProjectLabels } from './gauge-registry.js';
import type { ScrapeReport } from './types.js';
import { FakeMeasurementSource, measure, periodMeasure } from '../tests/fake-source.js';

const BUGS: MetricDefinition = { key: 'bugs', description: 'Bugs', domain: 'Reliability' };
const NEW_BUGS: MetricDefinition = { key: 'new_bugs', description: 'New bugs', domain: 'Reliability' };

function emptyReport(): ScrapeReport {
	return { enabledMetrics: 0, projects: 0, branches: 0, applied: 0, dropped: [] };
}

function recordingSink(): {
	sink: MeasurementSink;
	writes: Array<{ metricKey: string; labels: ProjectLabels; value: number }>;
} {
	const writes: Array<{ metricKey: string; labels: ProjectLabels; value: number }> = [];
	return {
		writes,
		sink: (metricKey, labels, value) => {
			writes.push({ metricKey, labels, value });
			return true;
		}
	};
}

beforeEach(() => {
	mockWarn.mockReset();
});

describe('MeasurementFetcher.listAllProjects', () => {
	it('uses a page size of 500', () => {
		expect(PROJECT_PAGE_SIZE).toBe(500);
		expect(new MeasurementFetcher(new FakeMeasurementSource()).pageSize).toBe(500);
	});

	it('issues only the count query when there are no projects', async () => {
		const source = FakeMeasurementSource.withProjectCount(0);

		const projects = await new MeasurementFetcher(source).listAllProjects();

		expect(projects).toEqual([]);
		expect(source.callsOf('searchProjects')).toEqual([
			{ op: 'searchProjects', pageSize: 500, page: undefined }
		]);
	});

	it('requests exactly one page when total equals the page size', async () => {
		const source = FakeMeasurementSource.withProjectCount(500);

		const projects = await new MeasurementFetcher(source).listAllProjects();

		expect(projects).toHaveLength(500);
		expect(source.callsOf('searchProjects').map((c) => c.page)).toEqual([undefined, 1]);
	});

	it('requests two pages for 501 projects', async () => {
		const source = FakeMeasurementSource.withProjectCount(501);

		const projects = await new MeasurementFetcher(source).listAllProjects();

		expect(projects).toHaveLength(501);
		expect(source.callsOf('searchProjects').map((c) => c.page)).toEqual([undefined, 1, 2]);
		expect(projects[500]).toEqual({ key: 'P501', name: 'Project 501' });
	});

	it('concatenates pages in order with a custom page size', async () => {
		const source = FakeMeasurementSource.withProjectCount(5);

		const projects = await new MeasurementFetcher(source, { pageSize: 2 }).listAllProjects();

		expect(projects.map((p) => p.key)).toEqual(['P1', 'P2', 'P3', 'P4', 'P5']);
		expect(source.callsOf('searchProjects').map((c) => c.page)).toEqual([undefined, 1, 2, 3]);
	});
});

describe('MeasurementFetcher.collect', () => {
	it('fetches each project/branch pair with the enabled metric keys', async () => {
		const source = new FakeMeasurementSource([
			{
				key: 'P1',
				name: 'Proj One',
				branches: [
					{ name: 'main', isMain: true, measures: [measure('bugs', '7')] },
					{ name: 'feature/x', measures: [measure('bugs', '2')] }
				]
			},
			{ key: 'P2', name: 'Proj Two', branches: [{ name: 'develop', measures: [] }] }
		]);
		const { sink, writes } = recordingSink();
		const report = emptyReport();

		await new MeasurementFetcher(source).collect([BUGS, NEW_BUGS], sink, report);

		expect(source.callsOf('listBranches').map((c) => c.projectKey)).toEqual(['P1', 'P2']);
		expect(source.callsOf('fetchMeasurements')).toEqual([
			{ op: 'fetchMeasurements', componentKey: 'P1', branch: 'main', metricKeys: ['bugs', 'new_bugs'] },
			{ op: 'fetchMeasurements', componentKey: 'P1', branch: 'feature/x', metricKeys: ['bugs', 'new_bugs'] },
			{ op: 'fetchMeasurements', componentKey: 'P2', branch: 'develop', metricKeys: ['bugs', 'new_bugs'] }
		]);
		expect(writes).toEqual([
			{ metricKey: 'bugs', labels: { projectKey: 'P1', projectName: 'Proj One', branchName: 'main' }, value: 7 },
			{ metricKey: 'bugs', labels: { projectKey: 'P1', projectName: 'Proj One', branchName: 'feature/x' }, value: 2 }
		]);
		expect(report).toEqual({ enabledMetrics: 0, projects: 2, branches: 3, applied: 2, dropped: [] });
	});

	it('issues 1 + pages + projects + branches calls', async () => {
		const source = new FakeMeasurementSource([
			{ key: 'A', name: 'A', branches: [{ name: 'main' }, { name: 'dev' }] },
			{ key: 'B', name: 'B', branches: [{ name: 'main' }] }
		]);

		await new MeasurementFetcher(source).collect([BUGS], recordingSink().sink, emptyReport());

		// count + 1 page + 2 branch listings + 3 measurement queries
		expect(source.calls).toHaveLength(7);
	});

	it('resolves period values and drops unparseable ones with a warning', async () => {
		const source = new FakeMeasurementSource([
			{
				key: 'P1',
				name: 'Proj One',
				branches: [
					{
						name: 'main',
						measures: [measure('bugs', 'n/a'), periodMeasure('new_bugs', '3')]
					}
				]
			}
		]);
		const { sink, writes } = recordingSink();
		const report = emptyReport();

		await new MeasurementFetcher(source).collect([BUGS, NEW_BUGS], sink, report);

		expect(writes).toEqual([
			{ metricKey: 'new_bugs', labels: { projectKey: 'P1', projectName: 'Proj One', branchName: 'main' }, value: 3 }
		]);
		expect(report.dropped).toEqual([
			{
				projectKey: 'P1',
				projectName: 'Proj One',
				branch: 'main',
				metricKey: 'bugs',
				rawValue: 'n/a',
				reason: 'value is not numeric'
			}
		]);
		expect(mockWarn).toHaveBeenCalledTimes(1);
		expect(mockWarn).toHaveBeenCalledWith(
			{
				projectKey: 'P1',
				projectName: 'Proj One',
				branch: 'main',
				metric: 'bugs',
				rawValue: 'n/a',
				reason: 'value is not numeric'
			},
			'dropping measurement'
		);
	});

	it('counts only values the sink accepted', async () => {
		const source = new FakeMeasurementSource([
			{ key: 'P1', name: 'One', branches: [{ name: 'main', measures: [measure('bugs', '1')] }] }
		]);
		const report = emptyReport();

		await new MeasurementFetcher(source).collect([BUGS], () => false, report);

		expect(report.applied).toBe(0);
	});

	it('keeps progress on the report when the source fails mid-walk', async () => {
		const source = new FakeMeasurementSource([
			{ key: 'P1', name: 'One', branches: [{ name: 'main', measures: [measure('bugs', '1')] }] },
			{ key: 'P2', name: 'Two', branches: [{ name: 'main', measures: [measure('bugs', '2')] }] }
		]);
		source.failWhen = {
			match: (call) => call.op === 'listBranches' && call.projectKey === 'P2',
			error: new Error('connection reset')
		};
		const { sink, writes } = recordingSink();
		const report = emptyReport();

		await expect(new MeasurementFetcher(source).collect([BUGS], sink, report)).rejects.toThrow(
			'connection reset'
		);
		expect(writes.map((w) => w.labels.projectKey)).toEqual(['P1']);
		expect(report.applied).toBe(1);
		expect(report.projects).toBe(2);
	});
});
