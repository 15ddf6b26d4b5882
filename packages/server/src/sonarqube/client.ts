/**
 * SonarQube Web API client.
 *
 * Implements the exporter's `MeasurementSource` over HTTP:
 * - GET /api/components/search      — project listing (paged)
 * - GET /api/project_branches/list  — branches of one project
 * - GET /api/measures/component     — measures of one project/branch
 *
 * Every call carries its own timeout. Network failures, timeouts, non-2xx
 * responses and bodies that fail schema validation all surface as
 * `UpstreamError`. Per-measure fields are validated leniently, so one odd
 * measure never rejects a whole measures response.
 */

import type { z } from 'zod';
import { UpstreamError } from '@sonar-exporter/types';
import { createLogger } from '../logger.js';
import type {
	Branch,
	Measurement,
	MeasurementSource,
	ProjectPage,
	ProjectSearch
} from '../exporter/types.js';
import {
	BranchListResponseSchema,
	ComponentMeasuresResponseSchema,
	ComponentSearchResponseSchema
} from './schemas.js';

const log = createLogger('sonarqube');

/** Component qualifier SonarQube uses for projects. */
export const PROJECT_QUALIFIER = 'TRK';

export const DEFAULT_TIMEOUT_MS = 10_000;

export interface SonarQubeClientOptions {
	/** Server root, including any context path (e.g. `https://ci.example.com/sonar`). */
	baseUrl: string;
	/** User token; sent as the Basic-auth user name with an empty password. */
	token?: string;
	timeoutMs?: number;
}

type QueryParams = Record<string, string | undefined>;

export class SonarQubeClient implements MeasurementSource {
	private readonly baseUrl: string;
	private readonly timeoutMs: number;
	private readonly authorization?: string;

	constructor(options: SonarQubeClientOptions) {
		this.baseUrl = options.baseUrl.replace(/\/+$/, '');
		this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
		if (options.token) {
			this.authorization = `Basic ${Buffer.from(`${options.token}:`).toString('base64')}`;
		}
	}

	async searchProjects(query: ProjectSearch): Promise<ProjectPage> {
		const data = await this.get('/api/components/search', ComponentSearchResponseSchema, {
			qualifiers: PROJECT_QUALIFIER,
			ps: String(query.pageSize),
			p: query.page === undefined ? undefined : String(query.page)
		});
		return {
			projects: data.components.map((c) => ({ key: c.key, name: c.name })),
			total: data.paging.total
		};
	}

	async listBranches(projectKey: string): Promise<Branch[]> {
		const data = await this.get('/api/project_branches/list', BranchListResponseSchema, {
			project: projectKey
		});
		return data.branches.map((b) => ({ name: b.name, isMain: b.isMain }));
	}

	async fetchMeasurements(
		componentKey: string,
		branch: string,
		metricKeys: readonly string[]
	): Promise<Measurement[]> {
		const data = await this.get('/api/measures/component', ComponentMeasuresResponseSchema, {
			component: componentKey,
			branch,
			metricKeys: metricKeys.join(',')
		});
		// Malformed fields arrive as undefined; the fetcher drops such measures with a warning.
		return data.component.measures.map((m) => ({
			metricKey: m.metric,
			rawValue: m.value,
			periodValues: (m.periods ?? (m.period ? [m.period] : [])).flatMap((p) =>
				p.value === undefined ? [] : [{ value: p.value }]
			)
		}));
	}

	/** Build the request URL; undefined params are left out. */
	buildUrl(path: string, params: QueryParams = {}): string {
		const search = new URLSearchParams();
		for (const [name, value] of Object.entries(params)) {
			if (value !== undefined) search.set(name, value);
		}
		const qs = search.toString();
		return `${this.baseUrl}${path}${qs ? `?${qs}` : ''}`;
	}

	private async get<S extends z.ZodTypeAny>(
		path: string,
		schema: S,
		params: QueryParams
	): Promise<z.output<S>> {
		const url = this.buildUrl(path, params);
		const context = { path, params };
		const headers: Record<string, string> = { Accept: 'application/json' };
		if (this.authorization) headers.Authorization = this.authorization;

		log.debug(context, 'sonarqube request');

		let response: Response;
		try {
			response = await fetch(url, {
				method: 'GET',
				headers,
				signal: AbortSignal.timeout(this.timeoutMs)
			});
		} catch (err) {
			// AbortSignal.timeout rejects with a DOMException named TimeoutError
			const isTimeout = err instanceof Error && err.name === 'TimeoutError';
			throw new UpstreamError(
				isTimeout
					? `SonarQube did not answer within ${this.timeoutMs}ms`
					: 'SonarQube is unreachable',
				{ ...context, timeout: isTimeout },
				err instanceof Error ? err : undefined
			);
		}

		if (!response.ok) {
			throw new UpstreamError(`SonarQube responded with HTTP ${response.status}`, {
				...context,
				status: response.status
			});
		}

		let body: unknown;
		try {
			body = await response.json();
		} catch (err) {
			throw new UpstreamError(
				'SonarQube returned a body that is not JSON',
				context,
				err instanceof Error ? err : undefined
			);
		}

		const parsed = schema.safeParse(body);
		if (!parsed.success) {
			throw new UpstreamError('SonarQube returned an unexpected response shape', {
				...context,
				issues: parsed.error.issues
			});
		}
		return parsed.data;
	}
}
