/**
 * Zod schemas for the SonarQube Web API responses the exporter reads.
 * Only the fields in use are declared; everything else is stripped.
 */

import { z } from 'zod';

/** `GET /api/components/search` */
export const ComponentSearchResponseSchema = z.object({
	paging: z.object({
		pageIndex: z.number().int(),
		pageSize: z.number().int(),
		total: z.number().int().nonnegative()
	}),
	components: z.array(
		z.object({
			key: z.string(),
			name: z.string()
		})
	)
});

export type ComponentSearchResponse = z.infer<typeof ComponentSearchResponseSchema>;

/** `GET /api/project_branches/list` */
export const BranchListResponseSchema = z.object({
	branches: z.array(
		z.object({
			name: z.string(),
			isMain: z.boolean().default(false)
		})
	)
});

export type BranchListResponse = z.infer<typeof BranchListResponseSchema>;

const PeriodSchema = z.object({
	index: z.number().int().optional(),
	value: z.string().optional()
});

/**
 * `GET /api/measures/component`
 *
 * Older servers report new-code values as `periods: [...]`, newer ones as a
 * single `period`.
 */
export const ComponentMeasuresResponseSchema = z.object({
	component: z.object({
		key: z.string(),
		measures: z.array(
			z.object({
				metric: z.string(),
				value: z.string().optional().catch(undefined),
				periods: z.array(PeriodSchema).optional().catch(undefined),
				period: PeriodSchema.optional().catch(undefined)
			})
		)
	})
});

export type ComponentMeasuresResponse = z.infer<typeof ComponentMeasuresResponseSchema>;
