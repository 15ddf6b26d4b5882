import { SerializationError, isExporterError } from '@sonar-exporter/types';
import type { MetricsRegistry } from '../metrics.js';

export interface RenderedSnapshot {
	body: string;
	contentType: string;
}

/**
 * Serialises the whole registry, including families without samples.
 * The body is built completely before it is returned, so a failure never
 * yields a truncated response.
 */
export class SnapshotPublisher {
	constructor(private readonly registry: MetricsRegistry) {}

	render(): RenderedSnapshot {
		try {
			return { body: this.registry.collect(), contentType: this.registry.contentType };
		} catch (err) {
			if (isExporterError(err)) throw err;
			throw new SerializationError(
				'Failed to render metrics',
				{ families: this.registry.names().length },
				err instanceof Error ? err : undefined
			);
		}
	}
}
