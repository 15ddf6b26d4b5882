import type { Measurement, ResolvedValue } from './types.js';

// Plain decimals only: NaN, Infinity and hex literals are rejected on purpose.
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Parse a whole string as a finite decimal, or return undefined. */
export function parseNumeric(raw: string): number | undefined {
	const trimmed = raw.trim();
	if (!DECIMAL.test(trimmed)) return undefined;
	const value = Number(trimmed);
	return Number.isFinite(value) ? value : undefined;
}

/**
 * Resolve a measurement to the number to publish.
 *
 * The direct value wins when present, even if it does not parse; only a
 * measurement with no direct value falls back to its first period value.
 */
export function resolveMeasurement(measurement: Measurement): ResolvedValue {
	if (measurement.rawValue !== undefined) {
		const value = parseNumeric(measurement.rawValue);
		return value === undefined
			? { ok: false, reason: 'value is not numeric' }
			: { ok: true, value };
	}

	const first = measurement.periodValues[0];
	if (first === undefined) {
		return { ok: false, reason: 'no value and no period value' };
	}

	const value = parseNumeric(first.value);
	return value === undefined
		? { ok: false, reason: 'period value is not numeric' }
		: { ok: true, value };
}
