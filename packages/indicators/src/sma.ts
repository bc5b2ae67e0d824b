/**
 * Arithmetic mean of the last `period` values, or null when the series is
 * shorter than the period.
 */
export function sma(values: readonly number[], period: number): number | null {
	if (period <= 0 || values.length < period) {
		return null;
	}

	let sum = 0;
	for (let i = values.length - period; i < values.length; i += 1) {
		sum += values[i];
	}
	return sum / period;
}
