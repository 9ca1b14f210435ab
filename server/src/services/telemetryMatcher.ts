import type { TelemetryReading } from '../../../types';

/**
 * Returns the reading closest in time to `target`, or null when there is no
 * target or no readings. Ties keep the first reading encountered, so the
 * result only depends on input order, never on sorting.
 */
export function findClosestReading(
    target: number | null,
    readings: readonly TelemetryReading[]
): TelemetryReading | null {
    if (target === null || readings.length === 0) return null;

    let closest: TelemetryReading | null = null;
    let minDiff = Infinity;

    for (const reading of readings) {
        const diff = Math.abs(reading.time - target);
        if (diff < minDiff) {
            minDiff = diff;
            closest = reading;
        }
    }

    return closest;
}
