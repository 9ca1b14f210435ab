import { DateTime } from 'luxon';
import { z } from 'zod';
import { DEFAULT_FETCH_TIMEOUT_MS } from '../../../constants';
import type { RawTelemetryReading, TelemetryReading } from '../../../types';
import { describeError } from '../errors';
import { createLog } from '../logger';

const log = createLog('TELEMETRY');

const fieldSchema = z.union([z.string(), z.number()]).nullish();

export const feedEntrySchema = z.object({
    created_at: z.string(),
    entry_id: fieldSchema,
    field1: fieldSchema,
    field2: fieldSchema,
    field3: fieldSchema,
});

export const telemetryFeedSchema = z.object({
    channel: z.object({ id: z.number().optional(), name: z.string().optional() }).passthrough().optional(),
    feeds: z.array(feedEntrySchema),
});

export type TelemetryFeed = z.infer<typeof telemetryFeedSchema>;

const toNumber = (val: string | number | null | undefined): number | null => {
    if (val === null || val === undefined) return null;
    if (typeof val === 'string' && val.trim() === '') return null;
    const n = Number(val);
    return Number.isFinite(n) ? n : null;
};

/**
 * ISO-8601 text → UTC epoch ms. Text without an offset is read as UTC.
 */
export const parseInstant = (text: string): number | null => {
    const dt = DateTime.fromISO(text.trim(), { zone: 'utc' });
    return dt.isValid ? dt.toMillis() : null;
};

/**
 * Converts one feed item. Returns null when its timestamp cannot be read;
 * unreadable depth values only blank that field.
 */
export function toTelemetryReading(raw: RawTelemetryReading): TelemetryReading | null {
    const time = parseInstant(raw.created_at);
    if (time === null) return null;

    const entryId = toNumber(raw.entry_id);
    return {
        time,
        temp_0_35m: toNumber(raw.field1),
        temp_2m: toNumber(raw.field2),
        temp_7m: toNumber(raw.field3),
        entry_id: entryId !== null && Number.isInteger(entryId) ? entryId : null,
    };
}

export function toTelemetryReadings(items: readonly RawTelemetryReading[]): TelemetryReading[] {
    const readings: TelemetryReading[] = [];
    for (const item of items) {
        const reading = toTelemetryReading(item);
        if (reading) {
            readings.push(reading);
        } else {
            log(`Skipping reading with unreadable timestamp '${item.created_at}' (entry ${item.entry_id ?? '?'})`);
        }
    }
    return readings;
}

/**
 * Validates a feed document and converts its entries.
 * Throws a ZodError when the document does not have the feed shape.
 */
export function parseTelemetryFeed(json: unknown): TelemetryReading[] {
    const feed = telemetryFeedSchema.parse(json);
    if (feed.feeds.length === 0) {
        log('Feed contains no entries');
    }
    return toTelemetryReadings(feed.feeds);
}

/**
 * Fetches the most recent `results` entries of a feed. One attempt; the
 * caller decides whether a failure is fatal.
 */
export async function fetchTelemetryFeed(
    feedUrl: string,
    results: number,
    timeoutMs = DEFAULT_FETCH_TIMEOUT_MS
): Promise<TelemetryReading[]> {
    const url = new URL(feedUrl);
    url.searchParams.set('results', String(results));

    log(`Fetching ${results} feed entries from ${url.host}...`);
    const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    if (!res.ok) {
        throw new Error(`Telemetry feed HTTP ${res.status}`);
    }

    const readings = parseTelemetryFeed(await res.json());
    log(`Retrieved ${readings.length} readings.`);
    return readings;
}

/**
 * Feed readings for a run, or none when no feed is configured or the fetch
 * fails. Observations are still stored without water temperatures.
 */
export async function fetchRecentReadings(
    feedUrl: string | undefined,
    results: number,
    timeoutMs = DEFAULT_FETCH_TIMEOUT_MS
): Promise<TelemetryReading[]> {
    if (!feedUrl) return [];
    try {
        return await fetchTelemetryFeed(feedUrl, results, timeoutMs);
    } catch (e) {
        log(`Could not fetch telemetry feed: ${describeError(e)}`);
        return [];
    }
}
