import { FORECAST_COLUMNS, FORECAST_HOURS, OBSERVATION_COLUMNS } from '../../../constants';
import type {
    Forecast,
    InsertOutcome,
    Observation,
    RawRow,
    ReconcileSummary,
    TelemetryReading,
} from '../../../types';
import { describeError } from '../errors';
import { createLog } from '../logger';
import type { RecordStore } from './recordStore';
import { findClosestReading } from './telemetryMatcher';
import { localDateOf, normalizeLocalTime, type AmbiguousPolicy } from './timeNormalizer';
import {
    parseInches,
    parsePercentage,
    parseTemperature,
    parseText,
    parseWind,
} from './unitParser';

const log = createLog('RECONCILE');

export interface ReconcileContext {
    store: RecordStore;
    timeZone: string;
    ambiguous?: AmbiguousPolicy;
}

export interface ObservationBatch {
    location: string;
    scrapeTime: number;
    referenceDate?: string; // YYYY-MM-DD; defaults to the scrape date
    rows: readonly RawRow[];
}

export interface ForecastBatch {
    location: string;
    scrapeTime: number;
    rows: readonly RawRow[];
}

const cell = (row: RawRow, index: number): string | undefined => row[index];

/** History tables print direction and speed in separate columns. */
const combineWind = (speed: string | undefined, direction: string | undefined): string => {
    const s = (speed ?? '').trim();
    const d = (direction ?? '').trim();
    return s && d ? `${s} ${d}` : s;
};

function buildObservation(
    row: RawRow,
    observationTime: number,
    batch: ObservationBatch,
    readings: readonly TelemetryReading[]
): Observation {
    const c = OBSERVATION_COLUMNS;
    const wind = parseWind(combineWind(cell(row, c.wind_speed), cell(row, c.wind_direction)));
    const water = findClosestReading(observationTime, readings);

    return {
        location: batch.location,
        observation_time: observationTime,
        scrape_time: batch.scrapeTime,
        temperature_f: parseTemperature(cell(row, c.temperature)),
        dew_point_f: parseTemperature(cell(row, c.dew_point)),
        humidity_pct: parsePercentage(cell(row, c.humidity)),
        wind_speed_mph: wind.speed,
        wind_direction: wind.direction,
        wind_gust_mph: parseWind(cell(row, c.wind_gust)).speed,
        pressure_in: parseInches(cell(row, c.pressure)),
        precip_amount_in: parseInches(cell(row, c.precip_amount)),
        condition: parseText(cell(row, c.condition)),
        water_temp_0_35m_c: water?.temp_0_35m ?? null,
        water_temp_2m_c: water?.temp_2m ?? null,
        water_temp_7m_c: water?.temp_7m ?? null,
        water_temp_entry_id: water?.entry_id ?? null,
    };
}

function buildForecast(row: RawRow, forecastTime: number, batch: ForecastBatch): Forecast {
    const c = FORECAST_COLUMNS;
    const wind = parseWind(cell(row, c.wind));

    return {
        location: batch.location,
        forecast_time: forecastTime,
        scrape_time: batch.scrapeTime,
        temperature_f: parseTemperature(cell(row, c.temperature)),
        feels_like_f: parseTemperature(cell(row, c.feels_like)),
        dew_point_f: parseTemperature(cell(row, c.dew_point)),
        humidity_pct: parsePercentage(cell(row, c.humidity)),
        wind_speed_mph: wind.speed,
        wind_direction: wind.direction,
        pressure_in: parseInches(cell(row, c.pressure)),
        precip_chance_pct: parsePercentage(cell(row, c.precip_chance)),
        precip_amount_in: parseInches(cell(row, c.precip_amount)),
        cloud_cover_pct: parsePercentage(cell(row, c.cloud_cover)),
        condition: parseText(cell(row, c.condition)),
    };
}

function tally(discarded: number, outcomes: readonly InsertOutcome[]): ReconcileSummary {
    let inserted = 0;
    let skipped = 0;
    for (const outcome of outcomes) {
        if (outcome === 'inserted') inserted++;
        else skipped++;
    }
    return { discarded, inserted, skipped };
}

/**
 * Normalizes, parses and time-matches one batch of history rows and stores
 * the result. Rows whose time cannot be read are discarded and counted as
 * neither inserted nor skipped.
 */
export function reconcileObservations(
    ctx: ReconcileContext,
    batch: ObservationBatch,
    readings: readonly TelemetryReading[]
): ReconcileSummary {
    const referenceDate = batch.referenceDate ?? localDateOf(batch.scrapeTime, ctx.timeZone);
    if (!referenceDate) {
        log(`${batch.location}: cannot derive a reference date in ${ctx.timeZone}; discarding ${batch.rows.length} rows`);
        return { discarded: batch.rows.length, inserted: 0, skipped: 0 };
    }

    const observations: Observation[] = [];
    let discarded = 0;

    for (const row of batch.rows) {
        const timeText = cell(row, OBSERVATION_COLUMNS.time);
        const observationTime = normalizeLocalTime(timeText, referenceDate, ctx.timeZone, {
            ambiguous: ctx.ambiguous,
        });
        if (observationTime === null) {
            log(`${batch.location}: discarding observation row with unreadable time '${timeText ?? ''}'`);
            discarded++;
            continue;
        }
        try {
            observations.push(buildObservation(row, observationTime, batch, readings));
        } catch (e) {
            log(`${batch.location}: discarding observation row at '${timeText}': ${describeError(e)}`);
            discarded++;
        }
    }

    const summary = tally(discarded, ctx.store.insertObservations(observations));
    log(`${batch.location} observations ${referenceDate}: ${summary.inserted} new, ${summary.skipped} duplicates, ${summary.discarded} discarded`);
    return summary;
}

/**
 * Same as reconcileObservations for an hourly forecast listing. Hours that are
 * not after the scrape time roll over to the next day. Only the first
 * FORECAST_HOURS rows are read; the rest count as discarded.
 */
export function reconcileForecasts(ctx: ReconcileContext, batch: ForecastBatch): ReconcileSummary {
    const referenceDate = localDateOf(batch.scrapeTime, ctx.timeZone);
    if (!referenceDate) {
        log(`${batch.location}: cannot derive a reference date in ${ctx.timeZone}; discarding ${batch.rows.length} rows`);
        return { discarded: batch.rows.length, inserted: 0, skipped: 0 };
    }

    const forecasts: Forecast[] = [];
    let discarded = 0;

    // Rollover reaches one day ahead at most.
    const overflow = batch.rows.length - FORECAST_HOURS;
    if (overflow > 0) {
        log(`${batch.location}: discarding ${overflow} forecast rows beyond ${FORECAST_HOURS} hours`);
        discarded += overflow;
    }

    for (const row of batch.rows.slice(0, FORECAST_HOURS)) {
        const timeText = cell(row, FORECAST_COLUMNS.time);
        const forecastTime = normalizeLocalTime(timeText, referenceDate, ctx.timeZone, {
            rollover: { kind: 'next-day-if-elapsed', currentTime: batch.scrapeTime },
            ambiguous: ctx.ambiguous,
        });
        if (forecastTime === null) {
            log(`${batch.location}: discarding forecast row with unreadable time '${timeText ?? ''}'`);
            discarded++;
            continue;
        }
        try {
            forecasts.push(buildForecast(row, forecastTime, batch));
        } catch (e) {
            log(`${batch.location}: discarding forecast row at '${timeText}': ${describeError(e)}`);
            discarded++;
        }
    }

    const summary = tally(discarded, ctx.store.insertForecasts(forecasts));
    log(`${batch.location} forecasts: ${summary.inserted} new, ${summary.skipped} duplicates, ${summary.discarded} discarded`);
    return summary;
}
