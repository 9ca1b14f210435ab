import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import type { TelemetryReading } from '../../types';
import { MEMORY_DB } from '../src/db';
import { setLogger } from '../src/logger';
import { RecordStore } from '../src/services/recordStore';
import { reconcileForecasts, reconcileObservations, type ReconcileContext } from '../src/services/reconciliationService';
import { toTelemetryReadings } from '../src/services/telemetryService';

const LONDON = 'Europe/London';
const SCRAPE = Date.parse('2025-11-15T03:05:00Z');

const historyRow = ['1:50 AM', '55 °F', '50 °F', '77 %', '', '12 mph', '', '29.60 in', '0.0 in', 'Cloudy'];

const readings: TelemetryReading[] = toTelemetryReadings([
    { created_at: '2025-11-15T00:30:00Z', field1: 11.5, entry_id: 4320 },
    { created_at: '2025-11-15T01:48:00Z', field1: 11.2, entry_id: 4321 },
]);

describe('reconcileObservations', () => {
    let store: RecordStore;
    let ctx: ReconcileContext;

    beforeEach(() => {
        store = RecordStore.open(MEMORY_DB);
        ctx = { store, timeZone: LONDON };
    });

    afterEach(() => {
        store.close();
    });

    it('stores a parsed, time-matched observation', () => {
        const summary = reconcileObservations(ctx, { location: 'EGLC', scrapeTime: SCRAPE, rows: [historyRow] }, readings);

        expect(summary).toEqual({ discarded: 0, inserted: 1, skipped: 0 });
        const [stored] = store.recentObservations('EGLC', 10);
        expect(stored).toMatchObject({
            location: 'EGLC',
            observation_time: Date.parse('2025-11-15T01:50:00Z'),
            scrape_time: SCRAPE,
            temperature_f: 55,
            dew_point_f: 50,
            humidity_pct: 77,
            wind_speed_mph: 12,
            wind_direction: null,
            wind_gust_mph: null,
            pressure_in: 29.6,
            precip_amount_in: 0,
            condition: 'Cloudy',
            water_temp_0_35m_c: 11.2,
            water_temp_2m_c: null,
            water_temp_7m_c: null,
            water_temp_entry_id: 4321,
        });
    });

    it('skips every row on a second run of the same batch', () => {
        const batch = { location: 'EGLC', scrapeTime: SCRAPE, rows: [historyRow] };
        reconcileObservations(ctx, batch, readings);
        const rerun = reconcileObservations(ctx, { ...batch, scrapeTime: SCRAPE + 3_600_000 }, readings);

        expect(rerun).toEqual({ discarded: 0, inserted: 0, skipped: 1 });
        expect(store.count('observation')).toBe(1);
        expect(store.recentObservations('EGLC', 1)[0].scrape_time).toBe(SCRAPE);
    });

    it('discards rows whose time cannot be read', () => {
        const rows = [historyRow, ['', '54 °F'], ['13:10 AM', '54 °F'], [], ['Mostly Cloudy']];
        const summary = reconcileObservations(ctx, { location: 'EGLC', scrapeTime: SCRAPE, rows }, readings);

        expect(summary).toEqual({ discarded: 4, inserted: 1, skipped: 0 });
    });

    it('stores short rows with absent trailing fields', () => {
        reconcileObservations(ctx, { location: 'EGLC', scrapeTime: SCRAPE, rows: [['12:20 AM', '56 °F']] }, []);

        expect(store.recentObservations('EGLC', 1)[0]).toMatchObject({
            observation_time: Date.parse('2025-11-15T00:20:00Z'),
            temperature_f: 56,
            dew_point_f: null,
            humidity_pct: null,
            wind_speed_mph: null,
            condition: null,
            water_temp_0_35m_c: null,
            water_temp_entry_id: null,
        });
    });

    it('keeps the first of two rows with the same time', () => {
        const second = ['1:50 AM', '99 °F'];
        const summary = reconcileObservations(ctx, { location: 'EGLC', scrapeTime: SCRAPE, rows: [historyRow, second] }, []);

        expect(summary).toEqual({ discarded: 0, inserted: 1, skipped: 1 });
        expect(store.recentObservations('EGLC', 1)[0].temperature_f).toBe(55);
    });

    it('reads separate direction and gust columns', () => {
        const row = ['2:50 AM', '54 °F', '50 °F', '86 %', 'WSW', '14 mph', '24 mph', '29.59 in', '0.01 in', 'Light Rain'];
        reconcileObservations(ctx, { location: 'EGLC', scrapeTime: SCRAPE, rows: [row] }, readings);

        expect(store.recentObservations('EGLC', 1)[0]).toMatchObject({
            wind_speed_mph: 14,
            wind_direction: 'WSW',
            wind_gust_mph: 24,
            water_temp_entry_id: 4321,
        });
    });

    it('uses an explicit reference date over the scrape date', () => {
        reconcileObservations(ctx, {
            location: 'EGLC',
            scrapeTime: SCRAPE,
            referenceDate: '2025-07-15',
            rows: [historyRow],
        }, []);

        expect(store.recentObservations('EGLC', 1)[0].observation_time).toBe(Date.parse('2025-07-15T00:50:00Z'));
    });

    it('discards everything when the zone is unknown', () => {
        const summary = reconcileObservations(
            { store, timeZone: 'Mars/Olympus_Mons' },
            { location: 'EGLC', scrapeTime: SCRAPE, rows: [historyRow, historyRow] },
            readings
        );

        expect(summary).toEqual({ discarded: 2, inserted: 0, skipped: 0 });
        expect(store.count('observation')).toBe(0);
    });
});

describe('reconcileForecasts', () => {
    const FORECAST_SCRAPE = Date.parse('2025-11-15T14:30:00Z');
    const rows = [
        ['3:00 pm', 'Partly Cloudy', '57 °F', '55 °F', '15 %', '0.01 in', '64 %', '48 °F', '72 %', '9 mph SW', '29.92 in'],
        ['12:00 am', 'Rain', '51 °F', '48 °F', '70 %', '0.10 in', '100 %', '47 °F', '90 %', '11 mph S', '29.88 in'],
    ];

    let store: RecordStore;

    beforeEach(() => {
        store = RecordStore.open(MEMORY_DB);
    });

    afterEach(() => {
        store.close();
    });

    it('parses every forecast column', () => {
        reconcileForecasts({ store, timeZone: LONDON }, { location: 'EGLC', scrapeTime: FORECAST_SCRAPE, rows: [rows[0]] });

        const [stored] = store.recentForecasts('EGLC', 10);
        expect(stored).toMatchObject({
            location: 'EGLC',
            forecast_time: Date.parse('2025-11-15T15:00:00Z'),
            scrape_time: FORECAST_SCRAPE,
            temperature_f: 57,
            feels_like_f: 55,
            precip_chance_pct: 15,
            precip_amount_in: 0.01,
            cloud_cover_pct: 64,
            dew_point_f: 48,
            humidity_pct: 72,
            wind_speed_mph: 9,
            wind_direction: 'SW',
            pressure_in: 29.92,
            condition: 'Partly Cloudy',
        });
    });

    it('rolls hours that have already passed onto the next day', () => {
        const summary = reconcileForecasts({ store, timeZone: LONDON }, { location: 'EGLC', scrapeTime: FORECAST_SCRAPE, rows });

        expect(summary).toEqual({ discarded: 0, inserted: 2, skipped: 0 });
        expect(store.recentForecasts('EGLC', 10).map(f => new Date(f.forecast_time).toISOString())).toEqual([
            '2025-11-15T15:00:00.000Z',
            '2025-11-16T00:00:00.000Z',
        ]);
    });

    it('records a later scrape of the same hours separately', () => {
        const ctx = { store, timeZone: LONDON };
        reconcileForecasts(ctx, { location: 'EGLC', scrapeTime: FORECAST_SCRAPE, rows });
        const again = reconcileForecasts(ctx, { location: 'EGLC', scrapeTime: FORECAST_SCRAPE, rows });
        const later = reconcileForecasts(ctx, { location: 'EGLC', scrapeTime: FORECAST_SCRAPE + 60_000, rows });

        expect(again).toEqual({ discarded: 0, inserted: 0, skipped: 2 });
        expect(later).toEqual({ discarded: 0, inserted: 2, skipped: 0 });
        expect(store.count('forecast')).toBe(4);
    });

    it('reads one day of hours and discards the rest of a longer listing', () => {
        const day = Array.from({ length: 24 }, (_, i) => {
            const hour = (15 + i) % 24;
            const label = `${hour % 12 || 12}:00 ${hour < 12 ? 'am' : 'pm'}`;
            return [label, 'Cloudy', '50 °F'];
        });
        const lines: string[] = [];
        setLogger(line => lines.push(line));

        const summary = reconcileForecasts(
            { store, timeZone: LONDON },
            { location: 'EGLC', scrapeTime: FORECAST_SCRAPE, rows: [...day, ...day] }
        );

        expect(summary).toEqual({ discarded: 24, inserted: 24, skipped: 0 });
        expect(lines).toContain('[RECONCILE] EGLC: discarding 24 forecast rows beyond 24 hours');
        const times = store.recentForecasts('EGLC', 100).map(f => new Date(f.forecast_time).toISOString());
        expect(times).toHaveLength(24);
        expect(times[0]).toBe('2025-11-15T15:00:00.000Z');
        expect(times[23]).toBe('2025-11-16T14:00:00.000Z');
    });

    it('discards rows without a readable hour', () => {
        const summary = reconcileForecasts(
            { store, timeZone: LONDON },
            { location: 'EGLC', scrapeTime: FORECAST_SCRAPE, rows: [['Tonight', 'Rain'], rows[0]] }
        );
        expect(summary).toEqual({ discarded: 1, inserted: 1, skipped: 0 });
    });
});
