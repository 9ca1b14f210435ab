import type Database from 'better-sqlite3';
import type {
    Forecast,
    InsertOutcome,
    Observation,
    RecordKind,
    StoredForecast,
    StoredObservation,
} from '../../../types';
import { openDatabase } from '../db';
import { StoreUnavailableError } from '../errors';
import { createLog } from '../logger';

const log = createLog('STORE');

type BindRecord = Record<string, string | number | null>;

const OBSERVATION_FIELDS = [
    'location', 'observation_time', 'scrape_time',
    'temperature_f', 'dew_point_f', 'humidity_pct',
    'wind_speed_mph', 'wind_direction', 'wind_gust_mph',
    'pressure_in', 'precip_amount_in', 'condition',
    'water_temp_0_35m_c', 'water_temp_2m_c', 'water_temp_7m_c', 'water_temp_entry_id',
] as const satisfies readonly (keyof Observation)[];

const FORECAST_FIELDS = [
    'location', 'forecast_time', 'scrape_time',
    'temperature_f', 'feels_like_f', 'dew_point_f', 'humidity_pct',
    'wind_speed_mph', 'wind_direction', 'pressure_in',
    'precip_chance_pct', 'precip_amount_in', 'cloud_cover_pct', 'condition',
] as const satisfies readonly (keyof Forecast)[];

const TABLES: Record<RecordKind, string> = {
    observation: 'observations',
    forecast: 'forecasts',
};

const MAX_LIMIT = 1000;

const buildInsert = (table: string, fields: readonly string[], naturalKey: string[]) => `
    INSERT INTO ${table} (${fields.join(', ')})
    VALUES (${fields.map(f => `@${f}`).join(', ')})
    ON CONFLICT (${naturalKey.join(', ')}) DO NOTHING
`;

const pick = <T extends object, K extends keyof T & string>(record: T, fields: readonly K[]): BindRecord => {
    const params: BindRecord = {};
    for (const field of fields) {
        const value = record[field];
        params[field] = typeof value === 'string' || typeof value === 'number' ? value : null;
    }
    return params;
};

const clampLimit = (limit: number): number =>
    Number.isFinite(limit) ? Math.min(Math.max(Math.trunc(limit), 1), MAX_LIMIT) : MAX_LIMIT;

/**
 * Persistent, uniquely keyed storage for observations and forecasts.
 *
 * Inserts are single `INSERT ... ON CONFLICT DO NOTHING` statements, so the
 * natural-key check and the write are one atomic step: a record whose key is
 * already stored is reported as `skipped` and leaves the table untouched.
 * Backend failures are rethrown as StoreUnavailableError.
 */
export class RecordStore {
    private readonly insertObservationStmt: Database.Statement<BindRecord>;
    private readonly insertForecastStmt: Database.Statement<BindRecord>;

    private constructor(private readonly db: Database.Database) {
        this.insertObservationStmt = db.prepare<BindRecord>(
            buildInsert('observations', OBSERVATION_FIELDS, ['location', 'observation_time'])
        );
        this.insertForecastStmt = db.prepare<BindRecord>(
            buildInsert('forecasts', FORECAST_FIELDS, ['location', 'forecast_time', 'scrape_time'])
        );
    }

    static open(dbPath: string): RecordStore {
        const db = openDatabase(dbPath);
        try {
            return new RecordStore(db);
        } catch (e) {
            db.close();
            throw new StoreUnavailableError(`Cannot prepare statements for ${dbPath}`, e);
        }
    }

    private static guard<T>(action: string, fn: () => T): T {
        try {
            return fn();
        } catch (e) {
            if (e instanceof StoreUnavailableError) throw e;
            throw new StoreUnavailableError(`Failed to ${action}`, e);
        }
    }

    insertObservation(obs: Observation): InsertOutcome {
        return RecordStore.guard('insert observation', () => this.runObservation(obs));
    }

    insertForecast(forecast: Forecast): InsertOutcome {
        return RecordStore.guard('insert forecast', () => this.runForecast(forecast));
    }

    /**
     * Inserts a batch in one transaction. Outcomes are index-aligned with the
     * input and are only returned once the batch is committed.
     */
    insertObservations(list: readonly Observation[]): InsertOutcome[] {
        const outcomes = RecordStore.guard('insert observation batch', () =>
            this.db.transaction((items: readonly Observation[]) => items.map(obs => this.runObservation(obs)))(list)
        );
        log(`observations: ${countOf(outcomes, 'inserted')} inserted, ${countOf(outcomes, 'skipped')} skipped`);
        return outcomes;
    }

    insertForecasts(list: readonly Forecast[]): InsertOutcome[] {
        const outcomes = RecordStore.guard('insert forecast batch', () =>
            this.db.transaction((items: readonly Forecast[]) => items.map(f => this.runForecast(f)))(list)
        );
        log(`forecasts: ${countOf(outcomes, 'inserted')} inserted, ${countOf(outcomes, 'skipped')} skipped`);
        return outcomes;
    }

    count(kind: RecordKind, location?: string): number {
        const table = TABLES[kind];
        return RecordStore.guard(`count ${table}`, () => {
            const row = location !== undefined
                ? this.db.prepare<[string], { n: number }>(`SELECT COUNT(*) AS n FROM ${table} WHERE location = ?`).get(location)
                : this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get();
            return row?.n ?? 0;
        });
    }

    recentObservations(location: string | undefined, limit: number): StoredObservation[] {
        return RecordStore.guard('read observations', () =>
            location !== undefined
                ? this.db.prepare<[string, number], StoredObservation>(
                    'SELECT * FROM observations WHERE location = ? ORDER BY observation_time DESC LIMIT ?'
                ).all(location, clampLimit(limit))
                : this.db.prepare<[number], StoredObservation>(
                    'SELECT * FROM observations ORDER BY observation_time DESC LIMIT ?'
                ).all(clampLimit(limit))
        );
    }

    recentForecasts(location: string | undefined, limit: number): StoredForecast[] {
        return RecordStore.guard('read forecasts', () =>
            location !== undefined
                ? this.db.prepare<[string, number], StoredForecast>(
                    'SELECT * FROM forecasts WHERE location = ? ORDER BY scrape_time DESC, forecast_time ASC LIMIT ?'
                ).all(location, clampLimit(limit))
                : this.db.prepare<[number], StoredForecast>(
                    'SELECT * FROM forecasts ORDER BY scrape_time DESC, forecast_time ASC LIMIT ?'
                ).all(clampLimit(limit))
        );
    }

    close(): void {
        if (this.db.open) {
            this.db.close();
        }
    }

    private runObservation(obs: Observation): InsertOutcome {
        const info = this.insertObservationStmt.run(pick(obs, OBSERVATION_FIELDS));
        return info.changes > 0 ? 'inserted' : 'skipped';
    }

    private runForecast(forecast: Forecast): InsertOutcome {
        const info = this.insertForecastStmt.run(pick(forecast, FORECAST_FIELDS));
        return info.changes > 0 ? 'inserted' : 'skipped';
    }
}

const countOf = (outcomes: readonly InsertOutcome[], outcome: InsertOutcome): number =>
    outcomes.filter(o => o === outcome).length;

/**
 * Opens a store for the duration of `fn` and closes it on every exit path.
 */
export async function withRecordStore<T>(
    dbPath: string,
    fn: (store: RecordStore) => T | Promise<T>
): Promise<T> {
    const store = RecordStore.open(dbPath);
    try {
        return await fn(store);
    } finally {
        store.close();
    }
}
