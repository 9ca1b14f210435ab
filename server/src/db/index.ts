import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { StoreUnavailableError } from '../errors';
import { createLog } from '../logger';

const log = createLog('DB');

export const MEMORY_DB = ':memory:';

/**
 * Opens (creating if needed) the SQLite file at `dbPath` and establishes the
 * schema. Every failure surfaces as StoreUnavailableError.
 */
export const openDatabase = (dbPath: string): Database.Database => {
    let db: Database.Database | undefined;
    try {
        if (dbPath !== MEMORY_DB) {
            fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
        }
        db = new Database(dbPath);
        if (dbPath !== MEMORY_DB) {
            // Enable WAL mode for better concurrency
            db.pragma('journal_mode = WAL');
        }
        initDB(db);
        return db;
    } catch (e) {
        db?.close();
        throw new StoreUnavailableError(`Cannot open database at ${dbPath}`, e);
    }
};

export const initDB = (db: Database.Database) => {
    db.exec(`
        CREATE TABLE IF NOT EXISTS observations (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            location TEXT NOT NULL,
            observation_time INTEGER NOT NULL,
            scrape_time INTEGER NOT NULL,
            temperature_f REAL,
            dew_point_f REAL,
            humidity_pct INTEGER,
            wind_speed_mph REAL,
            wind_direction TEXT,
            wind_gust_mph REAL,
            pressure_in REAL,
            precip_amount_in REAL,
            condition TEXT,
            water_temp_0_35m_c REAL,
            water_temp_2m_c REAL,
            water_temp_7m_c REAL,
            water_temp_entry_id INTEGER,
            created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
            UNIQUE (location, observation_time)
        );
        CREATE INDEX IF NOT EXISTS idx_observations_time ON observations(observation_time);
        CREATE INDEX IF NOT EXISTS idx_observations_location ON observations(location);

        CREATE TABLE IF NOT EXISTS forecasts (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            location TEXT NOT NULL,
            forecast_time INTEGER NOT NULL,
            scrape_time INTEGER NOT NULL,
            temperature_f REAL,
            feels_like_f REAL,
            dew_point_f REAL,
            humidity_pct INTEGER,
            wind_speed_mph REAL,
            wind_direction TEXT,
            pressure_in REAL,
            precip_chance_pct INTEGER,
            precip_amount_in REAL,
            cloud_cover_pct INTEGER,
            condition TEXT,
            created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
            UNIQUE (location, forecast_time, scrape_time)
        );
        CREATE INDEX IF NOT EXISTS idx_forecasts_time ON forecasts(forecast_time);
        CREATE INDEX IF NOT EXISTS idx_forecasts_scrape_time ON forecasts(scrape_time);
        CREATE INDEX IF NOT EXISTS idx_forecasts_location ON forecasts(location);
    `);
    log('Schema ready (observations, forecasts)');
};
