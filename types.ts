export type RecordKind = 'observation' | 'forecast';

export type InsertOutcome = 'inserted' | 'skipped';

/**
 * One row of column text as it came off a history or hourly-forecast table.
 * Rows may be short; missing trailing columns are treated as absent.
 */
export type RawRow = readonly string[];

/**
 * Represents a single hourly station observation, optionally enriched with
 * the closest river water-temperature reading.
 */
export interface Observation {
  location: string;
  observation_time: number; // UTC epoch ms
  scrape_time: number;

  temperature_f: number | null;
  dew_point_f: number | null;
  humidity_pct: number | null;
  wind_speed_mph: number | null;
  wind_direction: string | null;
  wind_gust_mph: number | null;
  pressure_in: number | null;
  precip_amount_in: number | null;
  condition: string | null;

  // Telemetry match (°C)
  water_temp_0_35m_c: number | null;
  water_temp_2m_c: number | null;
  water_temp_7m_c: number | null;
  water_temp_entry_id: number | null;
}

/**
 * Represents one forecast hour as published by one scrape run.
 * The same forecast hour scraped twice yields two records.
 */
export interface Forecast {
  location: string;
  forecast_time: number;
  scrape_time: number;

  temperature_f: number | null;
  feels_like_f: number | null;
  dew_point_f: number | null;
  humidity_pct: number | null;
  wind_speed_mph: number | null;
  wind_direction: string | null;
  pressure_in: number | null;
  precip_chance_pct: number | null;
  precip_amount_in: number | null;
  cloud_cover_pct: number | null;
  condition: string | null;
}

export interface StoredObservation extends Observation {
  id: number;
  created_at: string;
}

export interface StoredForecast extends Forecast {
  id: number;
  created_at: string;
}

/**
 * A water-temperature sample at three depths. Held in memory for matching only.
 */
export interface TelemetryReading {
  time: number;
  temp_0_35m: number | null;
  temp_2m: number | null;
  temp_7m: number | null;
  entry_id: number | null;
}

/**
 * Telemetry item in the shape the feed publishes it.
 */
export interface RawTelemetryReading {
  created_at: string;
  field1?: string | number | null;
  field2?: string | number | null;
  field3?: string | number | null;
  entry_id?: string | number | null;
}

export interface WindReading {
  speed: number | null;
  direction: string | null;
  gust: number | null;
}

export interface ReconcileSummary {
  discarded: number;
  inserted: number;
  skipped: number;
}
