// Default station: London City Airport (EGLC)
export const LOCATION = {
  name: 'EGLC',
  timeZone: 'Europe/London',
};

export const DEFAULT_DB_PATH = 'data/weather_data.db';
export const DEFAULT_PORT = 3001;
export const DEFAULT_TELEMETRY_RESULTS = 300; // ~25 hours of feed entries
export const DEFAULT_FETCH_TIMEOUT_MS = 15000;
export const DEFAULT_HISTORY_LIMIT = 24;

// Hourly forecast listings are read one day ahead; later rows are discarded.
export const FORECAST_HOURS = 24;

// Unit literals that may trail a wind speed. Never a compass direction.
export const WIND_UNITS = ['mph', 'km/h', 'kph', 'kt', 'kts', 'm/s'];

// Placeholders the source tables print for a missing measurement.
export const MISSING_VALUE_MARKERS = ['', 'N/A', 'n/a', '--', '-'];

/**
 * Column positions of the daily history table (hourly observations).
 */
export const OBSERVATION_COLUMNS = {
  time: 0,
  temperature: 1,
  dew_point: 2,
  humidity: 3,
  wind_direction: 4,
  wind_speed: 5,
  wind_gust: 6,
  pressure: 7,
  precip_amount: 8,
  condition: 9,
} as const;

/**
 * Column positions of the hourly forecast table.
 */
export const FORECAST_COLUMNS = {
  time: 0,
  condition: 1,
  temperature: 2,
  feels_like: 3,
  precip_chance: 4,
  precip_amount: 5,
  cloud_cover: 6,
  dew_point: 7,
  humidity: 8,
  wind: 9,
  pressure: 10,
} as const;
