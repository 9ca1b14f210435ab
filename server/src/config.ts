import {
    DEFAULT_DB_PATH,
    DEFAULT_FETCH_TIMEOUT_MS,
    DEFAULT_PORT,
    DEFAULT_TELEMETRY_RESULTS,
    LOCATION,
} from '../../constants';
import { ConfigError } from './errors';
import { isValidTimeZone } from './services/timeNormalizer';

export interface AppConfig {
    port: number;
    dbPath: string;
    location: string;
    timeZone: string;
    telemetryFeedUrl: string | undefined;
    telemetryResults: number;
    fetchTimeoutMs: number;
}

type Env = Record<string, string | undefined>;

function getEnvVar(env: Env, name: string, fallback?: string): string | undefined {
    const value = env[name];
    if (value && value.trim().length > 0) {
        return value.trim();
    }
    return fallback;
}

function getPositiveInt(env: Env, name: string, fallback: number): number {
    const raw = getEnvVar(env, name);
    if (!raw) {
        return fallback;
    }
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new ConfigError(`${name} must be a positive integer (got '${raw}')`);
    }
    return parsed;
}

/**
 * Reads settings from the environment (`.env` is loaded by the entry points).
 */
export function loadConfig(env: Env = process.env): AppConfig {
    const timeZone = getEnvVar(env, 'TIMEZONE', LOCATION.timeZone) ?? LOCATION.timeZone;
    if (!isValidTimeZone(timeZone)) {
        throw new ConfigError(`TIMEZONE '${timeZone}' is not a known IANA zone`);
    }

    const telemetryFeedUrl = getEnvVar(env, 'TELEMETRY_FEED_URL');
    if (telemetryFeedUrl && !URL.canParse(telemetryFeedUrl)) {
        throw new ConfigError(`TELEMETRY_FEED_URL '${telemetryFeedUrl}' is not a valid URL`);
    }

    return {
        port: getPositiveInt(env, 'PORT', DEFAULT_PORT),
        dbPath: getEnvVar(env, 'DB_PATH', DEFAULT_DB_PATH) ?? DEFAULT_DB_PATH,
        location: getEnvVar(env, 'LOCATION', LOCATION.name) ?? LOCATION.name,
        timeZone,
        telemetryFeedUrl,
        telemetryResults: getPositiveInt(env, 'TELEMETRY_RESULTS', DEFAULT_TELEMETRY_RESULTS),
        fetchTimeoutMs: getPositiveInt(env, 'FETCH_TIMEOUT_MS', DEFAULT_FETCH_TIMEOUT_MS),
    };
}
