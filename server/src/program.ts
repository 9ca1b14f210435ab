import { Command, Option } from 'commander';
import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { ReconcileSummary, TelemetryReading } from '../../types';
import { loadConfig, type AppConfig } from './config';
import { ConfigError, describeError } from './errors';
import { isValidTimeZone } from './services/timeNormalizer';
import { withRecordStore, type RecordStore } from './services/recordStore';
import { reconcileForecasts, reconcileObservations } from './services/reconciliationService';
import {
    feedEntrySchema,
    fetchRecentReadings,
    parseInstant,
    parseTelemetryFeed,
    toTelemetryReadings,
} from './services/telemetryService';

type Mode = 'actual' | 'forecast' | 'both';

type GlobalOptions = {
    db?: string;
    location?: string;
    timezone?: string;
};

type IngestOptions = {
    mode: Mode;
    observations?: string;
    forecasts?: string;
    telemetry?: string;
    telemetryUrl?: string;
};

export interface CliDependencies {
    print?: (line: string) => void;
    env?: Record<string, string | undefined>;
    now?: () => number;
}

const rowsSchema = z.array(z.array(z.string()));

const rowFileSchema = z.union([
    rowsSchema.transform(rows => ({ rows })),
    z.object({
        location: z.string().trim().min(1).optional(),
        scrape_time: z.string().optional(),
        reference_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
        rows: rowsSchema,
    }),
]);

type RowFile = z.infer<typeof rowFileSchema>;

const SEPARATOR = '='.repeat(70);

async function readJson(filePath: string): Promise<unknown> {
    const text = await readFile(filePath, 'utf-8');
    try {
        return JSON.parse(text);
    } catch (err) {
        throw new Error(`Failed to parse ${filePath}: ${describeError(err)}`);
    }
}

async function readRowFile(filePath: string): Promise<RowFile> {
    return rowFileSchema.parse(await readJson(filePath));
}

async function readTelemetryFile(filePath: string): Promise<TelemetryReading[]> {
    const json = await readJson(filePath);
    return Array.isArray(json)
        ? toTelemetryReadings(z.array(feedEntrySchema).parse(json))
        : parseTelemetryFeed(json);
}

function resolveConfig(options: GlobalOptions, deps: CliDependencies): AppConfig {
    const config = loadConfig(deps.env ?? process.env);
    if (options.timezone && !isValidTimeZone(options.timezone)) {
        throw new ConfigError(`--timezone '${options.timezone}' is not a known IANA zone`);
    }
    return {
        ...config,
        dbPath: options.db ?? config.dbPath,
        location: options.location ?? config.location,
        timeZone: options.timezone ?? config.timeZone,
    };
}

function scrapeTimeOf(file: RowFile, now: () => number): number {
    if ('scrape_time' in file && file.scrape_time !== undefined) {
        const parsed = parseInstant(file.scrape_time);
        if (parsed === null) {
            throw new Error(`scrape_time '${file.scrape_time}' is not an ISO-8601 timestamp`);
        }
        return parsed;
    }
    return now();
}

const locationOf = (file: RowFile, fallback: string): string =>
    ('location' in file && file.location) || fallback;

async function handleIngest(
    config: AppConfig,
    options: IngestOptions,
    deps: Required<CliDependencies>
): Promise<ReconcileSummary> {
    const { print, now } = deps;
    const wantsActual = options.mode === 'actual' || options.mode === 'both';
    const wantsForecast = options.mode === 'forecast' || options.mode === 'both';

    if (wantsActual && !options.observations) {
        throw new Error(`--observations <file> is required for mode '${options.mode}'`);
    }
    if (wantsForecast && !options.forecasts) {
        throw new Error(`--forecasts <file> is required for mode '${options.mode}'`);
    }

    print(SEPARATOR);
    print(`Weather Data Ingest - Mode: ${options.mode.toUpperCase()}`);
    print(SEPARATOR);

    return withRecordStore(config.dbPath, async (store: RecordStore) => {
        const context = { store, timeZone: config.timeZone };
        const totals: ReconcileSummary = { discarded: 0, inserted: 0, skipped: 0 };
        const add = (summary: ReconcileSummary) => {
            totals.discarded += summary.discarded;
            totals.inserted += summary.inserted;
            totals.skipped += summary.skipped;
        };

        if (wantsActual && options.observations) {
            print('\n[ACTUAL OBSERVATIONS]');
            const file = await readRowFile(options.observations);
            const readings = options.telemetry
                ? await readTelemetryFile(options.telemetry)
                : await fetchRecentReadings(
                    options.telemetryUrl ?? config.telemetryFeedUrl,
                    config.telemetryResults,
                    config.fetchTimeoutMs
                );
            print(`Telemetry readings: ${readings.length}`);

            const summary = reconcileObservations(context, {
                location: locationOf(file, config.location),
                scrapeTime: scrapeTimeOf(file, now),
                referenceDate: 'reference_date' in file ? file.reference_date : undefined,
                rows: file.rows,
            }, readings);
            print(`Added ${summary.inserted} new observations`);
            print(`Skipped ${summary.skipped} duplicates`);
            print(`Discarded ${summary.discarded} rows with unreadable time`);
            add(summary);
        }

        if (wantsForecast && options.forecasts) {
            print('\n[WEATHER FORECASTS]');
            const file = await readRowFile(options.forecasts);
            const summary = reconcileForecasts(context, {
                location: locationOf(file, config.location),
                scrapeTime: scrapeTimeOf(file, now),
                rows: file.rows,
            });
            print(`Added ${summary.inserted} new forecasts`);
            print(`Skipped ${summary.skipped} duplicates`);
            print(`Discarded ${summary.discarded} rows with unreadable time`);
            add(summary);
        }

        print(`\n${SEPARATOR}`);
        print('SUMMARY');
        print(SEPARATOR);
        print(`Database: ${config.dbPath}`);
        print(`Total observations: ${store.count('observation')}`);
        print(`Total forecasts: ${store.count('forecast')}`);
        print(`New records added: ${totals.inserted}`);
        print(`Duplicates skipped: ${totals.skipped}`);
        print(`Rows discarded: ${totals.discarded}`);
        return totals;
    });
}

async function handleStats(config: AppConfig, location: string | undefined, print: (line: string) => void) {
    await withRecordStore(config.dbPath, (store: RecordStore) => {
        const scope = location !== undefined ? ` (${location})` : '';
        print(`Database: ${config.dbPath}`);
        print(`Total observations${scope}: ${store.count('observation', location)}`);
        print(`Total forecasts${scope}: ${store.count('forecast', location)}`);
    });
}

export function createProgram(deps: CliDependencies = {}): Command {
    const resolved: Required<CliDependencies> = {
        print: deps.print ?? ((line: string) => console.log(line)),
        env: deps.env ?? process.env,
        now: deps.now ?? Date.now,
    };

    const program = new Command();
    program
        .name('weather-ingest')
        .description('Reconcile scraped weather tables and water-temperature telemetry into SQLite')
        .option('--db <path>', 'Database file path')
        .option('--location <code>', 'Location code used when a row file names none')
        .option('--timezone <zone>', 'IANA zone the table times are written in');

    program
        .command('ingest')
        .description('Normalize, match and store one batch of rows')
        .addOption(new Option('--mode <mode>', 'Which tables to ingest').choices(['actual', 'forecast', 'both']).default('actual'))
        .option('--observations <file>', 'JSON file with history table rows')
        .option('--forecasts <file>', 'JSON file with hourly forecast rows')
        .option('--telemetry <file>', 'JSON telemetry feed document')
        .option('--telemetry-url <url>', 'Telemetry feed URL (overrides TELEMETRY_FEED_URL)')
        .action(async (cmdOptions: IngestOptions) => {
            const config = resolveConfig(program.opts<GlobalOptions>(), resolved);
            await handleIngest(config, cmdOptions, resolved);
        });

    program
        .command('stats')
        .description('Print stored record counts')
        .action(async () => {
            const options = program.opts<GlobalOptions>();
            const config = resolveConfig(options, resolved);
            await handleStats(config, options.location, resolved.print);
        });

    return program;
}
