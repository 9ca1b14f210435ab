import cors from 'cors';
import express, { type Response } from 'express';
import { z, ZodError } from 'zod';
import { DEFAULT_HISTORY_LIMIT } from '../../constants';
import type { AppConfig } from './config';
import { describeError, StoreUnavailableError } from './errors';
import { createLog } from './logger';
import type { RecordStore } from './services/recordStore';
import { reconcileForecasts, reconcileObservations } from './services/reconciliationService';
import { feedEntrySchema, fetchRecentReadings, parseInstant, toTelemetryReadings } from './services/telemetryService';

const log = createLog('SERVER');

const rowsSchema = z.array(z.array(z.string()));

const scrapeTimeSchema = z
    .string()
    .refine(value => parseInstant(value) !== null, { message: 'scrape_time must be an ISO-8601 timestamp' });

const observationIngestSchema = z.object({
    location: z.string().trim().min(1).optional(),
    scrape_time: scrapeTimeSchema.optional(),
    reference_date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'reference_date must be YYYY-MM-DD').optional(),
    rows: rowsSchema,
    telemetry: z.array(feedEntrySchema).optional(),
});

const forecastIngestSchema = z.object({
    location: z.string().trim().min(1).optional(),
    scrape_time: scrapeTimeSchema.optional(),
    rows: rowsSchema,
});

const listQuerySchema = z.object({
    location: z.string().trim().min(1).optional(),
    limit: z.coerce.number().int().positive().default(DEFAULT_HISTORY_LIMIT),
});

const resolveScrapeTime = (text: string | undefined): number =>
    (text !== undefined ? parseInstant(text) : null) ?? Date.now();

const sendError = (res: Response, e: unknown) => {
    if (e instanceof ZodError) {
        res.status(400).json({ error: 'Invalid request', issues: e.issues });
        return;
    }
    if (e instanceof StoreUnavailableError) {
        log(`Store unavailable: ${e.message}`);
        res.status(503).json({ error: e.message });
        return;
    }
    log(`Request failed: ${describeError(e)}`);
    res.status(500).json({ error: describeError(e) });
};

/**
 * HTTP surface for a harness that scrapes tables elsewhere and posts the rows
 * here, plus read endpoints over the stored history.
 */
export function createApp(store: RecordStore, config: AppConfig) {
    const app = express();
    app.use(cors());
    app.use(express.json({ limit: '5mb' }));

    const context = { store, timeZone: config.timeZone };

    app.get('/api/status', (req, res) => {
        try {
            res.json({
                status: 'online',
                observations: store.count('observation'),
                forecasts: store.count('forecast'),
                server_time: Date.now(),
            });
        } catch (e) {
            sendError(res, e);
        }
    });

    app.get('/api/observations', (req, res) => {
        try {
            const query = listQuerySchema.parse(req.query);
            res.json(store.recentObservations(query.location, query.limit));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.get('/api/forecasts', (req, res) => {
        try {
            const query = listQuerySchema.parse(req.query);
            res.json(store.recentForecasts(query.location, query.limit));
        } catch (e) {
            sendError(res, e);
        }
    });

    app.post('/api/observations/ingest', async (req, res) => {
        try {
            const body = observationIngestSchema.parse(req.body);
            const readings = body.telemetry
                ? toTelemetryReadings(body.telemetry)
                : await fetchRecentReadings(config.telemetryFeedUrl, config.telemetryResults, config.fetchTimeoutMs);

            const summary = reconcileObservations(context, {
                location: body.location ?? config.location,
                scrapeTime: resolveScrapeTime(body.scrape_time),
                referenceDate: body.reference_date,
                rows: body.rows,
            }, readings);
            res.json(summary);
        } catch (e) {
            sendError(res, e);
        }
    });

    app.post('/api/forecasts/ingest', (req, res) => {
        try {
            const body = forecastIngestSchema.parse(req.body);
            const summary = reconcileForecasts(context, {
                location: body.location ?? config.location,
                scrapeTime: resolveScrapeTime(body.scrape_time),
                rows: body.rows,
            });
            res.json(summary);
        } catch (e) {
            sendError(res, e);
        }
    });

    return app;
}
