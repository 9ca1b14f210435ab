import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { describeError } from './errors';
import { createLog } from './logger';
import { RecordStore } from './services/recordStore';

const log = createLog('SERVER');

function main() {
    const config = loadConfig();
    const store = RecordStore.open(config.dbPath);
    log(`Database: ${config.dbPath} (${store.count('observation')} observations, ${store.count('forecast')} forecasts)`);

    const app = createApp(store, config);
    const server = app.listen(config.port, () => {
        log(`Running on http://localhost:${config.port}`);
    });

    const shutdown = () => {
        log('Shutting down...');
        server.close(() => {
            store.close();
        });
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

try {
    main();
} catch (e) {
    console.error(`[SERVER] Startup failed: ${describeError(e)}`);
    process.exitCode = 1;
}
