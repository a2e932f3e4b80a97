// src/server.ts

import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config/config';
import { errorMessage } from './lib/errors';
import { createLogger } from './lib/logger';
import { createRuntime } from './runtime';

async function main(): Promise<void> {
    const config = loadConfig();
    const runtime = await createRuntime(config);
    const app = createApp(runtime);

    app.listen(config.port, () => {
        runtime.logger.info(
            `Slot negotiation engine running on port ${config.port} ` +
            `(${config.numStations} stations, ${config.numSlots} slots)`
        );
    });
}

if (require.main === module) {
    main().catch((err: unknown) => {
        createLogger('server').error(errorMessage(err));
        process.exit(1);
    });
}
