import type { Server } from 'node:http';
import { bootstrap } from '../../../libs/bootstrap/startup.js';
import { logger } from '../../../libs/logging/logger.js';
import { createWebhookApp } from '../../../libs/gateway/expressApp.js';

const SHUTDOWN_GRACE_MS = 10_000;

async function main(): Promise<void> {
    const runtime = bootstrap('provisioning-api');
    const { config } = runtime;

    const app = createWebhookApp(runtime.gateway, {
        path: config.webhook.path,
        bodyLimit: config.webhook.bodyLimit
    });

    const server: Server = await new Promise(resolve => {
        const listening = app.listen(config.port, () => resolve(listening));
    });

    logger.info({
        port: config.port,
        path: config.webhook.path,
        tokenRequired: config.webhook.tokenRequired
    }, 'Provisioning API listening');

    const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, 'Shutting down; draining in-flight requests');
        const forced = setTimeout(() => {
            logger.error('Shutdown grace period elapsed; exiting');
            process.exit(1);
        }, SHUTDOWN_GRACE_MS);
        forced.unref();

        server.close(err => {
            if (err) {
                logger.error({ error: err.message }, 'Server close failed');
                process.exit(1);
            }
            process.exit(0);
        });
    };

    process.once('SIGTERM', shutdown);
    process.once('SIGINT', shutdown);
}

main().catch(err => {
    logger.fatal(err);
    process.exit(1);
});
