import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { WebhookGateway, firstHeader } from './webhookGateway.js';

export interface WebhookAppOptions {
    readonly path: string;
    readonly bodyLimit: string;
}

/**
 * Express binding for the webhook gateway.
 *
 * The body is taken as raw text whatever the content type, so JSON errors
 * surface as MalformedPayload results instead of Express error pages.
 */
export function createWebhookApp(gateway: WebhookGateway, options: WebhookAppOptions): Express {
    const app = express();
    app.disable('x-powered-by');

    app.get('/healthz', (_req: Request, res: Response) => {
        res.status(200).json({ status: 'ok' });
    });

    app.post(
        options.path,
        express.text({ type: () => true, limit: options.bodyLimit }),
        async (req: Request, res: Response, next: NextFunction): Promise<void> => {
            const requestId = firstHeader(req.headers['x-request-id']) ?? crypto.randomUUID();
            res.setHeader('x-request-id', requestId);

            // Client went away before we answered: withdraw the invocation.
            const controller = new AbortController();
            res.on('close', () => {
                if (!res.writableFinished) {
                    controller.abort();
                }
            });

            try {
                const response = await gateway.handle({
                    headers: req.headers,
                    body: typeof req.body === 'string' ? req.body : undefined,
                    requestId,
                    signal: controller.signal
                });
                res.status(response.statusCode).json(response.body);
            } catch (error) {
                next(error);
            }
        }
    );

    // Body-parser rejections (oversized body, bad charset) and handler defects.
    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const status = statusOf(error);
        logger.error({ error: error instanceof Error ? error.message : String(error), status }, 'Webhook request rejected');
        res.status(status).json({
            Status: 'Failed',
            AccountName: '',
            Error: status < 500 ? 'MalformedPayload' : 'InternalError',
            ErrorDetails: status === 413 ? 'Request body too large' : 'Request could not be processed',
            Timestamp: new Date().toISOString()
        });
    });

    return app;
}

function statusOf(error: unknown): number {
    if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
        return error.status >= 400 && error.status < 500 ? error.status : 500;
    }
    return 500;
}
