/**
 * Webhook Gateway
 *
 * Entry point for workflow-engine deliveries. Checks the shared token,
 * parses the body, runs the provisioning workflow and maps the result to
 * an HTTP status. Transport-independent; see expressApp.ts for the
 * Express binding.
 */

import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { RequestContext } from '../context/requestContext.js';
import { ERROR_KIND_METADATA } from '../errors/errorKinds.js';
import { ErrorSanitizer, ProvisioningError } from '../errors/sanitizer.js';
import { CredentialSource } from '../secrets/credentialBroker.js';
import { ProvisioningWorkflow } from '../provisioning/workflow.js';
import { ProvisioningResult, failedResultFrom } from '../provisioning/result.js';
import { ProvisioningResponse, reportResult } from '../audit/reporter.js';
import { accountNameHint } from '../validation/schema.js';

export type HeaderValue = string | string[] | undefined;

export interface WebhookRequest {
    readonly headers: Readonly<Record<string, HeaderValue>>;
    /** Raw body text; undefined when the client sent none. */
    readonly body: string | undefined;
    readonly requestId?: string;
    readonly signal?: AbortSignal;
}

export interface WebhookResponse {
    readonly statusCode: number;
    readonly body: ProvisioningResponse;
}

export interface WebhookGatewayOptions {
    readonly tokenRequired: boolean;
    /** Lower-case header name carrying the shared token. */
    readonly tokenHeader: string;
}

export function statusCodeFor(result: ProvisioningResult): number {
    switch (result.status) {
        case 'Success':
            return 201;
        case 'AlreadyExists':
            return ERROR_KIND_METADATA.AlreadyExists.httpStatus;
        case 'Failed':
            return ERROR_KIND_METADATA[result.errorKind].httpStatus;
    }
}

/**
 * Constant-time comparison. Both sides are hashed first so that inputs of
 * different length take the same path.
 */
export function tokensMatch(provided: string, expected: string): boolean {
    const a = crypto.createHash('sha256').update(provided, 'utf8').digest();
    const b = crypto.createHash('sha256').update(expected, 'utf8').digest();
    return crypto.timingSafeEqual(a, b) && provided.length === expected.length;
}

export function firstHeader(value: HeaderValue): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

export class WebhookGateway {
    constructor(
        private readonly workflow: ProvisioningWorkflow,
        private readonly credentials: CredentialSource,
        private readonly options: WebhookGatewayOptions
    ) { }

    async handle(request: WebhookRequest): Promise<WebhookResponse> {
        const requestId = request.requestId ?? crypto.randomUUID();

        return RequestContext.run({ requestId, source: 'webhook' }, async () => {
            const result = await this.process(request);
            return { statusCode: statusCodeFor(result), body: reportResult(result) };
        });
    }

    private async process(request: WebhookRequest): Promise<ProvisioningResult> {
        if (this.options.tokenRequired) {
            const rejection = await this.authenticate(request);
            if (rejection) return rejection;
        }

        let payload: unknown;
        try {
            payload = JSON.parse(request.body ?? '');
        } catch (error: unknown) {
            return failedResultFrom(new ProvisioningError(
                'MalformedPayload',
                'Request body is not valid JSON',
                { parseError: error instanceof Error ? error.message : String(error) },
                { cause: error, step: 'Parse' }
            ));
        }

        const accountName = accountNameHint(payload);
        try {
            return await RequestContext.withAccount(accountName, () =>
                this.workflow.run(payload, request.signal ? { signal: request.signal } : {})
            );
        } catch (error: unknown) {
            // The workflow returns failures as results; anything thrown here is a defect.
            return failedResultFrom(ErrorSanitizer.sanitize(error, 'Validate'), accountName);
        }
    }

    private async authenticate(request: WebhookRequest): Promise<ProvisioningResult | undefined> {
        const provided = firstHeader(request.headers[this.options.tokenHeader]);

        let expected: string;
        try {
            expected = await this.credentials.fetchWebhookToken(request.signal);
        } catch (error: unknown) {
            return failedResultFrom(ErrorSanitizer.sanitize(error, 'Authenticate', 'CredentialUnavailable'));
        }

        if (!provided || !tokensMatch(provided, expected)) {
            logger.warn({ tokenPresent: !!provided }, 'Webhook token rejected');
            return failedResultFrom(new ProvisioningError(
                'Unauthorized',
                'Webhook token missing or invalid',
                undefined,
                { step: 'Authenticate' }
            ));
        }

        return undefined;
    }
}
