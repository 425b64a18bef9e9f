import { logger } from '../logging/logger.js';
import crypto from 'crypto';
import { ErrorKind } from './errorKinds.js';

/**
 * Workflow steps an error can be attributed to.
 */
export type WorkflowStep =
    | 'Authenticate'
    | 'Parse'
    | 'Validate'
    | 'CredentialFetch'
    | 'ExistenceCheck'
    | 'RootKeyEnsure'
    | 'Create'
    | 'Verify';

/**
 * Typed provisioning failure.
 * Carries a unique IncidentID for log correlation; internal details are
 * logged once here and never returned to the caller.
 */
export class ProvisioningError extends Error {
    public readonly incidentId: string;
    public readonly timestamp: string;
    public readonly step?: WorkflowStep;
    public readonly code?: string | number;
    public override cause?: unknown;

    constructor(
        public readonly kind: ErrorKind,
        public readonly publicMessage: string,
        public readonly internalDetails?: unknown,
        options?: { cause?: unknown; step?: WorkflowStep; code?: string | number }
    ) {
        super(publicMessage);
        this.name = 'ProvisioningError';
        this.incidentId = crypto.randomUUID();
        this.timestamp = new Date().toISOString();
        this.step = options?.step;
        this.code = options?.code;
        this.cause = options?.cause;

        const payload = {
            incidentId: this.incidentId,
            kind,
            step: this.step,
            code: this.code,
            internalDetails
        };
        if (kind === 'AlreadyExists') {
            logger.info(payload, publicMessage);
        } else {
            logger.warn(payload, publicMessage);
        }
    }
}

/**
 * Remove credentials that may appear in third-party error messages.
 */
export function redactMessage(message: string): string {
    return message
        .replace(/password[=:]\s*\S+/gi, 'password=[REDACTED]')
        .replace(/token[=:]\s*\S+/gi, 'token=[REDACTED]')
        .replace(/secret[=:]\s*\S+/gi, 'secret=[REDACTED]')
        .substring(0, 500);
}

export function messageOf(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    if (err && typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
        return err.message;
    }
    return String(err);
}

export const ErrorSanitizer = {
    /**
     * Wraps any error into a ProvisioningError of the given fallback kind.
     * An existing ProvisioningError passes through unchanged.
     */
    sanitize: (err: unknown, step: WorkflowStep, fallbackKind: ErrorKind = 'InternalError'): ProvisioningError => {
        if (err instanceof ProvisioningError) return err;

        const originalMessage = messageOf(err);
        const stack = err instanceof Error ? err.stack : undefined;

        return new ProvisioningError(
            fallbackKind,
            redactMessage(originalMessage),
            { originalError: redactMessage(originalMessage), stack, step },
            { cause: err, step }
        );
    }
};
