/**
 * Failure Classifier
 *
 * Deterministic mapping from errors raised by the secret store or the
 * directory server to a provisioning error kind.
 */

import { logger } from '../logging/logger.js';
import { ErrorKind } from '../errors/errorKinds.js';
import { ProvisioningError, WorkflowStep, messageOf, redactMessage } from '../errors/sanitizer.js';
import { CancelledError, DeadlineExceededError } from './deadline.js';

/**
 * Which remote collaborator raised the error.
 */
export type RemoteSurface = 'secretStore' | 'directory';

/**
 * LDAP result codes (RFC 4511 §4.1.9) the directory may return.
 */
const LDAP_RESULT_CODE_KINDS: Readonly<Record<number, ErrorKind>> = {
    17: 'InvalidParameter',      // undefinedAttributeType
    19: 'InvalidParameter',      // constraintViolation
    21: 'InvalidParameter',      // invalidAttributeSyntax
    32: 'InvalidParameter',      // noSuchObject (missing OU)
    34: 'InvalidParameter',      // invalidDNSyntax
    49: 'DirectoryUnreachable',  // invalidCredentials
    50: 'PermissionDenied',      // insufficientAccessRights
    51: 'DirectoryUnreachable',  // busy
    52: 'DirectoryUnreachable',  // unavailable
    53: 'InvalidParameter',      // unwillingToPerform
    64: 'InvalidParameter',      // namingViolation
    65: 'InvalidParameter',      // objectClassViolation
    68: 'AlreadyExists',         // entryAlreadyExists
    81: 'DirectoryUnreachable'   // serverDown
};

interface ErrorPattern {
    readonly patterns: readonly (string | RegExp)[];
    readonly kind: ErrorKind;
}

/**
 * Known error patterns mapped to kinds.
 * Order matters: first match wins.
 */
const DIRECTORY_ERROR_PATTERNS: readonly ErrorPattern[] = [
    {
        patterns: ['ENTRY_EXISTS', 'ALREADY EXISTS', 'EntryAlreadyExists'],
        kind: 'AlreadyExists'
    },
    {
        patterns: ['INSUFFICIENT_ACCESS', 'InsufficientAccess', 'ACCESS_DENIED', /access\s+(is\s+)?denied/i],
        kind: 'PermissionDenied'
    },
    {
        patterns: ['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EHOSTUNREACH', 'EPIPE', /connection.*(closed|lost)/i, /timed?\s*out/i],
        kind: 'DirectoryUnreachable'
    },
    {
        patterns: ['ConstraintViolation', 'InvalidAttributeSyntax', 'ObjectClassViolation', 'NoSuchObject', 'InvalidDNSyntax'],
        kind: 'InvalidParameter'
    }
];

const SURFACE_DEFAULT_KIND: Readonly<Record<RemoteSurface, ErrorKind>> = {
    secretStore: 'CredentialUnavailable',
    directory: 'DirectoryUnreachable'
};

/**
 * Context for failure classification.
 */
export interface ClassificationContext {
    readonly error: unknown;
    readonly surface: RemoteSurface;
    readonly step: WorkflowStep;
}

function errorCodeOf(err: unknown): string | number | undefined {
    if (err && typeof err === 'object' && 'code' in err) {
        const { code } = err;
        if (typeof code === 'string' || typeof code === 'number') return code;
    }
    return undefined;
}

function errorNameOf(err: unknown): string | undefined {
    return err instanceof Error ? err.name : undefined;
}

function matchPattern(value: string): ErrorKind | undefined {
    const upper = value.toUpperCase();
    const matched = DIRECTORY_ERROR_PATTERNS.find(pattern =>
        pattern.patterns.some(p =>
            typeof p === 'string' ? upper.includes(p.toUpperCase()) : p.test(value)
        )
    );
    return matched?.kind;
}

/**
 * Classify a remote failure into an error kind.
 *
 * Classification is based on, in order:
 * 1. An already-typed ProvisioningError
 * 2. Cancellation and deadline errors
 * 3. Numeric LDAP result codes
 * 4. Error code, name and message patterns (directory only)
 * 5. The surface default
 */
export function classifyFailure(context: ClassificationContext): ErrorKind {
    const { error, surface, step } = context;

    if (error instanceof ProvisioningError) return error.kind;
    if (error instanceof CancelledError) return 'Cancelled';
    if (error instanceof DeadlineExceededError) return SURFACE_DEFAULT_KIND[surface];

    let kind: ErrorKind | undefined;

    if (surface === 'directory') {
        const code = errorCodeOf(error);
        if (typeof code === 'number') {
            kind = LDAP_RESULT_CODE_KINDS[code];
        } else if (typeof code === 'string') {
            kind = matchPattern(code);
        }

        if (!kind) {
            const name = errorNameOf(error);
            kind = name ? matchPattern(name) : undefined;
        }

        if (!kind) {
            kind = matchPattern(messageOf(error));
        }
    }

    const resolved = kind ?? SURFACE_DEFAULT_KIND[surface];

    logger.debug({ step, surface, kind: resolved, code: errorCodeOf(error) }, 'Failure classified');

    return resolved;
}

/**
 * Classify and wrap a remote failure in one go.
 */
export function toProvisioningError(context: ClassificationContext): ProvisioningError {
    const { error, step } = context;
    if (error instanceof ProvisioningError) return error;

    const kind = classifyFailure(context);
    const message = redactMessage(messageOf(error));

    return new ProvisioningError(
        kind,
        message,
        { surface: context.surface, stack: error instanceof Error ? error.stack : undefined },
        { cause: error, step, code: errorCodeOf(error) }
    );
}
