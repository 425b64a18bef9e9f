/**
 * Provisioning error kinds.
 *
 * Every failed invocation is tagged with exactly one kind. The kind decides
 * the HTTP status the gateway answers with and whether the caller may
 * safely redeliver.
 */
export type ErrorKind =
    | 'ValidationError'        // Missing/blank required field, no remote calls made
    | 'MalformedPayload'       // Body is not JSON
    | 'Unauthorized'           // Webhook token mismatch
    | 'CredentialUnavailable'  // Secret store unreachable, denied or secret missing
    | 'DirectoryUnreachable'   // Network or bind failure against the DC
    | 'AlreadyExists'          // Terminal, success-adjacent
    | 'PermissionDenied'       // Directory refused the operation
    | 'InvalidParameter'       // Directory refused the attribute set
    | 'VerificationFailed'     // Read-back after create found nothing
    | 'RootKeyPending'         // KDS root key not yet effective (deferred policy)
    | 'Cancelled'              // Caller withdrew before Create
    | 'InternalError';         // Unclassified

export const ERROR_KINDS: readonly ErrorKind[] = [
    'ValidationError',
    'MalformedPayload',
    'Unauthorized',
    'CredentialUnavailable',
    'DirectoryUnreachable',
    'AlreadyExists',
    'PermissionDenied',
    'InvalidParameter',
    'VerificationFailed',
    'RootKeyPending',
    'Cancelled',
    'InternalError'
];

export interface ErrorKindMetadata {
    /** HTTP status returned by the webhook gateway */
    readonly httpStatus: number;
    /** Whether redelivering the same request may produce a different outcome */
    readonly redeliverable: boolean;
    /** Human-readable summary used in reports */
    readonly summary: string;
}

export const ERROR_KIND_METADATA: Readonly<Record<ErrorKind, ErrorKindMetadata>> = {
    ValidationError: {
        httpStatus: 400,
        redeliverable: false,
        summary: 'Request is missing a required field'
    },
    MalformedPayload: {
        httpStatus: 400,
        redeliverable: false,
        summary: 'Request body is not valid JSON'
    },
    Unauthorized: {
        httpStatus: 401,
        redeliverable: false,
        summary: 'Webhook token did not match'
    },
    CredentialUnavailable: {
        httpStatus: 503,
        redeliverable: true,
        summary: 'Directory credentials could not be retrieved'
    },
    DirectoryUnreachable: {
        httpStatus: 502,
        redeliverable: true,
        summary: 'Directory server could not be reached'
    },
    AlreadyExists: {
        httpStatus: 200,
        redeliverable: false,
        summary: 'Account already exists'
    },
    PermissionDenied: {
        httpStatus: 403,
        redeliverable: false,
        summary: 'Directory denied the operation'
    },
    InvalidParameter: {
        httpStatus: 422,
        redeliverable: false,
        summary: 'Directory rejected the account parameters'
    },
    VerificationFailed: {
        httpStatus: 500,
        redeliverable: true,
        summary: 'Created account could not be read back'
    },
    RootKeyPending: {
        httpStatus: 409,
        redeliverable: true,
        summary: 'KDS root key is not yet effective'
    },
    Cancelled: {
        httpStatus: 499,
        redeliverable: true,
        summary: 'Request was cancelled before the account was created'
    },
    InternalError: {
        httpStatus: 500,
        redeliverable: true,
        summary: 'Unexpected internal error'
    }
};

export function isErrorKind(value: unknown): value is ErrorKind {
    return typeof value === 'string' && ERROR_KINDS.some(kind => kind === value);
}
