/**
 * Centralized Redaction Configuration
 * Defines keys that must be redacted from logs to prevent credential leakage.
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'password', '*.password',
    'secret', '*.secret',
    'secretValue', '*.secretValue',
    'credential', '*.credential',
    'apiKey', '*.apiKey',

    // Inbound webhook headers
    'headers["x-webhook-token"]', '*.headers["x-webhook-token"]',
    'req.headers.authorization',

    // Directory bind material
    'bindPassword', '*.bindPassword',
    'DomainAdminPassword', '*.DomainAdminPassword',
    'WebhookToken', '*.WebhookToken'
];

export const REDACT_CENSOR = '[REDACTED]';
