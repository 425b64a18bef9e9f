import { z } from 'zod';
import { Env, GuardRule } from '../config-guard.js';
import { createValidator } from '../../validation/zod-middleware.js';

const booleanFlag = (fallback: boolean) =>
    z.preprocess(
        value => (typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() : undefined),
        z.enum(['true', 'false', '1', '0', 'yes', 'no']).optional()
    ).transform(value => (value === undefined ? fallback : ['true', '1', 'yes'].includes(value)));

// An empty variable (`FOO=`) counts as unset so the default applies.
const blankToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const positiveInt = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
    z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));

/**
 * Root key policy.
 * - deferred: create a future-effective key and stop until it propagates
 * - immediate: create a back-dated key and continue (lab use only)
 */
export const RootKeyPolicySchema = z.enum(['deferred', 'immediate']);
export type RootKeyPolicy = z.infer<typeof RootKeyPolicySchema>;

export const ProvisioningConfigSchema = z.object({
    NODE_ENV: z.string().default('development'),
    PORT: positiveInt(8080),
    WEBHOOK_PATH: z.string().startsWith('/').default('/webhooks/gmsa'),
    WEBHOOK_BODY_LIMIT: z.string().default('64kb'),
    WEBHOOK_TOKEN_REQUIRED: booleanFlag(false),
    WEBHOOK_TOKEN_HEADER: z.string().default('x-webhook-token').transform(h => h.toLowerCase()),
    SECRET_STORE_BACKEND: z.enum(['aws', 'memory']).default('aws'),
    SECRET_STORE_REGION: z.string().optional(),
    SECRET_STORE_ENDPOINT: z.string().url().optional(),
    SECRET_NAME_PREFIX: z.string().default(''),
    DIRECTORY_BACKEND: z.enum(['ldap', 'memory']).default('ldap'),
    DIRECTORY_URL: z.string().regex(/^ldaps?:\/\//, 'DIRECTORY_URL must be an ldap:// or ldaps:// URL').optional(),
    DIRECTORY_TLS_VERIFY: booleanFlag(true),
    REMOTE_CALL_TIMEOUT_MS: positiveInt(30_000),
    VERIFY_SETTLE_MS: nonNegativeInt(2_000),
    ROOT_KEY_POLICY: RootKeyPolicySchema.default('deferred'),
    ROOT_KEY_PROPAGATION_HOURS: nonNegativeInt(10)
});

export interface ProvisioningConfig {
    readonly environment: string;
    readonly port: number;
    readonly webhook: {
        readonly path: string;
        readonly bodyLimit: string;
        readonly tokenRequired: boolean;
        readonly tokenHeader: string;
    };
    readonly secretStore: {
        readonly backend: 'aws' | 'memory';
        readonly region?: string;
        readonly endpoint?: string;
        readonly namePrefix: string;
    };
    readonly directory: {
        readonly backend: 'ldap' | 'memory';
        readonly url?: string;
        readonly tlsVerify: boolean;
    };
    readonly workflow: {
        readonly remoteCallTimeoutMs: number;
        readonly verifySettleMs: number;
        readonly rootKeyPolicy: RootKeyPolicy;
        readonly rootKeyPropagationHours: number;
    };
}

const validateConfig = createValidator(ProvisioningConfigSchema);

/**
 * Parses the environment into a typed configuration.
 * Throws a ValidationError listing every invalid variable.
 */
export function loadProvisioningConfig(env: Env = process.env): ProvisioningConfig {
    const raw = validateConfig(env, 'Config:Environment');

    return {
        environment: raw.NODE_ENV,
        port: raw.PORT,
        webhook: {
            path: raw.WEBHOOK_PATH,
            bodyLimit: raw.WEBHOOK_BODY_LIMIT,
            tokenRequired: raw.WEBHOOK_TOKEN_REQUIRED,
            tokenHeader: raw.WEBHOOK_TOKEN_HEADER
        },
        secretStore: {
            backend: raw.SECRET_STORE_BACKEND,
            ...(raw.SECRET_STORE_REGION ? { region: raw.SECRET_STORE_REGION } : {}),
            ...(raw.SECRET_STORE_ENDPOINT ? { endpoint: raw.SECRET_STORE_ENDPOINT } : {}),
            namePrefix: raw.SECRET_NAME_PREFIX
        },
        directory: {
            backend: raw.DIRECTORY_BACKEND,
            ...(raw.DIRECTORY_URL ? { url: raw.DIRECTORY_URL } : {}),
            tlsVerify: raw.DIRECTORY_TLS_VERIFY
        },
        workflow: {
            remoteCallTimeoutMs: raw.REMOTE_CALL_TIMEOUT_MS,
            verifySettleMs: raw.VERIFY_SETTLE_MS,
            rootKeyPolicy: raw.ROOT_KEY_POLICY,
            rootKeyPropagationHours: raw.ROOT_KEY_PROPAGATION_HOURS
        }
    };
}

const isProduction = (env: Env) => env.NODE_ENV === 'production';

/**
 * Startup guards for the provisioning service.
 */
export const PROVISIONING_CONFIG_GUARDS: GuardRule[] = [
    {
        type: 'assert',
        check: env => env.DIRECTORY_BACKEND === 'memory' || !!env.DIRECTORY_URL?.trim(),
        message: 'DIRECTORY_URL is required when DIRECTORY_BACKEND is ldap'
    },
    {
        type: 'forbidIf',
        name: 'MemoryDirectory',
        when: env => isProduction(env) && env.DIRECTORY_BACKEND === 'memory',
        message: 'The in-memory directory must never run in production'
    },
    {
        type: 'forbidIf',
        name: 'MemorySecretStore',
        when: env => isProduction(env) && env.SECRET_STORE_BACKEND === 'memory',
        message: 'The in-memory secret store must never run in production'
    },
    {
        type: 'forbidIf',
        name: 'PlaintextLdap',
        when: env => isProduction(env) && (env.DIRECTORY_URL ?? '').startsWith('ldap://'),
        message: 'Production directory traffic must use ldaps://'
    },
    {
        type: 'forbidIf',
        name: 'StaticAwsKeys',
        when: env => !!env.AWS_SECRET_ACCESS_KEY && isProduction(env),
        message: 'Static secret-store keys are not allowed; use the host identity'
    }
];
