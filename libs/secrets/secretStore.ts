import {
    SecretsManagerClient,
    GetSecretValueCommand,
    ResourceNotFoundException
} from '@aws-sdk/client-secrets-manager';
import { logger } from '../logging/logger.js';

/**
 * Read-only view of the secret store.
 * Returns undefined when the secret does not exist; throws on any other
 * failure (unreachable, access denied, deadline).
 */
export interface SecretStore {
    getSecret(name: string, signal: AbortSignal): Promise<string | undefined>;
}

export interface AwsSecretStoreOptions {
    region?: string;
    endpoint?: string;
}

/**
 * AWS Secrets Manager backed store.
 *
 * No credentials are passed to the client: the SDK default provider chain
 * resolves the host's own role (instance profile, task role, IRSA).
 */
export class AwsSecretsManagerStore implements SecretStore {
    private readonly client: SecretsManagerClient;

    constructor(options: AwsSecretStoreOptions = {}, client?: SecretsManagerClient) {
        this.client = client ?? new SecretsManagerClient({
            ...(options.region ? { region: options.region } : {}),
            ...(options.endpoint ? { endpoint: options.endpoint } : {})
        });
    }

    async getSecret(name: string, signal: AbortSignal): Promise<string | undefined> {
        try {
            const response = await this.client.send(
                new GetSecretValueCommand({ SecretId: name }),
                { abortSignal: signal }
            );

            if (response.SecretString !== undefined) {
                return response.SecretString;
            }
            if (response.SecretBinary) {
                return Buffer.from(response.SecretBinary).toString('utf8');
            }
            return undefined;
        } catch (error: unknown) {
            if (error instanceof ResourceNotFoundException) {
                return undefined;
            }
            logger.error({
                secretName: name,
                errorName: error instanceof Error ? error.name : undefined,
                error: error instanceof Error ? error.message : String(error)
            }, 'Secret store read failed');
            throw error;
        }
    }
}

/**
 * Process-local store for tests and local runs.
 */
export class InMemorySecretStore implements SecretStore {
    private readonly secrets: Map<string, string>;
    public reads = 0;

    constructor(secrets: Record<string, string> = {}) {
        this.secrets = new Map(Object.entries(secrets));
    }

    set(name: string, value: string): void {
        this.secrets.set(name, value);
    }

    async getSecret(name: string, signal: AbortSignal): Promise<string | undefined> {
        this.reads++;
        await Promise.resolve();
        if (signal.aborted) {
            throw signal.reason instanceof Error ? signal.reason : new Error('aborted');
        }
        return this.secrets.get(name);
    }
}
