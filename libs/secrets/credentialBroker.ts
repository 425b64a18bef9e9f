/**
 * Credential Broker
 *
 * Sole reader of the secret store. Fetches the directory admin credential
 * fresh on every invocation and hands it out as an in-memory value only.
 */

import { inspect } from 'node:util';
import { logger } from '../logging/logger.js';
import { ProvisioningError } from '../errors/sanitizer.js';
import { toProvisioningError } from '../execution/failureClassifier.js';
import { withDeadline } from '../execution/deadline.js';
import { SecretStore } from './secretStore.js';

/**
 * Fixed secret names. An optional prefix namespaces them per deployment.
 */
export const SECRET_NAMES = {
    username: 'DomainAdminUsername',
    password: 'DomainAdminPassword',
    webhookToken: 'WebhookToken'
} as const;

/**
 * Directory admin identity for one invocation.
 * Serializes with the password masked so it cannot leak through logs.
 */
export class DirectoryCredential {
    constructor(
        public readonly username: string,
        public readonly password: string
    ) {
        Object.freeze(this);
    }

    toJSON(): Record<string, string> {
        return { username: this.username, password: '[REDACTED]' };
    }

    [inspect.custom](): string {
        return `DirectoryCredential(${this.username})`;
    }
}

/**
 * What the workflow and gateway need from the broker.
 */
export interface CredentialSource {
    fetchDirectoryCredential(signal?: AbortSignal): Promise<DirectoryCredential>;
    fetchWebhookToken(signal?: AbortSignal): Promise<string>;
}

export interface CredentialBrokerOptions {
    timeoutMs: number;
    namePrefix?: string;
}

export class CredentialBroker implements CredentialSource {
    constructor(
        private readonly store: SecretStore,
        private readonly options: CredentialBrokerOptions
    ) { }

    async fetchDirectoryCredential(signal?: AbortSignal): Promise<DirectoryCredential> {
        const username = await this.read(SECRET_NAMES.username, signal);
        const password = await this.read(SECRET_NAMES.password, signal);

        logger.debug({ username }, 'Directory credential retrieved');
        return new DirectoryCredential(username, password);
    }

    async fetchWebhookToken(signal?: AbortSignal): Promise<string> {
        return this.read(SECRET_NAMES.webhookToken, signal);
    }

    private async read(name: string, signal?: AbortSignal): Promise<string> {
        const secretId = `${this.options.namePrefix ?? ''}${name}`;

        let value: string | undefined;
        try {
            value = await withDeadline(
                `secret read ${secretId}`,
                this.options.timeoutMs,
                s => this.store.getSecret(secretId, s),
                signal
            );
        } catch (error: unknown) {
            throw toProvisioningError({ error, surface: 'secretStore', step: 'CredentialFetch' });
        }

        if (value === undefined || value.trim() === '') {
            throw new ProvisioningError(
                'CredentialUnavailable',
                `Secret ${secretId} is missing or empty`,
                { secretId },
                { step: 'CredentialFetch' }
            );
        }

        return value;
    }
}
