/**
 * Unit Tests: Credential Broker and secret stores
 *
 * @see libs/secrets/credentialBroker.ts
 * @see libs/secrets/secretStore.ts
 */

import { describe, it, mock } from 'node:test';
import assert from 'node:assert';
import { inspect } from 'node:util';
import {
    GetSecretValueCommand,
    ResourceNotFoundException,
    SecretsManagerClient
} from '@aws-sdk/client-secrets-manager';
import { CredentialBroker, DirectoryCredential } from '../../libs/secrets/credentialBroker.js';
import { AwsSecretsManagerStore, InMemorySecretStore, SecretStore } from '../../libs/secrets/secretStore.js';
import { ProvisioningError } from '../../libs/errors/sanitizer.js';

const SEEDED = {
    DomainAdminUsername: 'CONTOSO\\svc-provisioner',
    DomainAdminPassword: 'test-secret',
    WebhookToken: 'test-token'
};

function isKind(kind: string) {
    return (err: unknown) => {
        assert.ok(err instanceof ProvisioningError);
        assert.strictEqual(err.kind, kind);
        assert.strictEqual(err.step, 'CredentialFetch');
        return true;
    };
}

describe('CredentialBroker', () => {
    it('reads username and password on every call', async () => {
        const store = new InMemorySecretStore(SEEDED);
        const broker = new CredentialBroker(store, { timeoutMs: 1000 });

        const first = await broker.fetchDirectoryCredential();
        await broker.fetchDirectoryCredential();

        assert.strictEqual(first.username, 'CONTOSO\\svc-provisioner');
        assert.strictEqual(first.password, 'test-secret');
        assert.strictEqual(store.reads, 4);
    });

    it('applies the name prefix', async () => {
        const store = new InMemorySecretStore({ 'gmsa/WebhookToken': 'test-token' });
        const broker = new CredentialBroker(store, { timeoutMs: 1000, namePrefix: 'gmsa/' });

        assert.strictEqual(await broker.fetchWebhookToken(), 'test-token');
    });

    it('fails with CredentialUnavailable when a secret is missing', async () => {
        const store = new InMemorySecretStore({ DomainAdminUsername: 'CONTOSO\\svc-provisioner' });
        const broker = new CredentialBroker(store, { timeoutMs: 1000 });

        await assert.rejects(broker.fetchDirectoryCredential(), (err: unknown) => {
            isKind('CredentialUnavailable')(err);
            assert.ok(err instanceof ProvisioningError);
            assert.strictEqual(err.publicMessage, 'Secret DomainAdminPassword is missing or empty');
            return true;
        });
    });

    it('fails with CredentialUnavailable when a secret is blank', async () => {
        const store = new InMemorySecretStore({ ...SEEDED, DomainAdminPassword: '   ' });
        const broker = new CredentialBroker(store, { timeoutMs: 1000 });

        await assert.rejects(broker.fetchDirectoryCredential(), isKind('CredentialUnavailable'));
    });

    it('fails with CredentialUnavailable when the store throws', async () => {
        const store: SecretStore = {
            getSecret: mock.fn(async () => {
                throw Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' });
            })
        };
        const broker = new CredentialBroker(store, { timeoutMs: 1000 });

        await assert.rejects(broker.fetchDirectoryCredential(), isKind('CredentialUnavailable'));
    });

    it('fails with CredentialUnavailable when the store does not answer in time', async () => {
        const store: SecretStore = { getSecret: () => new Promise(() => undefined) };
        const broker = new CredentialBroker(store, { timeoutMs: 20 });

        await assert.rejects(broker.fetchDirectoryCredential(), isKind('CredentialUnavailable'));
    });

    it('reports Cancelled when the caller aborts', async () => {
        const controller = new AbortController();
        controller.abort();
        const broker = new CredentialBroker(new InMemorySecretStore(SEEDED), { timeoutMs: 1000 });

        await assert.rejects(broker.fetchDirectoryCredential(controller.signal), isKind('Cancelled'));
    });
});

describe('DirectoryCredential', () => {
    it('masks the password when serialised or inspected', () => {
        const credential = new DirectoryCredential('CONTOSO\\svc-provisioner', 'test-secret');

        assert.strictEqual(
            JSON.stringify({ credential }),
            '{"credential":{"username":"CONTOSO\\\\svc-provisioner","password":"[REDACTED]"}}'
        );
        assert.strictEqual(inspect(credential), 'DirectoryCredential(CONTOSO\\svc-provisioner)');
        assert.ok(Object.isFrozen(credential));
    });
});

describe('AwsSecretsManagerStore', () => {
    it('returns SecretString for the requested id', async () => {
        const client = new SecretsManagerClient({ region: 'us-east-1' });
        const send = mock.method(client, 'send', async (command: unknown) => {
            assert.ok(command instanceof GetSecretValueCommand);
            return { SecretString: `value-of-${command.input.SecretId}` };
        });
        const store = new AwsSecretsManagerStore({}, client);

        const value = await store.getSecret('WebhookToken', new AbortController().signal);

        assert.strictEqual(value, 'value-of-WebhookToken');
        assert.strictEqual(send.mock.callCount(), 1);
    });

    it('decodes SecretBinary', async () => {
        const client = new SecretsManagerClient({ region: 'us-east-1' });
        mock.method(client, 'send', async () => ({ SecretBinary: new TextEncoder().encode('binary-value') }));
        const store = new AwsSecretsManagerStore({}, client);

        assert.strictEqual(await store.getSecret('DomainAdminPassword', new AbortController().signal), 'binary-value');
    });

    it('treats a missing secret as absent', async () => {
        const client = new SecretsManagerClient({ region: 'us-east-1' });
        mock.method(client, 'send', async () => {
            throw new ResourceNotFoundException({ $metadata: {}, message: "Secrets Manager can't find the specified secret." });
        });
        const store = new AwsSecretsManagerStore({}, client);

        assert.strictEqual(await store.getSecret('DomainAdminPassword', new AbortController().signal), undefined);
    });

    it('rethrows other failures', async () => {
        const client = new SecretsManagerClient({ region: 'us-east-1' });
        const denied = Object.assign(new Error('not authorized'), { name: 'AccessDeniedException' });
        mock.method(client, 'send', async () => { throw denied; });
        const store = new AwsSecretsManagerStore({}, client);

        await assert.rejects(store.getSecret('DomainAdminPassword', new AbortController().signal), denied);
    });
});
