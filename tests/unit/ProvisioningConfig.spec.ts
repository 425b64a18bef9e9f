/**
 * Unit Tests: provisioning configuration, startup guards and runtime wiring
 *
 * @see libs/bootstrap/config/provisioning-config.ts
 * @see libs/bootstrap/config-guard.ts
 * @see libs/bootstrap/startup.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { ConfigGuard } from '../../libs/bootstrap/config-guard.js';
import {
    PROVISIONING_CONFIG_GUARDS,
    loadProvisioningConfig
} from '../../libs/bootstrap/config/provisioning-config.js';
import { buildRuntime, memorySecretsFromEnv } from '../../libs/bootstrap/startup.js';
import { ProvisioningError } from '../../libs/errors/sanitizer.js';
import { InMemorySecretStore } from '../../libs/secrets/secretStore.js';
import { InMemoryDirectory } from '../../libs/directory/inMemoryDirectory.js';
import { LdapDirectoryConnector } from '../../libs/directory/ldapDirectory.js';

describe('loadProvisioningConfig', () => {
    it('applies defaults', () => {
        const config = loadProvisioningConfig({ DIRECTORY_URL: 'ldaps://dc01.contoso.com' });

        assert.deepStrictEqual(config, {
            environment: 'development',
            port: 8080,
            webhook: {
                path: '/webhooks/gmsa',
                bodyLimit: '64kb',
                tokenRequired: false,
                tokenHeader: 'x-webhook-token'
            },
            secretStore: { backend: 'aws', namePrefix: '' },
            directory: { backend: 'ldap', url: 'ldaps://dc01.contoso.com', tlsVerify: true },
            workflow: {
                remoteCallTimeoutMs: 30000,
                verifySettleMs: 2000,
                rootKeyPolicy: 'deferred',
                rootKeyPropagationHours: 10
            }
        });
    });

    it('parses overrides', () => {
        const config = loadProvisioningConfig({
            NODE_ENV: 'staging',
            PORT: '9443',
            WEBHOOK_TOKEN_REQUIRED: 'yes',
            WEBHOOK_TOKEN_HEADER: 'X-Provisioning-Token',
            SECRET_STORE_BACKEND: 'memory',
            SECRET_NAME_PREFIX: 'gmsa/',
            DIRECTORY_BACKEND: 'memory',
            DIRECTORY_TLS_VERIFY: 'false',
            REMOTE_CALL_TIMEOUT_MS: '5000',
            VERIFY_SETTLE_MS: '0',
            ROOT_KEY_POLICY: 'immediate',
            ROOT_KEY_PROPAGATION_HOURS: '2'
        });

        assert.strictEqual(config.environment, 'staging');
        assert.strictEqual(config.port, 9443);
        assert.strictEqual(config.webhook.tokenRequired, true);
        assert.strictEqual(config.webhook.tokenHeader, 'x-provisioning-token');
        assert.deepStrictEqual(config.secretStore, { backend: 'memory', namePrefix: 'gmsa/' });
        assert.deepStrictEqual(config.directory, { backend: 'memory', tlsVerify: false });
        assert.deepStrictEqual(config.workflow, {
            remoteCallTimeoutMs: 5000,
            verifySettleMs: 0,
            rootKeyPolicy: 'immediate',
            rootKeyPropagationHours: 2
        });
    });

    it('rejects invalid values with a ValidationError', () => {
        assert.throws(
            () => loadProvisioningConfig({ ROOT_KEY_POLICY: 'eventually', DIRECTORY_URL: 'https://dc01' }),
            (err: unknown) => {
                assert.ok(err instanceof ProvisioningError);
                assert.strictEqual(err.kind, 'ValidationError');
                assert.ok(err.publicMessage.includes('DIRECTORY_URL must be an ldap:// or ldaps:// URL'));
                return true;
            }
        );
    });
});

describe('loadProvisioningConfig numeric variables', () => {
    it('treats blank numeric variables as unset', () => {
        const config = loadProvisioningConfig({
            DIRECTORY_URL: 'ldaps://dc01.contoso.com',
            PORT: '',
            REMOTE_CALL_TIMEOUT_MS: '',
            VERIFY_SETTLE_MS: '  ',
            ROOT_KEY_PROPAGATION_HOURS: ''
        });

        assert.strictEqual(config.port, 8080);
        assert.deepStrictEqual(config.workflow, {
            remoteCallTimeoutMs: 30000,
            verifySettleMs: 2000,
            rootKeyPolicy: 'deferred',
            rootKeyPropagationHours: 10
        });
    });

    it('rejects a zero remote call timeout', () => {
        assert.throws(
            () => loadProvisioningConfig({ DIRECTORY_URL: 'ldaps://dc01.contoso.com', REMOTE_CALL_TIMEOUT_MS: '0' }),
            (err: unknown) => {
                assert.ok(err instanceof ProvisioningError);
                assert.strictEqual(err.kind, 'ValidationError');
                return true;
            }
        );
    });
});

describe('PROVISIONING_CONFIG_GUARDS', () => {
    it('passes a production LDAPS deployment', () => {
        const errors = ConfigGuard.evaluate(PROVISIONING_CONFIG_GUARDS, {
            NODE_ENV: 'production',
            DIRECTORY_URL: 'ldaps://dc01.contoso.com'
        });

        assert.deepStrictEqual(errors, []);
    });

    it('requires DIRECTORY_URL for the ldap backend', () => {
        const errors = ConfigGuard.evaluate(PROVISIONING_CONFIG_GUARDS, {});

        assert.deepStrictEqual(errors, [
            'FATAL CONFIG: DIRECTORY_URL is required when DIRECTORY_BACKEND is ldap'
        ]);
    });

    it('forbids stand-ins and plaintext LDAP in production', () => {
        const errors = ConfigGuard.evaluate(PROVISIONING_CONFIG_GUARDS, {
            NODE_ENV: 'production',
            DIRECTORY_BACKEND: 'memory',
            SECRET_STORE_BACKEND: 'memory',
            DIRECTORY_URL: 'ldap://dc01.contoso.com'
        });

        assert.deepStrictEqual(errors, [
            'FATAL CONFIG: The in-memory directory must never run in production (Rule: MemoryDirectory)',
            'FATAL CONFIG: The in-memory secret store must never run in production (Rule: MemorySecretStore)',
            'FATAL CONFIG: Production directory traffic must use ldaps:// (Rule: PlaintextLdap)'
        ]);
    });

    it('allows memory backends outside production', () => {
        const errors = ConfigGuard.evaluate(PROVISIONING_CONFIG_GUARDS, {
            DIRECTORY_BACKEND: 'memory',
            SECRET_STORE_BACKEND: 'memory'
        });

        assert.deepStrictEqual(errors, []);
    });

    it('reports a throwing rule instead of crashing', () => {
        const errors = ConfigGuard.evaluate([
            { type: 'assert', check: () => { throw new Error('boom'); }, message: 'unused' },
            { type: 'required', name: 'PORT' }
        ], {});

        assert.deepStrictEqual(errors, [
            'Check failed for rule: boom',
            'FATAL CONFIG: Required env var PORT is missing'
        ]);
    });
});

describe('startup wiring', () => {
    it('seeds the memory secret store from same-named variables', () => {
        const secrets = memorySecretsFromEnv({
            DomainAdminUsername: 'CONTOSO\\svc-provisioner',
            DomainAdminPassword: 'test-secret',
            UNRELATED: 'x'
        }, 'gmsa/');

        assert.deepStrictEqual(secrets, {
            'gmsa/DomainAdminUsername': 'CONTOSO\\svc-provisioner',
            'gmsa/DomainAdminPassword': 'test-secret'
        });
    });

    it('builds the LDAP connector when configured', () => {
        const config = loadProvisioningConfig({ DIRECTORY_URL: 'ldaps://dc01.contoso.com' });
        const runtime = buildRuntime(config, { secretStore: new InMemorySecretStore() });

        assert.ok(runtime.directory instanceof LdapDirectoryConnector);
    });

    it('uses injected stand-ins', () => {
        const config = loadProvisioningConfig({ DIRECTORY_BACKEND: 'memory', SECRET_STORE_BACKEND: 'memory' });
        const directory = new InMemoryDirectory();
        const runtime = buildRuntime(config, { directory, secretStore: new InMemorySecretStore() });

        assert.strictEqual(runtime.directory, directory);
        assert.strictEqual(runtime.config, config);
    });
});
