import { logger } from '../logging/logger.js';
import { ConfigGuard, Env } from './config-guard.js';
import {
    PROVISIONING_CONFIG_GUARDS,
    ProvisioningConfig,
    loadProvisioningConfig
} from './config/provisioning-config.js';
import { AwsSecretsManagerStore, InMemorySecretStore, SecretStore } from '../secrets/secretStore.js';
import { CredentialBroker, SECRET_NAMES } from '../secrets/credentialBroker.js';
import { DirectoryConnector } from '../directory/types.js';
import { LdapDirectoryConnector } from '../directory/ldapDirectory.js';
import { InMemoryDirectory } from '../directory/inMemoryDirectory.js';
import { ProvisioningWorkflow } from '../provisioning/workflow.js';
import { WebhookGateway } from '../gateway/webhookGateway.js';

export interface ProvisioningRuntime {
    readonly config: ProvisioningConfig;
    readonly credentials: CredentialBroker;
    readonly directory: DirectoryConnector;
    readonly workflow: ProvisioningWorkflow;
    readonly gateway: WebhookGateway;
}

/**
 * Optional overrides, used by tests and local runs to inject stand-ins.
 */
export interface RuntimeOverrides {
    readonly secretStore?: SecretStore;
    readonly directory?: DirectoryConnector;
}

/**
 * Fail-closed startup: guards, typed config, then the component graph.
 */
export function bootstrap(serviceName: string, env: Env = process.env): ProvisioningRuntime {
    logger.info({ serviceName }, 'Bootstrapping service');

    ConfigGuard.enforce(PROVISIONING_CONFIG_GUARDS, env);
    const config = loadProvisioningConfig(env);

    if (config.environment === 'production' && config.workflow.rootKeyPolicy === 'immediate') {
        logger.warn('ROOT_KEY_POLICY=immediate in production: back-dated KDS root keys bypass replication');
    }

    const runtime = buildRuntime(config, config.secretStore.backend === 'memory'
        ? { secretStore: new InMemorySecretStore(memorySecretsFromEnv(env, config.secretStore.namePrefix)) }
        : {});
    logger.info({
        serviceName,
        secretStore: config.secretStore.backend,
        directory: config.directory.backend,
        rootKeyPolicy: config.workflow.rootKeyPolicy
    }, 'Startup checks passed');

    return runtime;
}

export function buildRuntime(config: ProvisioningConfig, overrides: RuntimeOverrides = {}): ProvisioningRuntime {
    const secretStore = overrides.secretStore ?? createSecretStore(config);
    const credentials = new CredentialBroker(secretStore, {
        timeoutMs: config.workflow.remoteCallTimeoutMs,
        namePrefix: config.secretStore.namePrefix
    });

    const directory = overrides.directory ?? createDirectory(config);
    const workflow = new ProvisioningWorkflow({
        credentials,
        directory,
        settings: config.workflow
    });
    const gateway = new WebhookGateway(workflow, credentials, {
        tokenRequired: config.webhook.tokenRequired,
        tokenHeader: config.webhook.tokenHeader
    });

    return { config, credentials, directory, workflow, gateway };
}

function createSecretStore(config: ProvisioningConfig): SecretStore {
    if (config.secretStore.backend === 'memory') {
        logger.warn('Using in-memory secret store; secrets must be seeded by the caller');
        return new InMemorySecretStore();
    }
    return new AwsSecretsManagerStore({
        ...(config.secretStore.region ? { region: config.secretStore.region } : {}),
        ...(config.secretStore.endpoint ? { endpoint: config.secretStore.endpoint } : {})
    });
}

function createDirectory(config: ProvisioningConfig): DirectoryConnector {
    if (config.directory.backend === 'memory') {
        logger.warn('Using in-memory directory; nothing is written to Active Directory');
        return new InMemoryDirectory();
    }
    if (!config.directory.url) {
        throw new Error('DIRECTORY_URL is required when DIRECTORY_BACKEND is ldap');
    }
    return new LdapDirectoryConnector({
        url: config.directory.url,
        tlsVerify: config.directory.tlsVerify,
        timeoutMs: config.workflow.remoteCallTimeoutMs
    });
}

/**
 * Local runs with the memory backend read the secrets from variables of the
 * same name (DomainAdminUsername, DomainAdminPassword, WebhookToken).
 */
export function memorySecretsFromEnv(env: Env, namePrefix: string): Record<string, string> {
    const secrets: Record<string, string> = {};
    for (const name of Object.values(SECRET_NAMES)) {
        const value = env[name];
        if (value !== undefined) {
            secrets[`${namePrefix}${name}`] = value;
        }
    }
    return secrets;
}
