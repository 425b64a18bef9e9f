/**
 * LDAP Directory Client
 *
 * Typed replacement for remote script execution on a domain controller:
 * every operation is a plain LDAP search or add over one bound connection.
 */

import crypto from 'crypto';
import { Attribute, Client } from 'ldapts';
import { logger } from '../logging/logger.js';
import { ProvisioningError } from '../errors/sanitizer.js';
import { DirectoryCredential } from '../secrets/credentialBroker.js';
import { ProvisioningRequest } from '../validation/schema.js';
import {
    CreatedObject,
    DirectoryAttributes,
    DirectoryConnector,
    DirectoryObjectRef,
    DirectorySession,
    RootKeyRequest,
    RootKeyState
} from './types.js';
import {
    escapeFilterValue,
    fileTimeToDate,
    formatObjectGuid,
    generalizedTimeToIso,
    samAccountNameFor
} from './identifiers.js';
import { accountDistinguishedName, buildAccountAttributes } from './accountAttributes.js';
import { buildRootKeyAttributes, rootKeyContainerDn, rootKeyEffectiveTime } from './kdsRootKey.js';
import { isSidString, sidFromString } from './securityDescriptor.js';

export type LdapEntry = {
    dn: string;
    [attribute: string]: Buffer | Buffer[] | string[] | string;
};

export interface LdapSearchOptions {
    scope: 'base' | 'one' | 'sub';
    filter: string;
    attributes: string[];
    sizeLimit?: number;
    explicitBufferAttributes?: string[];
}

/**
 * The subset of the ldapts client the directory session uses.
 */
export interface LdapClient {
    bind(dn: string, password: string): Promise<void>;
    search(baseDN: string, options: LdapSearchOptions): Promise<{ searchEntries: LdapEntry[] }>;
    add(dn: string, attributes: Attribute[]): Promise<void>;
    unbind(): Promise<void>;
}

export interface LdapClientOptions {
    url: string;
    timeout: number;
    connectTimeout: number;
    tlsOptions: { rejectUnauthorized: boolean };
}

export interface LdapDirectoryOptions {
    url: string;
    tlsVerify: boolean;
    timeoutMs: number;
}

interface RootDse {
    readonly defaultNamingContext: string;
    readonly configurationNamingContext: string;
    readonly dnsHostName?: string;
    readonly serverName?: string;
}

const ACCOUNT_ATTRIBUTES = ['distinguishedName', 'sAMAccountName', 'objectGUID', 'dNSHostName', 'whenCreated'];

function readAttribute(entry: LdapEntry, name: string): Buffer | Buffer[] | string[] | string | undefined {
    if (name === 'dn') return entry.dn;
    const key = Object.keys(entry).find(k => k.toLowerCase() === name.toLowerCase());
    return key === undefined ? undefined : entry[key];
}

function firstString(entry: LdapEntry, name: string): string | undefined {
    const value = readAttribute(entry, name);
    const first = Array.isArray(value) ? value[0] : value;
    if (first === undefined) return undefined;
    return Buffer.isBuffer(first) ? first.toString('utf8') : first;
}

function firstBuffer(entry: LdapEntry, name: string): Buffer | undefined {
    const value = readAttribute(entry, name);
    const first = Array.isArray(value) ? value[0] : value;
    if (first === undefined) return undefined;
    return Buffer.isBuffer(first) ? first : Buffer.from(first, 'binary');
}

function toLdapAttributes(...sets: DirectoryAttributes[]): Attribute[] {
    return sets.flatMap(set =>
        Object.entries(set).map(([type, values]) => new Attribute({ type, values }))
    );
}

export class LdapDirectorySession implements DirectorySession {
    constructor(
        private readonly client: LdapClient,
        private readonly rootDse: RootDse
    ) { }

    async exists(accountName: string): Promise<DirectoryObjectRef | null> {
        return this.findAccount(accountName);
    }

    async verifyAccount(accountName: string): Promise<DirectoryObjectRef> {
        const ref = await this.findAccount(accountName);
        if (!ref) {
            throw new ProvisioningError(
                'VerificationFailed',
                `Account ${accountName} was not found after creation`,
                { accountName },
                { step: 'Verify' }
            );
        }
        return ref;
    }

    async createAccount(request: ProvisioningRequest): Promise<CreatedObject> {
        const principalSids = await this.resolvePrincipals(request.principalsAllowedToRetrieve ?? []);
        const distinguishedName = accountDistinguishedName(request, this.rootDse.defaultNamingContext);
        const { text, binary } = buildAccountAttributes(request, principalSids);

        logger.info({
            distinguishedName,
            attributes: [...Object.keys(text), ...Object.keys(binary)]
        }, 'Adding group managed service account');

        await this.client.add(distinguishedName, toLdapAttributes(text, binary));

        return {
            distinguishedName,
            samAccountName: samAccountNameFor(request.accountName)
        };
    }

    async ensureRootKey(request: RootKeyRequest): Promise<RootKeyState> {
        const container = rootKeyContainerDn(this.rootDse.configurationNamingContext);
        const keys = await this.listRootKeys(container);
        const now = request.now.getTime();

        if (request.requestedKeyId) {
            const wanted = keys.find(k => k.keyId.toLowerCase() === request.requestedKeyId);
            if (!wanted) {
                throw new ProvisioningError(
                    'InvalidParameter',
                    `KDS root key ${request.requestedKeyId} does not exist`,
                    { requestedKeyId: request.requestedKeyId },
                    { step: 'RootKeyEnsure' }
                );
            }
            return {
                present: true,
                created: false,
                effective: wanted.effectiveAt.getTime() <= now,
                keyId: wanted.keyId,
                effectiveAt: wanted.effectiveAt.toISOString()
            };
        }

        const effective = keys.find(k => k.effectiveAt.getTime() <= now);
        const existing = effective ?? keys[0];
        if (existing) {
            return {
                present: true,
                created: false,
                effective: existing.effectiveAt.getTime() <= now,
                keyId: existing.keyId,
                effectiveAt: existing.effectiveAt.toISOString()
            };
        }

        const keyId = crypto.randomUUID();
        const effectiveAt = rootKeyEffectiveTime(request);
        const { text, binary } = buildRootKeyAttributes({
            keyId,
            effectiveAt,
            createdAt: request.now,
            domainControllerDn: await this.domainControllerDn()
        });

        logger.warn({ keyId, effectiveAt: effectiveAt.toISOString(), policy: request.policy }, 'Creating KDS root key');
        await this.client.add(`CN=${keyId},${container}`, toLdapAttributes(text, binary));

        return {
            present: true,
            created: true,
            effective: effectiveAt.getTime() <= now,
            keyId,
            effectiveAt: effectiveAt.toISOString()
        };
    }

    distinguishedNameFor(request: ProvisioningRequest): string {
        return accountDistinguishedName(request, this.rootDse.defaultNamingContext);
    }

    async close(): Promise<void> {
        await this.client.unbind();
    }

    private async findAccount(accountName: string): Promise<DirectoryObjectRef | null> {
        const { searchEntries } = await this.client.search(this.rootDse.defaultNamingContext, {
            scope: 'sub',
            filter: `(sAMAccountName=${escapeFilterValue(samAccountNameFor(accountName))})`,
            attributes: ACCOUNT_ATTRIBUTES,
            sizeLimit: 1,
            explicitBufferAttributes: ['objectGUID']
        });

        const entry = searchEntries[0];
        return entry ? this.toObjectRef(entry) : null;
    }

    private toObjectRef(entry: LdapEntry): DirectoryObjectRef {
        const guid = firstBuffer(entry, 'objectGUID');
        const whenCreated = firstString(entry, 'whenCreated');
        const dnsHostName = firstString(entry, 'dNSHostName');

        return {
            distinguishedName: firstString(entry, 'distinguishedName') ?? entry.dn,
            samAccountName: firstString(entry, 'sAMAccountName') ?? '',
            objectGuid: guid ? formatObjectGuid(guid) : '',
            ...(dnsHostName ? { dnsHostName } : {}),
            createdAt: whenCreated ? generalizedTimeToIso(whenCreated) : new Date().toISOString()
        };
    }

    private async listRootKeys(container: string): Promise<Array<{ keyId: string; effectiveAt: Date }>> {
        const { searchEntries } = await this.client.search(container, {
            scope: 'one',
            filter: '(objectClass=msKds-ProvRootKey)',
            attributes: ['cn', 'msKds-UseStartTime']
        });

        return searchEntries.flatMap(entry => {
            const keyId = firstString(entry, 'cn');
            const useStart = firstString(entry, 'msKds-UseStartTime');
            return keyId && useStart ? [{ keyId, effectiveAt: fileTimeToDate(useStart) }] : [];
        });
    }

    private async domainControllerDn(): Promise<string> {
        const { dnsHostName, serverName, defaultNamingContext } = this.rootDse;
        if (dnsHostName) {
            const { searchEntries } = await this.client.search(defaultNamingContext, {
                scope: 'sub',
                filter: `(&(objectCategory=computer)(dNSHostName=${escapeFilterValue(dnsHostName)}))`,
                attributes: ['distinguishedName'],
                sizeLimit: 1
            });
            const entry = searchEntries[0];
            if (entry) return firstString(entry, 'distinguishedName') ?? entry.dn;
        }
        if (serverName) return serverName;
        throw new ProvisioningError(
            'InternalError',
            'Domain controller account could not be determined from rootDSE',
            { dnsHostName },
            { step: 'RootKeyEnsure' }
        );
    }

    /**
     * Resolves principals given as SID strings, DNs or sAMAccountNames
     * (computer accounts may omit their trailing `$`).
     */
    private async resolvePrincipals(principals: readonly string[]): Promise<Buffer[]> {
        const sids: Buffer[] = [];
        for (const principal of principals) {
            if (isSidString(principal)) {
                sids.push(sidFromString(principal));
                continue;
            }

            const isDn = principal.includes('=');
            const { searchEntries } = await this.client.search(
                isDn ? principal : this.rootDse.defaultNamingContext,
                {
                    scope: isDn ? 'base' : 'sub',
                    filter: isDn
                        ? '(objectClass=*)'
                        : `(|(sAMAccountName=${escapeFilterValue(principal)})(sAMAccountName=${escapeFilterValue(principal)}$))`,
                    attributes: ['objectSid'],
                    sizeLimit: 1,
                    explicitBufferAttributes: ['objectSid']
                }
            );

            const sid = searchEntries[0] ? firstBuffer(searchEntries[0], 'objectSid') : undefined;
            if (!sid) {
                throw new ProvisioningError(
                    'InvalidParameter',
                    `Principal ${principal} could not be resolved`,
                    { principal },
                    { step: 'Create' }
                );
            }
            sids.push(sid);
        }
        return sids;
    }
}

/**
 * Opens one bound LDAP connection per invocation.
 */
export class LdapDirectoryConnector implements DirectoryConnector {
    constructor(
        private readonly options: LdapDirectoryOptions,
        private readonly clientFactory: (options: LdapClientOptions) => LdapClient = opts => new Client(opts)
    ) { }

    async connect(credential: DirectoryCredential): Promise<DirectorySession> {
        const client = this.clientFactory({
            url: this.options.url,
            timeout: this.options.timeoutMs,
            connectTimeout: this.options.timeoutMs,
            tlsOptions: { rejectUnauthorized: this.options.tlsVerify }
        });

        try {
            await client.bind(credential.username, credential.password);
            const rootDse = await readRootDse(client);
            logger.debug({ url: this.options.url, domain: rootDse.defaultNamingContext }, 'Directory session opened');
            return new LdapDirectorySession(client, rootDse);
        } catch (error: unknown) {
            await client.unbind().catch((unbindError: unknown) => {
                logger.debug({ error: String(unbindError) }, 'Unbind after failed connect also failed');
            });
            throw error;
        }
    }
}

async function readRootDse(client: LdapClient): Promise<RootDse> {
    const { searchEntries } = await client.search('', {
        scope: 'base',
        filter: '(objectClass=*)',
        attributes: ['defaultNamingContext', 'configurationNamingContext', 'dnsHostName', 'serverName']
    });

    const entry = searchEntries[0];
    const defaultNamingContext = entry ? firstString(entry, 'defaultNamingContext') : undefined;
    const configurationNamingContext = entry ? firstString(entry, 'configurationNamingContext') : undefined;
    if (!entry || !defaultNamingContext || !configurationNamingContext) {
        throw new ProvisioningError(
            'DirectoryUnreachable',
            'Directory rootDSE did not report naming contexts',
            {},
            { step: 'ExistenceCheck' }
        );
    }

    const dnsHostName = firstString(entry, 'dnsHostName');
    const serverName = firstString(entry, 'serverName');
    return {
        defaultNamingContext,
        configurationNamingContext,
        ...(dnsHostName ? { dnsHostName } : {}),
        ...(serverName ? { serverName } : {})
    };
}
