/**
 * In-Memory Directory
 *
 * Process-local stand-in for a domain controller, used by tests and by
 * local runs with DIRECTORY_BACKEND=memory. It enforces sAMAccountName
 * uniqueness the way the real directory does (result code 68) and records
 * every call so ordering and call counts can be asserted.
 */

import crypto from 'crypto';
import { setImmediate as nextTick } from 'node:timers/promises';
import { ProvisioningError } from '../errors/sanitizer.js';
import { DirectoryCredential } from '../secrets/credentialBroker.js';
import { ProvisioningRequest } from '../validation/schema.js';
import {
    CreatedObject,
    DirectoryConnector,
    DirectoryObjectRef,
    DirectorySession,
    RootKeyRequest,
    RootKeyState
} from './types.js';
import { formatObjectGuid, samAccountNameFor } from './identifiers.js';
import { accountDistinguishedName, buildAccountAttributes, defaultServiceAccountContainer, AccountAttributeSet } from './accountAttributes.js';
import { rootKeyEffectiveTime } from './kdsRootKey.js';
import { isSidString, sidFromString } from './securityDescriptor.js';

/**
 * Error shaped like an LDAP result from a real server.
 */
export class DirectoryResultError extends Error {
    constructor(public readonly code: number, message: string) {
        super(message);
        this.name = 'DirectoryResultError';
    }
}

export type DirectoryOperation =
    | 'connect'
    | 'exists'
    | 'rootKeyLookup'
    | 'rootKeyCreate'
    | 'createAccount'
    | 'verifyAccount'
    | 'close';

export interface StoredAccount {
    readonly ref: DirectoryObjectRef;
    readonly attributes: AccountAttributeSet;
}

export interface StoredRootKey {
    readonly keyId: string;
    readonly effectiveAt: Date;
}

export interface InMemoryDirectoryOptions {
    defaultNamingContext?: string;
    /** Extra containers (OUs) that accept new accounts */
    containers?: string[];
    /** sAMAccountName → SID string */
    principals?: Record<string, string>;
    rootKeys?: StoredRootKey[];
    /** When set, binds with any other credential fail with invalidCredentials */
    credential?: { username: string; password: string };
}

export class InMemoryDirectory implements DirectoryConnector {
    readonly defaultNamingContext: string;
    readonly accounts = new Map<string, StoredAccount>();
    readonly rootKeys: StoredRootKey[];
    readonly operations: DirectoryOperation[] = [];

    private readonly containers: Set<string>;
    private readonly principals: Map<string, string>;
    private readonly hidden = new Set<string>();
    private readonly failures = new Map<DirectoryOperation, unknown>();

    constructor(private readonly options: InMemoryDirectoryOptions = {}) {
        this.defaultNamingContext = options.defaultNamingContext ?? 'DC=contoso,DC=com';
        this.containers = new Set(
            [defaultServiceAccountContainer(this.defaultNamingContext), ...(options.containers ?? [])]
                .map(c => c.toLowerCase())
        );
        this.principals = new Map(
            Object.entries(options.principals ?? {}).map(([name, sid]) => [name.toLowerCase(), sid])
        );
        this.rootKeys = [...(options.rootKeys ?? [])];
    }

    /** Number of times the given operation ran. */
    count(operation: DirectoryOperation): number {
        return this.operations.filter(op => op === operation).length;
    }

    /** The next call of `operation` throws `error`. */
    failNext(operation: DirectoryOperation, error: unknown): void {
        this.failures.set(operation, error);
    }

    /** Reads stop seeing this account, as if replication had not caught up. */
    hideFromReads(accountName: string): void {
        this.hidden.add(samAccountNameFor(accountName).toLowerCase());
    }

    getAccount(accountName: string): StoredAccount | undefined {
        return this.accounts.get(samAccountNameFor(accountName).toLowerCase());
    }

    async connect(credential: DirectoryCredential): Promise<DirectorySession> {
        await this.record('connect');
        const expected = this.options.credential;
        if (expected && (expected.username !== credential.username || expected.password !== credential.password)) {
            throw new DirectoryResultError(49, 'invalidCredentials: bind rejected');
        }
        return new InMemoryDirectorySession(this);
    }

    /** @internal */
    async record(operation: DirectoryOperation): Promise<void> {
        // Yield so concurrent invocations interleave like real remote calls.
        await nextTick();
        this.note(operation);
    }

    /** @internal Records without yielding, for check-then-write sequences. */
    note(operation: DirectoryOperation): void {
        this.operations.push(operation);
        const failure = this.failures.get(operation);
        if (failure !== undefined) {
            this.failures.delete(operation);
            throw failure;
        }
    }

    /** @internal */
    readAccount(accountName: string): DirectoryObjectRef | null {
        const key = samAccountNameFor(accountName).toLowerCase();
        if (this.hidden.has(key)) return null;
        return this.accounts.get(key)?.ref ?? null;
    }

    /** @internal */
    storeAccount(request: ProvisioningRequest): CreatedObject {
        const samAccountName = samAccountNameFor(request.accountName);
        const key = samAccountName.toLowerCase();
        if (this.accounts.has(key)) {
            throw new DirectoryResultError(68, `entryAlreadyExists: ${samAccountName}`);
        }

        const container = request.organizationalUnit ?? defaultServiceAccountContainer(this.defaultNamingContext);
        if (!this.containers.has(container.toLowerCase())) {
            throw new DirectoryResultError(32, `noSuchObject: ${container}`);
        }

        const principalSids = (request.principalsAllowedToRetrieve ?? []).map(principal => {
            const sid = isSidString(principal) ? principal : this.principals.get(principal.toLowerCase());
            if (!sid) {
                throw new ProvisioningError(
                    'InvalidParameter',
                    `Principal ${principal} could not be resolved`,
                    { principal },
                    { step: 'Create' }
                );
            }
            return sidFromString(sid);
        });

        const distinguishedName = accountDistinguishedName(request, this.defaultNamingContext);
        const ref: DirectoryObjectRef = {
            distinguishedName,
            samAccountName,
            objectGuid: formatObjectGuid(crypto.randomBytes(16)),
            dnsHostName: request.dnsHostName,
            createdAt: new Date().toISOString()
        };

        this.accounts.set(key, { ref, attributes: buildAccountAttributes(request, principalSids) });
        return { distinguishedName, samAccountName };
    }
}

class InMemoryDirectorySession implements DirectorySession {
    constructor(private readonly directory: InMemoryDirectory) { }

    async exists(accountName: string): Promise<DirectoryObjectRef | null> {
        await this.directory.record('exists');
        return this.directory.readAccount(accountName);
    }

    async ensureRootKey(request: RootKeyRequest): Promise<RootKeyState> {
        await this.directory.record('rootKeyLookup');
        const now = request.now.getTime();
        const keys = this.directory.rootKeys;

        const describe = (key: StoredRootKey, created: boolean): RootKeyState => ({
            present: true,
            created,
            effective: key.effectiveAt.getTime() <= now,
            keyId: key.keyId,
            effectiveAt: key.effectiveAt.toISOString()
        });

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
            return describe(wanted, false);
        }

        const existing = keys.find(k => k.effectiveAt.getTime() <= now) ?? keys[0];
        if (existing) {
            return describe(existing, false);
        }

        // No yield between the lookup above and the write below.
        this.directory.note('rootKeyCreate');
        const key: StoredRootKey = { keyId: crypto.randomUUID(), effectiveAt: rootKeyEffectiveTime(request) };
        keys.push(key);
        return describe(key, true);
    }

    async createAccount(request: ProvisioningRequest): Promise<CreatedObject> {
        await this.directory.record('createAccount');
        return this.directory.storeAccount(request);
    }

    async verifyAccount(accountName: string): Promise<DirectoryObjectRef> {
        await this.directory.record('verifyAccount');
        const ref = this.directory.readAccount(accountName);
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

    distinguishedNameFor(request: ProvisioningRequest): string {
        return accountDistinguishedName(request, this.directory.defaultNamingContext);
    }

    async close(): Promise<void> {
        await this.directory.record('close');
    }
}
