/**
 * Directory Client contract.
 *
 * A connector opens one authenticated session per invocation; the session
 * exposes the typed operations the provisioning workflow sequences.
 */

import type { DirectoryCredential } from '../secrets/credentialBroker.js';
import type { ProvisioningRequest } from '../validation/schema.js';
import type { RootKeyPolicy } from '../bootstrap/config/provisioning-config.js';

export type AttributeValues = string[] | Buffer[];

/**
 * Attribute set sent with an add operation. Absent optional fields are
 * omitted entirely, never sent as empty values.
 */
export type DirectoryAttributes = Record<string, AttributeValues>;

export interface DirectoryObjectRef {
    readonly distinguishedName: string;
    readonly samAccountName: string;
    readonly objectGuid: string;
    readonly dnsHostName?: string;
    /** ISO-8601 from whenCreated */
    readonly createdAt: string;
}

export type CreatedObject = Pick<DirectoryObjectRef, 'distinguishedName' | 'samAccountName'>;

export interface RootKeyRequest {
    readonly policy: RootKeyPolicy;
    readonly propagationHours: number;
    /** When set, this exact key must exist; none is created. */
    readonly requestedKeyId?: string;
    readonly now: Date;
}

export interface RootKeyState {
    /** At least one root key (or the requested one) exists */
    readonly present: boolean;
    /** This invocation created it */
    readonly created: boolean;
    /** Its effective time has passed */
    readonly effective: boolean;
    readonly keyId?: string;
    readonly effectiveAt?: string;
}

export interface DirectorySession {
    exists(accountName: string): Promise<DirectoryObjectRef | null>;
    ensureRootKey(request: RootKeyRequest): Promise<RootKeyState>;
    createAccount(request: ProvisioningRequest): Promise<CreatedObject>;
    /** Throws a VerificationFailed ProvisioningError when the object cannot be read. */
    verifyAccount(accountName: string): Promise<DirectoryObjectRef>;
    /** DN the account has, or would have, under this directory. */
    distinguishedNameFor(request: ProvisioningRequest): string;
    close(): Promise<void>;
}

export interface DirectoryConnector {
    connect(credential: DirectoryCredential): Promise<DirectorySession>;
}
