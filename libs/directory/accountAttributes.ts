/**
 * Attribute set for a new group managed service account.
 */

import { ProvisioningRequest } from '../validation/schema.js';
import { DirectoryAttributes } from './types.js';
import { escapeDnValue, samAccountNameFor } from './identifiers.js';
import { buildGroupMsaMembership } from './securityDescriptor.js';

// WORKSTATION_TRUST_ACCOUNT
const USER_ACCOUNT_CONTROL = 4096;
const MANAGED_PASSWORD_INTERVAL_DAYS = 30;
// RC4_HMAC | AES128 | AES256
const SUPPORTED_ENCRYPTION_TYPES = 28;

export function defaultServiceAccountContainer(defaultNamingContext: string): string {
    return `CN=Managed Service Accounts,${defaultNamingContext}`;
}

export function accountDistinguishedName(request: Pick<ProvisioningRequest, 'accountName' | 'organizationalUnit'>, defaultNamingContext: string): string {
    const container = request.organizationalUnit ?? defaultServiceAccountContainer(defaultNamingContext);
    return `CN=${escapeDnValue(request.accountName)},${container}`;
}

export interface AccountAttributeSet {
    readonly text: DirectoryAttributes;
    readonly binary: DirectoryAttributes;
}

/**
 * Builds the add-operation attributes. Optional fields that are absent on
 * the request do not appear in the result at all.
 */
export function buildAccountAttributes(
    request: ProvisioningRequest,
    principalSids: readonly Buffer[]
): AccountAttributeSet {
    const text: DirectoryAttributes = {
        objectClass: ['msDS-GroupManagedServiceAccount'],
        cn: [request.accountName],
        sAMAccountName: [samAccountNameFor(request.accountName)],
        dNSHostName: [request.dnsHostName],
        userAccountControl: [String(USER_ACCOUNT_CONTROL)],
        'msDS-ManagedPasswordInterval': [String(MANAGED_PASSWORD_INTERVAL_DAYS)],
        'msDS-SupportedEncryptionTypes': [String(SUPPORTED_ENCRYPTION_TYPES)]
    };
    const binary: DirectoryAttributes = {};

    if (request.description !== undefined) {
        text.description = [request.description];
    }
    if (request.servicePrincipalNames && request.servicePrincipalNames.length > 0) {
        text.servicePrincipalName = [...request.servicePrincipalNames];
    }
    if (principalSids.length > 0) {
        binary['msDS-GroupMSAMembership'] = [buildGroupMsaMembership(principalSids)];
    }

    return { text, binary };
}
