/**
 * KDS root key object layout.
 *
 * Root keys are msKds-ProvRootKey objects under the Group Key Distribution
 * Service container of the configuration partition. The key is usable once
 * msKds-UseStartTime has passed and the object has replicated to every DC.
 */

import crypto from 'crypto';
import { DirectoryAttributes, RootKeyRequest } from './types.js';
import { dateToFileTime } from './identifiers.js';

const ROOT_KEY_DATA_BYTES = 64;
const KDF_ALGORITHM = 'SP800_108_CTR_HMAC';
const KDF_HASH = 'SHA512';
const SECRET_AGREEMENT_ALGORITHM = 'DH';
const PUBLIC_KEY_LENGTH = 2048;
const PRIVATE_KEY_LENGTH = 512;
// BCRYPT_DH_PARAMETERS_MAGIC ('DHPM')
const DH_PARAMETERS_MAGIC = 0x4d504844;

const HOUR_MS = 60 * 60 * 1000;

export function rootKeyContainerDn(configurationNamingContext: string): string {
    return `CN=Master Root Keys,CN=Group Key Distribution Service,CN=Services,${configurationNamingContext}`;
}

/**
 * Effective time for a new root key under the configured policy.
 * `immediate` back-dates the key so it is usable now; `deferred` places it
 * in the future so replication completes before first use.
 */
export function rootKeyEffectiveTime(request: RootKeyRequest): Date {
    const offset = request.propagationHours * HOUR_MS;
    return new Date(request.now.getTime() + (request.policy === 'immediate' ? -offset : offset));
}

function encodeKdfParam(): Buffer {
    const hashName = Buffer.from(`${KDF_HASH}\0`, 'utf16le');
    const header = Buffer.alloc(16);
    header.writeUInt32LE(0, 0);
    header.writeUInt32LE(1, 4);
    header.writeUInt32LE(hashName.length, 8);
    header.writeUInt32LE(0, 12);
    return Buffer.concat([header, hashName]);
}

function encodeDhParameters(): Buffer {
    const group = crypto.getDiffieHellman('modp14');
    const prime = group.getPrime();
    const keyLength = prime.length;
    const generator = Buffer.alloc(keyLength);
    const rawGenerator = group.getGenerator();
    rawGenerator.copy(generator, keyLength - rawGenerator.length);

    const header = Buffer.alloc(12);
    header.writeUInt32LE(header.length + keyLength * 2, 0);
    header.writeUInt32LE(DH_PARAMETERS_MAGIC, 4);
    header.writeUInt32LE(keyLength, 8);
    return Buffer.concat([header, prime, generator]);
}

export interface NewRootKey {
    readonly keyId: string;
    readonly effectiveAt: Date;
    readonly createdAt: Date;
    /** DN of the DC computer account that generated the key */
    readonly domainControllerDn: string;
}

export interface RootKeyAttributeSet {
    readonly text: DirectoryAttributes;
    readonly binary: DirectoryAttributes;
}

/**
 * Attribute set for a new msKds-ProvRootKey object.
 */
export function buildRootKeyAttributes(key: NewRootKey): RootKeyAttributeSet {
    return {
        text: {
            objectClass: ['msKds-ProvRootKey'],
            cn: [key.keyId],
            'msKds-Version': ['1'],
            'msKds-KDFAlgorithmID': [KDF_ALGORITHM],
            'msKds-SecretAgreementAlgorithmID': [SECRET_AGREEMENT_ALGORITHM],
            'msKds-PublicKeyLength': [String(PUBLIC_KEY_LENGTH)],
            'msKds-PrivateKeyLength': [String(PRIVATE_KEY_LENGTH)],
            'msKds-DomainID': [key.domainControllerDn],
            'msKds-CreateTime': [dateToFileTime(key.createdAt)],
            'msKds-UseStartTime': [dateToFileTime(key.effectiveAt)]
        },
        binary: {
            'msKds-RootKeyData': [crypto.randomBytes(ROOT_KEY_DATA_BYTES)],
            'msKds-KDFParam': [encodeKdfParam()],
            'msKds-SecretAgreementParam': [encodeDhParameters()]
        }
    };
}
