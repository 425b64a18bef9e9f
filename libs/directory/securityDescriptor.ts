/**
 * Binary SID and security descriptor encoding for
 * msDS-GroupMSAMembership.
 *
 * The descriptor is self-relative, owned by BUILTIN\Administrators, with a
 * DACL holding one ACCESS_ALLOWED ACE per principal permitted to retrieve
 * the managed password.
 */

const SE_DACL_PRESENT = 0x0004;
const SE_SELF_RELATIVE = 0x8000;
const ACCESS_ALLOWED_ACE_TYPE = 0x00;
const ACL_REVISION = 0x02;
// GENERIC_ALL as stored on gMSA membership descriptors.
const GMSA_RETRIEVE_MASK = 0x000f01ff;

export const BUILTIN_ADMINISTRATORS_SID = 'S-1-5-32-544';

/**
 * Encodes a SID string (`S-1-5-21-...`) as its binary form.
 */
export function sidFromString(sid: string): Buffer {
    const parts = sid.trim().toUpperCase().split('-');
    if (parts.length < 3 || parts[0] !== 'S') {
        throw new Error(`Invalid SID: ${sid}`);
    }

    const revision = Number(parts[1]);
    const authority = BigInt(parts[2] ?? '');
    const subAuthorities = parts.slice(3).map(part => {
        if (!/^\d+$/.test(part)) throw new Error(`Invalid SID: ${sid}`);
        return Number(part);
    });
    if (subAuthorities.length > 15 || subAuthorities.some(n => n > 0xffffffff)) {
        throw new Error(`Invalid SID: ${sid}`);
    }

    const buffer = Buffer.alloc(8 + subAuthorities.length * 4);
    buffer.writeUInt8(revision, 0);
    buffer.writeUInt8(subAuthorities.length, 1);
    // 48-bit identifier authority, big-endian
    buffer.writeUIntBE(Number(authority), 2, 6);
    subAuthorities.forEach((value, index) => buffer.writeUInt32LE(value, 8 + index * 4));
    return buffer;
}

export function sidToString(raw: Buffer): string {
    if (raw.length < 8) {
        throw new Error('SID buffer too short');
    }
    const count = raw.readUInt8(1);
    const authority = raw.readUIntBE(2, 6);
    const subAuthorities: number[] = [];
    for (let i = 0; i < count; i++) {
        subAuthorities.push(raw.readUInt32LE(8 + i * 4));
    }
    return ['S', raw.readUInt8(0), authority, ...subAuthorities].join('-');
}

export function isSidString(value: string): boolean {
    return /^S-1-\d+(-\d+)*$/i.test(value.trim());
}

function encodeAce(sid: Buffer): Buffer {
    const ace = Buffer.alloc(8 + sid.length);
    ace.writeUInt8(ACCESS_ALLOWED_ACE_TYPE, 0);
    ace.writeUInt8(0, 1);
    ace.writeUInt16LE(ace.length, 2);
    ace.writeUInt32LE(GMSA_RETRIEVE_MASK, 4);
    sid.copy(ace, 8);
    return ace;
}

function encodeAcl(sids: readonly Buffer[]): Buffer {
    const aces = sids.map(encodeAce);
    const header = Buffer.alloc(8);
    const size = header.length + aces.reduce((sum, ace) => sum + ace.length, 0);
    header.writeUInt8(ACL_REVISION, 0);
    header.writeUInt8(0, 1);
    header.writeUInt16LE(size, 2);
    header.writeUInt16LE(aces.length, 4);
    header.writeUInt16LE(0, 6);
    return Buffer.concat([header, ...aces]);
}

/**
 * Builds the msDS-GroupMSAMembership value for the given principal SIDs.
 */
export function buildGroupMsaMembership(principalSids: readonly Buffer[]): Buffer {
    const owner = sidFromString(BUILTIN_ADMINISTRATORS_SID);
    const dacl = encodeAcl(principalSids);

    const header = Buffer.alloc(20);
    const daclOffset = header.length;
    const ownerOffset = daclOffset + dacl.length;

    header.writeUInt8(1, 0);                                   // Revision
    header.writeUInt8(0, 1);                                   // Sbz1
    header.writeUInt16LE(SE_SELF_RELATIVE | SE_DACL_PRESENT, 2);
    header.writeUInt32LE(ownerOffset, 4);                      // Owner
    header.writeUInt32LE(0, 8);                                // Group
    header.writeUInt32LE(0, 12);                               // Sacl
    header.writeUInt32LE(daclOffset, 16);                      // Dacl

    return Buffer.concat([header, dacl, owner]);
}
