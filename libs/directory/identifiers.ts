/**
 * Encoding helpers for directory-native identifiers and time values.
 */

// 100ns intervals between 1601-01-01 and 1970-01-01.
const FILETIME_EPOCH_OFFSET = 116_444_736_000_000_000n;

/**
 * Formats a 16-byte objectGUID in the registry form Windows shows
 * (first three groups little-endian).
 */
export function formatObjectGuid(raw: Buffer): string {
    if (raw.length !== 16) {
        throw new Error(`objectGUID must be 16 bytes, got ${raw.length}`);
    }
    const hex = (bytes: Buffer) => bytes.toString('hex');
    const reversed = (start: number, end: number) => hex(Buffer.from(raw.subarray(start, end)).reverse());

    return [
        reversed(0, 4),
        reversed(4, 6),
        reversed(6, 8),
        hex(raw.subarray(8, 10)),
        hex(raw.subarray(10, 16))
    ].join('-');
}

export function dateToFileTime(date: Date): string {
    return (BigInt(date.getTime()) * 10_000n + FILETIME_EPOCH_OFFSET).toString();
}

export function fileTimeToDate(fileTime: string): Date {
    const ticks = BigInt(fileTime.trim());
    return new Date(Number((ticks - FILETIME_EPOCH_OFFSET) / 10_000n));
}

/**
 * Converts LDAP GeneralizedTime (e.g. `20261018173200.0Z`) to ISO-8601.
 */
export function generalizedTimeToIso(value: string): string {
    const match = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})(?:[.,](\d+))?Z$/.exec(value.trim());
    if (!match) {
        throw new Error(`Unrecognised GeneralizedTime: ${value}`);
    }
    const [, year, month, day, hour, minute, second, fraction] = match;
    const millis = (fraction ?? '0').padEnd(3, '0').substring(0, 3);
    return `${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}Z`;
}

/**
 * Escapes a value for use inside an LDAP search filter (RFC 4515).
 */
export function escapeFilterValue(value: string): string {
    return value.replace(/[\\*()\0]/g, ch => `\\${ch.charCodeAt(0).toString(16).padStart(2, '0')}`);
}

/**
 * Escapes an attribute value for use in a DN (RFC 4514).
 */
export function escapeDnValue(value: string): string {
    let escaped = value.replace(/[,+"\\<>;=]/g, ch => `\\${ch}`);
    if (escaped.startsWith(' ') || escaped.startsWith('#')) {
        escaped = `\\${escaped}`;
    }
    if (escaped.endsWith(' ') && !escaped.endsWith('\\ ')) {
        escaped = `${escaped.slice(0, -1)}\\ `;
    }
    return escaped;
}

/**
 * Account name as stored in sAMAccountName (managed service accounts
 * carry a trailing `$`).
 */
export function samAccountNameFor(accountName: string): string {
    return `${accountName}$`;
}
