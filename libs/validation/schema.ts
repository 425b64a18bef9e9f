import { z } from 'zod';

/**
 * Inbound webhook payload schema.
 * Wire fields are PascalCase; the parsed request is camelCase.
 * Unrecognised fields are ignored.
 */

// Characters Active Directory does not accept in a sAMAccountName.
const ACCOUNT_NAME_PATTERN = /^[^"/\\[\]:;|=,+*?<>\s]*$/;

const blankToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const requiredText = (field: string) =>
    z.string({
        required_error: `${field} is required`,
        invalid_type_error: `${field} must be a string`
    })
        .trim()
        .min(1, `${field} must not be blank`);

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

/**
 * Ordered list of identifiers. A comma-separated string is accepted as well,
 * since several workflow engines cannot send JSON arrays in webhook bodies.
 * Blank entries are dropped; an empty result counts as absent.
 */
const identifierList = z
    .union([z.array(z.string()), z.string()])
    .optional()
    .transform(value => {
        if (value === undefined) return undefined;
        const items = (typeof value === 'string' ? value.split(',') : value)
            .map(item => item.trim())
            .filter(item => item.length > 0);
        return items.length > 0 ? items : undefined;
    });

export const ProvisioningRequestSchema = z.preprocess(
    raw => {
        // DNSHostName is the spelling used by the directory and most callers.
        const record = z.record(z.unknown()).safeParse(raw);
        if (record.success && record.data.DnsHostName === undefined && record.data.DNSHostName !== undefined) {
            return { ...record.data, DnsHostName: record.data.DNSHostName };
        }
        return raw;
    },
    z.object({
        AccountName: requiredText('AccountName')
            .max(64, 'AccountName must be at most 64 characters')
            .regex(ACCOUNT_NAME_PATTERN, 'AccountName contains characters the directory does not accept')
            .refine(name => !name.endsWith('$'), 'AccountName must not end with $'),
        DnsHostName: requiredText('DnsHostName'),
        PrincipalsAllowedToRetrieve: identifierList,
        Description: optionalText,
        ServicePrincipalNames: identifierList,
        OrganizationalUnit: optionalText,
        KdsRootKeyId: z.preprocess(blankToUndefined, z.string().trim().uuid('KdsRootKeyId must be a GUID').optional())
    })
).transform(body => ({
    accountName: body.AccountName,
    dnsHostName: body.DnsHostName,
    ...(body.PrincipalsAllowedToRetrieve ? { principalsAllowedToRetrieve: body.PrincipalsAllowedToRetrieve } : {}),
    ...(body.Description !== undefined ? { description: body.Description } : {}),
    ...(body.ServicePrincipalNames ? { servicePrincipalNames: body.ServicePrincipalNames } : {}),
    ...(body.OrganizationalUnit !== undefined ? { organizationalUnit: body.OrganizationalUnit } : {}),
    ...(body.KdsRootKeyId !== undefined ? { kdsRootKeyId: body.KdsRootKeyId.toLowerCase() } : {})
}));

export type ProvisioningRequest = z.output<typeof ProvisioningRequestSchema>;

/**
 * Best-effort account name from an unvalidated payload, for correlating
 * logs and failure reports.
 */
export function accountNameHint(payload: unknown): string {
    if (payload && typeof payload === 'object' && 'AccountName' in payload && typeof payload.AccountName === 'string') {
        return payload.AccountName.trim();
    }
    return '';
}
