/**
 * Result Reporter
 *
 * Renders a ProvisioningResult for the calling workflow engine (JSON body),
 * for humans (one-line message) and for operations (audit log record).
 */

import crypto from 'crypto';
import { logger } from '../logging/logger.js';
import { RequestContext } from '../context/requestContext.js';
import { ProvisioningResult } from '../provisioning/result.js';
import { AUDIT_EVENT_FOR_STATUS, AuditRecordV1 } from './schema.js';

export interface SuccessResponse {
    Status: 'Success';
    AccountName: string;
    DNSHostName: string;
    DistinguishedName: string;
    SamAccountName: string;
    ObjectGUID: string;
    Created: string;
    Message: string;
    Timestamp: string;
}

export interface AlreadyExistsResponse {
    Status: 'AlreadyExists';
    AccountName: string;
    DistinguishedName: string;
    Message: string;
    Timestamp: string;
}

export interface FailedResponse {
    Status: 'Failed';
    AccountName: string;
    Error: string;
    ErrorDetails: string;
    Timestamp: string;
}

export type ProvisioningResponse = SuccessResponse | AlreadyExistsResponse | FailedResponse;

/**
 * One-line human-readable summary.
 */
export function describeResult(result: ProvisioningResult): string {
    switch (result.status) {
        case 'Success':
            return `gMSA '${result.accountName}' created successfully`;
        case 'AlreadyExists':
            return `gMSA '${result.accountName}' already exists`;
        case 'Failed':
            return `gMSA '${result.accountName}' provisioning failed (${result.errorKind}): ${result.errorMessage}`;
    }
}

/**
 * Wire representation returned to the caller.
 */
export function renderResponse(result: ProvisioningResult): ProvisioningResponse {
    switch (result.status) {
        case 'Success':
            return {
                Status: 'Success',
                AccountName: result.accountName,
                DNSHostName: result.dnsHostName,
                DistinguishedName: result.distinguishedName,
                SamAccountName: result.samAccountName,
                ObjectGUID: result.objectId,
                Created: result.createdAt,
                Message: describeResult(result),
                Timestamp: result.completedAt
            };
        case 'AlreadyExists':
            return {
                Status: 'AlreadyExists',
                AccountName: result.accountName,
                DistinguishedName: result.distinguishedName,
                Message: describeResult(result),
                Timestamp: result.completedAt
            };
        case 'Failed':
            return {
                Status: 'Failed',
                AccountName: result.accountName,
                Error: result.errorKind,
                ErrorDetails: result.errorMessage,
                Timestamp: result.completedAt
            };
    }
}

export function buildAuditRecord(result: ProvisioningResult): AuditRecordV1 {
    const context = RequestContext.current();

    return {
        eventId: crypto.randomUUID(),
        eventType: AUDIT_EVENT_FOR_STATUS[result.status],
        timestamp: result.completedAt,
        ...(context ? { requestId: context.requestId, source: context.source } : {}),
        accountName: result.accountName,
        outcome: result.status,
        ...(result.status === 'Success'
            ? { distinguishedName: result.distinguishedName, objectGuid: result.objectId }
            : {}),
        ...(result.status === 'AlreadyExists' ? { distinguishedName: result.distinguishedName } : {}),
        ...(result.status === 'Failed'
            ? {
                errorKind: result.errorKind,
                ...(result.step ? { step: result.step } : {}),
                ...(result.incidentId ? { incidentId: result.incidentId } : {})
            }
            : {})
    };
}

/**
 * Emits the audit record and returns the wire response.
 */
export function reportResult(result: ProvisioningResult): ProvisioningResponse {
    const audit = buildAuditRecord(result);
    const message = describeResult(result);

    if (result.status === 'Failed') {
        logger.warn({ audit }, message);
    } else {
        logger.info({ audit }, message);
    }

    return renderResponse(result);
}
