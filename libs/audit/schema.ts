/**
 * Provisioning audit schema, v1
 *
 * One record per invocation, emitted on the structured log stream for
 * operational search and alerting.
 */

import type { ErrorKind } from '../errors/errorKinds.js';
import type { WorkflowStep } from '../errors/sanitizer.js';
import type { ProvisioningStatus } from '../provisioning/result.js';

export type AuditEventType =
    | 'GMSA_PROVISIONED'
    | 'GMSA_ALREADY_EXISTS'
    | 'GMSA_PROVISIONING_FAILED';

export interface AuditRecordV1 {
    eventId: string;        // UUID
    eventType: AuditEventType;
    timestamp: string;      // ISO-8601
    requestId?: string;
    source?: 'webhook' | 'cli';
    accountName: string;
    outcome: ProvisioningStatus;
    distinguishedName?: string;
    objectGuid?: string;
    errorKind?: ErrorKind;
    step?: WorkflowStep;
    incidentId?: string;
}

export const AUDIT_EVENT_FOR_STATUS: Readonly<Record<ProvisioningStatus, AuditEventType>> = {
    Success: 'GMSA_PROVISIONED',
    AlreadyExists: 'GMSA_ALREADY_EXISTS',
    Failed: 'GMSA_PROVISIONING_FAILED'
};
