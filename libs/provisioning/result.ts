/**
 * Provisioning result.
 *
 * Exactly one result is produced per invocation. It is assembled once from
 * local step outcomes and frozen; nothing mutates it afterwards.
 */

import { ErrorKind } from '../errors/errorKinds.js';
import { ProvisioningError, WorkflowStep } from '../errors/sanitizer.js';

export interface SuccessResult {
    readonly status: 'Success';
    readonly accountName: string;
    readonly dnsHostName: string;
    readonly distinguishedName: string;
    readonly samAccountName: string;
    readonly objectId: string;
    /** Directory whenCreated, ISO-8601 */
    readonly createdAt: string;
    readonly completedAt: string;
}

export interface AlreadyExistsResult {
    readonly status: 'AlreadyExists';
    readonly accountName: string;
    readonly distinguishedName: string;
    readonly completedAt: string;
}

export interface FailedResult {
    readonly status: 'Failed';
    readonly accountName: string;
    readonly errorKind: Exclude<ErrorKind, 'AlreadyExists'>;
    readonly errorMessage: string;
    readonly step?: WorkflowStep;
    readonly incidentId?: string;
    readonly completedAt: string;
}

export type ProvisioningResult = SuccessResult | AlreadyExistsResult | FailedResult;

export type ProvisioningStatus = ProvisioningResult['status'];

export function successResult(fields: Omit<SuccessResult, 'status' | 'completedAt'>, now: Date = new Date()): SuccessResult {
    return Object.freeze({ status: 'Success', ...fields, completedAt: now.toISOString() });
}

export function alreadyExistsResult(accountName: string, distinguishedName: string, now: Date = new Date()): AlreadyExistsResult {
    return Object.freeze({ status: 'AlreadyExists', accountName, distinguishedName, completedAt: now.toISOString() });
}

export function failedResult(
    fields: Omit<FailedResult, 'status' | 'completedAt'>,
    now: Date = new Date()
): FailedResult {
    return Object.freeze({ status: 'Failed', ...fields, completedAt: now.toISOString() });
}

/**
 * Failed result for an error raised outside the workflow (token check,
 * body parsing). AlreadyExists is never a failure, so it cannot appear here.
 */
export function failedResultFrom(err: ProvisioningError, accountName = '', now: Date = new Date()): FailedResult {
    return failedResult({
        accountName,
        errorKind: err.kind === 'AlreadyExists' ? 'InternalError' : err.kind,
        errorMessage: err.publicMessage,
        ...(err.step ? { step: err.step } : {}),
        incidentId: err.incidentId
    }, now);
}
