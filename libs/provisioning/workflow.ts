/**
 * Provisioning Workflow
 *
 * Orchestrates one create-if-absent gMSA provisioning invocation:
 * credential fetch, existence check, root key ensure, create, verify.
 *
 * Steps are strictly sequential and never retried here; redelivery is the
 * caller's concern. Every path ends in exactly one ProvisioningResult.
 */

import { logger } from '../logging/logger.js';
import { ProvisioningError, ErrorSanitizer, WorkflowStep } from '../errors/sanitizer.js';
import { CredentialSource } from '../secrets/credentialBroker.js';
import { DirectoryConnector, DirectoryObjectRef, DirectorySession, RootKeyState } from '../directory/types.js';
import { executeIdempotencyGuard } from '../guards/idempotencyGuard.js';
import { toProvisioningError } from '../execution/failureClassifier.js';
import { CancelledError, delay, withDeadline } from '../execution/deadline.js';
import { createValidator } from '../validation/zod-middleware.js';
import { ProvisioningRequest, ProvisioningRequestSchema, accountNameHint } from '../validation/schema.js';
import { RootKeyPolicy } from '../bootstrap/config/provisioning-config.js';
import { WorkflowTracker, isTerminal } from './stateMachine.js';
import {
    ProvisioningResult,
    alreadyExistsResult,
    failedResult,
    successResult
} from './result.js';

export interface WorkflowSettings {
    readonly remoteCallTimeoutMs: number;
    readonly verifySettleMs: number;
    readonly rootKeyPolicy: RootKeyPolicy;
    readonly rootKeyPropagationHours: number;
}

export interface ProvisioningWorkflowDeps {
    readonly credentials: CredentialSource;
    readonly directory: DirectoryConnector;
    readonly settings: WorkflowSettings;
    readonly clock?: () => Date;
}

export interface InvocationOptions {
    /** Caller cancellation; honoured only until Create is issued. */
    readonly signal?: AbortSignal;
}

const validateRequest = createValidator(ProvisioningRequestSchema);

export class ProvisioningWorkflow {
    private readonly clock: () => Date;

    constructor(private readonly deps: ProvisioningWorkflowDeps) {
        this.clock = deps.clock ?? (() => new Date());
    }

    /**
     * Validates an already-parsed payload and runs the workflow.
     * Validation failures return without any remote call.
     */
    async run(payload: unknown, options: InvocationOptions = {}): Promise<ProvisioningResult> {
        let request: ProvisioningRequest;
        try {
            request = validateRequest(payload, 'Workflow:ProvisioningRequest');
        } catch (error: unknown) {
            const err = ErrorSanitizer.sanitize(error, 'Validate', 'ValidationError');
            return this.fail(accountNameHint(payload), err);
        }
        return this.execute(request, options);
    }

    async execute(request: ProvisioningRequest, options: InvocationOptions = {}): Promise<ProvisioningResult> {
        const { accountName } = request;
        const { signal } = options;
        const tracker = new WorkflowTracker(accountName);
        let session: DirectorySession | undefined;

        logger.info({ accountName, dnsHostName: request.dnsHostName }, 'Provisioning workflow started');

        try {
            tracker.advance('CredentialFetch');
            this.checkCancelled(tracker, signal, 'CredentialFetch');
            const credential = await this.deps.credentials.fetchDirectoryCredential(signal);

            tracker.advance('ExistenceCheck');
            this.checkCancelled(tracker, signal, 'ExistenceCheck');
            const connected = await this.openSession(this.deps.directory.connect(credential), signal);
            session = connected;

            const guard = await executeIdempotencyGuard(
                { exists: name => this.remote('ExistenceCheck', () => connected.exists(name), signal) },
                { accountName }
            );
            if (!guard.proceed) {
                tracker.advance('AlreadyExists');
                return this.alreadyExists(accountName, guard.existing.distinguishedName);
            }

            tracker.advance('RootKeyEnsure');
            this.checkCancelled(tracker, signal, 'RootKeyEnsure');
            const rootKey = await this.ensureRootKey(connected, request, signal);
            if (!rootKey.effective) {
                const keyLabel = rootKey.keyId ? `KDS root key ${rootKey.keyId}` : 'KDS root key';
                throw new ProvisioningError(
                    'RootKeyPending',
                    `${keyLabel} is not effective until ${rootKey.effectiveAt ?? 'replication completes'}; provisioning deferred`,
                    { rootKey, policy: this.deps.settings.rootKeyPolicy },
                    { step: 'RootKeyEnsure' }
                );
            }

            this.checkCancelled(tracker, signal, 'Create');
            tracker.advance('Create');
            // The caller's signal is no longer passed on: once Create is
            // issued, Verify must run so the report matches the directory.
            let createdDn: string;
            try {
                const created = await this.remote('Create', () => connected.createAccount(request));
                createdDn = created.distinguishedName;
            } catch (error: unknown) {
                if (error instanceof ProvisioningError && error.kind === 'AlreadyExists') {
                    tracker.advance('AlreadyExists');
                    return this.alreadyExists(accountName, await this.existingDn(connected, request));
                }
                throw error;
            }

            tracker.advance('Verify');
            await delay(this.deps.settings.verifySettleMs);
            const verified = await this.verify(connected, accountName);

            tracker.advance('Success');
            const result = successResult({
                accountName,
                dnsHostName: verified.dnsHostName ?? request.dnsHostName,
                distinguishedName: verified.distinguishedName || createdDn,
                samAccountName: verified.samAccountName,
                objectId: verified.objectGuid,
                createdAt: verified.createdAt
            }, this.clock());

            logger.info({ accountName, distinguishedName: result.distinguishedName, path: tracker.path }, 'Provisioning succeeded');
            return result;
        } catch (error: unknown) {
            const step = tracker.lastStep ?? 'CredentialFetch';
            const err = ErrorSanitizer.sanitize(error, step);
            if (!isTerminal(tracker.current)) {
                tracker.advance('Failed');
            }
            return this.fail(accountName, err, step);
        } finally {
            if (session) {
                await session.close().catch((closeError: unknown) => {
                    logger.debug({ accountName, error: String(closeError) }, 'Directory session close failed');
                });
            }
        }
    }

    /**
     * Awaits the session under the deadline. A session that arrives after the
     * deadline or cancellation is closed as soon as it settles.
     */
    private async openSession(pending: Promise<DirectorySession>, signal: AbortSignal | undefined): Promise<DirectorySession> {
        try {
            return await this.remote('ExistenceCheck', () => pending, signal);
        } catch (error: unknown) {
            pending
                .then(
                    late => late.close(),
                    (connectError: unknown) => {
                        logger.debug({ error: String(connectError) }, 'Abandoned directory connect failed');
                    }
                )
                .catch((closeError: unknown) => {
                    logger.debug({ error: String(closeError) }, 'Abandoned directory session close failed');
                });
            throw error;
        }
    }

    private async ensureRootKey(
        session: DirectorySession,
        request: ProvisioningRequest,
        signal: AbortSignal | undefined
    ): Promise<RootKeyState> {
        const { rootKeyPolicy, rootKeyPropagationHours } = this.deps.settings;
        const rootKeyRequest = {
            policy: rootKeyPolicy,
            propagationHours: rootKeyPropagationHours,
            ...(request.kdsRootKeyId ? { requestedKeyId: request.kdsRootKeyId } : {}),
            now: this.clock()
        };

        try {
            const state = await this.remote('RootKeyEnsure', () => session.ensureRootKey(rootKeyRequest), signal);
            if (state.created) {
                logger.warn({ keyId: state.keyId, effectiveAt: state.effectiveAt, policy: rootKeyPolicy }, 'KDS root key created');
            }
            return state;
        } catch (error: unknown) {
            // A concurrent invocation created the key first; read it back.
            if (error instanceof ProvisioningError && error.kind === 'AlreadyExists') {
                return this.remote('RootKeyEnsure', () => session.ensureRootKey(rootKeyRequest), signal);
            }
            throw error;
        }
    }

    private async verify(session: DirectorySession, accountName: string): Promise<DirectoryObjectRef> {
        try {
            return await this.remote('Verify', () => session.verifyAccount(accountName));
        } catch (error: unknown) {
            if (error instanceof ProvisioningError && error.kind === 'VerificationFailed') {
                throw error;
            }
            throw new ProvisioningError(
                'VerificationFailed',
                `Account ${accountName} could not be read back: ${error instanceof ProvisioningError ? error.publicMessage : String(error)}`,
                { accountName },
                { cause: error, step: 'Verify' }
            );
        }
    }

    private async existingDn(session: DirectorySession, request: ProvisioningRequest): Promise<string> {
        try {
            const existing = await this.remote('Create', () => session.exists(request.accountName));
            if (existing) return existing.distinguishedName;
        } catch (error: unknown) {
            logger.warn({ accountName: request.accountName, error: String(error) }, 'Existing account could not be read after create race');
        }
        return session.distinguishedNameFor(request);
    }

    /**
     * Runs one directory call under the configured deadline and converts any
     * failure into a classified ProvisioningError.
     */
    private async remote<T>(step: WorkflowStep, fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        try {
            return await withDeadline(`directory ${step}`, this.deps.settings.remoteCallTimeoutMs, () => fn(), signal);
        } catch (error: unknown) {
            throw toProvisioningError({ error, surface: 'directory', step });
        }
    }

    private checkCancelled(tracker: WorkflowTracker, signal: AbortSignal | undefined, step: WorkflowStep): void {
        if (tracker.pastPointOfNoReturn) return;
        if (signal?.aborted) {
            throw toProvisioningError({ error: new CancelledError(step), surface: 'directory', step });
        }
    }

    private alreadyExists(accountName: string, distinguishedName: string): ProvisioningResult {
        logger.info({ accountName, distinguishedName }, 'Account already exists; nothing to do');
        return alreadyExistsResult(accountName, distinguishedName, this.clock());
    }

    private fail(accountName: string, err: ProvisioningError, step?: WorkflowStep): ProvisioningResult {
        const failedStep = err.step ?? step;
        return failedResult({
            accountName,
            // "Already exists" here concerns some other object (a root key
            // race that did not settle), never the account.
            errorKind: err.kind === 'AlreadyExists' ? 'InternalError' : err.kind,
            errorMessage: err.publicMessage,
            ...(failedStep ? { step: failedStep } : {}),
            incidentId: err.incidentId
        }, this.clock());
    }
}
