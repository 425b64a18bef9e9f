/**
 * Unit Tests: Webhook Gateway
 *
 * @see libs/gateway/webhookGateway.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { WebhookGateway, statusCodeFor, tokensMatch } from '../../libs/gateway/webhookGateway.js';
import { ProvisioningWorkflow } from '../../libs/provisioning/workflow.js';
import { failedResult } from '../../libs/provisioning/result.js';
import { CredentialBroker } from '../../libs/secrets/credentialBroker.js';
import { InMemorySecretStore } from '../../libs/secrets/secretStore.js';
import { InMemoryDirectory } from '../../libs/directory/inMemoryDirectory.js';
import { ERROR_KINDS, ERROR_KIND_METADATA } from '../../libs/errors/errorKinds.js';
import type { RootKeyPolicy } from '../../libs/bootstrap/config/provisioning-config.js';

const SECRETS = {
    DomainAdminUsername: 'CONTOSO\\svc-provisioner',
    DomainAdminPassword: 'test-secret',
    WebhookToken: 'test-token'
};

const BODY = JSON.stringify({ AccountName: 'gmsa-web', DNSHostName: 'web.contoso.com' });

function setup(options: { tokenRequired?: boolean; secrets?: Record<string, string>; rootKeyPolicy?: RootKeyPolicy } = {}) {
    const store = new InMemorySecretStore(options.secrets ?? SECRETS);
    const directory = new InMemoryDirectory();
    const credentials = new CredentialBroker(store, { timeoutMs: 1000 });
    const workflow = new ProvisioningWorkflow({
        credentials,
        directory,
        settings: {
            remoteCallTimeoutMs: 1000,
            verifySettleMs: 0,
            rootKeyPolicy: options.rootKeyPolicy ?? 'immediate',
            rootKeyPropagationHours: 10
        }
    });
    const gateway = new WebhookGateway(workflow, credentials, {
        tokenRequired: options.tokenRequired ?? true,
        tokenHeader: 'x-webhook-token'
    });
    return { gateway, store, directory };
}

describe('WebhookGateway', () => {
    describe('token check', () => {
        it('rejects a missing token with 401 before reading the body', async () => {
            const { gateway, store, directory } = setup();

            const response = await gateway.handle({ headers: {}, body: BODY });

            assert.strictEqual(response.statusCode, 401);
            assert.strictEqual(response.body.Status, 'Failed');
            if (response.body.Status === 'Failed') {
                assert.strictEqual(response.body.Error, 'Unauthorized');
                assert.strictEqual(response.body.AccountName, '');
            }
            assert.strictEqual(store.reads, 1);
            assert.deepStrictEqual(directory.operations, []);
        });

        it('rejects a wrong token even when the body is malformed', async () => {
            const { gateway } = setup();

            const response = await gateway.handle({ headers: { 'x-webhook-token': 'wrong-token' }, body: '{not json' });

            assert.strictEqual(response.statusCode, 401);
        });

        it('answers 503 when the token secret cannot be read', async () => {
            const { gateway } = setup({ secrets: { DomainAdminUsername: 'CONTOSO\\svc-provisioner' } });

            const response = await gateway.handle({ headers: { 'x-webhook-token': 'test-token' }, body: BODY });

            assert.strictEqual(response.statusCode, 503);
            assert.strictEqual(response.body.Status === 'Failed' ? response.body.Error : '', 'CredentialUnavailable');
        });

        it('uses the first value of a repeated header', async () => {
            const { gateway } = setup();

            const response = await gateway.handle({ headers: { 'x-webhook-token': ['test-token', 'other'] }, body: BODY });

            assert.strictEqual(response.statusCode, 201);
        });

        it('skips the check when no token is required', async () => {
            const { gateway, store } = setup({ tokenRequired: false });

            const response = await gateway.handle({ headers: {}, body: BODY });

            assert.strictEqual(response.statusCode, 201);
            assert.strictEqual(store.reads, 2);
        });
    });

    it('answers 400 MalformedPayload for a body that is not JSON', async () => {
        const { gateway, store, directory } = setup();

        const response = await gateway.handle({ headers: { 'x-webhook-token': 'test-token' }, body: '{"AccountName":' });

        assert.strictEqual(response.statusCode, 400);
        assert.deepStrictEqual(
            response.body.Status === 'Failed' ? [response.body.Error, response.body.ErrorDetails] : [],
            ['MalformedPayload', 'Request body is not valid JSON']
        );
        assert.strictEqual(store.reads, 1);
        assert.deepStrictEqual(directory.operations, []);
    });

    it('answers 400 MalformedPayload for an empty body', async () => {
        const { gateway } = setup({ tokenRequired: false });

        const response = await gateway.handle({ headers: {}, body: undefined });

        assert.strictEqual(response.statusCode, 400);
    });

    it('answers 400 ValidationError without fetching directory credentials', async () => {
        const { gateway, store, directory } = setup();

        const response = await gateway.handle({
            headers: { 'x-webhook-token': 'test-token' },
            body: JSON.stringify({ AccountName: 'gmsa-web' })
        });

        assert.strictEqual(response.statusCode, 400);
        assert.deepStrictEqual(
            response.body.Status === 'Failed' ? [response.body.AccountName, response.body.Error, response.body.ErrorDetails] : [],
            ['gmsa-web', 'ValidationError', 'DnsHostName is required']
        );
        assert.strictEqual(store.reads, 1);
        assert.deepStrictEqual(directory.operations, []);
    });

    it('answers 201 on create and 200 on a duplicate', async () => {
        const { gateway } = setup();
        const request = { headers: { 'x-webhook-token': 'test-token' }, body: BODY };

        const first = await gateway.handle(request);
        const second = await gateway.handle(request);

        assert.strictEqual(first.statusCode, 201);
        assert.strictEqual(first.body.Status, 'Success');
        assert.strictEqual(second.statusCode, 200);
        assert.strictEqual(second.body.Status, 'AlreadyExists');
    });

    it('answers 409 while the root key is pending', async () => {
        const { gateway } = setup({ rootKeyPolicy: 'deferred' });

        const response = await gateway.handle({ headers: { 'x-webhook-token': 'test-token' }, body: BODY });

        assert.strictEqual(response.statusCode, 409);
    });

    it('answers 499 when the caller has gone away', async () => {
        const { gateway } = setup();
        const controller = new AbortController();
        controller.abort();

        const response = await gateway.handle({ headers: { 'x-webhook-token': 'test-token' }, body: BODY, signal: controller.signal });

        assert.strictEqual(response.statusCode, 499);
    });
});

describe('statusCodeFor', () => {
    it('uses the error kind metadata for failures', () => {
        for (const kind of ERROR_KINDS) {
            if (kind === 'AlreadyExists') continue;
            const result = failedResult({ accountName: 'gmsa-web', errorKind: kind, errorMessage: 'x' });
            assert.strictEqual(statusCodeFor(result), ERROR_KIND_METADATA[kind].httpStatus);
        }
    });

    it('maps the documented statuses', () => {
        const status = (kind: Exclude<(typeof ERROR_KINDS)[number], 'AlreadyExists'>) =>
            statusCodeFor(failedResult({ accountName: 'gmsa-web', errorKind: kind, errorMessage: 'x' }));

        assert.deepStrictEqual(
            [
                status('ValidationError'), status('MalformedPayload'), status('Unauthorized'),
                status('PermissionDenied'), status('InvalidParameter'), status('RootKeyPending'),
                status('CredentialUnavailable'), status('DirectoryUnreachable'), status('VerificationFailed'),
                status('Cancelled'), status('InternalError')
            ],
            [400, 400, 401, 403, 422, 409, 503, 502, 500, 499, 500]
        );
    });
});

describe('tokensMatch', () => {
    it('compares exactly', () => {
        assert.strictEqual(tokensMatch('test-token', 'test-token'), true);
        assert.strictEqual(tokensMatch('test-token ', 'test-token'), false);
        assert.strictEqual(tokensMatch('', 'test-token'), false);
    });
});
