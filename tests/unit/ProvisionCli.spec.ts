/**
 * Unit Tests: operator CLI
 *
 * @see scripts/ops/provision_gmsa.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { provisionFromText } from '../../scripts/ops/provision_gmsa.js';
import { ProvisioningWorkflow } from '../../libs/provisioning/workflow.js';
import { CredentialBroker } from '../../libs/secrets/credentialBroker.js';
import { InMemorySecretStore } from '../../libs/secrets/secretStore.js';
import { InMemoryDirectory } from '../../libs/directory/inMemoryDirectory.js';

function workflow(): { workflow: ProvisioningWorkflow; directory: InMemoryDirectory } {
    const directory = new InMemoryDirectory();
    const credentials = new CredentialBroker(new InMemorySecretStore({
        DomainAdminUsername: 'CONTOSO\\svc-provisioner',
        DomainAdminPassword: 'test-secret'
    }), { timeoutMs: 1000 });
    return {
        directory,
        workflow: new ProvisioningWorkflow({
            credentials,
            directory,
            settings: { remoteCallTimeoutMs: 1000, verifySettleMs: 0, rootKeyPolicy: 'immediate', rootKeyPropagationHours: 10 }
        })
    };
}

const REQUEST = JSON.stringify({ AccountName: 'gmsa-batch', DNSHostName: 'batch.contoso.com' });

describe('provisionFromText', () => {
    it('exits 0 after creating the account', async () => {
        const { workflow: wf } = workflow();

        const outcome = await provisionFromText(wf, REQUEST);

        assert.strictEqual(outcome.exitCode, 0);
        assert.strictEqual(outcome.response.Status, 'Success');
        assert.strictEqual(outcome.response.AccountName, 'gmsa-batch');
    });

    it('exits 0 when the account already exists', async () => {
        const { workflow: wf } = workflow();
        await provisionFromText(wf, REQUEST);

        const outcome = await provisionFromText(wf, REQUEST);

        assert.strictEqual(outcome.exitCode, 0);
        assert.strictEqual(outcome.response.Status, 'AlreadyExists');
    });

    it('exits 1 on a file that is not JSON', async () => {
        const { workflow: wf, directory } = workflow();

        const outcome = await provisionFromText(wf, 'AccountName: gmsa-batch');

        assert.strictEqual(outcome.exitCode, 1);
        assert.strictEqual(outcome.response.Status, 'Failed');
        if (outcome.response.Status === 'Failed') {
            assert.strictEqual(outcome.response.Error, 'MalformedPayload');
            assert.strictEqual(outcome.response.ErrorDetails, 'Request file is not valid JSON');
        }
        assert.deepStrictEqual(directory.operations, []);
    });

    it('exits 1 on a request that fails validation', async () => {
        const { workflow: wf } = workflow();

        const outcome = await provisionFromText(wf, JSON.stringify({ AccountName: 'gmsa-batch' }));

        assert.strictEqual(outcome.exitCode, 1);
        assert.strictEqual(outcome.response.Status === 'Failed' ? outcome.response.Error : '', 'ValidationError');
        assert.strictEqual(outcome.response.AccountName, 'gmsa-batch');
    });
});
