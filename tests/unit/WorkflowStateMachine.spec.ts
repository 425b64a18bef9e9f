import { describe, it } from 'node:test';
import assert from 'node:assert';
import { WorkflowTracker, isTerminal } from '../../libs/provisioning/stateMachine.js';

describe('WorkflowTracker', () => {
    it('follows the create path', () => {
        const tracker = new WorkflowTracker('gmsa-app');
        for (const state of ['CredentialFetch', 'ExistenceCheck', 'RootKeyEnsure', 'Create', 'Verify', 'Success'] as const) {
            tracker.advance(state);
        }

        assert.deepStrictEqual(tracker.path, [
            'Start', 'CredentialFetch', 'ExistenceCheck', 'RootKeyEnsure', 'Create', 'Verify', 'Success'
        ]);
        assert.strictEqual(tracker.current, 'Success');
        assert.strictEqual(tracker.lastStep, 'Verify');
    });

    it('allows AlreadyExists from the existence check and from create', () => {
        const early = new WorkflowTracker('gmsa-app');
        early.advance('CredentialFetch');
        early.advance('ExistenceCheck');
        early.advance('AlreadyExists');
        assert.strictEqual(early.current, 'AlreadyExists');

        const raced = new WorkflowTracker('gmsa-app');
        for (const state of ['CredentialFetch', 'ExistenceCheck', 'RootKeyEnsure', 'Create', 'AlreadyExists'] as const) {
            raced.advance(state);
        }
        assert.strictEqual(raced.current, 'AlreadyExists');
    });

    it('rejects skipping the root key step', () => {
        const tracker = new WorkflowTracker('gmsa-app');
        tracker.advance('CredentialFetch');
        tracker.advance('ExistenceCheck');

        assert.throws(() => tracker.advance('Create'), /Illegal workflow transition ExistenceCheck → Create/);
    });

    it('rejects leaving a terminal state', () => {
        const tracker = new WorkflowTracker('gmsa-app');
        tracker.advance('Failed');

        assert.throws(() => tracker.advance('CredentialFetch'), /Illegal workflow transition Failed → CredentialFetch/);
    });

    it('marks the point of no return at Create', () => {
        const tracker = new WorkflowTracker('gmsa-app');
        tracker.advance('CredentialFetch');
        tracker.advance('ExistenceCheck');
        tracker.advance('RootKeyEnsure');
        assert.strictEqual(tracker.pastPointOfNoReturn, false);

        tracker.advance('Create');
        assert.strictEqual(tracker.pastPointOfNoReturn, true);
    });

    it('knows the terminal states', () => {
        assert.deepStrictEqual(
            (['Start', 'Verify', 'Success', 'AlreadyExists', 'Failed'] as const).map(isTerminal),
            [false, false, true, true, true]
        );
    });
});
