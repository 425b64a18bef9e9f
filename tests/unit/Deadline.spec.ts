import { describe, it } from 'node:test';
import assert from 'node:assert';
import { CancelledError, DeadlineExceededError, delay, withDeadline } from '../../libs/execution/deadline.js';

describe('withDeadline', () => {
    it('returns the result of a call that finishes in time', async () => {
        const value = await withDeadline('fast call', 1000, async () => 'done');
        assert.strictEqual(value, 'done');
    });

    it('rejects with DeadlineExceededError and aborts the call signal', async () => {
        let observed: AbortSignal | undefined;

        await assert.rejects(
            withDeadline('slow call', 20, signal => {
                observed = signal;
                return new Promise<string>(() => undefined);
            }),
            (err: unknown) => {
                assert.ok(err instanceof DeadlineExceededError);
                assert.strictEqual(err.message, 'slow call timed out after 20ms');
                return true;
            }
        );

        assert.strictEqual(observed?.aborted, true);
    });

    it('rejects immediately when the caller already aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        let called = false;

        await assert.rejects(
            withDeadline('late call', 1000, async () => { called = true; }, controller.signal),
            CancelledError
        );
        assert.strictEqual(called, false);
    });

    it('rejects with CancelledError when the caller aborts mid-call', async () => {
        const controller = new AbortController();
        const pending = withDeadline('pending call', 1000, () => new Promise<void>(() => undefined), controller.signal);
        controller.abort();

        await assert.rejects(pending, (err: unknown) => {
            assert.ok(err instanceof CancelledError);
            assert.strictEqual(err.message, 'pending call cancelled by caller');
            return true;
        });
    });

    it('propagates the call error unchanged', async () => {
        const failure = new Error('bind failed');
        await assert.rejects(withDeadline('failing call', 1000, async () => { throw failure; }), failure);
    });
});

describe('delay', () => {
    it('resolves immediately for zero', async () => {
        const started = Date.now();
        await delay(0);
        assert.ok(Date.now() - started < 50);
    });
});
