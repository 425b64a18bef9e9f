/**
 * Provisioning state machine.
 *
 * Start → CredentialFetch → ExistenceCheck → AlreadyExists
 *                                          ↘ RootKeyEnsure → Create → Verify → Success
 * Any non-terminal state may move to Failed. Create may also end in
 * AlreadyExists when a concurrent invocation won the race.
 */

import { logger } from '../logging/logger.js';
import { WorkflowStep } from '../errors/sanitizer.js';

export type WorkflowState = 'Start' | WorkflowStep | 'Success' | 'AlreadyExists' | 'Failed';

const TERMINAL_STATES: readonly WorkflowState[] = ['Success', 'AlreadyExists', 'Failed'];

const TRANSITIONS: Readonly<Record<WorkflowState, readonly WorkflowState[]>> = {
    Start: ['Authenticate', 'Parse', 'Validate', 'CredentialFetch', 'Failed'],
    Authenticate: ['Parse', 'Failed'],
    Parse: ['Validate', 'Failed'],
    Validate: ['CredentialFetch', 'Failed'],
    CredentialFetch: ['ExistenceCheck', 'Failed'],
    ExistenceCheck: ['RootKeyEnsure', 'AlreadyExists', 'Failed'],
    RootKeyEnsure: ['Create', 'Failed'],
    Create: ['Verify', 'AlreadyExists', 'Failed'],
    Verify: ['Success', 'Failed'],
    Success: [],
    AlreadyExists: [],
    Failed: []
};

export function isTerminal(state: WorkflowState): boolean {
    return TERMINAL_STATES.includes(state);
}

/**
 * Tracks one invocation's progress and rejects illegal transitions.
 */
export class WorkflowTracker {
    private state: WorkflowState = 'Start';
    private readonly history: WorkflowState[] = ['Start'];
    private mutationIssued = false;

    constructor(private readonly accountName: string) { }

    get current(): WorkflowState {
        return this.state;
    }

    /** Last non-terminal step reached, used to attribute failures. */
    get lastStep(): WorkflowStep | undefined {
        const steps = this.history.filter((s): s is WorkflowStep => s !== 'Start' && !isTerminal(s));
        return steps[steps.length - 1];
    }

    /** Whether Create has been issued; from then on cancellation is ignored. */
    get pastPointOfNoReturn(): boolean {
        return this.mutationIssued;
    }

    get path(): readonly WorkflowState[] {
        return [...this.history];
    }

    advance(next: WorkflowState): void {
        const allowed = TRANSITIONS[this.state];
        if (!allowed.includes(next)) {
            throw new Error(`Illegal workflow transition ${this.state} → ${next}`);
        }

        logger.debug({ accountName: this.accountName, from: this.state, to: next }, 'Workflow transition');

        this.state = next;
        this.history.push(next);
        if (next === 'Create') {
            this.mutationIssued = true;
        }
    }
}
