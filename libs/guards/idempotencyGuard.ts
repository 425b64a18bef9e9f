/**
 * Idempotency Guard
 *
 * Pre-flight existence check that decides whether the workflow may create
 * the account.
 *
 * Best effort only: the check and the create are not atomic, so two
 * concurrent invocations can both pass. The directory's uniqueness
 * constraint decides the race, and the workflow reclassifies the loser's
 * "already exists" into an AlreadyExists result.
 */

import { logger } from '../logging/logger.js';
import { DirectoryObjectRef, DirectorySession } from '../directory/types.js';

/**
 * Idempotency guard context.
 */
export interface IdempotencyGuardContext {
    readonly accountName: string;
}

/**
 * Idempotency guard result.
 */
export type IdempotencyGuardResult =
    | { proceed: true }
    | { proceed: false; reason: 'ALREADY_EXISTS'; existing: DirectoryObjectRef };

/**
 * Execute idempotency guard against the directory.
 */
export async function executeIdempotencyGuard(
    directory: Pick<DirectorySession, 'exists'>,
    context: IdempotencyGuardContext
): Promise<IdempotencyGuardResult> {
    const { accountName } = context;

    const existing = await directory.exists(accountName);

    if (!existing) {
        logger.debug({ accountName }, 'Idempotency guard passed: account absent');
        return { proceed: true };
    }

    logger.info({
        accountName,
        distinguishedName: existing.distinguishedName
    }, 'Idempotency guard stopped creation: account already exists');

    return { proceed: false, reason: 'ALREADY_EXISTS', existing };
}
