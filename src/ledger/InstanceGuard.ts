import { EscrowError } from '../errors';

/**
 * Per-instance mutual exclusion for one transaction. An operation that calls
 * out to the asset ledger holds its instance for the whole call, so a transfer
 * that calls back into the same instance is turned away.
 */
export class InstanceGuard {
    private readonly held = new Set<string>();

    async hold<T>(handle: string, work: () => Promise<T>): Promise<T> {
        if (this.held.has(handle)) {
            throw new EscrowError('REENTRANT_CALL', `Escrow ${handle} is already being settled`);
        }
        this.held.add(handle);
        try {
            return await work();
        } finally {
            this.held.delete(handle);
        }
    }

    isHeld(handle: string): boolean {
        return this.held.has(handle);
    }
}
