import { LedgerStub } from '../../src/ledger/WorldState';

export interface EmittedEvent {
    name: string;
    payload: string;
}

/**
 * In-process stand-in for the peer's chaincode stub. Like the peer, writes go
 * to a per-transaction write set that `getState` does not see, and only
 * `commit` makes them visible to later transactions.
 */
export class MemoryStub implements LedgerStub {
    readonly committed = new Map<string, Uint8Array>();
    readonly events: EmittedEvent[] = [];
    private writes = new Map<string, Uint8Array>();
    private event?: EmittedEvent;
    private seconds = Date.UTC(2026, 0, 1) / 1000;

    async getState(key: string): Promise<Uint8Array> {
        return this.committed.get(key) ?? new Uint8Array(0);
    }

    async putState(key: string, value: Uint8Array): Promise<void> {
        this.writes.set(key, value);
    }

    createCompositeKey(objectType: string, attributes: string[]): string {
        for (const part of [objectType, ...attributes]) {
            if (part.length === 0) throw new Error('object type or attribute not a non-zero length string');
        }
        return `\u0000${objectType}\u0000${attributes.map((attribute) => `${attribute}\u0000`).join('')}`;
    }

    getDateTimestamp(): Date {
        return new Date(this.seconds * 1000);
    }

    setEvent(name: string, payload: Uint8Array): void {
        this.event = { name, payload: Buffer.from(payload).toString('utf8') };
    }

    get now(): number {
        return this.seconds;
    }

    setTime(seconds: number): void {
        this.seconds = seconds;
    }

    advance(seconds: number): void {
        this.seconds += seconds;
    }

    commit(): void {
        for (const [key, value] of this.writes) this.committed.set(key, value);
        if (this.event) this.events.push(this.event);
        this.reset();
    }

    rollback(): void {
        this.reset();
    }

    /** Committed world state as decoded JSON, for comparing before and after. */
    snapshot(): Record<string, string> {
        const state: Record<string, string> = {};
        for (const [key, value] of this.committed) state[key] = Buffer.from(value).toString('utf8');
        return state;
    }

    private reset(): void {
        this.writes = new Map();
        this.event = undefined;
    }
}
