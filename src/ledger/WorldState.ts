import type { ChaincodeStub } from 'fabric-shim-api';
import { z } from 'zod';

/** The peer refuses empty composite-key attributes, so a blank id never names a stored record. */
export function isBlank(value: string): boolean {
    return value.trim().length === 0;
}

export type LedgerStub = Pick<ChaincodeStub, 'getState' | 'putState' | 'createCompositeKey' | 'getDateTimestamp' | 'setEvent'>;

/**
 * Typed access to the world state for one transaction.
 *
 * The peer does not let a transaction read its own writes back through
 * `getState`, so writes are mirrored here and served to later reads of the
 * same transaction. Every value is JSON and is decoded through a schema.
 */
export class WorldState {
    private readonly writes = new Map<string, string>();

    constructor(private readonly stub: LedgerStub) {}

    key(objectType: string, ...attributes: string[]): string {
        return this.stub.createCompositeKey(objectType, attributes);
    }

    async exists(key: string): Promise<boolean> {
        return (await this.read(key)) !== undefined;
    }

    async get<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | undefined> {
        const raw = await this.read(key);
        if (raw === undefined) return undefined;
        return schema.parse(JSON.parse(raw));
    }

    async put<T>(key: string, value: T): Promise<void> {
        const json = JSON.stringify(value);
        this.writes.set(key, json);
        await this.stub.putState(key, Buffer.from(json));
    }

    private async read(key: string): Promise<string | undefined> {
        const pending = this.writes.get(key);
        if (pending !== undefined) return pending;

        const data = await this.stub.getState(key);
        if (!data || data.length === 0) return undefined;
        return Buffer.from(data).toString('utf8');
    }
}
