import { z } from 'zod';
import { Keys } from '../config';
import { ESCROW_STATUSES, EscrowStatus, Principal } from '../models/Escrow';
import { StatusCounts } from '../models/Factory';
import { WorldState, isBlank } from '../ledger/WorldState';

const Count = z.number().int().nonnegative();
const Volume = z.string().regex(/^\d+$/);
const Handle = z.string().min(1);

/**
 * The factory's global bookkeeping. Nothing else writes these keys, which keeps
 * `sum(statusCounts) === totalEscrows` checkable in one place.
 */
export class AggregateCounters {
    constructor(private readonly world: WorldState) {}

    /** Books a new FUNDED instance; returns its position in creation order. */
    async recordCreation(handle: string, payer: Principal, payee: Principal, amount: bigint): Promise<number> {
        const sequence = (await this.totalEscrows()) + 1;
        await this.world.put(this.world.key(Keys.ESCROW_INDEX, String(sequence)), handle);
        await this.world.put(this.world.key(Keys.COUNTER, 'total'), sequence);

        const volume = await this.totalVolume();
        await this.world.put(this.world.key(Keys.COUNTER, 'volume'), (volume + amount).toString());

        await this.bumpParticipant(payer);
        await this.bumpParticipant(payee);
        await this.adjustStatus(EscrowStatus.FUNDED, 1);
        return sequence;
    }

    /** Moves one instance between status tallies. The decrement never goes below zero. */
    async moveStatus(from: EscrowStatus, to: EscrowStatus): Promise<void> {
        if (from === to) return;
        if ((await this.statusCount(from)) > 0) {
            await this.adjustStatus(from, -1);
        }
        await this.adjustStatus(to, 1);
    }

    async totalEscrows(): Promise<number> {
        return (await this.world.get(this.world.key(Keys.COUNTER, 'total'), Count)) ?? 0;
    }

    async totalVolume(): Promise<bigint> {
        const stored = await this.world.get(this.world.key(Keys.COUNTER, 'volume'), Volume);
        return stored === undefined ? 0n : BigInt(stored);
    }

    async statusCount(status: EscrowStatus): Promise<number> {
        return (await this.world.get(this.world.key(Keys.STATUS_COUNT, status), Count)) ?? 0;
    }

    async statusCounts(): Promise<StatusCounts> {
        const counts: StatusCounts = {
            [EscrowStatus.FUNDED]: 0,
            [EscrowStatus.RELEASED]: 0,
            [EscrowStatus.REFUNDED]: 0,
            [EscrowStatus.DISPUTED]: 0,
            [EscrowStatus.RESOLVED]: 0,
        };
        for (const status of ESCROW_STATUSES) {
            counts[status] = await this.statusCount(status);
        }
        return counts;
    }

    async participantCount(participant: Principal): Promise<number> {
        if (isBlank(participant)) return 0;
        return (await this.world.get(this.world.key(Keys.PARTICIPANT_COUNT, participant), Count)) ?? 0;
    }

    /** Every instance handle in creation order. */
    async handles(): Promise<string[]> {
        const total = await this.totalEscrows();
        const handles: string[] = [];
        for (let sequence = 1; sequence <= total; sequence++) {
            const handle = await this.world.get(this.world.key(Keys.ESCROW_INDEX, String(sequence)), Handle);
            if (handle !== undefined) handles.push(handle);
        }
        return handles;
    }

    private async bumpParticipant(participant: Principal): Promise<void> {
        const count = await this.participantCount(participant);
        await this.world.put(this.world.key(Keys.PARTICIPANT_COUNT, participant), count + 1);
    }

    private async adjustStatus(status: EscrowStatus, delta: number): Promise<void> {
        const count = await this.statusCount(status);
        await this.world.put(this.world.key(Keys.STATUS_COUNT, status), count + delta);
    }
}
