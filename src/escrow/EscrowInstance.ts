import { Keys } from '../config';
import { EscrowError, ErrorCode } from '../errors';
import { EscrowContext } from '../ledger/EscrowContext';
import { isBlank } from '../ledger/WorldState';
import {
    BasicInfo,
    DisputeInfo,
    EscrowInit,
    EscrowOperations,
    EscrowRecord,
    EscrowStatus,
    FeeInfo,
    Principal,
    Timestamps,
} from '../models/Escrow';
import { AggregateCounters } from './AggregateCounters';
import { FeeSplit, splitFee } from './fees';

export function escrowKey(ctx: EscrowContext, handle: string): string {
    return ctx.world.key(Keys.ESCROW, handle);
}

/**
 * The standard escrow state machine: FUNDED, then exactly one of RELEASED,
 * REFUNDED or DISPUTED, and DISPUTED only ever to RESOLVED.
 *
 * Every settlement runs under the context's instance guard and persists its
 * terminal status before the first transfer leaves the instance account.
 */
export class EscrowInstance implements EscrowOperations {
    constructor(private readonly ctx: EscrowContext, private readonly state: EscrowRecord) {}

    /** Writes the record of a freshly funded instance. */
    static async open(ctx: EscrowContext, template: string, init: EscrowInit): Promise<EscrowInstance> {
        const createdAt = ctx.now;
        const record: EscrowRecord = {
            handle: init.handle,
            docType: 'escrow',
            template,
            factory: init.factory,
            orderId: init.orderId,
            payer: init.payer,
            payee: init.payee,
            asset: init.asset,
            amount: init.amount.toString(),
            metadata: init.metadata,
            createdAt,
            releaseAfter: createdAt + init.releaseDelay,
            feeBips: init.feeBips,
            feeCollector: init.feeCollector,
            status: EscrowStatus.FUNDED,
        };
        const instance = new EscrowInstance(ctx, record);
        await instance.save();

        ctx.emit('EscrowInitialized', {
            instance: record.handle,
            payer: record.payer,
            payee: record.payee,
            asset: record.asset,
            amount: record.amount,
            metadata: record.metadata,
        });
        return instance;
    }

    get handle(): string {
        return this.state.handle;
    }

    get status(): EscrowStatus {
        return this.state.status;
    }

    async release(caller: Principal): Promise<void> {
        await this.ctx.guard.hold(this.handle, async () => {
            this.requireCaller(caller, this.state.payer, 'NOT_PAYER', 'Only the payer can release funds');
            this.requireStatus(EscrowStatus.FUNDED);
            await this.releaseToPayee();
        });
    }

    async refund(caller: Principal): Promise<void> {
        await this.ctx.guard.hold(this.handle, async () => {
            this.requireCaller(caller, this.state.payee, 'NOT_PAYEE', 'Only the payee can refund the payer');
            this.requireStatus(EscrowStatus.FUNDED);

            const prior = await this.transition(EscrowStatus.REFUNDED);
            await this.payPayer();
            this.ctx.emit('FundsRefunded', { instance: this.handle, recipient: this.state.payer, amount: this.state.amount });
            await this.counters().moveStatus(prior, EscrowStatus.REFUNDED);
        });
    }

    /** Lets anyone settle to the payee once the time lock has passed. */
    async autoRelease(): Promise<void> {
        await this.ctx.guard.hold(this.handle, async () => {
            this.requireStatus(EscrowStatus.FUNDED);
            if (this.ctx.now < this.state.releaseAfter) {
                throw new EscrowError('RELEASE_TOO_EARLY', `Escrow ${this.handle} cannot auto-release before ${this.state.releaseAfter}`);
            }
            await this.releaseToPayee();
        });
    }

    async raiseDispute(caller: Principal, reason: string): Promise<void> {
        await this.ctx.guard.hold(this.handle, async () => {
            if (caller !== this.state.payer && caller !== this.state.payee) {
                throw new EscrowError('NOT_PARTY', 'Only the payer or the payee can raise a dispute');
            }
            this.requireStatus(EscrowStatus.FUNDED);
            if (isBlank(reason)) {
                throw new EscrowError('EMPTY_REASON', 'A dispute needs a reason');
            }

            this.state.disputeReason = reason;
            this.state.disputeRaisedBy = caller;
            const prior = await this.transition(EscrowStatus.DISPUTED);
            this.ctx.emit('DisputeRaised', { instance: this.handle, raiser: caller, reason });
            await this.counters().moveStatus(prior, EscrowStatus.DISPUTED);
        });
    }

    /**
     * Settles a dispute for the given winner. Only the owning factory calls
     * this; it checks the arbitrator and keeps its own tallies.
     */
    async resolveDispute(caller: Principal, winner: Principal): Promise<void> {
        await this.ctx.guard.hold(this.handle, async () => {
            this.requireCaller(caller, this.state.factory, 'NOT_FACTORY', 'Disputes are resolved through the factory');
            this.requireStatus(EscrowStatus.DISPUTED);
            if (winner !== this.state.payee && winner !== this.state.payer) {
                throw new EscrowError('INVALID_WINNER', `Winner must be the payer or the payee of ${this.handle}`);
            }

            await this.transition(EscrowStatus.RESOLVED);
            if (winner === this.state.payee) {
                const { fee, net } = await this.payPayee();
                this.ctx.emit('DisputeResolved', { instance: this.handle, winner, netAmount: net.toString(), feeAmount: fee.toString() });
            } else {
                await this.payPayer();
                this.ctx.emit('DisputeResolved', { instance: this.handle, winner, netAmount: this.state.amount, feeAmount: '0' });
            }
        });
    }

    record(): EscrowRecord {
        return { ...this.state };
    }

    basicInfo(): BasicInfo {
        const { payer, payee, asset, amount, status } = this.state;
        return { payer, payee, asset, amount, status };
    }

    feeInfo(): FeeInfo {
        const { fee, net } = this.split();
        return {
            feeBips: this.state.feeBips,
            collector: this.state.feeCollector,
            feeAmount: fee.toString(),
            netAmount: net.toString(),
        };
    }

    disputeInfo(): DisputeInfo {
        return {
            hasDispute: this.state.disputeRaisedBy !== undefined,
            raisedBy: this.state.disputeRaisedBy ?? '',
            reason: this.state.disputeReason ?? '',
        };
    }

    timestamps(): Timestamps {
        return {
            createdAt: this.state.createdAt,
            releaseAfter: this.state.releaseAfter,
            timeLeft: this.timeLeft(),
        };
    }

    timeLeft(): number {
        if (this.state.status !== EscrowStatus.FUNDED) return 0;
        return Math.max(0, this.state.releaseAfter - this.ctx.now);
    }

    canAutoRelease(): boolean {
        return this.state.status === EscrowStatus.FUNDED && this.ctx.now >= this.state.releaseAfter;
    }

    isActive(): boolean {
        return this.state.status === EscrowStatus.FUNDED;
    }

    statusLabel(): string {
        return this.state.status === EscrowStatus.FUNDED ? 'ACTIVE' : this.state.status;
    }

    async balance(): Promise<bigint> {
        return this.ctx.assets.balanceOf(this.state.asset, this.handle);
    }

    private async releaseToPayee(): Promise<void> {
        const prior = await this.transition(EscrowStatus.RELEASED);
        const { fee, net } = await this.payPayee();
        this.ctx.emit('FundsReleased', {
            instance: this.handle,
            recipient: this.state.payee,
            netAmount: net.toString(),
            feeAmount: fee.toString(),
        });
        await this.counters().moveStatus(prior, EscrowStatus.RELEASED);
    }

    private async transition(next: EscrowStatus): Promise<EscrowStatus> {
        const prior = this.state.status;
        this.state.status = next;
        await this.save();
        return prior;
    }

    private async payPayee(): Promise<FeeSplit> {
        const split = this.split();
        if (split.fee > 0n) {
            await this.ctx.assets.transfer(this.state.asset, this.handle, this.state.feeCollector, split.fee);
        }
        await this.ctx.assets.transfer(this.state.asset, this.handle, this.state.payee, split.net);
        return split;
    }

    private async payPayer(): Promise<void> {
        await this.ctx.assets.transfer(this.state.asset, this.handle, this.state.payer, BigInt(this.state.amount));
    }

    private split(): FeeSplit {
        return splitFee(BigInt(this.state.amount), this.state.feeBips);
    }

    private requireCaller(caller: Principal, expected: Principal, code: ErrorCode, message: string): void {
        if (caller !== expected) throw new EscrowError(code, message);
    }

    private requireStatus(expected: EscrowStatus): void {
        if (this.state.status !== expected) {
            throw new EscrowError('INVALID_STATUS', `Escrow ${this.handle} is ${this.state.status}, expected ${expected}`);
        }
    }

    private counters(): AggregateCounters {
        return new AggregateCounters(this.ctx.world);
    }

    private async save(): Promise<void> {
        await this.ctx.world.put(escrowKey(this.ctx, this.handle), this.state);
    }
}
