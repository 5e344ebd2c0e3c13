import { Info, Transaction } from 'fabric-contract-api';
import { loadInstance } from '../escrow/templates';
import { EscrowContext } from '../ledger/EscrowContext';
import { BaseContract } from './BaseContract';

@Info({ title: 'EscrowContract', description: 'Settle, refund and dispute a single escrow' })
export class EscrowContract extends BaseContract {

    @Transaction()
    async Release(ctx: EscrowContext, escrow: string): Promise<void> {
        const instance = await loadInstance(ctx, escrow);
        await instance.release(ctx.caller);
        this.logger(ctx).info(`Escrow ${escrow} released to ${instance.record().payee}`);
    }

    @Transaction()
    async Refund(ctx: EscrowContext, escrow: string): Promise<void> {
        const instance = await loadInstance(ctx, escrow);
        await instance.refund(ctx.caller);
        this.logger(ctx).info(`Escrow ${escrow} refunded to ${instance.record().payer}`);
    }

    @Transaction()
    async AutoRelease(ctx: EscrowContext, escrow: string): Promise<void> {
        const instance = await loadInstance(ctx, escrow);
        await instance.autoRelease();
        this.logger(ctx).info(`Escrow ${escrow} auto-released by ${ctx.caller}`);
    }

    @Transaction()
    async RaiseDispute(ctx: EscrowContext, escrow: string, reason: string): Promise<void> {
        const instance = await loadInstance(ctx, escrow);
        await instance.raiseDispute(ctx.caller, reason);
        this.logger(ctx).info(`Dispute raised on ${escrow} by ${ctx.caller}`);
    }

    @Transaction(false)
    async ReadEscrow(ctx: EscrowContext, escrow: string): Promise<string> {
        return this.toJSON((await loadInstance(ctx, escrow)).record());
    }

    @Transaction(false)
    async GetBasicInfo(ctx: EscrowContext, escrow: string): Promise<string> {
        return this.toJSON((await loadInstance(ctx, escrow)).basicInfo());
    }

    @Transaction(false)
    async GetFeeInfo(ctx: EscrowContext, escrow: string): Promise<string> {
        return this.toJSON((await loadInstance(ctx, escrow)).feeInfo());
    }

    @Transaction(false)
    async GetDisputeInfo(ctx: EscrowContext, escrow: string): Promise<string> {
        return this.toJSON((await loadInstance(ctx, escrow)).disputeInfo());
    }

    @Transaction(false)
    async GetTimestamps(ctx: EscrowContext, escrow: string): Promise<string> {
        return this.toJSON((await loadInstance(ctx, escrow)).timestamps());
    }

    @Transaction(false)
    async GetTimeLeft(ctx: EscrowContext, escrow: string): Promise<number> {
        return (await loadInstance(ctx, escrow)).timeLeft();
    }

    @Transaction(false)
    async CanAutoRelease(ctx: EscrowContext, escrow: string): Promise<boolean> {
        return (await loadInstance(ctx, escrow)).canAutoRelease();
    }

    @Transaction(false)
    async IsActive(ctx: EscrowContext, escrow: string): Promise<boolean> {
        return (await loadInstance(ctx, escrow)).isActive();
    }

    @Transaction(false)
    async GetStatusString(ctx: EscrowContext, escrow: string): Promise<string> {
        return (await loadInstance(ctx, escrow)).statusLabel();
    }

    @Transaction(false)
    async GetBalance(ctx: EscrowContext, escrow: string): Promise<string> {
        const instance = await loadInstance(ctx, escrow);
        return (await instance.balance()).toString();
    }
}
