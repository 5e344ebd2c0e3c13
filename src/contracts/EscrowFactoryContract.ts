import { Info, Transaction } from 'fabric-contract-api';
import { EscrowFactory } from '../escrow/EscrowFactory';
import { EscrowContext } from '../ledger/EscrowContext';
import { AmountArg, BipsArg, EscrowStatusArg, SecondsArg, parseArg } from './args';
import { BaseContract } from './BaseContract';

@Info({ title: 'EscrowFactoryContract', description: 'Create escrows, route disputes and keep global escrow stats' })
export class EscrowFactoryContract extends BaseContract {

    @Transaction()
    async Initialize(ctx: EscrowContext, templateRef: string, feeCollector: string, arbitrator: string, defaultFeeBips: string): Promise<void> {
        const factory = new EscrowFactory(ctx);
        const config = await factory.initialize(ctx.caller, {
            template: templateRef,
            feeCollector,
            arbitrator,
            defaultFeeBips: parseArg(BipsArg, defaultFeeBips, 'FEE_OUT_OF_RANGE', 'Fee bips'),
        });
        this.logger(ctx).info(`Factory initialized by ${config.owner} with template ${config.template}`);
    }

    @Transaction()
    async CreateEscrow(
        ctx: EscrowContext,
        orderId: string,
        payee: string,
        asset: string,
        amount: string,
        metadata: string,
        releaseDelay: string
    ): Promise<string> {
        const handle = await new EscrowFactory(ctx).createEscrow(ctx.caller, {
            orderId,
            payee,
            asset,
            amount: parseArg(AmountArg, amount, 'INVALID_AMOUNT', 'Amount'),
            metadata,
            releaseDelay: parseArg(SecondsArg, releaseDelay, 'INVALID_DELAY', 'Release delay'),
        });
        this.logger(ctx).info(`Escrow ${handle} funded with ${amount} ${asset} for order ${orderId}`);
        return handle;
    }

    @Transaction()
    async CreateEscrowFromIntent(ctx: EscrowContext, orderId: string): Promise<string> {
        const handle = await new EscrowFactory(ctx).createEscrowFromIntent(ctx.caller, orderId);
        this.logger(ctx).info(`Escrow ${handle} funded from order intent ${orderId}`);
        return handle;
    }

    @Transaction()
    async ResolveDispute(ctx: EscrowContext, escrow: string, winner: string): Promise<void> {
        await new EscrowFactory(ctx).resolveDispute(ctx.caller, escrow, winner);
        this.logger(ctx).info(`Dispute on ${escrow} resolved for ${winner}`);
    }

    @Transaction()
    async SetFeeCollector(ctx: EscrowContext, feeCollector: string): Promise<void> {
        await new EscrowFactory(ctx).setFeeCollector(ctx.caller, feeCollector);
        this.logger(ctx).info(`Fee collector set to ${feeCollector}`);
    }

    @Transaction()
    async SetArbitrator(ctx: EscrowContext, arbitrator: string): Promise<void> {
        await new EscrowFactory(ctx).setArbitrator(ctx.caller, arbitrator);
        this.logger(ctx).info(`Arbitrator set to ${arbitrator}`);
    }

    @Transaction()
    async SetPlatformFee(ctx: EscrowContext, feeBips: string): Promise<void> {
        const bips = parseArg(BipsArg, feeBips, 'FEE_OUT_OF_RANGE', 'Fee bips');
        await new EscrowFactory(ctx).setDefaultFeeBips(ctx.caller, bips);
        this.logger(ctx).info(`Default fee set to ${bips} bips`);
    }

    @Transaction()
    async TransferOwnership(ctx: EscrowContext, newOwner: string): Promise<void> {
        await new EscrowFactory(ctx).transferOwnership(ctx.caller, newOwner);
        this.logger(ctx).info(`Factory ownership transferred to ${newOwner}`);
    }

    @Transaction(false)
    async GetEscrowAddress(ctx: EscrowContext, orderId: string): Promise<string> {
        return (await new EscrowFactory(ctx).escrowOf(orderId)) ?? '';
    }

    @Transaction(false)
    async IsKnownEscrow(ctx: EscrowContext, escrow: string): Promise<boolean> {
        return new EscrowFactory(ctx).isKnownEscrow(escrow);
    }

    @Transaction(false)
    async GetFactoryStats(ctx: EscrowContext): Promise<string> {
        return this.toJSON(await new EscrowFactory(ctx).stats());
    }

    @Transaction(false)
    async GetStatusCounts(ctx: EscrowContext): Promise<string> {
        return this.toJSON(await new EscrowFactory(ctx).statusCounts());
    }

    @Transaction(false)
    async GetTotalEscrows(ctx: EscrowContext): Promise<number> {
        return new EscrowFactory(ctx).totalEscrows();
    }

    @Transaction(false)
    async GetUserEscrowCount(ctx: EscrowContext, participant: string): Promise<number> {
        return new EscrowFactory(ctx).participantCount(participant);
    }

    @Transaction(false)
    async GetUserEscrows(ctx: EscrowContext, participant: string): Promise<string> {
        return this.toJSON(await new EscrowFactory(ctx).escrowsOf(participant));
    }

    @Transaction(false)
    async GetEscrowsByStatus(ctx: EscrowContext, status: string): Promise<string> {
        const wanted = parseArg(EscrowStatusArg, status, 'INVALID_ARGUMENT', 'Status');
        return this.toJSON(await new EscrowFactory(ctx).escrowsByStatus(wanted));
    }

    @Transaction(false)
    async GetAllEscrows(ctx: EscrowContext): Promise<string> {
        return this.toJSON(await new EscrowFactory(ctx).allEscrows());
    }

    @Transaction(false)
    async GetConfig(ctx: EscrowContext): Promise<string> {
        return this.toJSON(await new EscrowFactory(ctx).config());
    }
}
