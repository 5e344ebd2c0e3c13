import { Info, Transaction } from 'fabric-contract-api';
import { EscrowContext } from '../ledger/EscrowContext';
import { OrderIntentRegistry } from '../orders/OrderIntentRegistry';
import { AmountArg, IntentStatusArg, SecondsArg, parseArg } from './args';
import { BaseContract } from './BaseContract';

@Info({ title: 'OrderIntentContract', description: 'Seller-declared sales waiting for an escrow' })
export class OrderIntentContract extends BaseContract {

    @Transaction()
    async CreateIntent(
        ctx: EscrowContext,
        orderId: string,
        receiver: string,
        amount: string,
        asset: string,
        metadata: string,
        releaseDelay: string
    ): Promise<void> {
        const intent = await new OrderIntentRegistry(ctx).create(ctx.caller, {
            orderId,
            receiver,
            asset,
            amount: parseArg(AmountArg, amount, 'INVALID_AMOUNT', 'Amount'),
            metadata,
            releaseDelay: parseArg(SecondsArg, releaseDelay, 'INVALID_DELAY', 'Release delay'),
        });
        this.logger(ctx).info(`Order intent ${intent.orderId} created by ${intent.seller}`);
    }

    @Transaction()
    async UpdateIntentWithEscrow(ctx: EscrowContext, orderId: string, buyer: string, escrow: string): Promise<void> {
        await new OrderIntentRegistry(ctx).markPaid(orderId, buyer, escrow);
        this.logger(ctx).info(`Order intent ${orderId} paid through ${escrow}`);
    }

    @Transaction()
    async CancelIntent(ctx: EscrowContext, orderId: string): Promise<void> {
        await new OrderIntentRegistry(ctx).cancel(ctx.caller, orderId);
        this.logger(ctx).info(`Order intent ${orderId} cancelled`);
    }

    @Transaction(false)
    async ReadIntent(ctx: EscrowContext, orderId: string): Promise<string> {
        return this.toJSON(await new OrderIntentRegistry(ctx).intentOf(orderId));
    }

    @Transaction(false)
    async GetUserIntents(ctx: EscrowContext, participant: string): Promise<string> {
        return this.toJSON(await new OrderIntentRegistry(ctx).intentsOf(participant));
    }

    @Transaction(false)
    async GetUserIntentsByStatus(ctx: EscrowContext, participant: string, status: string): Promise<string> {
        const wanted = parseArg(IntentStatusArg, status, 'INVALID_ARGUMENT', 'Status');
        return this.toJSON(await new OrderIntentRegistry(ctx).intentsOf(participant, wanted));
    }

    @Transaction(false)
    async GetIntentCount(ctx: EscrowContext, participant: string): Promise<number> {
        return new OrderIntentRegistry(ctx).intentCount(participant);
    }

    @Transaction(false)
    async IsOrderPending(ctx: EscrowContext, orderId: string): Promise<boolean> {
        return new OrderIntentRegistry(ctx).isPending(orderId);
    }

    @Transaction(false)
    async GetIntentForEscrow(ctx: EscrowContext, orderId: string): Promise<string> {
        return this.toJSON(await new OrderIntentRegistry(ctx).escrowParameters(orderId));
    }
}
