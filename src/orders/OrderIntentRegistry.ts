import { z } from 'zod';
import { Keys } from '../config';
import { EscrowError } from '../errors';
import { escrowKey } from '../escrow/EscrowInstance';
import { EscrowContext } from '../ledger/EscrowContext';
import { isBlank } from '../ledger/WorldState';
import { EscrowRecord, EscrowRecordSchema, Principal } from '../models/Escrow';
import { EscrowParameters, IntentStatus, OrderIntent, OrderIntentSchema } from '../models/Order';

export interface IntentRequest {
    orderId: string;
    receiver: Principal;
    asset: string;
    amount: bigint;
    metadata: string;
    releaseDelay: number;
}

const OrderIds = z.array(z.string());

/**
 * Sales a seller has announced before any buyer funds them. Holds no funds;
 * the escrow factory reads an intent and marks it paid once the escrow exists.
 */
export class OrderIntentRegistry {
    constructor(private readonly ctx: EscrowContext) {}

    async create(seller: Principal, request: IntentRequest): Promise<OrderIntent> {
        const { orderId, receiver, asset, amount, metadata, releaseDelay } = request;
        if (isBlank(orderId)) throw new EscrowError('EMPTY_ORDER_ID', 'Order id cannot be empty');
        if (isBlank(receiver)) throw new EscrowError('NULL_IDENTITY', 'The receiver must be set');
        if (isBlank(asset)) throw new EscrowError('NULL_IDENTITY', 'The asset must be set');
        if (amount <= 0n) throw new EscrowError('ZERO_AMOUNT', 'Order amount must be greater than zero');
        if (isBlank(metadata)) throw new EscrowError('EMPTY_METADATA', 'Order metadata cannot be empty');
        if (!Number.isSafeInteger(releaseDelay) || releaseDelay < 0) {
            throw new EscrowError('INVALID_DELAY', `Release delay ${releaseDelay} is not a whole number of seconds`);
        }
        if (!Number.isSafeInteger(this.ctx.now + releaseDelay)) {
            throw new EscrowError('INVALID_DELAY', `Release delay ${releaseDelay} runs past the last representable time`);
        }
        if (await this.ctx.world.exists(this.intentKey(orderId))) {
            throw new EscrowError('ORDER_EXISTS', `Order ${orderId} already exists`);
        }

        const now = new Date(this.ctx.now * 1000).toISOString();
        const intent: OrderIntent = {
            orderId,
            docType: 'intent',
            seller,
            receiver,
            asset,
            amount: amount.toString(),
            metadata,
            releaseDelay,
            status: IntentStatus.PENDING,
            createdAt: now,
            updatedAt: now,
        };

        await this.save(intent);
        await this.link(seller, orderId);
        this.ctx.emit('IntentCreated', { orderId, seller, receiver, amount: intent.amount });
        return intent;
    }

    async markPaid(orderId: string, buyer: Principal, escrow: string): Promise<OrderIntent> {
        const intent = await this.intentOf(orderId);
        if (isBlank(buyer)) throw new EscrowError('NULL_IDENTITY', 'The buyer must be set');
        if (isBlank(escrow)) throw new EscrowError('NULL_IDENTITY', 'The escrow must be set');
        this.requirePending(intent);

        const record = await this.ctx.world.get(escrowKey(this.ctx, escrow), EscrowRecordSchema);
        if (!record || record.orderId !== orderId || record.payer !== buyer) {
            throw new EscrowError('ESCROW_MISMATCH', `Escrow ${escrow} was not funded by ${buyer} for order ${orderId}`);
        }
        if (!matchesTerms(record, intent)) {
            throw new EscrowError('ESCROW_MISMATCH', `Escrow ${escrow} does not hold the terms of order ${orderId}`);
        }

        intent.buyer = buyer;
        intent.escrow = escrow;
        intent.status = IntentStatus.PAID;
        intent.updatedAt = new Date(this.ctx.now * 1000).toISOString();

        await this.save(intent);
        await this.link(buyer, orderId);
        this.ctx.emit('IntentUpdated', { orderId, escrow, status: IntentStatus.PAID });
        return intent;
    }

    async cancel(caller: Principal, orderId: string): Promise<OrderIntent> {
        const intent = await this.intentOf(orderId);
        if (intent.seller !== caller) throw new EscrowError('NOT_SELLER', 'Only the seller can cancel an order');
        this.requirePending(intent);

        intent.status = IntentStatus.CANCELLED;
        intent.updatedAt = new Date(this.ctx.now * 1000).toISOString();

        await this.save(intent);
        this.ctx.emit('IntentUpdated', { orderId, escrow: '', status: IntentStatus.CANCELLED });
        return intent;
    }

    async find(orderId: string): Promise<OrderIntent | undefined> {
        if (isBlank(orderId)) return undefined;
        return this.ctx.world.get(this.intentKey(orderId), OrderIntentSchema);
    }

    async intentOf(orderId: string): Promise<OrderIntent> {
        const intent = await this.find(orderId);
        if (!intent) throw new EscrowError('ORDER_NOT_FOUND', `Order ${orderId} does not exist`);
        return intent;
    }

    async intentsOf(participant: Principal, status?: IntentStatus): Promise<OrderIntent[]> {
        const intents: OrderIntent[] = [];
        for (const orderId of await this.orderIdsOf(participant)) {
            const intent = await this.intentOf(orderId);
            if (status === undefined || intent.status === status) intents.push(intent);
        }
        return intents;
    }

    async intentCount(participant: Principal): Promise<number> {
        return (await this.orderIdsOf(participant)).length;
    }

    async isPending(orderId: string): Promise<boolean> {
        const intent = await this.find(orderId);
        return intent?.status === IntentStatus.PENDING;
    }

    async escrowParameters(orderId: string): Promise<EscrowParameters> {
        const { seller, receiver, asset, amount, metadata, releaseDelay } = await this.intentOf(orderId);
        return { seller, receiver, asset, amount, metadata, releaseDelay };
    }

    private requirePending(intent: OrderIntent): void {
        if (intent.status !== IntentStatus.PENDING) {
            throw new EscrowError('INTENT_ALREADY_PROCESSED', `Order ${intent.orderId} is already ${intent.status}`);
        }
    }

    private async orderIdsOf(participant: Principal): Promise<string[]> {
        if (isBlank(participant)) return [];
        return (await this.ctx.world.get(this.ctx.world.key(Keys.USER_INTENTS, participant), OrderIds)) ?? [];
    }

    private async link(participant: Principal, orderId: string): Promise<void> {
        const orderIds = await this.orderIdsOf(participant);
        if (orderIds.includes(orderId)) return;
        await this.ctx.world.put(this.ctx.world.key(Keys.USER_INTENTS, participant), [...orderIds, orderId]);
    }

    private async save(intent: OrderIntent): Promise<void> {
        await this.ctx.world.put(this.intentKey(intent.orderId), intent);
    }

    private intentKey(orderId: string): string {
        return this.ctx.world.key(Keys.INTENT, orderId);
    }
}

/** The escrow pays the intent's receiver exactly what the seller asked for. */
function matchesTerms(record: EscrowRecord, intent: OrderIntent): boolean {
    return record.payee === intent.receiver
        && record.asset === intent.asset
        && record.amount === intent.amount
        && record.metadata === intent.metadata
        && record.releaseAfter - record.createdAt === intent.releaseDelay;
}
