import { z } from 'zod';
import { Principal } from './Escrow';

export enum IntentStatus {
    PENDING = 'PENDING',        // Seller listed the sale
    PAID = 'PAID',              // Escrow funded by a buyer
    CANCELLED = 'CANCELLED'
}

export interface OrderIntent {
    orderId: string;        // "ORDER_123"
    docType: 'intent';

    seller: Principal;
    receiver: Principal;    // payee of the escrow
    buyer?: Principal;      // set once paid
    escrow?: string;        // instance handle, set once paid

    asset: string;
    amount: string;
    metadata: string;
    releaseDelay: number;   // seconds

    status: IntentStatus;
    createdAt: string;
    updatedAt: string;
}

export const OrderIntentSchema: z.ZodType<OrderIntent, z.ZodTypeDef, unknown> = z.object({
    orderId: z.string().min(1),
    docType: z.literal('intent'),
    seller: z.string().min(1),
    receiver: z.string().min(1),
    buyer: z.string().optional(),
    escrow: z.string().optional(),
    asset: z.string().min(1),
    amount: z.string().regex(/^\d+$/),
    metadata: z.string(),
    releaseDelay: z.number().int().nonnegative(),
    status: z.nativeEnum(IntentStatus),
    createdAt: z.string(),
    updatedAt: z.string(),
});

/** What the escrow factory reads from an intent before funding it. */
export interface EscrowParameters {
    seller: Principal;
    receiver: Principal;
    asset: string;
    amount: string;
    metadata: string;
    releaseDelay: number;
}
