import { z } from 'zod';

export enum EscrowStatus {
    FUNDED = 'FUNDED',          // Funds locked, awaiting settlement
    RELEASED = 'RELEASED',      // Paid to payee (minus fee)
    REFUNDED = 'REFUNDED',      // Returned to payer
    DISPUTED = 'DISPUTED',      // Waiting for the arbitrator
    RESOLVED = 'RESOLVED'       // Arbitrator decided
}

export const ESCROW_STATUSES: readonly EscrowStatus[] = [
    EscrowStatus.FUNDED,
    EscrowStatus.RELEASED,
    EscrowStatus.REFUNDED,
    EscrowStatus.DISPUTED,
    EscrowStatus.RESOLVED,
];

export type Principal = string;

export interface EscrowRecord {
    handle: string;         // "ESCROW_ORDER_123"
    docType: 'escrow';
    template: string;       // template the instance was cloned from
    factory: Principal;     // owning factory account

    orderId: string;
    payer: Principal;
    payee: Principal;
    asset: string;
    amount: string;         // integer string, never mutated
    metadata: string;

    createdAt: number;      // unix seconds
    releaseAfter: number;   // unix seconds

    feeBips: number;        // snapshot at creation
    feeCollector: Principal;

    status: EscrowStatus;

    disputeReason?: string;
    disputeRaisedBy?: Principal;
}

export const EscrowRecordSchema: z.ZodType<EscrowRecord, z.ZodTypeDef, unknown> = z.object({
    handle: z.string().min(1),
    docType: z.literal('escrow'),
    template: z.string().min(1),
    factory: z.string().min(1),
    orderId: z.string().min(1),
    payer: z.string().min(1),
    payee: z.string().min(1),
    asset: z.string().min(1),
    amount: z.string().regex(/^\d+$/),
    metadata: z.string(),
    createdAt: z.number().int(),
    releaseAfter: z.number().int(),
    feeBips: z.number().int().nonnegative(),
    feeCollector: z.string().min(1),
    status: z.nativeEnum(EscrowStatus),
    disputeReason: z.string().optional(),
    disputeRaisedBy: z.string().optional(),
});

/** Values a template needs to open a new, funded instance. */
export interface EscrowInit {
    handle: string;
    factory: Principal;
    orderId: string;
    payer: Principal;
    payee: Principal;
    asset: string;
    amount: bigint;
    metadata: string;
    releaseDelay: number;
    feeBips: number;
    feeCollector: Principal;
}

export interface BasicInfo {
    payer: Principal;
    payee: Principal;
    asset: string;
    amount: string;
    status: EscrowStatus;
}

export interface FeeInfo {
    feeBips: number;
    collector: Principal;
    feeAmount: string;
    netAmount: string;
}

export interface DisputeInfo {
    hasDispute: boolean;
    raisedBy: Principal;
    reason: string;
}

export interface Timestamps {
    createdAt: number;
    releaseAfter: number;
    timeLeft: number;
}

/** Behaviour every escrow instance exposes, whatever template it was cloned from. */
export interface EscrowOperations {
    readonly handle: string;
    readonly status: EscrowStatus;

    release(caller: Principal): Promise<void>;
    refund(caller: Principal): Promise<void>;
    autoRelease(): Promise<void>;
    raiseDispute(caller: Principal, reason: string): Promise<void>;
    resolveDispute(caller: Principal, winner: Principal): Promise<void>;

    record(): EscrowRecord;
    basicInfo(): BasicInfo;
    feeInfo(): FeeInfo;
    disputeInfo(): DisputeInfo;
    timestamps(): Timestamps;
    timeLeft(): number;
    canAutoRelease(): boolean;
    isActive(): boolean;
    statusLabel(): string;
    balance(): Promise<bigint>;
}
