import { z } from 'zod';
import { EscrowStatus, Principal } from './Escrow';

export interface FactoryConfig {
    docType: 'factory';
    owner: Principal;           // governance identity for the setters
    template: string;           // behaviour shared by every new instance
    account: Principal;         // spender of payer allowances
    feeCollector: Principal;
    arbitrator: Principal;
    defaultFeeBips: number;     // applies to instances created from now on
}

export const FactoryConfigSchema: z.ZodType<FactoryConfig, z.ZodTypeDef, unknown> = z.object({
    docType: z.literal('factory'),
    owner: z.string().min(1),
    template: z.string().min(1),
    account: z.string().min(1),
    feeCollector: z.string().min(1),
    arbitrator: z.string().min(1),
    defaultFeeBips: z.number().int().nonnegative(),
});

export interface FactoryStats {
    totalEscrows: number;
    totalVolume: string;
    feeBips: number;
    feeCollector: Principal;
    arbitrator: Principal;
}

export type StatusCounts = Record<EscrowStatus, number>;

export interface EscrowRequest {
    orderId: string;
    payee: Principal;
    asset: string;
    amount: bigint;
    metadata: string;
    releaseDelay: number;
}
