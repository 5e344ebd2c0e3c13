import { z } from 'zod';
import { Principal } from './Escrow';

export interface Asset {
    id: string;             // "USDC"
    docType: 'asset';
    symbol: string;
    decimals: number;
    issuer: Principal;      // only identity allowed to mint
}

export const AssetSchema: z.ZodType<Asset, z.ZodTypeDef, unknown> = z.object({
    id: z.string().min(1),
    docType: z.literal('asset'),
    symbol: z.string().min(1),
    decimals: z.number().int().nonnegative(),
    issuer: z.string().min(1),
});
