import { z } from 'zod';
import { ErrorCode, EscrowError } from '../errors';
import { EscrowStatus } from '../models/Escrow';
import { IntentStatus } from '../models/Order';

// Chaincode arguments always arrive as strings.
const Digits = z.string().trim().regex(/^\d+$/);

export const AmountArg = Digits.transform((value) => BigInt(value));
export const SecondsArg = Digits.transform(Number);
export const BipsArg = Digits.transform(Number);
export const DecimalsArg = Digits.transform(Number).pipe(z.number().int().max(36));
export const EscrowStatusArg = z.nativeEnum(EscrowStatus);
export const IntentStatusArg = z.nativeEnum(IntentStatus);

export function parseArg<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: string, code: ErrorCode, label: string): T {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
        throw new EscrowError(code, `${label} "${value}" is not valid`);
    }
    return parsed.data;
}
