import { MAX_FEE_BIPS } from '../config';

export interface FeeSplit {
    fee: bigint;
    net: bigint;
}

/**
 * Splits a settlement into the platform fee and what the recipient gets.
 * The fee truncates; whatever the division drops stays in `net`, so
 * `fee + net === amount` for every input.
 */
export function splitFee(amount: bigint, feeBips: number): FeeSplit {
    const fee = (amount * BigInt(feeBips)) / BigInt(MAX_FEE_BIPS);
    return { fee, net: amount - fee };
}

export function isValidFeeBips(feeBips: number): boolean {
    return Number.isInteger(feeBips) && feeBips >= 0 && feeBips < MAX_FEE_BIPS;
}
