export type ErrorKind = 'validation' | 'state' | 'authorization' | 'funding' | 'business';

const KINDS = {
    EMPTY_ORDER_ID: 'validation',
    NULL_IDENTITY: 'validation',
    ZERO_AMOUNT: 'validation',
    INVALID_AMOUNT: 'validation',
    INVALID_DELAY: 'validation',
    INVALID_ARGUMENT: 'validation',
    FEE_OUT_OF_RANGE: 'validation',
    EMPTY_REASON: 'validation',
    EMPTY_METADATA: 'validation',
    UNKNOWN_TEMPLATE: 'validation',

    INVALID_STATUS: 'state',
    REENTRANT_CALL: 'state',
    NOT_INITIALIZED: 'state',
    ALREADY_INITIALIZED: 'state',
    INTENT_ALREADY_PROCESSED: 'state',

    NOT_PAYER: 'authorization',
    NOT_PAYEE: 'authorization',
    NOT_PARTY: 'authorization',
    NOT_ARBITRATOR: 'authorization',
    NOT_FACTORY: 'authorization',
    NOT_OWNER: 'authorization',
    NOT_SELLER: 'authorization',
    NOT_ISSUER: 'authorization',

    INSUFFICIENT_ALLOWANCE: 'funding',
    INSUFFICIENT_BALANCE: 'funding',

    ORDER_EXISTS: 'business',
    INVALID_WINNER: 'business',
    RELEASE_TOO_EARLY: 'business',
    UNKNOWN_ESCROW: 'business',
    ORDER_NOT_FOUND: 'business',
    ESCROW_MISMATCH: 'business',
    ASSET_EXISTS: 'business',
    UNKNOWN_ASSET: 'business',
} as const satisfies Record<string, ErrorKind>;

export type ErrorCode = keyof typeof KINDS;

/**
 * Error raised by every rejected chaincode operation.
 *
 * Fabric clients only see the message of a failed invocation, so the code is
 * repeated as its prefix: `ORDER_EXISTS: Order ORDER_1 already has an escrow`.
 */
export class EscrowError extends Error {
    readonly kind: ErrorKind;

    constructor(readonly code: ErrorCode, detail: string) {
        super(`${code}: ${detail}`);
        this.name = 'EscrowError';
        this.kind = KINDS[code];
    }
}

export function isEscrowError(error: unknown, code?: ErrorCode): error is EscrowError {
    return error instanceof EscrowError && (code === undefined || error.code === code);
}
