/** Denominator of every fee rate; a rate must stay strictly below it. */
export const MAX_FEE_BIPS = 10000;

/** Ledger account the factory spends payer allowances from and stamps on every instance it owns. */
export const FACTORY_ACCOUNT = 'escrow-factory';

/** Chaincode event carrying the domain events buffered during one transaction. */
export const EVENT_NAME = 'EscrowEvents';

/** World-state object types used as the first segment of composite keys. */
export const Keys = {
    FACTORY: 'factory',
    ESCROW: 'escrow',
    ORDER: 'order',
    ESCROW_INDEX: 'escrowIndex',
    COUNTER: 'counter',
    STATUS_COUNT: 'statusCount',
    PARTICIPANT_COUNT: 'participantCount',
    INTENT: 'intent',
    USER_INTENTS: 'userIntents',
    ASSET: 'asset',
    BALANCE: 'balance',
    ALLOWANCE: 'allowance',
} as const;
