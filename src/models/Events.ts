import { Principal } from './Escrow';
import { IntentStatus } from './Order';

export interface EventPayloads {
    EscrowInitialized: { instance: string; payer: Principal; payee: Principal; asset: string; amount: string; metadata: string };
    EscrowCreated: { instance: string; orderId: string; payer: Principal; payee: Principal; asset: string; amount: string };
    FundsReleased: { instance: string; recipient: Principal; netAmount: string; feeAmount: string };
    FundsRefunded: { instance: string; recipient: Principal; amount: string };
    DisputeRaised: { instance: string; raiser: Principal; reason: string };
    DisputeResolved: { instance: string; winner: Principal; netAmount: string; feeAmount: string };
    FeeCollectorUpdated: { newCollector: Principal };
    ArbitratorUpdated: { newArbitrator: Principal };
    PlatformFeeUpdated: { newFeeBips: number };
    OwnershipTransferred: { previousOwner: Principal; newOwner: Principal };
    IntentCreated: { orderId: string; seller: Principal; receiver: Principal; amount: string };
    IntentUpdated: { orderId: string; escrow: string; status: IntentStatus };
}

export type EventName = keyof EventPayloads;

export interface DomainEvent {
    name: EventName;
    payload: EventPayloads[EventName];
}
