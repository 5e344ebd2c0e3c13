import { Context } from 'fabric-contract-api';
import { EVENT_NAME } from '../config';
import { Principal } from '../models/Escrow';
import { DomainEvent, EventName, EventPayloads } from '../models/Events';
import { AssetLedger, WorldStateAssetLedger } from './AssetLedger';
import { InstanceGuard } from './InstanceGuard';
import { LedgerStub, WorldState } from './WorldState';

export type ChaincodeLogger = ReturnType<Context['logging']['getLogger']>;

/**
 * Transaction context shared by every escrow contract. Holds what must live
 * exactly as long as one transaction: the state cache, the instance guard and
 * the buffered domain events.
 */
export class EscrowContext extends Context {
    readonly guard = new InstanceGuard();
    private readonly events: DomainEvent[] = [];
    private state?: WorldState;
    private ledger?: AssetLedger;

    get world(): WorldState {
        if (!this.state) this.state = new WorldState(this.ledgerStub());
        return this.state;
    }

    get assets(): AssetLedger {
        if (!this.ledger) this.ledger = this.createAssetLedger(this.world);
        return this.ledger;
    }

    get caller(): Principal {
        return this.callerId();
    }

    /** Transaction time in whole unix seconds; identical on every endorsing peer. */
    get now(): number {
        return Math.floor(this.ledgerStub().getDateTimestamp().getTime() / 1000);
    }

    logger(name: string): ChaincodeLogger {
        return this.logging.getLogger(name);
    }

    emit<N extends EventName>(name: N, payload: EventPayloads[N]): void {
        this.events.push({ name, payload });
    }

    pendingEvents(): readonly DomainEvent[] {
        return this.events;
    }

    /** Fabric keeps one chaincode event per transaction, so the buffer goes out as one. */
    flushEvents(): void {
        if (this.events.length === 0) return;
        this.ledgerStub().setEvent(EVENT_NAME, Buffer.from(JSON.stringify(this.events)));
        this.events.length = 0;
    }

    protected ledgerStub(): LedgerStub {
        return this.stub;
    }

    protected callerId(): Principal {
        return this.clientIdentity.getID();
    }

    protected createAssetLedger(world: WorldState): AssetLedger {
        return new WorldStateAssetLedger(world);
    }
}
