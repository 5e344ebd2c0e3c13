import { createLogger } from 'winston';
import { BaseContract } from '../../src/contracts/BaseContract';
import { AssetLedger } from '../../src/ledger/AssetLedger';
import { EscrowContext } from '../../src/ledger/EscrowContext';
import { LedgerStub, WorldState } from '../../src/ledger/WorldState';
import { Principal } from '../../src/models/Escrow';
import { MemoryStub } from './MemoryStub';

export type AssetLedgerFactory = (world: WorldState, ctx: EscrowContext) => AssetLedger;

const silent = createLogger({ silent: true });

export class TestContext extends EscrowContext {
    constructor(
        private readonly memory: MemoryStub,
        private readonly identity: Principal,
        private readonly ledgerFactory?: AssetLedgerFactory
    ) {
        super();
        this.logging = { setLevel: () => undefined, getLogger: () => silent };
    }

    protected ledgerStub(): LedgerStub {
        return this.memory;
    }

    protected callerId(): Principal {
        return this.identity;
    }

    protected createAssetLedger(world: WorldState): AssetLedger {
        return this.ledgerFactory ? this.ledgerFactory(world, this) : super.createAssetLedger(world);
    }
}

/** Runs contract functions the way the peer does: one context per transaction, all-or-nothing. */
export class ChaincodeHarness {
    readonly stub = new MemoryStub();
    assetLedger?: AssetLedgerFactory;

    context(caller: Principal): TestContext {
        return new TestContext(this.stub, caller, this.assetLedger);
    }

    async submit<T>(contract: BaseContract, caller: Principal, invoke: (ctx: TestContext) => Promise<T>): Promise<T> {
        const ctx = this.context(caller);
        try {
            await contract.beforeTransaction(ctx);
            const result = await invoke(ctx);
            await contract.afterTransaction(ctx, result);
            this.stub.commit();
            return result;
        } catch (error) {
            this.stub.rollback();
            throw error;
        }
    }

    /** Read-only invocation; nothing it writes is kept. */
    async evaluate<T>(caller: Principal, invoke: (ctx: TestContext) => Promise<T>): Promise<T> {
        try {
            return await invoke(this.context(caller));
        } finally {
            this.stub.rollback();
        }
    }
}
