import { Contract } from 'fabric-contract-api';
import { ChaincodeLogger, EscrowContext } from '../ledger/EscrowContext';

export abstract class BaseContract extends Contract {

    createContext(): EscrowContext {
        return new EscrowContext();
    }

    async beforeTransaction(ctx: EscrowContext): Promise<void> {
        this.logger(ctx).debug(`Transaction submitted by ${ctx.caller}`);
    }

    // Domain events buffered during the transaction leave as one chaincode event
    async afterTransaction(ctx: EscrowContext, _result: unknown): Promise<void> {
        ctx.flushEvents();
    }

    protected logger(ctx: EscrowContext): ChaincodeLogger {
        return ctx.logger(this.getName());
    }

    // Helper: query results go back to the client as JSON
    protected toJSON(value: unknown): string {
        return JSON.stringify(value);
    }
}
