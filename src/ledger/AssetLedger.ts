import { z } from 'zod';
import { Keys } from '../config';
import { EscrowError } from '../errors';
import { Principal } from '../models/Escrow';
import { WorldState, isBlank } from './WorldState';

/** What escrow needs from the ledger of the asset it holds. */
export interface AssetLedger {
    balanceOf(asset: string, account: Principal): Promise<bigint>;
    allowance(asset: string, owner: Principal, spender: Principal): Promise<bigint>;
    /** Moves funds the holder already has. */
    transfer(asset: string, holder: Principal, recipient: Principal, amount: bigint): Promise<void>;
    /** Moves an owner's funds on behalf of a spender, consuming its allowance. */
    transferFrom(asset: string, spender: Principal, owner: Principal, recipient: Principal, amount: bigint): Promise<void>;
}

const StoredAmount = z.string().regex(/^\d+$/);

/** Balances and allowances kept in the chaincode's own world state. */
export class WorldStateAssetLedger implements AssetLedger {
    constructor(private readonly world: WorldState) {}

    async balanceOf(asset: string, account: Principal): Promise<bigint> {
        if (isBlank(asset) || isBlank(account)) return 0n;
        return this.amountAt(this.world.key(Keys.BALANCE, asset, account));
    }

    async allowance(asset: string, owner: Principal, spender: Principal): Promise<bigint> {
        if (isBlank(asset) || isBlank(owner) || isBlank(spender)) return 0n;
        return this.amountAt(this.world.key(Keys.ALLOWANCE, asset, owner, spender));
    }

    async transfer(asset: string, holder: Principal, recipient: Principal, amount: bigint): Promise<void> {
        await this.move(asset, holder, recipient, amount);
    }

    async transferFrom(asset: string, spender: Principal, owner: Principal, recipient: Principal, amount: bigint): Promise<void> {
        const allowed = await this.allowance(asset, owner, spender);
        if (allowed < amount) {
            throw new EscrowError('INSUFFICIENT_ALLOWANCE', `Allowance ${allowed} is below ${amount}`);
        }
        await this.approve(asset, owner, spender, allowed - amount);
        await this.move(asset, owner, recipient, amount);
    }

    async approve(asset: string, owner: Principal, spender: Principal, amount: bigint): Promise<void> {
        await this.world.put(this.world.key(Keys.ALLOWANCE, asset, owner, spender), amount.toString());
    }

    async mint(asset: string, account: Principal, amount: bigint): Promise<void> {
        const balance = await this.balanceOf(asset, account);
        await this.world.put(this.world.key(Keys.BALANCE, asset, account), (balance + amount).toString());
    }

    private async move(asset: string, from: Principal, to: Principal, amount: bigint): Promise<void> {
        const available = await this.balanceOf(asset, from);
        if (available < amount) {
            throw new EscrowError('INSUFFICIENT_BALANCE', `Balance ${available} is below ${amount}`);
        }
        await this.world.put(this.world.key(Keys.BALANCE, asset, from), (available - amount).toString());
        const received = await this.balanceOf(asset, to);
        await this.world.put(this.world.key(Keys.BALANCE, asset, to), (received + amount).toString());
    }

    private async amountAt(key: string): Promise<bigint> {
        const stored = await this.world.get(key, StoredAmount);
        return stored === undefined ? 0n : BigInt(stored);
    }
}
